import { ProtocolError } from '../errors.js';

/**
 * Outbound keepalive frame
 */
export interface PingMessage {
  type: 'ping';
  id: number;
}

/**
 * Messages the agent reacts to. Everything else is `other` and only logged.
 */
export type InboundMessage =
  | { kind: 'pong'; replyTo: number }
  | { kind: 'reconnect_url'; url: string }
  | { kind: 'hello'; region: string | null; hostId: string | null }
  | { kind: 'other'; type: string | null };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export function encodePing(id: number): string {
  const message: PingMessage = { type: 'ping', id };
  return JSON.stringify(message);
}

/**
 * Parse a text frame once and classify it by its `type` field
 *
 * @throws ProtocolError when the frame is not a JSON object, or a known
 * type is missing its required fields
 */
export function decodeInboundMessage(frame: string): InboundMessage {
  let body: unknown;
  try {
    body = JSON.parse(frame);
  } catch (error) {
    throw new ProtocolError('Frame is not valid JSON', { cause: error });
  }

  if (!isRecord(body)) {
    throw new ProtocolError('Frame is not a JSON object');
  }

  switch (body.type) {
    case 'pong': {
      const replyTo = body.reply_to;
      if (typeof replyTo !== 'number' || !Number.isInteger(replyTo)) {
        throw new ProtocolError('pong frame without an integer reply_to');
      }
      return { kind: 'pong', replyTo };
    }

    case 'reconnect_url': {
      const url = body.url;
      if (typeof url !== 'string' || url === '') {
        throw new ProtocolError('reconnect_url frame without a url');
      }
      return { kind: 'reconnect_url', url };
    }

    case 'hello':
      return {
        kind: 'hello',
        region: optionalString(body.region),
        hostId: optionalString(body.host_id),
      };

    default:
      return { kind: 'other', type: optionalString(body.type) };
  }
}
