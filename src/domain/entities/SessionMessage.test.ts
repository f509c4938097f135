import { describe, it, expect } from 'vitest';
import { decodeInboundMessage, encodePing } from './SessionMessage.js';
import { ProtocolError } from '../errors.js';

describe('encodePing', () => {
  it('should encode the keepalive frame', () => {
    expect(encodePing(12)).toBe('{"type":"ping","id":12}');
  });
});

describe('decodeInboundMessage', () => {
  it('should decode pongs', () => {
    expect(decodeInboundMessage('{"type":"pong","reply_to":4,"time":1}')).toEqual({
      kind: 'pong',
      replyTo: 4,
    });
  });

  it('should decode reconnect hints', () => {
    expect(
      decodeInboundMessage('{"type":"reconnect_url","url":"wss://edge.example.test/link?x=1"}')
    ).toEqual({ kind: 'reconnect_url', url: 'wss://edge.example.test/link?x=1' });
  });

  it('should decode hello with optional fields', () => {
    expect(decodeInboundMessage('{"type":"hello","region":"eu-west-1","host_id":"h-1"}')).toEqual({
      kind: 'hello',
      region: 'eu-west-1',
      hostId: 'h-1',
    });
    expect(decodeInboundMessage('{"type":"hello"}')).toEqual({
      kind: 'hello',
      region: null,
      hostId: null,
    });
  });

  it('should classify unknown or missing types as other', () => {
    expect(decodeInboundMessage('{"type":"presence_change","user":"U1"}')).toEqual({
      kind: 'other',
      type: 'presence_change',
    });
    expect(decodeInboundMessage('{"ok":true}')).toEqual({ kind: 'other', type: null });
  });

  it('should reject frames that are not JSON objects', () => {
    expect(() => decodeInboundMessage('not json')).toThrow('Frame is not valid JSON');
    expect(() => decodeInboundMessage('[1,2]')).toThrow('Frame is not a JSON object');
    expect(() => decodeInboundMessage('null')).toThrow(ProtocolError);
  });

  it('should reject known types with malformed fields', () => {
    expect(() => decodeInboundMessage('{"type":"pong","reply_to":"4"}')).toThrow(
      'pong frame without an integer reply_to'
    );
    expect(() => decodeInboundMessage('{"type":"pong","reply_to":1.5}')).toThrow(
      'pong frame without an integer reply_to'
    );
    expect(() => decodeInboundMessage('{"type":"reconnect_url","url":""}')).toThrow(
      'reconnect_url frame without a url'
    );
  });
});
