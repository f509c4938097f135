import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { CachedEndpoint, IEndpointCache } from '../../domain/ports/IEndpointCache.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { PersistenceError } from '../../domain/errors.js';

/**
 * On-disk record, kept compatible with existing cache files
 */
interface EndpointCacheFile {
  websocket_url: string;
}

function isEndpointCacheFile(value: unknown): value is EndpointCacheFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    'websocket_url' in value &&
    typeof value.websocket_url === 'string'
  );
}

/**
 * Reconnect endpoint persisted as a small JSON file.
 *
 * All file I/O is synchronous, so reads and writes never interleave on the
 * event loop. Writes go to a temporary sibling and are renamed over the
 * target, leaving either the old or the new content after a crash.
 */
export class FileEndpointCache implements IEndpointCache {
  private url = '';

  constructor(
    private readonly filePath: string,
    private readonly logger: ILogger
  ) {}

  load(): CachedEndpoint | null {
    if (!existsSync(this.filePath)) {
      this.logger.debug('No endpoint cache file yet', { path: this.filePath });
      return null;
    }

    try {
      const content: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
      if (!isEndpointCacheFile(content)) {
        this.logger.warn('Ignoring endpoint cache file with unexpected content', {
          path: this.filePath,
        });
        return null;
      }

      this.url = content.websocket_url;
      this.logger.info('Loaded cached endpoint', { path: this.filePath });
      return this.url ? { url: this.url } : null;
    } catch (error) {
      this.logger.warn('Failed to read endpoint cache file, ignoring it', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  get(): string {
    return this.url;
  }

  set(url: string): void {
    this.url = url;

    const record: EndpointCacheFile = { websocket_url: url };
    const tempPath = `${this.filePath}.tmp`;
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tempPath, JSON.stringify(record, null, 2), 'utf-8');
      renameSync(tempPath, this.filePath);
    } catch (error) {
      throw new PersistenceError(`Failed to write endpoint cache ${this.filePath}`, {
        cause: error,
      });
    }
  }
}
