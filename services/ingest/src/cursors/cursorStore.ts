import type { Logger } from '../logger';
import type { ObjectStore } from '../storage/objectStore';
import { formatTimestamp, parseTimestamp } from './timestamps';

export const CURSOR_DOCUMENT_PATH = 'state/last_interval.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === 'object' && !Array.isArray(value));
}

export type CursorDocument = Record<string, string>;

export type CursorStoreOptions = {
  path?: string;
  logger?: Logger;
};

/**
 * One watermark per stream key, kept in a single JSON document inside a
 * container. Reads never throw; writes rewrite the whole document and the last
 * writer wins.
 */
export class CursorStore {
  private readonly store: ObjectStore;
  private readonly path: string;
  private readonly logger?: Logger;

  constructor(store: ObjectStore, options: CursorStoreOptions = {}) {
    this.store = store;
    this.path = options.path ?? CURSOR_DOCUMENT_PATH;
    this.logger = options.logger;
  }

  async get(key: string): Promise<Date | null> {
    const document = await this.readDocument();
    if (!(key in document)) {
      this.logger?.debug({ key, container: this.store.container }, 'no watermark stored');
      return null;
    }
    const parsed = parseTimestamp(document[key]);
    if (!parsed) {
      this.logger?.warn({ key, value: document[key] }, 'ignoring unparseable watermark');
    }
    return parsed;
  }

  async set(key: string, watermark: Date): Promise<void> {
    const document = await this.readDocument();
    const next: CursorDocument = {};
    for (const [existingKey, value] of Object.entries(document)) {
      if (typeof value === 'string') {
        next[existingKey] = value;
      }
    }
    next[key] = formatTimestamp(watermark);
    const body = Buffer.from(JSON.stringify(next, null, 2), 'utf8');
    await this.store.upload(this.path, new Uint8Array(body), { overwrite: true, contentType: 'application/json' });
  }

  /** Stores `candidate` only when it is later than the current watermark; returns the resulting watermark. */
  async advance(key: string, candidate: Date): Promise<Date> {
    const current = await this.get(key);
    if (current && current.getTime() >= candidate.getTime()) {
      return current;
    }
    await this.set(key, candidate);
    return candidate;
  }

  private async readDocument(): Promise<Record<string, unknown>> {
    let body: Uint8Array | null;
    try {
      body = await this.store.download(this.path);
    } catch (error) {
      this.logger?.warn({ err: error, container: this.store.container }, 'cursor document unreadable');
      return {};
    }
    if (body === null) {
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(Buffer.from(body).toString('utf8'));
      if (isRecord(parsed)) {
        return parsed;
      }
      this.logger?.warn({ container: this.store.container }, 'cursor document is not a JSON object');
    } catch (error) {
      this.logger?.warn({ err: error, container: this.store.container }, 'cursor document is not valid JSON');
    }
    return {};
  }
}
