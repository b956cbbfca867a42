import { ObjectStoreError } from '../errors';

export type UploadOptions = {
  overwrite?: boolean;
  contentType?: string;
};

/** Blob storage scoped to one container. Paths are relative to the container root. */
export interface ObjectStore {
  readonly container: string;
  upload(path: string, body: Uint8Array, options?: UploadOptions): Promise<void>;
  /** Resolves to `null` when the object does not exist. */
  download(path: string): Promise<Uint8Array | null>;
}

export function normalizeObjectPath(path: string): string {
  const cleaned = path.replace(/\\/g, '/').replace(/^\/+/, '').replace(/\/+$/, '');
  if (cleaned.length === 0 || cleaned.split('/').some((segment) => segment === '..' || segment === '.')) {
    throw new ObjectStoreError(`Invalid object path '${path}'`, 'object_store_error', path);
  }
  return cleaned;
}

export class MemoryObjectStore implements ObjectStore {
  readonly container: string;
  readonly objects = new Map<string, Uint8Array>();
  readonly uploads: string[] = [];

  constructor(container = 'memory') {
    this.container = container;
  }

  async upload(path: string, body: Uint8Array, options: UploadOptions = {}): Promise<void> {
    const key = normalizeObjectPath(path);
    if (options.overwrite === false && this.objects.has(key)) {
      throw new ObjectStoreError(`Object ${this.container}/${key} already exists`, 'object_exists', key);
    }
    this.objects.set(key, Uint8Array.from(body));
    this.uploads.push(key);
  }

  async download(path: string): Promise<Uint8Array | null> {
    const stored = this.objects.get(normalizeObjectPath(path));
    return stored ? Uint8Array.from(stored) : null;
  }

  readText(path: string): string | null {
    const stored = this.objects.get(normalizeObjectPath(path));
    return stored ? Buffer.from(stored).toString('utf8') : null;
  }

  keys(): string[] {
    return Array.from(this.objects.keys()).sort();
  }
}
