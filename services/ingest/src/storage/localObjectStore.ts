import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ObjectStoreError } from '../errors';
import type { ObjectStore, UploadOptions } from './objectStore';
import { normalizeObjectPath } from './objectStore';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/** Stores each container as a directory below `root`. */
export class LocalObjectStore implements ObjectStore {
  readonly container: string;
  private readonly directory: string;

  constructor(root: string, container: string) {
    this.container = container;
    this.directory = path.resolve(root, normalizeObjectPath(container));
  }

  private resolve(objectPath: string): string {
    return path.join(this.directory, ...normalizeObjectPath(objectPath).split('/'));
  }

  async upload(objectPath: string, body: Uint8Array, options: UploadOptions = {}): Promise<void> {
    const target = this.resolve(objectPath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    const temporary = `${target}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.writeFile(temporary, body, { flag: 'w' });
      if (options.overwrite === false) {
        try {
          await fs.link(temporary, target);
        } catch (error) {
          if (isErrnoException(error) && error.code === 'EEXIST') {
            throw new ObjectStoreError(`Object ${this.container}/${objectPath} already exists`, 'object_exists', objectPath);
          }
          throw error;
        }
        await fs.rm(temporary, { force: true });
      } else {
        await fs.rename(temporary, target);
      }
    } catch (error) {
      await fs.rm(temporary, { force: true });
      if (error instanceof ObjectStoreError) {
        throw error;
      }
      throw new ObjectStoreError(`Failed to write ${this.container}/${objectPath}`, 'object_store_error', objectPath, error);
    }
  }

  async download(objectPath: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await fs.readFile(this.resolve(objectPath)));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw new ObjectStoreError(`Failed to read ${this.container}/${objectPath}`, 'object_store_error', objectPath, error);
    }
  }
}
