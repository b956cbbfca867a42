import { promises as fs } from 'node:fs';
import path from 'node:path';

export interface SecretStore {
  get(name: string): Promise<string | null>;
  set(name: string, value: string): Promise<void>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === 'object' && !Array.isArray(value));
}

/** Secrets kept as a flat JSON object in one file, written with owner-only permissions. */
export class FileSecretStore implements SecretStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async get(name: string): Promise<string | null> {
    const secrets = await this.readAll();
    const value = secrets[name];
    return typeof value === 'string' && value.length > 0 ? value : null;
  }

  async set(name: string, value: string): Promise<void> {
    const secrets = await this.readAll();
    secrets[name] = value;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const temporary = `${this.filePath}.tmp`;
    await fs.writeFile(temporary, `${JSON.stringify(secrets, null, 2)}\n`, { encoding: 'utf8', mode: 0o600 });
    await fs.rename(temporary, this.filePath);
  }

  private async readAll(): Promise<Record<string, unknown>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      throw new Error(`Secrets file ${this.filePath} must contain a JSON object`);
    }
    return parsed;
  }
}

export class MemorySecretStore implements SecretStore {
  readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.values.set(name, value);
    }
  }

  async get(name: string): Promise<string | null> {
    return this.values.get(name) ?? null;
  }

  async set(name: string, value: string): Promise<void> {
    this.values.set(name, value);
  }
}
