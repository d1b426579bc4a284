/**
 * Persistence of the last bound device identity.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { IDENTITY_SETTINGS_KEY } from '../protocol/constants';

/**
 * Stores one device identity string.
 */
export interface IdentityStore {
  load(): Promise<string | null>;
  save(identity: string): Promise<void>;
  clear(): Promise<void>;
}

/**
 * Identity store kept in process memory.
 */
export class MemoryIdentityStore implements IdentityStore {
  constructor(private identity: string | null = null) {}

  async load(): Promise<string | null> {
    return this.identity;
  }

  async save(identity: string): Promise<void> {
    this.identity = identity;
  }

  async clear(): Promise<void> {
    this.identity = null;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Identity store backed by a JSON settings file.
 *
 * The identity lives under `key` in a flat JSON object; other keys in the
 * file are preserved. Writes go to a temporary file renamed into place.
 *
 * @example
 * ```typescript
 * const store = new FileIdentityStore(path.join(os.homedir(), '.moment', 'settings.json'));
 * ```
 */
export class FileIdentityStore implements IdentityStore {
  constructor(
    private readonly filePath: string,
    private readonly key: string = IDENTITY_SETTINGS_KEY
  ) {}

  async load(): Promise<string | null> {
    const settings = await this.readSettings();
    const identity = settings[this.key];
    return typeof identity === 'string' ? identity : null;
  }

  async save(identity: string): Promise<void> {
    const settings = await this.readSettings();
    settings[this.key] = identity;
    await this.writeSettings(settings);
  }

  async clear(): Promise<void> {
    const settings = await this.readSettings();
    if (!(this.key in settings)) {
      return;
    }
    delete settings[this.key];
    await this.writeSettings(settings);
  }

  private async readSettings(): Promise<Record<string, unknown>> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Ignoring unreadable settings file ${this.filePath}: ${message}`);
      return {};
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      console.warn(`Ignoring malformed settings file ${this.filePath}`);
      return {};
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private async writeSettings(settings: Record<string, unknown>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(settings, null, 2), 'utf8');
    await rename(tempPath, this.filePath);
  }
}
