/**
 * File-backed session state repository
 * Each key is a JSON file in the state directory, replaced via rename
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { PersistedSessionState } from '../state.js';
import type { SessionStateRepository } from './types.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileSessionStateRepository implements SessionStateRepository {
  constructor(private readonly directory: string) {}

  private fileFor(key: string): string {
    if (key !== path.basename(key) || key.startsWith('.')) {
      throw new Error(`Invalid session state key: ${key}`);
    }
    return path.join(this.directory, key);
  }

  async exists(key: string): Promise<boolean> {
    try {
      const info = await stat(this.fileFor(key));
      return info.isFile();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async read(key: string): Promise<unknown> {
    const file = this.fileFor(key);
    let raw: string;
    try {
      raw = await readFile(file, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    // Unparseable content goes back as text, for the caller's validation to reject
    try {
      return JSON.parse(raw);
    } catch {
      return raw;
    }
  }

  async write(key: string, record: PersistedSessionState): Promise<void> {
    const file = this.fileFor(key);
    const tmp = `${file}.${uuidv4()}.tmp`;

    await mkdir(this.directory, { recursive: true });
    await writeFile(tmp, JSON.stringify(record), 'utf-8');
    try {
      await rename(tmp, file);
    } catch (error) {
      await rm(tmp, { force: true });
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    await rm(this.fileFor(key), { force: true });
  }
}
