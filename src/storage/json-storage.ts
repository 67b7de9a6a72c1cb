import { access, copyFile, mkdir, open, readFile, rename, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import type { Storage } from './storage.js';
import type { Logger } from '../types/logger.js';

export interface JSONStorageConfig {
  /** Directory holding one `<key>.json` per document */
  basePath: string;
  /** Copy the previous version to `<key>.backup.json` before replacing it (default: true) */
  createBackup?: boolean;
  logger?: Logger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per key.
 *
 * `save` writes a temp file, fsyncs it and renames it over the document, so a
 * crash leaves either the old or the new version. Saves to the same key run
 * one after another in call order. A document that fails to parse is
 * replaced by its backup when one is readable.
 */
export class JSONStorage implements Storage {
  private readonly basePath: string;
  private readonly createBackup: boolean;
  private readonly logger: Logger | undefined;
  private readonly queues = new Map<string, Promise<void>>();

  constructor(config: JSONStorageConfig) {
    this.basePath = config.basePath;
    this.createBackup = config.createBackup ?? true;
    this.logger = config.logger?.child({ component: 'json-storage' });
  }

  async load(key: string): Promise<unknown> {
    const primary = await this.readDocument(this.fileFor(key));
    if (primary.status === 'ok') {
      return primary.value;
    }
    if (primary.status === 'missing') {
      return null;
    }

    const backup = await this.readDocument(this.fileFor(key, 'backup'));
    if (backup.status !== 'ok') {
      throw primary.error;
    }
    this.logger?.warn({ key, error: primary.error.message }, 'Document corrupt, loaded backup');
    return backup.value;
  }

  save(key: string, data: unknown): Promise<void> {
    // Serialized eagerly: the caller may mutate `data` while the write is queued
    const content = `${JSON.stringify(data, null, 2)}\n`;

    const queued = (this.queues.get(key) ?? Promise.resolve())
      .catch(() => undefined)
      .then(() => this.replace(key, content));
    this.queues.set(key, queued);

    return queued.finally(() => {
      if (this.queues.get(key) === queued) {
        this.queues.delete(key);
      }
    });
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.fileFor(key));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.fileFor(key));
      return true;
    } catch {
      return false;
    }
  }

  private fileFor(key: string, variant?: 'backup' | 'tmp'): string {
    return join(this.basePath, variant ? `${key}.${variant}.json` : `${key}.json`);
  }

  private async readDocument(
    file: string
  ): Promise<
    { status: 'ok'; value: unknown } | { status: 'missing' } | { status: 'corrupt'; error: SyntaxError }
  > {
    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return { status: 'missing' };
      throw error;
    }

    try {
      return { status: 'ok', value: JSON.parse(content) };
    } catch (error) {
      if (error instanceof SyntaxError) return { status: 'corrupt', error };
      throw error;
    }
  }

  private async replace(key: string, content: string): Promise<void> {
    await mkdir(this.basePath, { recursive: true });

    const target = this.fileFor(key);
    const temp = this.fileFor(key, 'tmp');

    const handle = await open(temp, 'w');
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    if (this.createBackup) {
      try {
        await copyFile(target, this.fileFor(key, 'backup'));
      } catch (error) {
        if (!isMissingFile(error)) {
          this.logger?.warn({ key, error }, 'Backup copy failed, saving anyway');
        }
      }
    }

    await rename(temp, target);
  }
}

export function createJSONStorage(
  basePath: string,
  options: Omit<JSONStorageConfig, 'basePath'> = {}
): JSONStorage {
  return new JSONStorage({ basePath, ...options });
}
