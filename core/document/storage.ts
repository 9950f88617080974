/**
 * Storage backends for documents.
 */

import { readFile, writeFile } from 'node:fs/promises';

export interface DocumentStorage {
  read(path: string): Promise<string>;
  write(path: string, content: string): Promise<void>;
}

/** Reads and writes UTF-8 files on the local file system. */
export class FileStorage implements DocumentStorage {
  async read(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }

  async write(path: string, content: string): Promise<void> {
    await writeFile(path, content, 'utf-8');
  }
}

/** Keeps file contents in a map. Missing paths reject like ENOENT. */
export class MemoryStorage implements DocumentStorage {
  readonly files: Map<string, string>;

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files));
  }

  async read(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), {
        code: 'ENOENT',
      });
    }
    return content;
  }

  async write(path: string, content: string): Promise<void> {
    this.files.set(path, content);
  }
}
