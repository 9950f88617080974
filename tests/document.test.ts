import { describe, test, expect, vi, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EditorDocument } from '../core/document/document';
import { DocumentIOError } from '../core/document/errors';
import { detectLineEnding } from '../core/document/line-ending';
import { FileStorage, MemoryStorage, type DocumentStorage } from '../core/document/storage';

function mockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
}

class FailingStorage implements DocumentStorage {
  async read(): Promise<string> {
    return 'fn main() {}\n';
  }

  async write(): Promise<void> {
    throw new Error('disk full');
  }
}

describe('EditorDocument', () => {
  test('opens a file and picks its language', async () => {
    const storage = new MemoryStorage({ 'src/main.rs': 'fn main() {\n}\n' });
    const doc = await EditorDocument.open('src/main.rs', { storage });
    expect(doc.path).toBe('src/main.rs');
    expect(doc.languageName).toBe('Rust');
    expect(doc.buffer.lineCount).toBe(2);
    expect(doc.isDirty).toBe(false);
  });

  test('unknown extension opens as plain text', async () => {
    const storage = new MemoryStorage({ 'notes.txt': 'hello' });
    const doc = await EditorDocument.open('notes.txt', { storage });
    expect(doc.languageName).toBe('No filetype');
  });

  test('missing file fails with a load error', async () => {
    const storage = new MemoryStorage();
    let error: unknown = null;
    try {
      await EditorDocument.open('missing.rs', { storage });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(DocumentIOError);
    if (error instanceof DocumentIOError) {
      expect(error.operation).toBe('load');
      expect(error.path).toBe('missing.rs');
      expect(error.cause).toMatchObject({ code: 'ENOENT' });
    }
  });

  test('save writes LF-terminated lines and clears dirty', async () => {
    const storage = new MemoryStorage({ 'a.txt': 'one\r\ntwo' });
    const doc = await EditorDocument.open('a.txt', { storage });
    doc.buffer.insert({ x: 3, y: 0 }, '!');
    expect(doc.isDirty).toBe(true);

    await expect(doc.save()).resolves.toBe(true);
    expect(storage.files.get('a.txt')).toBe('one!\ntwo\n');
    expect(doc.isDirty).toBe(false);
  });

  test('document without a path does not save', async () => {
    const storage = new MemoryStorage();
    const doc = new EditorDocument('draft', null, { storage });
    doc.buffer.insert({ x: 0, y: 0 }, '#');
    await expect(doc.save()).resolves.toBe(false);
    expect(storage.files.size).toBe(0);
    expect(doc.isDirty).toBe(true);
  });

  test('saveAs stores under the new path and switches language', async () => {
    const storage = new MemoryStorage();
    const doc = new EditorDocument('let x = 1;', null, { storage });
    expect(doc.languageName).toBe('No filetype');

    await doc.saveAs('notes.ts');
    expect(doc.path).toBe('notes.ts');
    expect(doc.languageName).toBe('TypeScript');
    expect(storage.files.get('notes.ts')).toBe('let x = 1;\n');
  });

  test('failed write surfaces a save error and keeps the document dirty', async () => {
    const doc = await EditorDocument.open('main.rs', { storage: new FailingStorage() });
    doc.buffer.insert({ x: 0, y: 0 }, ' ');
    await expect(doc.save()).rejects.toThrow(DocumentIOError);
    await expect(doc.save()).rejects.toMatchObject({
      operation: 'save',
      message: 'Failed to save main.rs: disk full',
    });
    expect(doc.isDirty).toBe(true);
  });

  test('logs open and save events', async () => {
    const logger = mockLogger();
    const storage = new MemoryStorage({ 'main.rs': 'fn a() {}\r\nfn b() {}\r\n' });
    const doc = await EditorDocument.open('main.rs', { storage, logger });
    expect(logger.info).toHaveBeenCalledWith('opened main.rs', { lines: 2, language: 'Rust' });
    expect(logger.warn).toHaveBeenCalledWith('main.rs uses CRLF line endings; saving will write LF');

    await doc.save();
    expect(logger.info).toHaveBeenLastCalledWith('saved main.rs', { lines: 2 });
  });

  test('CR-only text stays one line and is saved back unchanged', async () => {
    const logger = mockLogger();
    const storage = new MemoryStorage({ 'old.txt': 'a\rb' });
    const doc = await EditorDocument.open('old.txt', { storage, logger });
    expect(doc.lineEnding).toBe('\r');
    expect(doc.buffer.lineCount).toBe(1);
    expect(logger.warn).not.toHaveBeenCalled();

    await doc.save();
    expect(storage.files.get('old.txt')).toBe('a\rb\n');
  });
});

describe('detectLineEnding', () => {
  test('majority wins', () => {
    expect(detectLineEnding('a\nb\nc')).toBe('\n');
    expect(detectLineEnding('a\r\nb\r\nc\n')).toBe('\r\n');
    expect(detectLineEnding('a\rb\rc')).toBe('\r');
  });

  test('text without line breaks is LF', () => {
    expect(detectLineEnding('')).toBe('\n');
    expect(detectLineEnding('single')).toBe('\n');
  });
});

describe('FileStorage', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir !== null) await rm(dir, { recursive: true, force: true });
    dir = null;
  });

  test('round-trips a document through the file system', async () => {
    dir = await mkdtemp(join(tmpdir(), 'scanline-'));
    const path = join(dir, 'lib.c');
    await writeFile(path, 'int x = 1;\n', 'utf-8');

    const doc = await EditorDocument.open(path, { storage: new FileStorage() });
    expect(doc.languageName).toBe('C');
    doc.buffer.insertText({ x: 0, y: 1 }, 'int y;');
    await doc.save();

    expect(await readFile(path, 'utf-8')).toBe('int x = 1;\nint y;\n');
  });
});
