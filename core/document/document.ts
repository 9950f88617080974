/**
 * EditorDocument: path, buffer, language profile, dirty state.
 *
 * Wraps a TextBuffer with the file it was loaded from and the storage it
 * is saved through. Only load and save can fail; their errors surface as
 * DocumentIOError.
 */

import { TextBuffer } from '../buffer/text-buffer';
import { LanguageRegistry } from '../language/registry';
import { PLAIN_TEXT_PROFILE } from '../language/profile';
import { Logger, silentLogger } from '../log';
import { DocumentIOError } from './errors';
import { LineEnding, detectLineEnding } from './line-ending';
import { DocumentStorage, FileStorage } from './storage';

export interface DocumentOptions {
  storage?: DocumentStorage;
  registry?: LanguageRegistry;
  logger?: Logger;
}

export class EditorDocument {
  readonly buffer: TextBuffer;
  /**
   * Line ending style of the loaded text. Saving always writes `\n`; lines
   * split only at `\n`, so CR-only text loads as a single line.
   */
  readonly lineEnding: LineEnding;

  private _path: string | null;
  private storage: DocumentStorage;
  private registry: LanguageRegistry;
  private logger: Logger;

  constructor(content: string, path: string | null = null, options: DocumentOptions = {}) {
    this.storage = options.storage ?? new FileStorage();
    this.registry = options.registry ?? LanguageRegistry.withBuiltins();
    this.logger = options.logger ?? silentLogger;
    this._path = path;
    this.lineEnding = detectLineEnding(content);
    const profile = path === null ? PLAIN_TEXT_PROFILE : this.registry.resolve(path);
    this.buffer = TextBuffer.fromText(content, profile);
  }

  /**
   * Load a document from storage.
   * @throws DocumentIOError when the storage read fails.
   */
  static async open(path: string, options: DocumentOptions = {}): Promise<EditorDocument> {
    const storage = options.storage ?? new FileStorage();
    let content: string;
    try {
      content = await storage.read(path);
    } catch (err) {
      throw new DocumentIOError('load', path, err);
    }

    const doc = new EditorDocument(content, path, { ...options, storage });
    doc.logger.info(`opened ${path}`, {
      lines: doc.buffer.lineCount,
      language: doc.languageName,
    });
    if (doc.lineEnding === '\r\n') {
      doc.logger.warn(`${path} uses CRLF line endings; saving will write LF`);
    }
    return doc;
  }

  get path(): string | null {
    return this._path;
  }

  get languageName(): string {
    return this.buffer.profile.name;
  }

  get isDirty(): boolean {
    return this.buffer.isDirty;
  }

  /**
   * Write every line followed by `\n` to the document's path and clear
   * the dirty flag. Resolves false, writing nothing, when the document
   * has no path.
   * @throws DocumentIOError when the storage write fails.
   */
  async save(): Promise<boolean> {
    if (this._path === null) {
      this.logger.debug('save skipped: document has no path');
      return false;
    }

    const path = this._path;
    try {
      await this.storage.write(path, this.buffer.getText());
    } catch (err) {
      throw new DocumentIOError('save', path, err);
    }

    this.buffer.setProfile(this.registry.resolve(path));
    this.buffer.markSaved();
    this.logger.info(`saved ${path}`, { lines: this.buffer.lineCount });
    return true;
  }

  /** Save under a new path, which also selects the language profile. */
  async saveAs(path: string): Promise<void> {
    this._path = path;
    await this.save();
  }
}
