/**
 * Core barrel export: re-exports all public APIs from core/.
 */

// Buffer
export { TextBuffer, splitLines } from './buffer/text-buffer';
export { Line, type ClassificationState } from './buffer/line';
export type { Position, SearchDirection } from './buffer/position';
export { splitGraphemes, graphemeCount, isSeparator, isDigit } from './buffer/graphemes';

// Document
export { EditorDocument, type DocumentOptions } from './document/document';
export { type DocumentStorage, FileStorage, MemoryStorage } from './document/storage';
export { DocumentIOError } from './document/errors';
export { detectLineEnding, type LineEnding } from './document/line-ending';

// Language profiles
export {
  type LanguageProfile, type LanguageProfileInput,
  languageProfileSchema, parseProfile, PLAIN_TEXT_PROFILE, ProfileValidationError,
} from './language/profile';
export { LanguageRegistry, resolveProfile } from './language/registry';

// Tokenizer / Classification
export {
  Classifier, buildRules, scanUnits, overlaySearchMatches,
  type ClassificationRule, type ScanResult,
} from './tokenizer/classifier';
export {
  CLASSIFICATION_TAGS, type ClassificationTag, type StyledRun, type LineClassification,
} from './tokenizer/classification';
export { resolveTagColor, resolveTagStyle, tagForClassification } from './tokenizer/token-theme';

// Search
export { IncrementalSearch } from './search/incremental';

// Logging
export { type Logger, createConsoleLogger, silentLogger } from './log';
