/**
 * Per-line classification engine.
 *
 * A line is scanned grapheme by grapheme. At each position the rules of
 * the active profile are tried in priority order; the first that matches
 * tags the graphemes it consumes and moves the cursor past them. Graphemes
 * no rule claims are tagged `None`.
 *
 * The only state carried from one line to the next is whether the previous
 * line ended inside an unterminated multi-line comment.
 */

import { Line } from '../buffer/line';
import { graphemeCount, isDigit, isSeparator, splitGraphemes } from '../buffer/graphemes';
import type { LanguageProfile } from '../language/profile';
import type { ClassificationTag } from './classification';

interface RuleMatch {
  /** Graphemes consumed, at least one. */
  length: number;
  tag: ClassificationTag;
  /** Set by a multi-line comment that runs to the end of the line without closing. */
  open?: boolean;
}

/** A rule looks at `units` from `index` and either claims a span or passes. */
export type ClassificationRule = (units: readonly string[], index: number) => RuleMatch | null;

/** Index of the first `*` of a `*\/` pair at or after `from`, or -1. */
function findCommentClose(units: readonly string[], from: number): number {
  for (let i = from; i + 1 < units.length; i++) {
    if (units[i] === '*' && units[i + 1] === '/') return i;
  }
  return -1;
}

const multilineCommentRule: ClassificationRule = (units, index) => {
  if (units[index] !== '/' || units[index + 1] !== '*') return null;
  const close = findCommentClose(units, index + 2);
  if (close === -1) {
    return { length: units.length - index, tag: 'MultilineComment', open: true };
  }
  return { length: close + 2 - index, tag: 'MultilineComment' };
};

const characterRule: ClassificationRule = (units, index) => {
  if (units[index] !== "'") return null;
  const next = units[index + 1];
  if (next === undefined) return null;
  // One escape grapheme is allowed between the quotes: '\n'
  const close = next === '\\' ? index + 3 : index + 2;
  if (units[close] !== "'") return null;
  return { length: close - index + 1, tag: 'CharacterLiteral' };
};

const lineCommentRule: ClassificationRule = (units, index) => {
  if (units[index] !== '/' || units[index + 1] !== '/') return null;
  return { length: units.length - index, tag: 'LineComment' };
};

function keywordRule(keywords: readonly string[], tag: ClassificationTag): ClassificationRule {
  const words = keywords.map(splitGraphemes).filter(word => word.length > 0);

  return (units, index) => {
    if (index > 0 && !isSeparator(units[index - 1])) return null;

    for (const word of words) {
      const end = index + word.length;
      if (end > units.length) continue;
      if (end < units.length && !isSeparator(units[end])) continue;
      if (word.every((unit, k) => units[index + k] === unit)) {
        return { length: word.length, tag };
      }
    }
    return null;
  };
}

const stringRule: ClassificationRule = (units, index) => {
  if (units[index] !== '"') return null;
  let end = index + 1;
  while (end < units.length && units[end] !== '"') end++;
  // Include the closing quote when there is one.
  const length = (end < units.length ? end + 1 : end) - index;
  return { length, tag: 'String' };
};

const numberRule: ClassificationRule = (units, index) => {
  if (!isDigit(units[index])) return null;
  if (index > 0 && !isSeparator(units[index - 1])) return null;
  let end = index + 1;
  while (end < units.length && (isDigit(units[end]) || units[end] === '.')) end++;
  return { length: end - index, tag: 'Number' };
};

/**
 * Build the ordered rule table for a profile. Order is priority: the first
 * rule that matches at a position wins.
 */
export function buildRules(profile: LanguageProfile): ClassificationRule[] {
  const rules: ClassificationRule[] = [];
  if (profile.multilineComments) rules.push(multilineCommentRule);
  if (profile.characters) rules.push(characterRule);
  if (profile.comments) rules.push(lineCommentRule);
  if (profile.primaryKeywords.length > 0) {
    rules.push(keywordRule(profile.primaryKeywords, 'PrimaryKeyword'));
  }
  if (profile.secondaryKeywords.length > 0) {
    rules.push(keywordRule(profile.secondaryKeywords, 'SecondaryKeyword'));
  }
  if (profile.strings) rules.push(stringRule);
  if (profile.numbers) rules.push(numberRule);
  return rules;
}

export interface ScanResult {
  tags: ClassificationTag[];
  endsInComment: boolean;
}

/**
 * Scan a grapheme sequence. `startsInComment` means the first graphemes
 * continue a multi-line comment opened on an earlier line.
 */
export function scanUnits(
  units: readonly string[],
  rules: readonly ClassificationRule[],
  startsInComment: boolean,
): ScanResult {
  const tags: ClassificationTag[] = [];
  let index = 0;
  let endsInComment = false;

  if (startsInComment) {
    const close = findCommentClose(units, 0);
    index = close === -1 ? units.length : close + 2;
    endsInComment = close === -1;
    for (let i = 0; i < index; i++) tags.push('MultilineComment');
  }

  while (index < units.length) {
    let match: RuleMatch | null = null;
    for (const rule of rules) {
      match = rule(units, index);
      if (match) break;
    }

    if (!match) {
      tags.push('None');
      index++;
      continue;
    }

    for (let i = 0; i < match.length; i++) tags.push(match.tag);
    index += match.length;
    if (match.open) endsInComment = true;
  }

  return { tags, endsInComment };
}

/**
 * Overlay every non-overlapping forward occurrence of `word` with
 * `SearchMatch`, on a copy of the base tags.
 */
export function overlaySearchMatches(
  line: Line,
  base: readonly ClassificationTag[],
  word: string | null,
): ClassificationTag[] {
  const tags = [...base];
  if (!word) return tags;

  const width = graphemeCount(word);
  let at = 0;
  let match = line.find(word, at, 'forward');
  while (match !== null) {
    for (let i = match; i < match + width && i < tags.length; i++) {
      tags[i] = 'SearchMatch';
    }
    at = match + width;
    match = line.find(word, at, 'forward');
  }
  return tags;
}

/**
 * Classifies lines for one language profile.
 */
export class Classifier {
  readonly profile: LanguageProfile;
  private rules: ClassificationRule[];

  constructor(profile: LanguageProfile) {
    this.profile = profile;
    this.rules = buildRules(profile);
  }

  /**
   * Whether the line's cached base classification can be reused: it was
   * scanned, did not end inside an open comment, and was scanned with the
   * same carried-in comment state.
   */
  isUpToDate(line: Line, startsInComment: boolean): boolean {
    const cached = line.classification;
    return cached !== null
      && !cached.endsInComment
      && cached.startedInComment === startsInComment;
  }

  /**
   * Classify one line and return whether it ends inside an unterminated
   * multi-line comment. The search overlay is recomputed on every call;
   * the base scan only when the line is not up to date.
   */
  classify(line: Line, word: string | null, startsInComment: boolean): boolean {
    let base: readonly ClassificationTag[];
    let endsInComment: boolean;

    const cached = line.classification;
    if (cached !== null && this.isUpToDate(line, startsInComment)) {
      base = cached.base;
      endsInComment = false;
    } else {
      const result = scanUnits(line.units, this.rules, startsInComment);
      line.setClassification({
        base: result.tags,
        startedInComment: startsInComment,
        endsInComment: result.endsInComment,
      });
      base = result.tags;
      endsInComment = result.endsInComment;
    }

    line.setTags(overlaySearchMatches(line, base, word));
    return endsInComment;
  }
}
