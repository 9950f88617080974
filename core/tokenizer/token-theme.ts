/**
 * Classification-to-theme mapping.
 *
 * Each classification tag is expressed as a Lezer highlight tag, and the
 * Lezer tag is resolved to a color from the current theme.
 */

import { tags, Tag } from '@lezer/highlight';
import type { TokenThemeMapping } from '../../view-model/theme';
import type { ClassificationTag } from './classification';

/** Search matches have no Lezer equivalent; they are styled by the theme directly. */
const searchMatchTag = Tag.define();

const TAG_FOR_CLASSIFICATION: Record<ClassificationTag, Tag> = {
  None: tags.content,
  Number: tags.number,
  SearchMatch: searchMatchTag,
  String: tags.string,
  CharacterLiteral: tags.character,
  LineComment: tags.lineComment,
  MultilineComment: tags.blockComment,
  PrimaryKeyword: tags.keyword,
  SecondaryKeyword: tags.typeName,
};

/** Lezer highlight tag for a classification. */
export function tagForClassification(classification: ClassificationTag): Tag {
  return TAG_FOR_CLASSIFICATION[classification];
}

/**
 * Resolve a Lezer highlight tag to a theme color. Tags without a theme
 * slot fall back to `plain`.
 */
export function resolveTagColor(tag: Tag, tokens: TokenThemeMapping): string {
  switch (tag) {
    case searchMatchTag: return tokens.searchMatch;
    case tags.number: return tokens.number;
    case tags.string: return tokens.string;
    case tags.character: return tokens.character;
    case tags.lineComment:
    case tags.blockComment:
      return tokens.comment;
    case tags.keyword: return tokens.keyword;
    case tags.typeName: return tokens.typeName;
    default: return tokens.plain;
  }
}

/**
 * Resolve a Lezer tag to a font style.
 */
export function resolveTagStyle(tag: Tag): 'normal' | 'italic' | 'bold' {
  if (tag === tags.lineComment || tag === tags.blockComment) return 'italic';
  if (tag === searchMatchTag) return 'bold';
  return 'normal';
}
