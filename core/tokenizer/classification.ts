/**
 * Classification tags assigned to each grapheme of a line.
 */

export const CLASSIFICATION_TAGS = [
  'None',
  'Number',
  'SearchMatch',
  'String',
  'CharacterLiteral',
  'LineComment',
  'MultilineComment',
  'PrimaryKeyword',
  'SecondaryKeyword',
] as const;

export type ClassificationTag = typeof CLASSIFICATION_TAGS[number];

/** A run of rendered text sharing one tag. */
export interface StyledRun {
  text: string;
  tag: ClassificationTag;
}

/** Result of scanning one line, cached on the line until it is edited. */
export interface LineClassification {
  /** Base tags, one per grapheme, without the search overlay. */
  readonly base: readonly ClassificationTag[];
  /** Whether the scan began inside an open multi-line comment. */
  readonly startedInComment: boolean;
  /** Whether the line ends inside an unterminated multi-line comment. */
  readonly endsInComment: boolean;
}
