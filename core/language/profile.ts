/**
 * Language profiles: the rule flags and keyword lists that drive the
 * classifier. Profiles are plain data, validated on the way in.
 */

import { z } from 'zod';

export const languageProfileSchema = z.object({
  /** Display name shown in the status bar. */
  name: z.string().min(1),
  /** File extensions (without the dot) that select this profile. */
  extensions: z.array(z.string().min(1)).default([]),
  numbers: z.boolean().default(false),
  strings: z.boolean().default(false),
  characters: z.boolean().default(false),
  comments: z.boolean().default(false),
  multilineComments: z.boolean().default(false),
  primaryKeywords: z.array(z.string().min(1)).default([]),
  secondaryKeywords: z.array(z.string().min(1)).default([]),
});

export type LanguageProfile = Readonly<z.infer<typeof languageProfileSchema>>;

/** Input accepted by {@link parseProfile}; omitted flags default to off. */
export type LanguageProfileInput = z.input<typeof languageProfileSchema>;

export class ProfileValidationError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[]) {
    super(message);
    this.name = 'ProfileValidationError';
    this.issues = issues;
  }
}

/**
 * Validate raw profile data.
 * @throws ProfileValidationError when the data does not match the schema.
 */
export function parseProfile(data: unknown): LanguageProfile {
  const result = languageProfileSchema.safeParse(data);
  if (!result.success) {
    const summary = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ProfileValidationError(`Invalid language profile: ${summary}`, result.error.issues);
  }
  return Object.freeze(result.data);
}

/** Profile used when no language matches: every rule is off. */
export const PLAIN_TEXT_PROFILE: LanguageProfile = parseProfile({ name: 'No filetype' });
