import { describe, test, expect } from 'vitest';
import { LanguageRegistry, resolveProfile } from '../core/language/registry';
import { PLAIN_TEXT_PROFILE, ProfileValidationError, parseProfile } from '../core/language/profile';

describe('parseProfile', () => {
  test('omitted flags default to off', () => {
    const profile = parseProfile({ name: 'Bare' });
    expect(profile).toEqual({
      name: 'Bare',
      extensions: [],
      numbers: false,
      strings: false,
      characters: false,
      comments: false,
      multilineComments: false,
      primaryKeywords: [],
      secondaryKeywords: [],
    });
  });

  test('rejects a mistyped flag', () => {
    let error: unknown = null;
    try {
      parseProfile({ name: 'Bad', numbers: 'yes' });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ProfileValidationError);
    if (error instanceof ProfileValidationError) {
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0].path).toEqual(['numbers']);
      expect(error.message.startsWith('Invalid language profile: numbers: ')).toBe(true);
    }
  });

  test('rejects a missing name', () => {
    expect(() => parseProfile({})).toThrow(ProfileValidationError);
  });

  test('profiles are frozen', () => {
    expect(Object.isFrozen(parseProfile({ name: 'Frozen' }))).toBe(true);
  });
});

describe('resolveProfile', () => {
  test('resolves built-in languages by extension', () => {
    expect(resolveProfile('src/main.rs').name).toBe('Rust');
    expect(resolveProfile('app.tsx').name).toBe('TypeScript');
    expect(resolveProfile('lib/list.h').name).toBe('C');
  });

  test('extension match ignores case', () => {
    expect(resolveProfile('INDEX.TS').name).toBe('TypeScript');
  });

  test('unknown or missing extension is plain text', () => {
    expect(resolveProfile('README')).toBe(PLAIN_TEXT_PROFILE);
    expect(resolveProfile('notes.xyz')).toBe(PLAIN_TEXT_PROFILE);
    expect(resolveProfile('dir.rs/Makefile')).toBe(PLAIN_TEXT_PROFILE);
    expect(PLAIN_TEXT_PROFILE.name).toBe('No filetype');
  });

  test('Rust profile enables every rule', () => {
    const rust = resolveProfile('main.rs');
    expect(rust.numbers && rust.strings && rust.characters).toBe(true);
    expect(rust.comments && rust.multilineComments).toBe(true);
    expect(rust.primaryKeywords).toContain('fn');
    expect(rust.secondaryKeywords).toContain('usize');
  });

  test('TypeScript has no character literals', () => {
    expect(resolveProfile('index.ts').characters).toBe(false);
  });
});

describe('LanguageRegistry', () => {
  test('lists built-in languages', () => {
    expect(LanguageRegistry.withBuiltins().getSupportedLanguages()).toEqual(['Rust', 'TypeScript', 'C']);
  });

  test('an empty registry resolves everything to plain text', () => {
    expect(new LanguageRegistry().resolve('main.rs')).toBe(PLAIN_TEXT_PROFILE);
  });

  test('registered profiles resolve and are found by name', () => {
    const registry = new LanguageRegistry();
    const toml = registry.register({ name: 'TOML', extensions: ['TOML'], comments: true });
    expect(registry.resolve('Cargo.toml')).toBe(toml);
    expect(registry.getByName('TOML')).toBe(toml);
    expect(registry.getByName('YAML')).toBeNull();
  });

  test('a later registration takes over the extension', () => {
    const registry = LanguageRegistry.withBuiltins();
    registry.register({ name: 'C++', extensions: ['cpp'] });
    expect(registry.resolve('main.cpp').name).toBe('C++');
    expect(registry.resolve('main.c').name).toBe('C');
  });

  test('invalid data is rejected on register', () => {
    const registry = new LanguageRegistry();
    expect(() => registry.register({ name: 'Bad', extensions: 'bad' })).toThrow(ProfileValidationError);
    expect(registry.getSupportedLanguages()).toEqual([]);
  });
});
