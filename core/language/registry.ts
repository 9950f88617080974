/**
 * Language registry: resolves a language profile from a file path by its
 * extension. Built-in profiles come from profiles.json.
 */

import builtinProfiles from './profiles.json';
import { LanguageProfile, PLAIN_TEXT_PROFILE, parseProfile } from './profile';

export class LanguageRegistry {
  private byName: Map<string, LanguageProfile> = new Map();
  private byExtension: Map<string, LanguageProfile> = new Map();

  /** Registry preloaded with the built-in profiles. */
  static withBuiltins(): LanguageRegistry {
    const registry = new LanguageRegistry();
    for (const data of builtinProfiles) {
      registry.register(data);
    }
    return registry;
  }

  /**
   * Validate and register a profile. A later registration for the same
   * extension wins.
   */
  register(data: unknown): LanguageProfile {
    const profile = parseProfile(data);
    this.byName.set(profile.name, profile);
    for (const ext of profile.extensions) {
      this.byExtension.set(ext.toLowerCase(), profile);
    }
    return profile;
  }

  /** Profile for a file path, or the plain-text profile. */
  resolve(path: string): LanguageProfile {
    const base = path.split(/[\\/]/).pop() ?? '';
    const dot = base.lastIndexOf('.');
    if (dot === -1) return PLAIN_TEXT_PROFILE;
    const ext = base.slice(dot + 1).toLowerCase();
    return this.byExtension.get(ext) ?? PLAIN_TEXT_PROFILE;
  }

  getByName(name: string): LanguageProfile | null {
    return this.byName.get(name) ?? null;
  }

  getSupportedLanguages(): string[] {
    return [...this.byName.keys()];
  }
}

const defaultRegistry = LanguageRegistry.withBuiltins();

/** Resolve a profile from the built-in registry. */
export function resolveProfile(path: string): LanguageProfile {
  return defaultRegistry.resolve(path);
}
