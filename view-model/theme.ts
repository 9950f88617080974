/**
 * Theme system: colors for each classification.
 */

export interface TokenThemeMapping {
  plain: string;
  number: string;
  searchMatch: string;
  string: string;
  character: string;
  comment: string;
  keyword: string;
  typeName: string;
}

export interface EditorTheme {
  name: string;
  tokens: TokenThemeMapping;
}

/** Dark theme (default, Solarized accents). */
export const DARK_THEME: EditorTheme = {
  name: 'dark',
  tokens: {
    plain: '#ffffff',
    number: '#dca3a3',
    searchMatch: '#268bd2',
    string: '#d33682',
    character: '#6c71c4',
    comment: '#859900',
    keyword: '#b58900',
    typeName: '#2aa198',
  },
};

/** Light theme (Solarized Light). */
export const LIGHT_THEME: EditorTheme = {
  name: 'light',
  tokens: {
    plain: '#657b83',
    number: '#cb4b16',
    searchMatch: '#268bd2',
    string: '#d33682',
    character: '#6c71c4',
    comment: '#93a1a1',
    keyword: '#859900',
    typeName: '#2aa198',
  },
};
