/**
 * Theme system: token colors for the terminal frame.
 *
 * Colors are hex strings; the ANSI writer turns them into truecolor SGR
 * sequences. Plain text is drawn in the terminal's default foreground.
 */

export interface TokenThemeMapping {
  keyword: string;
  typeName: string;
  string: string;
  number: string;
  comment: string;
  searchMatch: string;
}

export interface EditorTheme {
  name: string;
  tokens: TokenThemeMapping;
}

/** Dark theme (default). */
export const DARK_THEME: EditorTheme = {
  name: 'dark',
  tokens: {
    keyword: '#569cd6',
    typeName: '#4ec9b0',
    string: '#ce9178',
    number: '#b5cea8',
    comment: '#6a9955',
    searchMatch: '#3794ff',
  },
};

/** Light theme (similar to GitHub Light). */
export const LIGHT_THEME: EditorTheme = {
  name: 'light',
  tokens: {
    keyword: '#d73a49',
    typeName: '#6f42c1',
    string: '#032f62',
    number: '#005cc5',
    comment: '#6a737d',
    searchMatch: '#e36209',
  },
};

export function themeByName(name: 'dark' | 'light'): EditorTheme {
  return name === 'light' ? LIGHT_THEME : DARK_THEME;
}
