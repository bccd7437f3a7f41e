const LATEX_REPLACEMENTS: Record<string, string> = {
  '\\': '\\textbackslash{}',
  '{': '\\{',
  '}': '\\}',
  '#': '\\#',
  $: '\\$',
  '%': '\\%',
  '&': '\\&',
  _: '\\_',
  '~': '\\textasciitilde{}',
  '^': '\\textasciicircum{}',
};

const LATEX_SPECIALS = /[\\{}#$%&_~^]/g;

/**
 * Escape text for use in LaTeX body text
 */
export function escapeLatex(text: string): string {
  return text.replace(LATEX_SPECIALS, (char) => LATEX_REPLACEMENTS[char] ?? char);
}

/**
 * Escape a notation token. The mate marker `#` becomes `\#`.
 */
export function escapeNotation(move: string): string {
  return escapeLatex(move);
}
