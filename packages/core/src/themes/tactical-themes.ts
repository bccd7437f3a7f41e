/**
 * Tactical motif catalogue
 *
 * Keys are the corpus tag names, so a theme selection can be matched against
 * record tags directly.
 */
export const TACTICAL_THEMES = {
  fork: 'A piece attacks two or more enemy pieces at once',
  pin: 'A piece cannot move without exposing a more valuable piece behind it',
  discoveredAttack: 'Moving one piece uncovers an attack by another',
  skewer: 'A valuable piece is attacked and must move, exposing a piece behind it',
  sacrifice: 'Material is given up for a tactical gain',
  attraction: 'An enemy piece is lured onto an unfavourable square',
  deflection: 'An enemy piece is forced away from a square it defends',
  interference: 'A piece is placed between an enemy piece and what it defends',
  xRayAttack: 'A piece attacks or defends through an intervening piece',
  zugzwang: 'Every move available to the opponent worsens their position',
  trappedPiece: 'A piece has no safe square to go to',
  hangingPiece: 'A piece can be captured for free',
  doubleCheck: 'Two pieces give check at the same time',
  clearance: 'A square or line is vacated for another piece',
  quietMove: 'A non-forcing move that sets up an unstoppable threat',
  intermezzo: 'An in-between move played instead of the expected recapture',
  capturingDefender: 'A defender is captured so the piece it guards falls',
  defensiveMove: 'A precise move that averts loss of material or the game',
} as const satisfies Record<string, string>;

export type TacticalTheme = keyof typeof TACTICAL_THEMES;

const THEME_NAMES = new Set<string>(Object.keys(TACTICAL_THEMES));

export function isTacticalTheme(name: string): name is TacticalTheme {
  return THEME_NAMES.has(name);
}

/**
 * Every catalogued theme, in catalogue order
 */
export function allTacticalThemes(): TacticalTheme[] {
  return Object.keys(TACTICAL_THEMES).filter(isTacticalTheme);
}

export function themeDescription(name: string): string {
  return isTacticalTheme(name) ? TACTICAL_THEMES[name] : 'Unknown theme';
}

/**
 * "fork (A piece attacks ...), pin (...)"
 */
export function describeThemes(names: readonly string[]): string {
  return names.map((name) => `${name} (${themeDescription(name)})`).join(', ');
}
