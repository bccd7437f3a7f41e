export {
  TACTICAL_THEMES,
  isTacticalTheme,
  allTacticalThemes,
  themeDescription,
  describeThemes,
} from './tactical-themes.js';
export type { TacticalTheme } from './tactical-themes.js';
export { validateThemes, parseMixRatio, parsePositiveIntList } from './constraint-parsing.js';
export type { MixRatio } from './constraint-parsing.js';
