export { formatAlgebraic, iterateNotation, renderNotation, withNotation } from './algebraic.js';
export type { CheckMarker } from './algebraic.js';
