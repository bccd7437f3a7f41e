import { describe, it, expect } from 'vitest';

import { renderBoard, describePosition, perspectiveFor, STARTING_FEN } from '../index.js';

const KINGS_ONLY = '8/8/8/8/8/8/8/4K2k w - - 0 1';

describe('renderBoard', () => {
  it('renders from the white side by default', () => {
    const lines = renderBoard(KINGS_ONLY).split('\n');
    expect(lines).toHaveLength(10);
    expect(lines[0]).toBe('   a   b   c   d   e   f   g   h');
    expect(lines[8]).toBe('1  .   .   .   .  [K]  .   .  [k]  1');
  });

  it('flips the board for the black perspective', () => {
    const lines = renderBoard(KINGS_ONLY, { perspective: 'black' }).split('\n');
    expect(lines[0]).toBe('   h   g   f   e   d   c   b   a');
    expect(lines[1]).toBe('1 [k]  .   .  [K]  .   .   .   .   1');
  });

  it('uses FEN letter case for piece colors', () => {
    const lines = renderBoard(STARTING_FEN).split('\n');
    expect(lines[1]).toBe('8 [r] [n] [b] [q] [k] [b] [n] [r]  8');
    expect(lines[8]).toBe('1 [R] [N] [B] [Q] [K] [B] [N] [R]  1');
  });
});

describe('perspectiveFor', () => {
  it('puts the solver at the bottom', () => {
    expect(perspectiveFor('first')).toBe('white');
    expect(perspectiveFor('second')).toBe('black');
  });
});

describe('describePosition', () => {
  it('includes the FEN and side to move', () => {
    const lines = describePosition(KINGS_ONLY).split('\n');
    expect(lines[0]).toBe(`FEN: ${KINGS_ONLY}`);
    expect(lines[1]).toBe('White to move');
    expect(lines[2]).toBe('   a   b   c   d   e   f   g   h');
  });

  it('can omit the FEN', () => {
    const lines = describePosition('4k3/8/8/8/8/8/8/4K3 b - - 0 1', { includeFen: false }).split(
      '\n',
    );
    expect(lines[0]).toBe('Black to move');
    expect(lines[1]).toBe('   h   g   f   e   d   c   b   a');
  });
});
