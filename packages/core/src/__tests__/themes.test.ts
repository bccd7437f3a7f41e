import { describe, it, expect } from 'vitest';

import { InvalidConstraintError } from '../errors.js';
import {
  TACTICAL_THEMES,
  allTacticalThemes,
  describeThemes,
  isTacticalTheme,
  parseMixRatio,
  parsePositiveIntList,
  validateThemes,
} from '../themes/index.js';

describe('tactical theme catalogue', () => {
  it('should list every catalogued theme', () => {
    expect(allTacticalThemes()).toHaveLength(Object.keys(TACTICAL_THEMES).length);
    expect(allTacticalThemes()[0]).toBe('fork');
  });

  it('should recognise corpus tag names only', () => {
    expect(isTacticalTheme('discoveredAttack')).toBe(true);
    expect(isTacticalTheme('mateIn2')).toBe(false);
    expect(isTacticalTheme('Fork')).toBe(false);
  });

  it('should describe themes for display', () => {
    expect(describeThemes(['fork', 'pin'])).toBe(
      'fork (A piece attacks two or more enemy pieces at once), ' +
        'pin (A piece cannot move without exposing a more valuable piece behind it)',
    );
    expect(describeThemes(['windmill'])).toBe('windmill (Unknown theme)');
  });
});

describe('validateThemes', () => {
  it('should split and trim a comma-separated list', () => {
    expect(validateThemes('fork, pin ,skewer')).toEqual(['fork', 'pin', 'skewer']);
  });

  it('should drop repeated names', () => {
    expect(validateThemes('fork,fork')).toEqual(['fork']);
  });

  it('should name the unknown themes', () => {
    expect(() => validateThemes('fork,windmill,mateIn2')).toThrow(
      'Invalid themes: windmill, mateIn2',
    );
  });

  it('should reject an empty list', () => {
    expect(() => validateThemes(' , ')).toThrow(InvalidConstraintError);
  });
});

describe('parseMixRatio', () => {
  it('should parse tactical and mate shares', () => {
    expect(parseMixRatio('70:30')).toEqual({ tactical: 70, mate: 30 });
    expect(parseMixRatio(' 0 : 100 ')).toEqual({ tactical: 0, mate: 100 });
  });

  it('should reject shares that do not sum to 100', () => {
    expect(() => parseMixRatio('60:30')).toThrow('Mix ratio parts must sum to 100, got 90');
  });

  it.each(['70', '70:30:0', 'a:b', '-10:110', '70.5:29.5', ''])(
    'should reject malformed ratio "%s"',
    (input) => {
      expect(() => parseMixRatio(input)).toThrow(InvalidConstraintError);
    },
  );
});

describe('parsePositiveIntList', () => {
  it('should parse distinct values in order', () => {
    expect(parsePositiveIntList('3, 1,2,1')).toEqual([3, 1, 2]);
  });

  it.each(['', '0', '1,x', '-1', '1.5'])('should reject "%s"', (input) => {
    expect(() => parsePositiveIntList(input)).toThrow(InvalidConstraintError);
  });
});
