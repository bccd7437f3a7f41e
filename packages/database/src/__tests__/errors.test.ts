import { describe, it, expect } from 'vitest';

import { CorpusError, CorpusNotFoundError, CorpusReadError } from '../errors.js';

describe('Error Classes', () => {
  describe('CorpusError', () => {
    it('should create error with message and path', () => {
      const error = new CorpusError('Test error', '/path/to/puzzles.csv');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('CorpusError');
      expect(error.corpusPath).toBe('/path/to/puzzles.csv');
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('CorpusNotFoundError', () => {
    it('should include path in message', () => {
      const error = new CorpusNotFoundError('/path/to/puzzles.csv');
      expect(error.message).toBe('Puzzle corpus not found: /path/to/puzzles.csv');
      expect(error.corpusPath).toBe('/path/to/puzzles.csv');
      expect(error.name).toBe('CorpusNotFoundError');
      expect(error).toBeInstanceOf(CorpusError);
    });
  });

  describe('CorpusReadError', () => {
    it('should include the cause when given', () => {
      const error = new CorpusReadError('/data/p.csv', new Error('EIO'));
      expect(error.message).toBe('Failed to read puzzle corpus at /data/p.csv: EIO');
      expect(error.name).toBe('CorpusReadError');
    });

    it('should work without a cause', () => {
      const error = new CorpusReadError('/data/p.csv');
      expect(error.message).toBe('Failed to read puzzle corpus at /data/p.csv');
      expect(error).toBeInstanceOf(CorpusError);
    });
  });
});
