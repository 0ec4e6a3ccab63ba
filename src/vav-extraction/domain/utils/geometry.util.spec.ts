import { createToken, Token } from '../entities/token.entity';
import {
  bboxOfTokens,
  groupIntoLines,
  readingOrder,
  rectDistance,
  sortByPosition,
} from './geometry.util';

function token(text: string, x0: number, y0: number, width = 20, height = 10): Token {
  return createToken(text, { x0, y0, x1: x0 + width, y1: y0 + height }, 0, height);
}

describe('geometry utils', () => {
  describe('rectDistance', () => {
    it('should return the diagonal gap between separated boxes', () => {
      expect(
        rectDistance(
          { x0: 0, y0: 0, x1: 10, y1: 10 },
          { x0: 13, y0: 14, x1: 20, y1: 20 },
        ),
      ).toBe(5);
    });

    it('should return 0 for overlapping boxes', () => {
      expect(
        rectDistance(
          { x0: 0, y0: 0, x1: 10, y1: 10 },
          { x0: 5, y0: 5, x1: 20, y1: 20 },
        ),
      ).toBe(0);
    });
  });

  describe('bboxOfTokens', () => {
    it('should return the union of token boxes', () => {
      expect(bboxOfTokens([token('A', 10, 100), token('B', 50, 80)])).toEqual({
        x0: 10,
        y0: 80,
        x1: 70,
        y1: 110,
      });
    });

    it('should return an empty box for no tokens', () => {
      expect(bboxOfTokens([])).toEqual({ x0: 0, y0: 0, x1: 0, y1: 0 });
    });
  });

  describe('sortByPosition', () => {
    it('should sort top to bottom, then left to right', () => {
      const sorted = sortByPosition([
        token('C', 10, 50),
        token('B', 60, 10),
        token('A', 10, 10),
      ]);

      expect(sorted.map((t) => t.text)).toEqual(['A', 'B', 'C']);
    });
  });

  describe('groupIntoLines', () => {
    it('should join tokens whose centers are within half a line height', () => {
      const lines = groupIntoLines([
        token('B', 50, 100),
        token('A', 10, 101),
        token('C', 10, 130),
      ]);

      expect(lines.map((line) => line.map((t) => t.text))).toEqual([
        ['A', 'B'],
        ['C'],
      ]);
    });

    it('should keep tokens on separate lines when they are a full line apart', () => {
      const lines = groupIntoLines([token('A', 10, 100), token('B', 10, 111)]);

      expect(lines).toHaveLength(2);
    });
  });

  describe('readingOrder', () => {
    it('should flatten lines in reading order', () => {
      expect(
        readingOrder([
          token('350', 60, 120),
          token('CFM', 90, 121),
          token('VAV-1', 10, 100),
        ]).map((t) => t.text),
      ).toEqual(['VAV-1', '350', 'CFM']);
    });
  });
});
