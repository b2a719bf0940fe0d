/**
 * Similarity Engine Tests
 *
 * Verifies:
 * 1. Pivot orders rows and columns ascending, missing cells read 0
 * 2. Duplicate (user, recipe) pairs are rejected
 * 3. L1 distance is zero on itself, symmetric and non-negative
 * 4. Distance aligns by recipe id, absent recipes compare against 0
 */

import type { CellValue } from '../../../types/dishmatch';
import { DataShapeError } from '../errors';
import { buildMatrix, cellDistance, distance, l1Distance } from '../similarity/matrix';
import { recordsFrom } from './fixtures';

describe('Similarity Engine', () => {
  describe('buildMatrix', () => {
    it('sorts users and recipes ascending', () => {
      const matrix = buildMatrix(
        recordsFrom({
          9: { 30: 1 },
          2: { 10: -1, 30: 1 },
        })
      );

      expect(matrix.userIds).toEqual([2, 9]);
      expect(matrix.recipeIds).toEqual([10, 30]);
    });

    it('reads missing cells as 0', () => {
      const matrix = buildMatrix(recordsFrom({ 1: { 10: 1 }, 2: { 20: -1 } }));

      expect(matrix.row(1)).toEqual([1, 0]);
      expect(matrix.row(2)).toEqual([0, -1]);
      expect(matrix.get(3, 10)).toBe(0);
    });

    it('rejects a duplicate pair', () => {
      const records = [
        { user_id: 1, recipe_id: 10, rating: 1 as const },
        { user_id: 1, recipe_id: 10, rating: -1 as const },
      ];

      expect(() => buildMatrix(records)).toThrow(DataShapeError);
      expect(() => buildMatrix(records)).toThrow(
        'Cannot pivot: duplicate rating for user 1 and recipe 10'
      );
    });

    it('is empty for no records', () => {
      const matrix = buildMatrix([]);
      expect(matrix.isEmpty).toBe(true);
      expect(matrix.columnSums()).toEqual([]);
    });

    it('sums columns in column order', () => {
      const matrix = buildMatrix(
        recordsFrom({
          1: { 10: 1, 20: -1 },
          2: { 10: 1, 20: -1 },
          3: { 10: -1 },
        })
      );

      expect(matrix.columnSums()).toEqual([
        { recipeId: 10, sum: 1 },
        { recipeId: 20, sum: -2 },
      ]);
    });

    it('fills unrated cells with zero', () => {
      const matrix = buildMatrix(recordsFrom({ 1: { 10: 1, 20: -1 }, 2: { 30: 1 } }));
      expect(matrix.row(1)).toEqual([1, -1, 0]);
      expect(matrix.row(2)).toEqual([0, 0, 1]);
    });

    it('reindexes rows and columns', () => {
      const matrix = buildMatrix(recordsFrom({ 1: { 10: 1 }, 2: { 20: -1 } }))
        .withRows([2, 5])
        .withColumns([20, 40]);

      expect(matrix.userIds).toEqual([2, 5]);
      expect(matrix.recipeIds).toEqual([20, 40]);
      expect(matrix.row(2)).toEqual([-1, 0]);
      expect(matrix.row(5)).toEqual([0, 0]);
    });
  });

  describe('l1Distance', () => {
    const a = [1, -1, 0, 1] as const;
    const b = [-1, -1, 1, 0] as const;

    it('is zero against itself', () => {
      expect(l1Distance(a, a)).toBe(0);
    });

    it('is symmetric', () => {
      expect(l1Distance(a, b)).toBe(l1Distance(b, a));
      expect(l1Distance(a, b)).toBe(4);
    });

    it('never goes negative', () => {
      expect(cellDistance(-1, 1)).toBe(2);
      expect(cellDistance(0, -1)).toBe(1);
    });

    it('rejects vectors of different lengths', () => {
      expect(() => l1Distance([1], [1, 0])).toThrow(RangeError);
    });
  });

  describe('distance', () => {
    it('compares each row over the reference recipes only', () => {
      const matrix = buildMatrix(
        recordsFrom({
          1: { 10: 1, 99: -1 },
          2: { 10: -1 },
          3: { 20: 1 },
        })
      );
      const reference = new Map<number, CellValue>([
        [10, 1],
        [20, 1],
      ]);

      const result = distance(reference, matrix);

      expect(Array.from(result)).toEqual([
        [1, 1],
        [2, 3],
        [3, 1],
      ]);
    });

    it('compares a reference recipe missing from the matrix against 0', () => {
      const matrix = buildMatrix(recordsFrom({ 1: { 10: 1 } }));
      const reference = new Map<number, CellValue>([
        [10, 1],
        [77, -1],
      ]);

      expect(distance(reference, matrix).get(1)).toBe(1);
    });
  });
});
