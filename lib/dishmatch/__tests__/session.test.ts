/**
 * User Session Tests
 *
 * Drives the public API end to end: create, suggest, rate, undo, explain.
 */

import {
  createSeededRng,
  createStaticTableProvider,
  createUser,
  DISLIKE,
  getMetric,
  getSettingsForTest,
  InvalidDishTypeError,
  LIKE,
  NoNeighborError,
  PreferenceNotFoundError,
  resetMetrics,
  SettingsError,
  YOU,
  type GraphPruning,
} from '../index';
import { parseDishType } from '../session';
import { createDessertTable, createProvider, fixedRng, tableFrom } from './fixtures';

const settings = getSettingsForTest();

describe('User Session', () => {
  beforeEach(() => {
    resetMetrics();
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('createUser', () => {
    it('rejects an unknown dish type', () => {
      expect(() => createUser('drinks', createProvider(), { settings })).toThrow(InvalidDishTypeError);
      expect(() => parseDishType('Main')).toThrow('The type of dish must be "main" or "dessert", not "Main".');
    });

    it('binds the session to one dish type', () => {
      expect(createUser('main', createProvider(), { settings }).dishType).toBe('main');
      expect(createUser('dessert', createProvider(), { settings }).dishType).toBe('dessert');
    });

    it('rejects inconsistent neighbor bounds', () => {
      expect(() =>
        createUser('main', createProvider(), { settings, minNeighbors: 10, maxNeighbors: 2 })
      ).toThrow(SettingsError);
      expect(() => createUser('main', createProvider(), { settings, percentile: NaN })).toThrow(SettingsError);
    });
  });

  describe('suggest and rate', () => {
    it('moves from cold start to neighbor suggestions', () => {
      const user = createUser('main', createProvider(), { settings, rng: fixedRng(0) });

      expect(user.suggest()).toEqual({ mode: 'cold_start', recipeId: 101 });
      expect(user.neighbors).toEqual([]);

      user.like(102);
      expect(user.suggest()).toEqual({ mode: 'neighbors', recipeId: 103, neighbors: [4], score: 1 });
      expect(user.neighbors).toEqual([4]);
    });

    it('keeps the neighbor set across a cold start', () => {
      const user = createUser('main', createProvider(), { settings, rng: fixedRng(0) });
      user.like(102);
      user.suggest();

      user.undo(102);
      expect(user.suggest().mode).toBe('cold_start');
      expect(user.neighbors).toEqual([4]);
    });

    it('clears the neighbor set on fallback', () => {
      const user = createUser('main', createProvider(), { settings, rng: fixedRng(0) });
      user.like(102);
      user.suggest();

      user.like(103);
      expect(user.suggest()).toEqual({ mode: 'fallback', recipeId: 101, neighbors: [] });
      expect(user.neighbors).toEqual([]);
    });

    it('uses the dessert table for dessert sessions', () => {
      const user = createUser('dessert', createProvider(), { settings, rng: fixedRng(0) });
      user.dislike(202);

      expect(user.suggest()).toEqual({ mode: 'fallback', recipeId: 201, neighbors: [] });
    });

    it('replays cold-start and fallback picks for the same seed', () => {
      const run = () => {
        const user = createUser('main', createProvider(), { settings, rng: createSeededRng('test-seed') });
        const first = user.suggest().recipeId;
        user.like(102);
        user.like(103);
        return [first, user.suggest().recipeId];
      };

      expect(run()).toEqual(run());
      expect(run()[1]).toBe(101);
    });

    it('applies neighbor bounds from options', () => {
      const user = createUser('main', createProvider(), {
        settings,
        rng: fixedRng(0),
        minNeighbors: 1,
        maxNeighbors: 1,
      });
      user.like(102);

      expect(user.suggest().mode).toBe('fallback');
    });
  });

  describe('undo', () => {
    it('removes a rating', () => {
      const user = createUser('main', createProvider(), { settings });
      user.like(101);
      user.dislike(103);
      user.undo(101);

      expect(Array.from(user.preferences())).toEqual([[103, DISLIKE]]);
      expect(getMetric('preference_added')).toBe(2);
      expect(getMetric('preference_removed')).toBe(1);
    });

    it('rejects an unknown recipe and keeps the history', () => {
      const user = createUser('main', createProvider(), { settings });
      user.like(101);

      expect(() => user.undo(999)).toThrow(PreferenceNotFoundError);
      expect(Array.from(user.preferences())).toEqual([[101, LIKE]]);
      expect(getMetric('preference_removed')).toBe(0);
    });
  });

  describe('explain', () => {
    it('needs a neighbor suggestion first', () => {
      const user = createUser('main', createProvider(), { settings, rng: fixedRng(0) });
      user.suggest();

      expect(() => user.adjacencyGraph(LIKE)).toThrow(NoNeighborError);
      expect(() => user.neighborReport(LIKE)).toThrow(NoNeighborError);
    });

    it('builds the graph and report from the last neighbors', () => {
      const user = createUser('main', createProvider(), { settings, rng: fixedRng(0) });
      user.like(102);
      user.suggest();

      expect(user.adjacencyGraph(LIKE)).toEqual({
        polarity: LIKE,
        nodes: [YOU, 4],
        edges: [{ source: YOU, target: 4, recipeId: 102 }],
      });
      expect(user.adjacencyGraph(DISLIKE).nodes).toEqual([YOU]);
      expect(user.neighborReport(LIKE)).toEqual([
        { userId: 4, commonLikes: 1, commonDislikes: 0, recipesToRecommend: 1 },
      ]);
    });

    it('uses the session pruning mode', () => {
      // 12 and 14 share a like with each other, not with you
      const provider = createStaticTableProvider({
        main: tableFrom('main', {
          10: { 1: 1, 6: 1 },
          12: { 1: -1, 5: 1 },
          14: { 1: -1, 5: 1 },
        }),
        dessert: createDessertTable(),
      });
      const explain = (pruning: GraphPruning) => {
        const user = createUser('main', provider, { settings, pruning, rng: fixedRng(0) });
        user.like(1);
        expect(user.suggest()).toEqual({ mode: 'neighbors', recipeId: 5, neighbors: [10, 12, 14], score: 2 });
        return user.adjacencyGraph(LIKE).nodes;
      };

      expect(explain('component')).toEqual([YOU, 10]);
      expect(explain('isolated')).toEqual([YOU, 10, 12, 14]);
    });
  });
});
