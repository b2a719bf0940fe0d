/**
 * Neighbor Analytics
 *
 * Per neighbor: how many of your likes they share, how many of your dislikes
 * they share, and how many recipes they like that you have not liked yet.
 */

import type { NeighborReportRow, Rating } from '../../../types/dishmatch';
import { LIKE, DISLIKE } from '../../../types/dishmatch';
import type { InteractionTable } from '../data/table';
import { NoNeighborError } from '../errors';
import type { PreferenceLedger } from '../ledger';
import { record } from '../monitoring/metrics';
import { neighborMatrix } from '../neighbors/selector';

export interface NeighborReportInput {
  table: InteractionTable;
  ledger: PreferenceLedger;
  neighbors: readonly number[];
  /** Sort key: LIKE sorts by commonLikes, DISLIKE by commonDislikes */
  polarity: Rating;
}

/**
 * @throws NoNeighborError when no neighbor-driven suggestion has run yet
 */
export function buildNeighborReport(input: NeighborReportInput): NeighborReportRow[] {
  const { table, ledger, neighbors, polarity } = input;

  if (neighbors.length === 0) {
    record('neighbor_error');
    console.warn('[Recs] No neighbor found');
    throw new NoNeighborError();
  }

  const liked = ledger.withRating(LIKE);
  const disliked = ledger.withRating(DISLIKE);
  const likedSet = new Set(liked);
  const matrix = neighborMatrix(table, neighbors, ledger.recipeIds());

  const rows = neighbors.map((userId): NeighborReportRow => ({
    userId,
    commonLikes: liked.filter(recipeId => matrix.get(userId, recipeId) === LIKE).length,
    commonDislikes: disliked.filter(recipeId => matrix.get(userId, recipeId) === DISLIKE).length,
    recipesToRecommend: matrix.recipeIds.filter(
      recipeId => !likedSet.has(recipeId) && matrix.get(userId, recipeId) === LIKE
    ).length,
  }));

  const sortKey = polarity === LIKE ? 'commonLikes' : 'commonDislikes';
  record('report_built');
  return rows.sort((a, b) => b[sortKey] - a[sortKey]);
}
