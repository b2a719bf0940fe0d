/**
 * DISHMATCH: Recommendation Types
 *
 * Shapes produced by neighbor selection, the suggestion policy,
 * the adjacency graph and the neighbor report.
 */

import type { Rating } from './interaction';

// =============================================================================
// NEIGHBORS
// =============================================================================

export interface NeighborDistance {
  userId: number;
  dist: number;
}

/**
 * Neighbor user ids, closest first. Recomputed on every neighbor-driven suggestion.
 */
export type NeighborSet = readonly number[];

export interface NeighborBounds {
  minRows: number;
  maxRows: number;
  /** Distance cutoff percentile, 0..100 */
  percentile: number;
}

// =============================================================================
// SUGGESTIONS
// =============================================================================

export type SuggestionMode = 'cold_start' | 'neighbors' | 'fallback';

export interface ColdStartSuggestion {
  mode: 'cold_start';
  recipeId: number;
}

export interface NeighborSuggestion {
  mode: 'neighbors';
  recipeId: number;
  neighbors: NeighborSet;
  /** Sum of the chosen recipe's column across neighbors */
  score: number;
}

export interface FallbackSuggestion {
  mode: 'fallback';
  recipeId: number;
  /** Always empty: every candidate was pruned or had nothing new to rate */
  neighbors: NeighborSet;
}

/**
 * Exactly one recipe. Modes that ran neighbor selection carry the new NeighborSet.
 */
export type SuggestionResult = ColdStartSuggestion | NeighborSuggestion | FallbackSuggestion;

// =============================================================================
// ADJACENCY GRAPH
// =============================================================================

export const YOU = 'you';

export type GraphNodeId = typeof YOU | number;

export interface GraphEdge {
  source: GraphNodeId;
  target: GraphNodeId;
  /** Recipe both endpoints rated with the visualized polarity */
  recipeId: number;
}

export interface AdjacencyGraph {
  polarity: Rating;
  nodes: GraphNodeId[];
  edges: GraphEdge[];
}

/**
 * How nodes disconnected from "you" are removed after construction.
 * - component: keep only the connected component containing "you"
 * - isolated: drop nodes without any edge
 * "you" is kept in both cases, even with zero edges.
 */
export type GraphPruning = 'component' | 'isolated';

// =============================================================================
// NEIGHBOR REPORT
// =============================================================================

export interface NeighborReportRow {
  userId: number;
  commonLikes: number;
  commonDislikes: number;
  recipesToRecommend: number;
}
