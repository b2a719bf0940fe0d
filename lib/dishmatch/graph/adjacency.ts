/**
 * Adjacency Graph Builder
 *
 * Explains a suggestion: "you" and each neighbor are nodes; every recipe two
 * of them rated with the visualized polarity adds one edge between them
 * (multigraph, one edge per shared recipe).
 *
 * The "you" row is synthetic: ledger entries with the requested polarity keep
 * it, every other cell is 0. Neighbor-to-neighbor edges count too, so a
 * neighbor may reach "you" only through another neighbor.
 */

import type {
  AdjacencyGraph,
  CellValue,
  GraphEdge,
  GraphNodeId,
  GraphPruning,
  Rating,
} from '../../../types/dishmatch';
import { YOU } from '../../../types/dishmatch';
import type { InteractionTable } from '../data/table';
import { NoNeighborError } from '../errors';
import type { PreferenceLedger } from '../ledger';
import { record } from '../monitoring/metrics';
import { neighborMatrix } from '../neighbors/selector';
import { cellDistance } from '../similarity/matrix';

export interface BuildGraphInput {
  table: InteractionTable;
  ledger: PreferenceLedger;
  neighbors: readonly number[];
  polarity: Rating;
  pruning?: GraphPruning;
}

interface GraphRow {
  id: GraphNodeId;
  values: readonly CellValue[];
}

/**
 * Columns where both rows hold the polarity value.
 *
 * Only columns where one side holds the polarity and the pair is not
 * all-zero are compared; a zero distance there means both sides match.
 */
export function sharedColumns(
  a: readonly CellValue[],
  b: readonly CellValue[],
  polarity: Rating
): number[] {
  const shared: number[] = [];
  for (let i = 0; i < a.length; i++) {
    const relevant = (a[i] === polarity || b[i] === polarity) && !(a[i] === 0 && b[i] === 0);
    if (relevant && cellDistance(a[i], b[i]) === 0) {
      shared.push(i);
    }
  }
  return shared;
}

export function degreeOf(graph: Pick<AdjacencyGraph, 'edges'>, node: GraphNodeId): number {
  return graph.edges.filter(e => e.source === node || e.target === node).length;
}

/**
 * Nodes reachable from "you" along any edge
 */
function componentOfYou(edges: readonly GraphEdge[]): Set<GraphNodeId> {
  const reached = new Set<GraphNodeId>([YOU]);
  const queue: GraphNodeId[] = [YOU];

  while (queue.length > 0) {
    const current = queue.shift();
    for (const edge of edges) {
      const other =
        edge.source === current ? edge.target : edge.target === current ? edge.source : null;
      if (other !== null && !reached.has(other)) {
        reached.add(other);
        queue.push(other);
      }
    }
  }
  return reached;
}

/**
 * Remove nodes disconnected from "you". "you" always stays.
 */
export function pruneGraph(graph: AdjacencyGraph, pruning: GraphPruning): AdjacencyGraph {
  const keep =
    pruning === 'component'
      ? componentOfYou(graph.edges)
      : new Set<GraphNodeId>(graph.nodes.filter(node => node === YOU || degreeOf(graph, node) > 0));

  return {
    polarity: graph.polarity,
    nodes: graph.nodes.filter(node => keep.has(node)),
    edges: graph.edges.filter(edge => keep.has(edge.source) && keep.has(edge.target)),
  };
}

/**
 * @throws NoNeighborError when no neighbor-driven suggestion has run yet
 */
export function buildAdjacencyGraph(input: BuildGraphInput): AdjacencyGraph {
  const { table, ledger, neighbors, polarity } = input;

  if (neighbors.length === 0) {
    record('neighbor_error');
    console.warn('[Recs] No neighbor found');
    throw new NoNeighborError();
  }

  const matrix = neighborMatrix(table, neighbors, ledger.recipeIds());
  const youRatings = new Set(ledger.withRating(polarity));

  const rows: GraphRow[] = [
    {
      id: YOU,
      values: matrix.recipeIds.map((recipeId): CellValue => (youRatings.has(recipeId) ? polarity : 0)),
    },
    ...neighbors.map(userId => ({ id: userId, values: matrix.row(userId) })),
  ];

  const edges: GraphEdge[] = [];
  for (let i = 0; i < rows.length; i++) {
    for (let j = i + 1; j < rows.length; j++) {
      for (const column of sharedColumns(rows[i].values, rows[j].values, polarity)) {
        edges.push({ source: rows[i].id, target: rows[j].id, recipeId: matrix.recipeIds[column] });
      }
    }
  }

  record('graph_built');
  return pruneGraph(
    { polarity, nodes: rows.map(row => row.id), edges },
    input.pruning ?? 'component'
  );
}

// =============================================================================
// EXPORT
// =============================================================================

export interface NetworkData {
  nodes: Array<{ id: string; label: string }>;
  edges: Array<{ from: string; to: string; label: string }>;
}

export function nodeLabel(node: GraphNodeId): string {
  return node === YOU ? YOU : `user: ${node}`;
}

/**
 * Plain node/edge lists for a network renderer
 */
export function toNetworkData(graph: AdjacencyGraph): NetworkData {
  return {
    nodes: graph.nodes.map(node => ({ id: nodeLabel(node), label: nodeLabel(node) })),
    edges: graph.edges.map(edge => ({
      from: nodeLabel(edge.source),
      to: nodeLabel(edge.target),
      label: String(edge.recipeId),
    })),
  };
}
