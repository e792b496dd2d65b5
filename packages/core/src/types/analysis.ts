import type { TransitionRow, TransitionTriple } from './automaton'

/**
 * Graph size of an automaton.
 * @public
 */
export interface NodesAndEdges {
  /** Number of states */
  readonly nodes: number

  /** Number of transitions */
  readonly edges: number
}

/**
 * Plain-data form of a whole automaton, for export sinks.
 *
 * Contains no functions, so two exports can be compared with deep equality.
 *
 * @public
 */
export interface DfaExport<St, Sy> {
  readonly vocabulary: readonly Sy[]
  readonly states: readonly St[]
  readonly start: St
  readonly finals: readonly St[]

  /** Full transition relation, sorted by `(origin, symbol)` */
  readonly triples: readonly TransitionTriple<St, Sy>[]
}

/**
 * Plain-data form of the reachable part of an automaton.
 * @public
 */
export interface TableExport<St, Sy> {
  /** Sorted vocabulary; each row lists one destination per entry */
  readonly vocabulary: readonly Sy[]
  readonly start: St

  /** Reachable accepting states, in row order */
  readonly finals: readonly St[]

  /** Rows in discovery order */
  readonly rows: readonly TransitionRow<St>[]
}
