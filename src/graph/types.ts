// src/graph/types.ts

export interface RelationGraph {
  /** File → sorted, duplicate-free direct relations */
  relations: Map<string, string[]>
  /** Every file that was visited, inputs included */
  visited: Set<string>
}
