// ============= PIECES =============

export const PIECE_KINDS = ['Pawn', 'Knight', 'Bishop', 'Rook', 'Queen', 'King'] as const;
export type PieceKind = typeof PIECE_KINDS[number];

export const OWNERS = ['White', 'Black'] as const;
export type Owner = typeof OWNERS[number];

// ============= SQUARES =============

export const MIN_COORD = 1 as const;
export const MAX_COORD = 8 as const;

/**
 * Board coordinate. file 1 = "a", rank 1 = White's back rank.
 */
export interface Square {
  readonly file: number;
  readonly rank: number;
}

// ============= SNAPSHOT =============

/**
 * One occupied square at a single instant.
 */
export interface PieceRecord {
  readonly kind: PieceKind;
  readonly owner: Owner;
  readonly square: Square;
}

/**
 * Complete piece layout, in board scan order: file-major, rank-minor
 * (a1, a2 ... a8, b1 ... h8).
 */
export type Snapshot = readonly PieceRecord[];

/**
 * A decoded record ready to be put on a board. Carries the square's
 * algebraic notation so boards do not need to re-derive it.
 */
export interface Placement extends PieceRecord {
  readonly notation: string;
}

// ============= BOARD COLLABORATOR =============

export interface OccupiedSquare {
  square: Square;
  kind: PieceKind;
  owner: Owner;
}

/**
 * What the session core needs from a board model: one scan per snapshot,
 * one apply per load.
 */
export interface BoardModel {
  forEachOccupiedSquare(): Iterable<OccupiedSquare>;

  /**
   * Replace the whole position. Throws if the position cannot be held,
   * in which case the board is left as it was.
   */
  applySnapshot(snapshot: Snapshot): void;
}

/**
 * Boards that can report executed moves to the session host.
 */
export interface MoveReportingBoard extends BoardModel {
  onMoveExecuted(listener: (halfMoveIndex: number) => void): () => void;
}
