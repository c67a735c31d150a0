/**
 * ChessJsBoard - board collaborator backed by chess.js.
 *
 * Used by the host (moves + snapshots) and by peers (apply only).
 */

import { Chess, SQUARES, type Color, type PieceSymbol } from 'chess.js';
import type {
  MoveReportingBoard,
  OccupiedSquare,
  Owner,
  PieceKind,
  Snapshot
} from '../types';
import { parseSquare } from '../core/squares';
import { decodeSnapshot } from '../core/snapshot-codec';

const SYMBOL_TO_KIND: Record<PieceSymbol, PieceKind> = {
  p: 'Pawn',
  n: 'Knight',
  b: 'Bishop',
  r: 'Rook',
  q: 'Queen',
  k: 'King'
};

const KIND_TO_SYMBOL: Record<PieceKind, PieceSymbol> = {
  Pawn: 'p',
  Knight: 'n',
  Bishop: 'b',
  Rook: 'r',
  Queen: 'q',
  King: 'k'
};

const COLOR_TO_OWNER: Record<Color, Owner> = { w: 'White', b: 'Black' };
const OWNER_TO_COLOR: Record<Owner, Color> = { White: 'w', Black: 'b' };

export class ChessJsBoard implements MoveReportingBoard {
  private chess: Chess;
  private halfMoves = 0;
  private readonly listeners = new Set<(halfMoveIndex: number) => void>();

  constructor(fen?: string) {
    this.chess = fen === undefined ? new Chess() : new Chess(fen);
  }

  *forEachOccupiedSquare(): Iterable<OccupiedSquare> {
    for (const row of this.chess.board()) {
      for (const cell of row) {
        if (!cell) continue;
        const square = parseSquare(cell.square);
        if (!square) continue;
        yield {
          square,
          kind: SYMBOL_TO_KIND[cell.type],
          owner: COLOR_TO_OWNER[cell.color]
        };
      }
    }
  }

  /**
   * Builds the new position on a fresh instance and swaps it in only when
   * every piece was accepted.
   */
  applySnapshot(snapshot: Snapshot): void {
    const placements = decodeSnapshot(snapshot);
    const next = new Chess();
    next.clear();

    for (const placement of placements) {
      const square = SQUARES.find(sq => sq === placement.notation);
      const piece = { type: KIND_TO_SYMBOL[placement.kind], color: OWNER_TO_COLOR[placement.owner] };
      if (!square || !next.put(piece, square)) {
        throw new Error(`Cannot place ${placement.owner} ${placement.kind} on ${placement.notation}`);
      }
    }

    this.chess = next;
  }

  /**
   * Play a move in SAN ("e4", "Nf3"). chess.js throws on illegal moves.
   */
  move(san: string): number {
    this.chess.move(san);
    this.halfMoves++;
    for (const listener of this.listeners) {
      listener(this.halfMoves);
    }
    return this.halfMoves;
  }

  onMoveExecuted(listener: (halfMoveIndex: number) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  fen(): string {
    return this.chess.fen();
  }
}
