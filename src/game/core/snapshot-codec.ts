/**
 * Snapshot Codec
 *
 * Board ↔ Snapshot ↔ wire text. Pure, synchronous, no I/O.
 *
 * Wire form: one token per piece, comma separated, scan order.
 *   <kind-letter><owner-letter>@<square>
 *   Kw@e1,Pw@e2,Pb@e7,Kb@e8
 * The empty board is the empty string.
 */

import {
  OWNERS,
  PIECE_KINDS,
  type BoardModel,
  type Owner,
  type PieceKind,
  type PieceRecord,
  type Placement,
  type Snapshot
} from '../types';
import { formatSquare, parseSquare, squareIndex } from './squares';

const KIND_TO_LETTER: Record<PieceKind, string> = {
  Pawn: 'P',
  Knight: 'N',
  Bishop: 'B',
  Rook: 'R',
  Queen: 'Q',
  King: 'K'
};

const OWNER_TO_LETTER: Record<Owner, string> = {
  White: 'w',
  Black: 'b'
};

const WIRE_TOKEN = /^([PNBRQK])([wb])@([a-h][1-8])$/;

/**
 * Error thrown when a snapshot (or one of its serialized forms) cannot be
 * turned into a board position. Nothing is applied when this is thrown.
 */
export class MalformedSnapshotError extends Error {
  details?: unknown;

  constructor(reason: string, details?: unknown) {
    super(`Malformed snapshot: ${reason}`);
    this.name = 'MalformedSnapshotError';
    this.details = details;
  }
}

export function isPieceKind(value: unknown): value is PieceKind {
  return PIECE_KINDS.some(kind => kind === value);
}

export function isOwner(value: unknown): value is Owner {
  return OWNERS.some(owner => owner === value);
}

function byScanOrder(a: PieceRecord, b: PieceRecord): number {
  return squareIndex(a.square) - squareIndex(b.square);
}

/**
 * Sort records into scan order. Returns a new array; input is untouched.
 */
export function normalizeSnapshot(records: readonly PieceRecord[]): Snapshot {
  return [...records].sort(byScanOrder);
}

/**
 * Capture a board. Scans once and orders the result, so boards may yield
 * their pieces in any order.
 */
export function encodeBoard(board: BoardModel): Snapshot {
  const records: PieceRecord[] = [];
  for (const occupied of board.forEachOccupiedSquare()) {
    records.push({
      kind: occupied.kind,
      owner: occupied.owner,
      square: { file: occupied.square.file, rank: occupied.square.rank }
    });
  }
  return normalizeSnapshot(records);
}

/**
 * Validate a snapshot and turn it into placements.
 * All-or-nothing: any bad record fails the whole decode.
 */
export function decodeSnapshot(snapshot: Snapshot): Placement[] {
  const seen = new Set<string>();
  const placements: Placement[] = [];

  snapshot.forEach((record, index) => {
    if (!isPieceKind(record.kind)) {
      throw new MalformedSnapshotError(`unknown piece kind at record ${index}`, record);
    }
    if (!isOwner(record.owner)) {
      throw new MalformedSnapshotError(`unknown owner at record ${index}`, record);
    }

    const notation = formatSquare(record.square);
    if (notation === null) {
      throw new MalformedSnapshotError(`square out of range at record ${index}`, record);
    }
    if (seen.has(notation)) {
      throw new MalformedSnapshotError(`duplicate square ${notation}`, record);
    }
    seen.add(notation);

    placements.push({
      kind: record.kind,
      owner: record.owner,
      square: { file: record.square.file, rank: record.square.rank },
      notation
    });
  });

  return placements;
}

/**
 * Wire text for a snapshot. Validates first, so malformed snapshots never
 * reach the wire.
 */
export function formatSnapshotWire(snapshot: Snapshot): string {
  return decodeSnapshot(normalizeSnapshot(snapshot))
    .map(p => `${KIND_TO_LETTER[p.kind]}${OWNER_TO_LETTER[p.owner]}@${p.notation}`)
    .join(',');
}

export function parseSnapshotWire(text: string): Snapshot {
  if (text === '') {
    return [];
  }

  const records: PieceRecord[] = text.split(',').map(token => {
    const match = WIRE_TOKEN.exec(token);
    if (!match) {
      throw new MalformedSnapshotError(`bad token "${token}"`);
    }
    const [, kindLetter, ownerLetter, notation] = match;
    const kind = PIECE_KINDS.find(k => KIND_TO_LETTER[k] === kindLetter);
    const owner = OWNERS.find(o => OWNER_TO_LETTER[o] === ownerLetter);
    const square = notation === undefined ? null : parseSquare(notation);
    if (!kind || !owner || !square) {
      throw new MalformedSnapshotError(`bad token "${token}"`);
    }
    return { kind, owner, square };
  });

  const normalized = normalizeSnapshot(records);
  decodeSnapshot(normalized);
  return normalized;
}

/**
 * Same (kind, owner, square) set, ignoring order.
 */
export function snapshotsEqual(a: Snapshot, b: Snapshot): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return formatSnapshotWire(a) === formatSnapshotWire(b);
}
