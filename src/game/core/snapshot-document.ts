/**
 * Persisted form of a snapshot.
 *
 *   { "pieces": [ { "pieceType": "Pawn", "color": "White", "position": "e2" } ] }
 *
 * The store keeps this JSON as an opaque string; only this module reads it.
 */

import { z } from 'zod';
import { OWNERS, PIECE_KINDS, type PieceRecord, type Snapshot } from '../types';
import { parseSquare } from './squares';
import { MalformedSnapshotError, decodeSnapshot, normalizeSnapshot } from './snapshot-codec';

const pieceStateSchema = z.object({
  pieceType: z.enum(PIECE_KINDS),
  color: z.enum(OWNERS),
  position: z.string()
});

const snapshotDocumentSchema = z.object({
  pieces: z.array(pieceStateSchema)
});

export type PieceStateDocument = z.infer<typeof pieceStateSchema>;
export type SnapshotDocument = z.infer<typeof snapshotDocumentSchema>;

export function toSnapshotDocument(snapshot: Snapshot): SnapshotDocument {
  return {
    pieces: decodeSnapshot(normalizeSnapshot(snapshot)).map(p => ({
      pieceType: p.kind,
      color: p.owner,
      position: p.notation
    }))
  };
}

export function serializeSnapshotDocument(snapshot: Snapshot): string {
  return JSON.stringify(toSnapshotDocument(snapshot));
}

export function fromSnapshotDocument(document: SnapshotDocument): Snapshot {
  const records: PieceRecord[] = document.pieces.map((piece, index) => {
    const square = parseSquare(piece.position);
    if (!square) {
      throw new MalformedSnapshotError(`bad position "${piece.position}" at piece ${index}`, piece);
    }
    return { kind: piece.pieceType, owner: piece.color, square };
  });

  const normalized = normalizeSnapshot(records);
  decodeSnapshot(normalized);
  return normalized;
}

/**
 * Parse a stored payload. Bad JSON, schema violations and invalid
 * positions all surface as MalformedSnapshotError.
 */
export function parseSnapshotDocument(payload: string): Snapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (error) {
    throw new MalformedSnapshotError('payload is not JSON', error);
  }

  const parsed = snapshotDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedSnapshotError('payload does not match the snapshot document', parsed.error.issues);
  }

  return fromSnapshotDocument(parsed.data);
}
