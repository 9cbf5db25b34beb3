import { BinaryCodec, getSchemaSize, type Schema } from "../../core/binary-codec";
import type { ScoreInfo } from "./score-info";

/**
 * Packet actions understood by the client.
 */
export enum ScorePacketAction {
  /** Add the rows, or refresh them in place */
  CHANGE = 0,
  REMOVE = 1,
}

export interface ScorePacket {
  action: ScorePacketAction;
  entries: ScoreInfo[];
}

/** Max UTF-8 bytes of an objective id */
export const MAX_OBJECTIVE_ID_BYTES = 32;
/**
 * Max UTF-8 bytes of a rendered row, marker and team affixes included.
 * Longer names are cut at a character boundary.
 */
export const MAX_DISPLAY_NAME_BYTES = 64;

interface ScorePacketHeader {
  action: number;
  count: number;
}

const headerSchema: Schema<ScorePacketHeader> = {
  action: BinaryCodec.u8,
  count: BinaryCodec.u16,
};

const HEADER_SIZE = getSchemaSize(headerSchema);

function isScorePacketAction(value: number): value is ScorePacketAction {
  return value === ScorePacketAction.CHANGE || value === ScorePacketAction.REMOVE;
}

const scoreInfoSchema: Schema<ScoreInfo> = {
  scoreboardId: BinaryCodec.u64,
  objectiveId: BinaryCodec.string(MAX_OBJECTIVE_ID_BYTES),
  score: BinaryCodec.i64,
  displayName: BinaryCodec.string(MAX_DISPLAY_NAME_BYTES),
};

/**
 * Codec for score packets.
 *
 * Buffer Layout:
 * ```
 * ┌─────────┬─────────┬──────────────────────────┐
 * │ Action  │  Count  │  Entries (fixed size)    │
 * │ (u8)    │  (u16)  │  count × ScoreInfo       │
 * └─────────┴─────────┴──────────────────────────┘
 * ```
 *
 * @example
 * ```ts
 * const { add, remove } = reconciler.render(objective, ObjectiveUpdateType.NOTHING);
 * if (remove.length > 0) transport.send(ScorePacketCodec.encode(ScorePacketAction.REMOVE, remove));
 * if (add.length > 0) transport.send(ScorePacketCodec.encode(ScorePacketAction.CHANGE, add));
 * ```
 */
export class ScorePacketCodec {
  static readonly entrySize = getSchemaSize(scoreInfoSchema);

  static encode(action: ScorePacketAction, entries: readonly ScoreInfo[]): Uint8Array {
    if (entries.length > 0xffff) {
      throw new RangeError(`Too many entries in one packet: ${entries.length}`);
    }

    const buf = new Uint8Array(HEADER_SIZE + entries.length * this.entrySize);
    const view = new DataView(buf.buffer);

    let offset = BinaryCodec.writeInto(headerSchema, { action, count: entries.length }, view, 0);
    for (const entry of entries) {
      offset += BinaryCodec.writeInto(scoreInfoSchema, entry, view, offset);
    }

    return buf;
  }

  static decode(buf: Uint8Array): ScorePacket {
    const { action, count } = BinaryCodec.decodeInto(headerSchema, buf, { action: 0, count: 0 });
    if (!isScorePacketAction(action)) {
      throw new RangeError(`Unknown score packet action: ${action}`);
    }

    const entries: ScoreInfo[] = [];
    let offset = HEADER_SIZE;
    for (let i = 0; i < count; i++) {
      const entry: ScoreInfo = { scoreboardId: 0, objectiveId: "", score: 0, displayName: "" };
      entries.push(BinaryCodec.decodeInto(scoreInfoSchema, buf, entry, offset));
      offset += this.entrySize;
    }

    return { action, entries };
  }
}
