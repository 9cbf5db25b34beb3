/**
 * Source of row identities. One allocator per client session, shared by
 * every sidebar of that session, so ids never collide on the client.
 */
export interface IdAllocator {
  next(): number;
}

/**
 * Hands out 1, 2, 3, ... and never reuses a value.
 */
export class SequentialIdAllocator implements IdAllocator {
  private lastId: number;

  constructor(start = 1) {
    if (!Number.isSafeInteger(start) || start < 0) {
      throw new RangeError(`Invalid start id: ${start}`);
    }
    this.lastId = start - 1;
  }

  next(): number {
    if (this.lastId >= Number.MAX_SAFE_INTEGER) {
      throw new RangeError("Score id space exhausted");
    }
    return ++this.lastId;
  }
}
