/**
 * A binary field descriptor.
 * Defines how a single value is serialized/deserialized
 * at a fixed byte size.
 */
export type Field<T> = {
  /** Size of the field in bytes */
  size: number;

  /**
   * Writes a value into a DataView at the given offset.
   * @param dv DataView to write into
   * @param o Byte offset
   * @param v Value to write
   */
  write(dv: DataView, o: number, v: T): void;

  /**
   * Reads a value from a DataView at the given offset.
   * @param dv DataView to read from
   * @param o Byte offset
   */
  read(dv: DataView, o: number): T;
};

/**
 * A schema mapping object keys to binary fields.
 * The order of iteration defines the binary layout.
 *
 * IMPORTANT:
 * Property order is respected as insertion order.
 * Do not rely on computed or dynamic keys.
 */
export type Schema<T> = {
  [K in keyof T]: Field<T[K]>;
};

const schemaSizes = new WeakMap<object, number>();

/**
 * Computes and caches the total byte size of a schema.
 */
export function getSchemaSize<T extends object>(schema: Schema<T>): number {
  const cached = schemaSizes.get(schema);
  if (cached !== undefined) return cached;

  let size = 0;
  for (const k of Object.keys(schema) as (keyof T)[]) {
    size += schema[k].size;
  }

  schemaSizes.set(schema, size);
  return size;
}

/**
 * Converts a JS number into a 64-bit integer, rejecting anything that
 * would silently lose precision on the way.
 */
function toBigInt(v: number): bigint {
  if (!Number.isSafeInteger(v)) {
    throw new RangeError(`Expected a safe integer, got ${v}`);
  }
  return BigInt(v);
}

/**
 * Cuts UTF-8 bytes to at most `maxLength` without splitting a character.
 */
export function truncateUtf8(bytes: Uint8Array, maxLength: number): Uint8Array {
  if (bytes.length <= maxLength) return bytes;

  let end = maxLength;
  // 10xxxxxx continues the character that started before it
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) end--;
  return bytes.subarray(0, end);
}

/**
 * Base codec implementation.
 * Handles schema-driven encoding/decoding.
 */
export class BaseBinaryCodec {
  /**
   * Writes an object into an existing view at the given offset.
   *
   * @returns Number of bytes written
   */
  static writeInto<T extends object>(
    schema: Schema<T>,
    data: T,
    view: DataView,
    offset: number
  ): number {
    let o = offset;
    for (const k of Object.keys(schema) as (keyof T)[]) {
      const f = schema[k];
      f.write(view, o, data[k]);
      o += f.size;
    }

    return o - offset;
  }

  /**
   * Decodes a binary buffer into a target object using the given schema.
   *
   * Validates buffer size before reading.
   *
   * @param schema Binary schema definition
   * @param buf Buffer containing encoded data
   * @param target Target object to mutate
   * @param offset Byte offset to start reading at
   * @returns The mutated target object
   */
  static decodeInto<T extends object>(
    schema: Schema<T>,
    buf: Uint8Array,
    target: T,
    offset = 0
  ): T {
    const expectedSize = getSchemaSize(schema);

    if (buf.byteLength - offset < expectedSize) {
      throw new RangeError(
        `Buffer too small: expected ${expectedSize} bytes, got ${buf.byteLength - offset}`
      );
    }

    const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);

    let o = offset;
    for (const k of Object.keys(schema) as (keyof T)[]) {
      const f = schema[k];
      target[k] = f.read(view, o);
      o += f.size;
    }

    return target;
  }
}

/**
 * Binary primitive field definitions used by the score packets.
 * Multi-byte values are big-endian.
 */
export class BinaryPrimitives {
  /** Unsigned 8-bit integer */
  static readonly u8: Field<number> = {
    size: 1,
    write: (dv, o, v) => dv.setUint8(o, v),
    read: (dv, o) => dv.getUint8(o),
  };

  /** Unsigned 16-bit integer */
  static readonly u16: Field<number> = {
    size: 2,
    write: (dv, o, v) => dv.setUint16(o, v, false),
    read: (dv, o) => dv.getUint16(o, false),
  };

  /** Unsigned 64-bit integer, limited to the safe integer range of a JS number */
  static readonly u64: Field<number> = {
    size: 8,
    write: (dv, o, v) => {
      if (v < 0) throw new RangeError(`Expected an unsigned integer, got ${v}`);
      dv.setBigUint64(o, toBigInt(v), false);
    },
    read: (dv, o) => Number(dv.getBigUint64(o, false)),
  };

  /** Signed 64-bit integer, limited to the safe integer range of a JS number */
  static readonly i64: Field<number> = {
    size: 8,
    write: (dv, o, v) => dv.setBigInt64(o, toBigInt(v), false),
    read: (dv, o) => Number(dv.getBigInt64(o, false)),
  };

  /**
   * String field with UTF-8 encoding and 2-byte length prefix.
   * Text over `maxLength` bytes is cut at the last whole character that fits.
   * @param maxLength Maximum number of bytes kept
   */
  static string(maxLength: number): Field<string> {
    return {
      size: maxLength + 2,
      write(dv, o, v) {
        const bytes = truncateUtf8(new TextEncoder().encode(v), maxLength);
        dv.setUint16(o, bytes.length, false);
        for (let i = 0; i < bytes.length; i++) dv.setUint8(o + 2 + i, bytes[i]);
        for (let i = bytes.length; i < maxLength; i++) dv.setUint8(o + 2 + i, 0);
      },
      read(dv, o) {
        const length = dv.getUint16(o, false);
        if (length > maxLength)
          throw new RangeError(`String length ${length} exceeds max ${maxLength} bytes`);
        const bytes = new Uint8Array(length);
        for (let i = 0; i < length; i++) bytes[i] = dv.getUint8(o + 2 + i);
        return new TextDecoder().decode(bytes);
      },
    };
  }
}

/**
 * Public codec API.
 * Re-exports primitives next to the schema read/write helpers.
 */
export class BinaryCodec extends BaseBinaryCodec {
  static readonly u8 = BinaryPrimitives.u8;
  static readonly u16 = BinaryPrimitives.u16;
  static readonly u64 = BinaryPrimitives.u64;
  static readonly i64 = BinaryPrimitives.i64;
  static readonly string = BinaryPrimitives.string;
}
