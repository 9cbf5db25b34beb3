export type { Field, Schema } from "./binary-codec";
export { BaseBinaryCodec, BinaryPrimitives, BinaryCodec, getSchemaSize, truncateUtf8 } from "./binary-codec";
