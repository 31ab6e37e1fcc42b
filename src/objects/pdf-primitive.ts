import type { ByteWriter } from "#src/io/byte-writer";

/**
 * Common shape of every PDF value: a `type` discriminator and the ability
 * to write its own syntax. Composite values recurse into their children.
 */
export interface PdfPrimitive {
  readonly type: string;

  toBytes(writer: ByteWriter): void;
}
