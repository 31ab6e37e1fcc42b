/**
 * Signature placeholder mechanism.
 *
 * The signature must be embedded in the PDF yet is computed over the PDF
 * bytes. The signature dictionary is therefore written with two
 * fixed-width slots, `/ByteRange` and `/Contents`, which are patched in
 * place once the revision's final layout is known. Patching never
 * changes a length, so no offset moves.
 *
 * PDF Reference: Section 12.8.1 "Signature Dictionary"
 */

import { asciiBytes, bytesToHex, concatBytes, indexOfBytes } from "#src/helpers/buffer";
import { ANGLE_BRACKET_OPEN } from "#src/helpers/chars";
import { PdfRaw } from "#src/objects/pdf-raw";
import { PdfString } from "#src/objects/pdf-string";
import type { ObjectSpan } from "#src/writer/serializer";
import { type ByteRange, PlaceholderNotFoundError, SignatureTooLargeError } from "./types";

/** Default reserved container size in bytes */
export const DEFAULT_ESTIMATED_LENGTH = 8192;

/** Width of each patched ByteRange number */
const FIELD_WIDTH = 10;

/**
 * `[0 <10> <10> <10>]`, 36 characters.
 */
const BYTE_RANGE_PLACEHOLDER = `[0 ${"*".repeat(FIELD_WIDTH)} ${"*".repeat(FIELD_WIDTH)} ${"*".repeat(FIELD_WIDTH)}]`;

/** Key and separator preceding each value in a serialized dictionary */
const BYTE_RANGE_KEY = "/ByteRange ";
const CONTENTS_KEY = "/Contents ";

const BYTE_RANGE_ENTRY = asciiBytes(`${BYTE_RANGE_KEY}${BYTE_RANGE_PLACEHOLDER}`);
const CONTENTS_PREFIX = `${CONTENTS_KEY}<`;

/**
 * Positions of both placeholders in a buffer.
 */
export interface PlaceholderLocation {
  /** Offset of the ByteRange `[` */
  byteRangeStart: number;

  /** Length of the ByteRange value including brackets */
  byteRangeLength: number;

  /** Offset of the first hex digit (after `<`) */
  contentsStart: number;

  /** Number of hex digits (excluding `<` and `>`) */
  contentsLength: number;
}

/**
 * Reserves, locates and patches the signature placeholders.
 *
 * The placeholders have to exist before the revision is serialized,
 * since their length shifts every later offset in the revision.
 *
 * @example
 * ```ts
 * const allocator = new ByteRangeAllocator(8192);
 *
 * sigDict.set("ByteRange", allocator.createByteRangePlaceholder());
 * sigDict.set("Contents", allocator.createContentsPlaceholder());
 *
 * const { bytes, spans } = revision.commit();
 * const location = allocator.locate(bytes, spans.get(sigRef.objectNumber));
 * const byteRange = allocator.computeByteRange(bytes.length, location);
 *
 * allocator.patchByteRange(bytes, location, byteRange);
 * ```
 */
export class ByteRangeAllocator {
  constructor(
    /** Reserved container size in bytes; the placeholder holds twice as many hex digits */
    readonly estimatedLength: number = DEFAULT_ESTIMATED_LENGTH,
  ) {
    if (!Number.isInteger(estimatedLength) || estimatedLength <= 0) {
      throw new RangeError(`Estimated length must be a positive integer, got ${estimatedLength}`);
    }
  }

  createByteRangePlaceholder(): PdfRaw {
    return new PdfRaw(BYTE_RANGE_PLACEHOLDER);
  }

  /**
   * Zero-filled hex string of `2 × estimatedLength` digits.
   */
  createContentsPlaceholder(): PdfString {
    return new PdfString(new Uint8Array(this.estimatedLength), "hex");
  }

  /**
   * Find both placeholders within `span`, normally the signature
   * object's span in the revision just written.
   *
   * Only the exact placeholder text this allocator produces matches, and
   * the first match wins: the placeholders precede any caller-supplied
   * text in the signature dictionary, so a `/Reason` or `/Name` quoting
   * them is never taken for the real slot.
   *
   * @throws {PlaceholderNotFoundError} if either placeholder is missing
   */
  locate(buffer: Uint8Array, span: ObjectSpan = { start: 0, end: buffer.length }): PlaceholderLocation {
    const byteRangeKey = indexOfBytes(buffer, BYTE_RANGE_ENTRY, span.start, span.end);

    if (byteRangeKey === -1) {
      throw new PlaceholderNotFoundError("ByteRange");
    }

    const contentsKey = indexOfBytes(buffer, this.contentsEntry(), span.start, span.end);

    if (contentsKey === -1) {
      throw new PlaceholderNotFoundError("Contents");
    }

    const location: PlaceholderLocation = {
      byteRangeStart: byteRangeKey + BYTE_RANGE_KEY.length,
      byteRangeLength: BYTE_RANGE_PLACEHOLDER.length,
      contentsStart: contentsKey + CONTENTS_KEY.length + 1,
      contentsLength: this.estimatedLength * 2,
    };

    if (buffer[location.contentsStart - 1] !== ANGLE_BRACKET_OPEN) {
      throw new PlaceholderNotFoundError("Contents");
    }

    return location;
  }

  /**
   * `/Contents <00…00>` as written by `createContentsPlaceholder`.
   */
  private contentsEntry(): Uint8Array {
    return asciiBytes(`${CONTENTS_PREFIX}${"0".repeat(this.estimatedLength * 2)}>`);
  }

  /**
   * Everything but the hex string including its delimiters:
   * `[0, contentsStart - 1, contentsEnd + 1, length - (contentsEnd + 1)]`.
   */
  computeByteRange(bufferLength: number, location: PlaceholderLocation): ByteRange {
    const beforeContents = location.contentsStart - 1;
    const afterContents = location.contentsStart + location.contentsLength + 1;

    return [0, beforeContents, afterContents, bufferLength - afterContents];
  }

  /**
   * Write the byte range into its slot, each number left-aligned and
   * space-padded so the slot keeps its length.
   *
   * @param buffer - Modified in place
   */
  patchByteRange(buffer: Uint8Array, location: PlaceholderLocation, byteRange: ByteRange): void {
    const [, length1, offset2, length2] = byteRange;
    const field = (n: number) => n.toString().padEnd(FIELD_WIDTH, " ");
    const value = `[0 ${field(length1)} ${field(offset2)} ${field(length2)}]`;

    if (value.length !== location.byteRangeLength) {
      throw new RangeError(
        `ByteRange replacement length mismatch: expected ${location.byteRangeLength}, got ${value.length}`,
      );
    }

    buffer.set(asciiBytes(value), location.byteRangeStart);
  }
}

/**
 * Write `container` into the `/Contents` placeholder as uppercase hex,
 * right-padded with `0`.
 *
 * @param buffer - Modified in place, and only when the container fits
 * @throws {SignatureTooLargeError} when the hex is longer than the placeholder
 */
export function patchContents(buffer: Uint8Array, location: PlaceholderLocation, container: Uint8Array): void {
  const hex = bytesToHex(container);

  if (hex.length > location.contentsLength) {
    throw new SignatureTooLargeError(container.length, location.contentsLength / 2);
  }

  buffer.set(asciiBytes(hex.padEnd(location.contentsLength, "0")), location.contentsStart);
}

/**
 * The bytes a byte range covers, concatenated.
 */
export function extractSignedBytes(buffer: Uint8Array, byteRange: ByteRange): Uint8Array {
  const [offset1, length1, offset2, length2] = byteRange;

  return concatBytes([
    buffer.subarray(offset1, offset1 + length1),
    buffer.subarray(offset2, offset2 + length2),
  ]);
}

/**
 * Parse a patched `/ByteRange` value back into numbers.
 *
 * @returns null while the slot still holds the placeholder
 */
export function readByteRange(buffer: Uint8Array, location: PlaceholderLocation): ByteRange | null {
  let text = "";

  for (const byte of buffer.subarray(location.byteRangeStart, location.byteRangeStart + location.byteRangeLength)) {
    text += String.fromCharCode(byte);
  }

  const match = /^\[\s*(\d+)\s+(\d+)\s+(\d+)\s+(\d+)\s*\]$/.exec(text);

  if (!match) {
    return null;
  }

  return [Number(match[1]), Number(match[2]), Number(match[3]), Number(match[4])];
}
