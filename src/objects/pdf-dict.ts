import type { RefResolver } from "#src/helpers/types";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfArray } from "./pdf-array";
import { PdfName } from "./pdf-name";
import type { PdfNumber } from "./pdf-number";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";
import type { PdfRef } from "./pdf-ref";
import type { PdfString } from "./pdf-string";

type Key = PdfName | string;

function toName(key: Key): PdfName {
  return typeof key === "string" ? PdfName.of(key) : key;
}

/**
 * Dictionary object, e.g. `<< /Type /Page /Parent 2 0 R >>`.
 *
 * Entries keep insertion order, so a dictionary read from a file and
 * written back lists its keys in the original order.
 */
export class PdfDict implements PdfPrimitive {
  private entries = new Map<PdfName, PdfObject>();

  constructor(entries?: Iterable<[Key, PdfObject]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.entries.set(toName(key), value);
      }
    }
  }

  get type(): "dict" | "stream" {
    return "dict";
  }

  static of(entries: Record<string, PdfObject>): PdfDict {
    return new PdfDict(Object.entries(entries));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Value for `key`. With a resolver, a reference value is followed to
   * the object it points at.
   */
  get(key: Key, resolver?: RefResolver): PdfObject | undefined {
    const value = this.entries.get(toName(key));

    if (resolver && value?.type === "ref") {
      return resolver(value) ?? undefined;
    }

    return value;
  }

  set(key: Key, value: PdfObject): void {
    this.entries.set(toName(key), value);
  }

  has(key: Key): boolean {
    return this.entries.has(toName(key));
  }

  delete(key: Key): boolean {
    return this.entries.delete(toName(key));
  }

  keys(): Iterable<PdfName> {
    return this.entries.keys();
  }

  *[Symbol.iterator](): Iterator<[PdfName, PdfObject]> {
    yield* this.entries;
  }

  getName(key: Key, resolver?: RefResolver): PdfName | undefined {
    const value = this.get(key, resolver);

    return value?.type === "name" ? value : undefined;
  }

  getNumber(key: Key, resolver?: RefResolver): PdfNumber | undefined {
    const value = this.get(key, resolver);

    return value?.type === "number" ? value : undefined;
  }

  getString(key: Key, resolver?: RefResolver): PdfString | undefined {
    const value = this.get(key, resolver);

    return value?.type === "string" ? value : undefined;
  }

  getArray(key: Key, resolver?: RefResolver): PdfArray | undefined {
    const value = this.get(key, resolver);

    return value?.type === "array" ? value : undefined;
  }

  /**
   * Dictionary value (a stream counts, since it is a dictionary too).
   */
  getDict(key: Key, resolver?: RefResolver): PdfDict | undefined {
    const value = this.get(key, resolver);

    return value?.type === "dict" || value?.type === "stream" ? value : undefined;
  }

  getRef(key: Key): PdfRef | undefined {
    const value = this.get(key);

    return value?.type === "ref" ? value : undefined;
  }

  /**
   * Shallow copy; values are shared.
   */
  clone(): PdfDict {
    return new PdfDict(this.entries);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("<<\n");
    this.writeEntries(writer);
    writer.writeAscii(">>");
  }

  protected writeEntries(writer: ByteWriter, skip?: PdfName): void {
    for (const [key, value] of this.entries) {
      if (key === skip) {
        continue;
      }

      key.toBytes(writer);
      writer.writeAscii(" ");
      value.toBytes(writer);
      writer.writeAscii("\n");
    }
  }
}
