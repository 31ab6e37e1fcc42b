/**
 * Objects queued for the next incremental update.
 */

import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import type { ParsedDocument } from "#src/parser/structural-parser";
import { type IncrementalWriteResult, writeIncremental } from "#src/writer/incremental-writer";

/**
 * Collects new and rewritten objects on top of a parsed document, then
 * appends them as one revision.
 *
 * New objects are numbered after both the highest number in the xref and
 * the trailer's `/Size`, so a number freed in an earlier revision is
 * never reused.
 *
 * @example
 * ```ts
 * const revision = new PendingRevision(doc);
 * const widget = revision.register(widgetDict);
 *
 * revision.set(catalogRef, updatedCatalog);
 * const { bytes } = revision.commit();
 * ```
 */
export class PendingRevision {
  private readonly objects = new Map<PdfRef, PdfObject>();
  private nextObjNum: number;

  constructor(private readonly doc: ParsedDocument) {
    const size = doc.getTrailer().getNumber("Size")?.value ?? 0;

    this.nextObjNum = Math.max(doc.getMaxObjectNumber() + 1, size);
  }

  get isEmpty(): boolean {
    return this.objects.size === 0;
  }

  /** Trailer `/Size` the revision will be written with */
  get size(): number {
    return this.nextObjNum;
  }

  /**
   * Add a new object under a fresh number.
   */
  register(obj: PdfObject): PdfRef {
    const ref = this.allocateRef();

    this.objects.set(ref, obj);

    return ref;
  }

  /**
   * Reserve a number for an object that is built later, typically one
   * that must point back at something not yet registered.
   */
  allocateRef(): PdfRef {
    return PdfRef.of(this.nextObjNum++, 0);
  }

  /**
   * Write `obj` under `ref`: either a reserved number or an existing
   * object being replaced.
   */
  set(ref: PdfRef, obj: PdfObject): void {
    this.objects.set(ref, obj);
  }

  has(ref: PdfRef): boolean {
    return this.objects.has(ref);
  }

  /**
   * The pending value of `ref` if any, else the document's.
   */
  resolve = (ref: PdfRef): PdfObject | null => {
    return this.objects.get(ref) ?? this.doc.getObject(ref);
  };

  /**
   * Append the queued objects to the document's bytes.
   *
   * The trailer keeps the document's `/Root`, `/Info` and `/ID`.
   */
  commit(): IncrementalWriteResult {
    const trailer = this.doc.getTrailer();
    const root = trailer.getRef("Root");

    if (!root) {
      throw new Error("Cannot write a revision without a /Root reference");
    }

    return writeIncremental(this.objects, {
      originalBytes: this.doc.bytes,
      prevXRefOffset: this.doc.getStartXRef(),
      root,
      size: this.nextObjNum,
      info: trailer.getRef("Info"),
      id: trailer.get("ID"),
    });
  }
}
