import { asciiBytes, indexOfBytes } from "#src/helpers/buffer";
import type { RefResolver, WarningCallback } from "#src/helpers/types";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import { MalformedDocumentError, StructureError } from "./errors";
import { type IndirectObject, IndirectObjectParser } from "./indirect-object-parser";
import { type SignatureField, scanSignatureFields } from "./signature-fields";
import { type XRefEntry, XRefParser } from "./xref-parser";

export interface ParseOptions {
  /** Called for every recoverable oddity, in addition to `warnings` */
  onWarning?: WarningCallback;
}

/**
 * One xref section of the file, i.e. one revision.
 */
export interface Revision {
  /** Offset of the `xref` keyword */
  xrefOffset: number;
  trailer: PdfDict;
  /** Offset of the previous section; absent for the original revision */
  prev?: number;
  /** Object numbers this revision defines (free or in use) */
  entries: number[];
}

/**
 * A parsed PDF, with objects loaded on first access.
 */
export interface ParsedDocument {
  /** The buffer this document was parsed from */
  readonly bytes: Uint8Array;

  /** Merged xref: the newest revision's entry for each object number */
  readonly xref: ReadonlyMap<number, XRefEntry>;

  /** Recoverable problems found so far (object loading may add more) */
  readonly warnings: string[];

  /** Header version, or the catalog's `/Version` when that is higher */
  getVersion(): string;

  /** Newest trailer */
  getTrailer(): PdfDict;

  /** Revisions, newest first */
  getRevisions(): Revision[];

  /** Offset of the newest xref section */
  getStartXRef(): number;

  /** Highest object number in the merged xref */
  getMaxObjectNumber(): number;

  /** Load an object; null for free, missing or unreadable entries */
  getObject: RefResolver;

  /** Load an object with its number, generation and offset */
  getIndirectObject(ref: PdfRef): IndirectObject | null;

  /** The `/Root` dictionary */
  getCatalog(): PdfDict;

  /** Leaf pages in document order */
  getPages(): PdfRef[];

  /** Terminal `/FT /Sig` fields of the AcroForm */
  getSignatureFields(): SignatureField[];
}

const PDF_HEADER = asciiBytes("%PDF-");
const HEADER_SEARCH_LIMIT = 1024;
const VERSION_PATTERN = /^(\d\.\d)/;

/**
 * Reads the structure of a PDF: header, xref chain, trailer and page tree.
 *
 * Objects are indexed, not loaded: the returned document parses each
 * object the first time it is asked for. References such as `/Parent`
 * are resolved on lookup and never followed eagerly.
 *
 * @example
 * ```ts
 * const doc = new StructuralParser(bytes).parse();
 *
 * doc.getVersion(); // "1.7"
 * doc.getPages().length;
 * ```
 */
export class StructuralParser {
  private readonly warnings: string[] = [];

  constructor(
    private readonly bytes: Uint8Array,
    private readonly options: ParseOptions = {},
  ) {}

  /**
   * @throws {MalformedDocumentError} when the file cannot be indexed
   */
  parse(): ParsedDocument {
    const version = this.parseHeader();
    const xrefParser = new XRefParser(this.bytes);
    const startXRef = xrefParser.findStartXRef();
    const xref = new Map<number, XRefEntry>();
    const revisions: Revision[] = [];
    const visited = new Set<number>();

    let offset: number | undefined = startXRef;

    while (offset !== undefined) {
      if (visited.has(offset)) {
        throw new MalformedDocumentError(`Cyclic /Prev chain at offset ${offset}`, offset);
      }

      visited.add(offset);

      const section = xrefParser.parseAt(offset);

      for (const [objNum, entry] of section.entries) {
        if (!xref.has(objNum)) {
          xref.set(objNum, entry);
        }
      }

      if (section.trailer.has("XRefStm")) {
        this.warn("Hybrid-reference /XRefStm ignored", offset);
      }

      revisions.push({
        xrefOffset: section.offset,
        trailer: section.trailer,
        prev: section.prev,
        entries: [...section.entries.keys()],
      });

      offset = section.prev;
    }

    for (const [objNum, entry] of xref) {
      if (entry.type === "uncompressed" && entry.offset >= this.bytes.length) {
        throw new MalformedDocumentError(
          `Object ${objNum} offset ${entry.offset} is beyond end of file`,
          entry.offset,
        );
      }
    }

    const trailer = revisions[0].trailer;

    if (!trailer.getRef("Root")) {
      throw new MalformedDocumentError("Trailer has no /Root reference", startXRef);
    }

    return this.buildDocument(version, xref, revisions, startXRef);
  }

  private warn(message: string, position: number): void {
    this.warnings.push(message);
    this.options.onWarning?.(message, position);
  }

  private parseHeader(): string {
    const position = indexOfBytes(this.bytes, PDF_HEADER, 0, HEADER_SEARCH_LIMIT);

    if (position === -1) {
      throw new MalformedDocumentError("PDF header not found");
    }

    if (position > 0) {
      this.warn(`PDF header found at offset ${position} (expected 0)`, position);
    }

    let text = "";

    for (let i = position + PDF_HEADER.length; i < this.bytes.length && text.length < 8; i++) {
      if (this.bytes[i] <= 0x20) {
        break;
      }

      text += String.fromCharCode(this.bytes[i]);
    }

    const match = VERSION_PATTERN.exec(text);

    if (!match) {
      throw new MalformedDocumentError(`Invalid PDF version '${text}'`, position);
    }

    return match[1];
  }

  private buildDocument(
    headerVersion: string,
    xref: Map<number, XRefEntry>,
    revisions: Revision[],
    startXRef: number,
  ): ParsedDocument {
    const { bytes, warnings } = this;
    const trailer = revisions[0].trailer;
    const cache = new Map<number, IndirectObject>();
    const loading = new Set<number>();

    const getIndirectObject = (ref: PdfRef): IndirectObject | null => {
      const cached = cache.get(ref.objectNumber);

      if (cached) {
        return cached;
      }

      const entry = xref.get(ref.objectNumber);

      // A /Length pointing back into the object being loaded
      if (entry?.type !== "uncompressed" || loading.has(ref.objectNumber)) {
        return null;
      }

      loading.add(ref.objectNumber);

      try {
        const parser = new IndirectObjectParser(bytes, lengthResolver, (message, position) =>
          this.warn(message, position),
        );
        const result = parser.parseObjectAt(entry.offset);

        if (result.objNum !== ref.objectNumber) {
          throw new MalformedDocumentError(
            `xref entry for object ${ref.objectNumber} points at object ${result.objNum}`,
            entry.offset,
          );
        }

        if (result.genNum !== ref.generation) {
          this.warn(
            `Generation mismatch for object ${ref.objectNumber}: expected ${ref.generation}, got ${result.genNum}`,
            entry.offset,
          );
        }

        cache.set(ref.objectNumber, result);

        return result;
      } finally {
        loading.delete(ref.objectNumber);
      }
    };

    const getObject = (ref: PdfRef): PdfObject | null => getIndirectObject(ref)?.value ?? null;

    const lengthResolver = (ref: PdfRef): number | null => {
      const value = getObject(ref);

      return value?.type === "number" ? value.value : null;
    };

    const getCatalog = (): PdfDict => {
      const rootRef = trailer.getRef("Root");
      const root = rootRef ? getObject(rootRef) : null;

      if (root?.type !== "dict") {
        throw new StructureError("Document catalog is missing or not a dictionary");
      }

      return root;
    };

    const getVersion = (): string => {
      const catalogVersion = getCatalog().getName("Version")?.value;

      if (catalogVersion && Number.parseFloat(catalogVersion) > Number.parseFloat(headerVersion)) {
        return catalogVersion;
      }

      return headerVersion;
    };

    const getPages = (): PdfRef[] => {
      const pagesRef = getCatalog().getRef("Pages");

      if (!pagesRef) {
        throw new StructureError("Catalog has no /Pages reference");
      }

      const pages: PdfRef[] = [];
      const visited = new Set<number>();

      const walk = (ref: PdfRef): void => {
        if (visited.has(ref.objectNumber)) {
          throw new StructureError(`Cycle in page tree at object ${ref.objectNumber}`);
        }

        visited.add(ref.objectNumber);

        const node = getObject(ref);

        if (node?.type !== "dict") {
          this.warn(`Page tree node ${ref.toString()} is not a dictionary`, 0);

          return;
        }

        const kids = node.getArray("Kids", getObject);
        const type = node.getName("Type")?.value;

        if (type === "Page" || (type === undefined && !kids)) {
          pages.push(ref);

          return;
        }

        for (const kid of kids ?? []) {
          if (kid.type === "ref") {
            walk(kid);
          }
        }
      };

      walk(pagesRef);

      return pages;
    };

    let maxObjectNumber = 0;

    for (const objectNumber of xref.keys()) {
      maxObjectNumber = Math.max(maxObjectNumber, objectNumber);
    }

    const document: ParsedDocument = {
      bytes,
      xref,
      warnings,
      getVersion,
      getTrailer: () => trailer,
      getRevisions: () => revisions,
      getStartXRef: () => startXRef,
      getMaxObjectNumber: () => maxObjectNumber,
      getObject,
      getIndirectObject,
      getCatalog,
      getPages,
      getSignatureFields: () => scanSignatureFields(document),
    };

    return document;
  }
}

