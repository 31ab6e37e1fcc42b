/**
 * Objects of a signature field and its signature value.
 *
 * A signature field is written with the merged field/widget model: one
 * dictionary is both the terminal field (`/FT /Sig`, `/T`, later `/V`)
 * and its widget annotation (`/Subtype /Widget`, `/Rect`, `/P`).
 *
 * PDF Reference: Section 12.7.4.5 "Signature Fields",
 * Section 12.8.1 "Signature Dictionary", Section 12.8.2.2 "DocMDP"
 */

import type { PendingRevision } from "#src/document/pending-revision";
import { formatPdfDate } from "#src/helpers/format";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import { type PdfObject, isPdfArray, isPdfDict } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { PdfString } from "#src/objects/pdf-string";
import type { ByteRangeAllocator } from "./byte-range";
import type { CertificationLevel, Unit } from "./types";

/** Print + Locked */
const WIDGET_FLAGS = 132;

/** SignaturesExist + AppendOnly */
const SIG_FLAGS = 3;

/** Points per unit */
export const UNIT_SCALE: Record<Unit, number> = {
  pt: 1,
  mm: 72 / 25.4,
  cm: 72 / 2.54,
  in: 72,
};

export type Rect = [number, number, number, number];

/**
 * `[x, y, x + width, y + height]` converted from `unit` to points.
 */
export function toRect(x: number, y: number, width: number, height: number, unit: Unit): Rect {
  const k = UNIT_SCALE[unit];

  return [x * k, y * k, (x + width) * k, (y + height) * k];
}

/**
 * Empty Form XObject sized to the widget, so viewers have a normal
 * appearance to draw.
 */
export function buildEmptyAppearance(rect: Rect): PdfStream {
  const width = rect[2] - rect[0];
  const height = rect[3] - rect[1];

  return PdfStream.fromDict({
    Type: PdfName.XObject,
    Subtype: PdfName.Form,
    BBox: PdfArray.of(PdfNumber.of(0), PdfNumber.of(0), PdfNumber.of(width), PdfNumber.of(height)),
  });
}

export function buildSignatureWidget(options: {
  name: string;
  pageRef: PdfRef;
  rect: Rect;
  appearanceRef: PdfRef;
}): PdfDict {
  const { name, pageRef, rect, appearanceRef } = options;

  return PdfDict.of({
    Type: PdfName.Annot,
    Subtype: PdfName.Widget,
    FT: PdfName.Sig,
    F: PdfNumber.of(WIDGET_FLAGS),
    Rect: new PdfArray(rect.map(PdfNumber.of)),
    P: pageRef,
    T: PdfString.fromText(name),
    AP: PdfDict.of({ N: appearanceRef }),
  });
}

export interface SignatureDictionaryOptions {
  signingTime: Date;
  name?: string;
  reason?: string;
  location?: string;
  contactInfo?: string;
  certificationLevel?: CertificationLevel;
}

/**
 * Signature value dictionary with the allocator's placeholders.
 */
export function buildSignatureDictionary(
  allocator: ByteRangeAllocator,
  options: SignatureDictionaryOptions,
): PdfDict {
  const dict = PdfDict.of({
    Type: PdfName.Sig,
    Filter: PdfName.of("Adobe.PPKLite"),
    SubFilter: PdfName.of("adbe.pkcs7.detached"),
    ByteRange: allocator.createByteRangePlaceholder(),
    Contents: allocator.createContentsPlaceholder(),
    M: PdfString.fromText(formatPdfDate(options.signingTime)),
  });

  const text: [string, string | undefined][] = [
    ["Name", options.name],
    ["Reason", options.reason],
    ["Location", options.location],
    ["ContactInfo", options.contactInfo],
  ];

  for (const [key, value] of text) {
    if (value !== undefined) {
      dict.set(key, PdfString.fromText(value));
    }
  }

  if (options.certificationLevel !== undefined) {
    const transformParams = PdfDict.of({
      Type: PdfName.TransformParams,
      P: PdfNumber.of(options.certificationLevel),
      V: PdfName.of("1.2"),
    });

    dict.set(
      "Reference",
      PdfArray.of(
        PdfDict.of({
          Type: PdfName.SigRef,
          TransformMethod: PdfName.DocMDP,
          TransformParams: transformParams,
        }),
      ),
    );
  }

  return dict;
}

// ─────────────────────────────────────────────────────────────────────────────
// Linking
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A writable copy of a dictionary reached through `holder[key]`,
 * whether the entry is a reference or a direct value.
 *
 * `commit()` stores the copy: under its own number when indirect,
 * otherwise back into the holder (which the caller then rewrites).
 */
interface EditableDict {
  dict: PdfDict;
  /** Whether the holder itself changed and must be rewritten */
  commit(): boolean;
}

function editDict(revision: PendingRevision, holder: PdfDict, key: string): EditableDict | null {
  const entry = holder.get(key);

  if (entry?.type === "ref") {
    const target = revision.resolve(entry);

    if (!isPdfDict(target)) {
      return null;
    }

    const dict = target.clone();

    return {
      dict,
      commit: () => {
        revision.set(entry, dict);

        return false;
      },
    };
  }

  if (isPdfDict(entry)) {
    const dict = entry.clone();

    return {
      dict,
      commit: () => {
        holder.set(key, dict);

        return true;
      },
    };
  }

  return null;
}

/**
 * Append `item` to the array at `holder[key]`, creating it when absent.
 *
 * @returns whether `holder` changed
 */
function appendToArray(revision: PendingRevision, holder: PdfDict, key: string, item: PdfObject): boolean {
  const entry = holder.get(key);

  if (entry?.type === "ref") {
    const target = revision.resolve(entry);

    if (isPdfArray(target)) {
      const array = target.clone();

      array.push(item);
      revision.set(entry, array);

      return false;
    }
  }

  const array = isPdfArray(entry) ? entry.clone() : new PdfArray();

  array.push(item);
  holder.set(key, array);

  return true;
}

/**
 * Rewrite a dictionary object with `edit` applied to a copy.
 */
function rewrite(revision: PendingRevision, ref: PdfRef, edit: (dict: PdfDict) => boolean): void {
  const current = revision.resolve(ref);

  if (!isPdfDict(current)) {
    throw new Error(`Object ${ref.toString()} is not a dictionary`);
  }

  const copy = current.clone();

  if (edit(copy)) {
    revision.set(ref, copy);
  }
}

/**
 * Add `fieldRef` to `/AcroForm /Fields`, creating the AcroForm with
 * `/SigFlags 3` when the catalog has none.
 *
 * @returns whether an existing AcroForm's `/SigFlags` had to be raised
 */
export function linkToAcroForm(revision: PendingRevision, catalogRef: PdfRef, fieldRef: PdfRef): boolean {
  let flagsUpdated = false;

  rewrite(revision, catalogRef, catalog => {
    const acroForm = editDict(revision, catalog, "AcroForm");

    if (!acroForm) {
      const created = PdfDict.of({
        Fields: PdfArray.of(fieldRef),
        SigFlags: PdfNumber.of(SIG_FLAGS),
      });

      catalog.set("AcroForm", revision.register(created));

      return true;
    }

    appendToArray(revision, acroForm.dict, "Fields", fieldRef);

    const flags = acroForm.dict.getNumber("SigFlags", revision.resolve)?.value ?? 0;

    if ((flags & SIG_FLAGS) !== SIG_FLAGS) {
      acroForm.dict.set("SigFlags", PdfNumber.of(flags | SIG_FLAGS));
      flagsUpdated = true;
    }

    return acroForm.commit();
  });

  return flagsUpdated;
}

/**
 * Add `annotRef` to the page's `/Annots`.
 */
export function linkToPage(revision: PendingRevision, pageRef: PdfRef, annotRef: PdfRef): void {
  rewrite(revision, pageRef, page => appendToArray(revision, page, "Annots", annotRef));
}

/**
 * Point the catalog's `/Perms /DocMDP` at a certification signature.
 */
export function setDocMdpPermission(revision: PendingRevision, catalogRef: PdfRef, sigRef: PdfRef): void {
  rewrite(revision, catalogRef, catalog => {
    const perms = editDict(revision, catalog, "Perms");

    if (!perms) {
      catalog.set("Perms", PdfDict.of({ DocMDP: sigRef }));

      return true;
    }

    perms.dict.set("DocMDP", sigRef);

    return perms.commit();
  });
}
