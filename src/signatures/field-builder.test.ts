import { describe, expect, it } from "vitest";
import { PendingRevision } from "#src/document/pending-revision";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { isPdfArray, isPdfDict } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { StructuralParser } from "#src/parser/structural-parser";
import { buildPdf, bytesToString, createMinimalPdf } from "#src/test-utils";
import { serializeObject } from "#src/writer/serializer";
import { ByteRangeAllocator } from "./byte-range";
import {
  buildEmptyAppearance,
  buildSignatureDictionary,
  buildSignatureWidget,
  linkToAcroForm,
  linkToPage,
  setDocMdpPermission,
  toRect,
} from "./field-builder";

function text(obj: Parameters<typeof serializeObject>[0]): string {
  return bytesToString(serializeObject(obj));
}

function open(objects: string[]) {
  const doc = new StructuralParser(buildPdf({ objects })).parse();

  return { doc, revision: new PendingRevision(doc) };
}

function dictAt(revision: PendingRevision, ref: PdfRef): PdfDict {
  const value = revision.resolve(ref);

  if (!isPdfDict(value)) {
    throw new Error(`expected a dictionary at ${ref.toString()}`);
  }

  return value;
}

function refsIn(array: PdfArray | undefined): string[] {
  return [...(array ?? [])].map(item => (item.type === "ref" ? item.toString() : item.type));
}

describe("toRect", () => {
  it("keeps points as they are", () => {
    expect(toRect(10, 10, 50, 20, "pt")).toEqual([10, 10, 60, 30]);
  });

  it("converts inches and millimetres", () => {
    expect(toRect(1, 2, 1, 0.5, "in")).toEqual([72, 144, 144, 180]);
    expect(toRect(0, 0, 25.4, 0, "mm")[2]).toBeCloseTo(72, 10);
    expect(toRect(0, 0, 2.54, 0, "cm")[2]).toBeCloseTo(72, 10);
  });
});

describe("field objects", () => {
  it("builds an empty appearance sized to the widget", () => {
    expect(text(buildEmptyAppearance([10, 10, 60, 30]))).toBe(
      "<<\n/Length 0\n/Type /XObject\n/Subtype /Form\n/BBox [0 0 50 20]\n>>\nstream\n\nendstream",
    );
  });

  it("builds a merged field and widget", () => {
    const widget = buildSignatureWidget({
      name: "TestSignature",
      pageRef: PdfRef.of(3),
      rect: [10, 10, 60, 30],
      appearanceRef: PdfRef.of(4),
    });

    expect(text(widget)).toBe(
      "<<\n/Type /Annot\n/Subtype /Widget\n/FT /Sig\n/F 132\n/Rect [10 10 60 30]\n/P 3 0 R\n" +
        "/T (TestSignature)\n/AP <<\n/N 4 0 R\n>>\n>>",
    );
  });

  it("builds a signature dictionary with placeholders and metadata", () => {
    const dict = buildSignatureDictionary(new ByteRangeAllocator(2), {
      signingTime: new Date("2026-03-01T10:00:00Z"),
      reason: "Approved",
    });

    expect(text(dict)).toBe(
      "<<\n/Type /Sig\n/Filter /Adobe.PPKLite\n/SubFilter /adbe.pkcs7.detached\n" +
        "/ByteRange [0 ********** ********** **********]\n/Contents <0000>\n" +
        "/M (D:20260301100000Z)\n/Reason (Approved)\n>>",
    );
  });

  it("adds a DocMDP reference for certification", () => {
    const dict = buildSignatureDictionary(new ByteRangeAllocator(2), {
      signingTime: new Date("2026-03-01T10:00:00Z"),
      certificationLevel: 2,
    });

    expect(text(dict)).toContain(
      "/Reference [<<\n/Type /SigRef\n/TransformMethod /DocMDP\n/TransformParams <<\n" +
        "/Type /TransformParams\n/P 2\n/V /1.2\n>>\n>>]",
    );
  });
});

describe("linkToAcroForm", () => {
  it("creates an AcroForm when the catalog has none", () => {
    const doc = new StructuralParser(createMinimalPdf()).parse();
    const revision = new PendingRevision(doc);
    const fieldRef = revision.register(new PdfDict());

    expect(linkToAcroForm(revision, PdfRef.of(1), fieldRef)).toBe(false);

    const acroFormRef = dictAt(revision, PdfRef.of(1)).getRef("AcroForm");

    expect(acroFormRef).toBe(PdfRef.of(5));

    const acroForm = dictAt(revision, PdfRef.of(5));

    expect(refsIn(acroForm.getArray("Fields"))).toEqual(["4 0 R"]);
    expect(acroForm.getNumber("SigFlags")?.value).toBe(3);
  });

  it("updates a direct AcroForm inside the catalog and raises its flags", () => {
    const { revision } = open([
      "<< /Type /Catalog /Pages 2 0 R /AcroForm << /Fields [] /SigFlags 1 >> >>",
      "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
      "<< /Type /Page /Parent 2 0 R >>",
    ]);
    const fieldRef = revision.register(new PdfDict());

    expect(linkToAcroForm(revision, PdfRef.of(1), fieldRef)).toBe(true);

    const acroForm = dictAt(revision, PdfRef.of(1)).getDict("AcroForm");

    expect(refsIn(acroForm?.getArray("Fields"))).toEqual(["4 0 R"]);
    expect(acroForm?.getNumber("SigFlags")?.value).toBe(3);
  });

  it("rewrites an indirect Fields array without touching the catalog", () => {
    const { doc, revision } = open([
      "<< /Type /Catalog /Pages 2 0 R /AcroForm 4 0 R >>",
      "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
      "<< /Type /Page /Parent 2 0 R >>",
      "<< /Fields 5 0 R /SigFlags 3 >>",
      "[3 0 R]",
    ]);
    const fieldRef = revision.register(new PdfDict());

    expect(linkToAcroForm(revision, PdfRef.of(1), fieldRef)).toBe(false);
    expect(revision.has(PdfRef.of(1))).toBe(false);

    const fields = revision.resolve(PdfRef.of(5));

    expect(isPdfArray(fields) ? refsIn(fields) : []).toEqual(["3 0 R", "6 0 R"]);

    const original = doc.getObject(PdfRef.of(5));

    expect(isPdfArray(original) ? refsIn(original) : []).toEqual(["3 0 R"]);
  });
});

describe("linkToPage", () => {
  it("creates /Annots on a page without one", () => {
    const doc = new StructuralParser(createMinimalPdf()).parse();
    const revision = new PendingRevision(doc);

    linkToPage(revision, PdfRef.of(3), PdfRef.of(9));

    expect(refsIn(dictAt(revision, PdfRef.of(3)).getArray("Annots"))).toEqual(["9 0 R"]);
    expect(dictAt(revision, PdfRef.of(3)).getRef("Parent")).toBe(PdfRef.of(2));
  });

  it("appends to an indirect /Annots array", () => {
    const { revision } = open([
      "<< /Type /Catalog /Pages 2 0 R >>",
      "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
      "<< /Type /Page /Parent 2 0 R /Annots 4 0 R >>",
      "[]",
    ]);

    linkToPage(revision, PdfRef.of(3), PdfRef.of(9));

    const annots = revision.resolve(PdfRef.of(4));

    expect(isPdfArray(annots) ? refsIn(annots) : []).toEqual(["9 0 R"]);
    expect(revision.has(PdfRef.of(3))).toBe(false);
  });
});

describe("setDocMdpPermission", () => {
  it("points /Perms /DocMDP at the signature", () => {
    const doc = new StructuralParser(createMinimalPdf()).parse();
    const revision = new PendingRevision(doc);

    setDocMdpPermission(revision, PdfRef.of(1), PdfRef.of(7));

    expect(dictAt(revision, PdfRef.of(1)).getDict("Perms")?.getRef("DocMDP")).toBe(PdfRef.of(7));
  });
});
