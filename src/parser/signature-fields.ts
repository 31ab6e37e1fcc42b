import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfRef } from "#src/objects/pdf-ref";
import type { ParsedDocument } from "./structural-parser";

/**
 * A signature field found in the document's AcroForm.
 */
export interface SignatureField {
  /** Fully qualified name, e.g. `form.approvals.Sig1` */
  name: string;
  /** 1-based page of the widget, or null when it is on no page */
  page: number | null;
  /** `[llx, lly, urx, ury]` in default user space */
  rect: [number, number, number, number];
  /** Object number of the field dictionary (the one that carries `/V`) */
  objectNumber: number;
  /** Whether the field has a `/V` value */
  signed: boolean;
}

function readRect(dict: PdfDict | undefined, doc: ParsedDocument): [number, number, number, number] {
  const values = [...(dict?.getArray("Rect", doc.getObject) ?? [])].map(item =>
    item.type === "number" ? item.value : 0,
  );

  if (values.length !== 4) {
    return [0, 0, 0, 0];
  }

  return [values[0], values[1], values[2], values[3]];
}

/**
 * Collect the terminal signature fields reachable from `/AcroForm /Fields`.
 *
 * `/FT` is inherited from ancestors. Kids without `/T` are widgets of
 * their parent rather than fields of their own. The page of a field
 * comes from its widget's `/P`, or else from the page whose `/Annots`
 * lists the widget.
 */
export function scanSignatureFields(doc: ParsedDocument): SignatureField[] {
  const acroForm = doc.getCatalog().getDict("AcroForm", doc.getObject);
  const fields = acroForm?.getArray("Fields", doc.getObject);

  if (!fields) {
    return [];
  }

  const result: SignatureField[] = [];
  const visited = new Set<number>();

  let pages: PdfRef[] | null = null;

  const pageOf = (widgetRef: PdfRef, widget: PdfDict): number | null => {
    const pageList = (pages ??= doc.getPages());

    const target = widget.getRef("P");

    if (target) {
      const index = pageList.findIndex(page => page.objectNumber === target.objectNumber);

      if (index !== -1) {
        return index + 1;
      }
    }

    for (const [index, pageRef] of pageList.entries()) {
      const page = doc.getObject(pageRef);
      const annots = page?.type === "dict" ? page.getArray("Annots", doc.getObject) : undefined;

      for (const annot of annots ?? []) {
        if (annot.type === "ref" && annot.objectNumber === widgetRef.objectNumber) {
          return index + 1;
        }
      }
    }

    return null;
  };

  const walk = (ref: PdfRef, parentName: string | undefined, inheritedType: string | undefined) => {
    if (visited.has(ref.objectNumber)) {
      return;
    }

    visited.add(ref.objectNumber);

    const node = doc.getObject(ref);

    if (node?.type !== "dict") {
      return;
    }

    const partial = node.getString("T")?.asString();
    const name = partial === undefined ? parentName : parentName ? `${parentName}.${partial}` : partial;
    const fieldType = node.getName("FT")?.value ?? inheritedType;

    const childFields: PdfRef[] = [];
    const widgets: PdfRef[] = [];

    for (const kid of node.getArray("Kids", doc.getObject) ?? []) {
      if (kid.type !== "ref") {
        continue;
      }

      const kidDict = doc.getObject(kid);

      if (kidDict?.type === "dict" && kidDict.has("T")) {
        childFields.push(kid);
      } else {
        widgets.push(kid);
      }
    }

    if (childFields.length > 0) {
      for (const child of childFields) {
        walk(child, name, fieldType);
      }

      return;
    }

    if (fieldType !== "Sig" || name === undefined) {
      return;
    }

    const widgetRef = widgets[0] ?? ref;
    const widgetObj = doc.getObject(widgetRef);
    const widget = widgetObj?.type === "dict" ? widgetObj : node;
    const value = node.get("V");

    result.push({
      name,
      page: pageOf(widgetRef, widget),
      rect: readRect(widget, doc),
      objectNumber: ref.objectNumber,
      signed: value !== undefined && value.type !== "null",
    });
  };

  for (const field of fields) {
    if (field.type === "ref") {
      walk(field, undefined, undefined);
    }
  }

  return result;
}
