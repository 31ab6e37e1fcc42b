/**
 * Test utilities: in-memory PDF construction and throwaway signing identities.
 */

import { Integer, Utf8String } from "asn1js";
import * as pkijs from "pkijs";
import { asciiBytes } from "./helpers/buffer";

/**
 * Encode a string one byte per character (test PDFs are ASCII).
 */
export function stringToBytes(str: string): Uint8Array {
  return asciiBytes(str);
}

/**
 * Decode bytes one character per byte, so offsets in the string equal
 * offsets in the buffer.
 */
export function bytesToString(bytes: Uint8Array): string {
  let str = "";

  for (const byte of bytes) {
    str += String.fromCharCode(byte);
  }

  return str;
}

export interface TestPdfOptions {
  /** Header version. Default: "1.7" */
  version?: string;
  /** Object bodies; entry `i` becomes object `i + 1` */
  objects: string[];
  /** Catalog object number. Default: 1 */
  root?: number;
  /** Extra trailer entries, e.g. `/Info 4 0 R` */
  trailerExtra?: string;
  /** Bytes appended after the final `%%EOF` line */
  trailing?: string;
  /** Bytes placed before the header (offsets account for them) */
  prefix?: string;
}

/**
 * Build a single-revision PDF with a correct classic xref table.
 *
 * @example
 * ```ts
 * const bytes = buildPdf({ objects: ["<< /Type /Catalog /Pages 2 0 R >>", ...] });
 * ```
 */
export function buildPdf(options: TestPdfOptions): Uint8Array {
  const { objects, version = "1.7", root = 1, trailerExtra, trailing = "", prefix = "" } = options;

  let out = `${prefix}%PDF-${version}\n`;
  const offsets: number[] = [];

  objects.forEach((body, i) => {
    offsets.push(out.length);
    out += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = out.length;

  out += `xref\n0 ${objects.length + 1}\n0000000000 65535 f\r\n`;

  for (const offset of offsets) {
    out += `${offset.toString().padStart(10, "0")} 00000 n\r\n`;
  }

  const extra = trailerExtra ? ` ${trailerExtra}` : "";

  out += `trailer\n<< /Size ${objects.length + 1} /Root ${root} 0 R${extra} >>\n`;
  out += `startxref\n${xrefOffset}\n%%EOF\n${trailing}`;

  return stringToBytes(out);
}

/**
 * Catalog → page tree → one page.
 */
export function createMinimalPdf(): Uint8Array {
  return buildPdf({
    objects: [
      "<< /Type /Catalog /Pages 2 0 R >>",
      "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
      "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] >>",
    ],
  });
}

/**
 * The minimal document with an xref subsection of `size` entries, all but
 * the first four free.
 */
export function createLargeXRefPdf(size: number): Uint8Array {
  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
    "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] >>",
  ];

  let out = "%PDF-1.7\n";
  let table = "0000000000 65535 f\r\n";

  objects.forEach((body, i) => {
    table += `${out.length.toString().padStart(10, "0")} 00000 n\r\n`;
    out += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = out.length;

  out += `xref\n0 ${size}\n${table}${"0000000000 00001 f\r\n".repeat(size - objects.length - 1)}`;
  out += `trailer\n<< /Size ${size} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return stringToBytes(out);
}

/**
 * A throwaway ECDSA P-256 key with a self-signed certificate.
 */
export interface TestIdentity {
  privateKey: CryptoKey;
  publicKey: CryptoKey;
  /** DER-encoded certificate */
  certificate: Uint8Array;
  /** DER-encoded issuer Name */
  issuer: Uint8Array;
  /** Serial number content bytes */
  serialNumber: Uint8Array;
}

function commonName(value: string): pkijs.RelativeDistinguishedNames {
  return new pkijs.RelativeDistinguishedNames({
    typesAndValues: [
      new pkijs.AttributeTypeAndValue({
        type: "2.5.4.3",
        value: new Utf8String({ value }),
      }),
    ],
  });
}

/**
 * Generate a signing identity with WebCrypto and pkijs.
 */
export async function createTestIdentity(name = "Test Signer", serial = 4242): Promise<TestIdentity> {
  pkijs.setEngine(
    "webcrypto",
    new pkijs.CryptoEngine({ name: "webcrypto", crypto: globalThis.crypto }),
  );

  const crypto = pkijs.getCrypto(true);

  const keys = await crypto.generateKey({ name: "ECDSA", namedCurve: "P-256" }, true, [
    "sign",
    "verify",
  ]);

  const cert = new pkijs.Certificate();

  cert.version = 2;
  cert.serialNumber = new Integer({ value: serial });
  cert.issuer = commonName(name);
  cert.subject = commonName(name);
  cert.notBefore = new pkijs.Time({ type: 0, value: new Date("2025-01-01T00:00:00Z") });
  cert.notAfter = new pkijs.Time({ type: 0, value: new Date("2035-01-01T00:00:00Z") });

  await cert.subjectPublicKeyInfo.importKey(keys.publicKey);
  await cert.sign(keys.privateKey, "SHA-256");

  return {
    privateKey: keys.privateKey,
    publicKey: keys.publicKey,
    certificate: new Uint8Array(cert.toSchema(true).toBER(false)),
    issuer: new Uint8Array(cert.issuer.toSchema().toBER(false)),
    serialNumber: new Uint8Array(cert.serialNumber.valueBlock.valueHexView),
  };
}
