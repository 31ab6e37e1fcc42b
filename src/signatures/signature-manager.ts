/**
 * Incremental signing of an existing PDF.
 *
 * Every step that changes the document appends a revision, so the bytes
 * of earlier revisions (and the signatures covering them) never change.
 */

import { PendingRevision } from "#src/document/pending-revision";
import type { PdfDict } from "#src/objects/pdf-dict";
import { isPdfDict } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { StructureError } from "#src/parser/errors";
import type { SignatureField } from "#src/parser/signature-fields";
import { type ParsedDocument, StructuralParser } from "#src/parser/structural-parser";
import { ByteRangeAllocator, extractSignedBytes, type PlaceholderLocation, patchContents } from "./byte-range";
import { CmsBuilder } from "./cms-builder";
import {
  buildEmptyAppearance,
  buildSignatureDictionary,
  buildSignatureWidget,
  linkToAcroForm,
  linkToPage,
  setDocMdpPermission,
  toRect,
} from "./field-builder";
import {
  EstimatedLengthSchema,
  FieldPlacementSchema,
  type ManagerSettings,
  ManagerSettingsSchema,
  PrepareOptionsSchema,
  validate,
} from "./schemas";
import {
  AlreadyFinalizedError,
  AlreadySignedError,
  type ByteRange,
  type DigestAlgorithm,
  DuplicateFieldNameError,
  FieldNotFoundError,
  InvalidArgumentError,
  InvalidPageIndexError,
  InvalidStateError,
  type PrepareOptions,
  type PreparedSignature,
  type SignatureManagerOptions,
  type Signer,
  type SignerOutput,
  SigningFailedError,
  type SignRequest,
  type SignWarning,
  UnsupportedAlgorithmError,
} from "./types";
import { assertDigestAlgorithm, getSignatureAlgorithmOid, hashData } from "./utils";

/**
 * Unused placeholder space above which a `PLACEHOLDER_OVERSIZED`
 * warning is emitted.
 */
const OVERSIZED_THRESHOLD = 32768;

export type SignatureState = "Unloaded" | "Loaded" | "FieldAdded" | "Prepared" | "Signed" | "Finalized";

/**
 * The signature between `prepareSignature` and `signAndEmbed`.
 */
interface PendingSignature {
  fieldName: string;
  digestAlgorithm: DigestAlgorithm;
  signingTime: Date;
  location: PlaceholderLocation;
  byteRange: ByteRange;
  digest: Uint8Array | null;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Drives one signing session over a document:
 * `loadPdf → addSignatureField* → prepareSignature → computeDigest →
 * signAndEmbed → finalize`.
 *
 * Calls out of that order throw `InvalidStateError`; anything that
 * would change a finalized document throws `AlreadyFinalizedError`.
 * Instances share nothing and are not re-entrant.
 *
 * @example
 * ```ts
 * const manager = new SignatureManager({ unit: "mm" });
 *
 * manager.loadPdf(bytes);
 * manager.addSignatureField("Approval", 1, 20, 20, 60, 15);
 * manager.prepareSignature("Approval", "SHA-256", 8192, { reason: "Approved" });
 * manager.computeDigest();
 * await manager.signAndEmbed(signer);
 *
 * const signed = manager.finalize();
 * ```
 */
export class SignatureManager {
  /** Warnings emitted since construction */
  readonly warnings: SignWarning[] = [];

  private state: SignatureState = "Unloaded";
  private doc: ParsedDocument | null = null;
  private pending: PendingSignature | null = null;

  private readonly settings: ManagerSettings;
  private readonly digestAlgorithm: DigestAlgorithm;

  constructor(private readonly options: SignatureManagerOptions = {}) {
    this.settings = validate(
      ManagerSettingsSchema,
      { unit: options.unit, estimatedLength: options.estimatedLength },
      "options",
    );

    const digestAlgorithm = options.digestAlgorithm ?? "SHA-256";

    assertDigestAlgorithm(digestAlgorithm);

    this.digestAlgorithm = digestAlgorithm;
  }

  get currentState(): SignatureState {
    return this.state;
  }

  /**
   * Parse `bytes` and start a new session, discarding any previous one.
   *
   * @throws {MalformedDocumentError} leaving the previous session as it was
   */
  loadPdf(bytes: Uint8Array): void {
    this.doc = new StructuralParser(bytes, {
      onWarning: message => this.warn("PARSE_WARNING", message),
    }).parse();
    this.pending = null;
    this.state = "Loaded";
  }

  /**
   * The current buffer: the loaded bytes until a revision is appended.
   */
  getPdfContent(): Uint8Array {
    return this.requireDocument().bytes;
  }

  getSignatureFields(): SignatureField[] {
    return this.requireDocument().getSignatureFields();
  }

  getUnsignedFields(): SignatureField[] {
    return this.getSignatureFields().filter(field => !field.signed);
  }

  /**
   * Append a revision with a new, unsigned signature field on `page`
   * (1-based). Coordinates are in the configured unit.
   *
   * @returns the extended buffer
   * @throws {DuplicateFieldNameError} if a signature field has this name
   * @throws {InvalidPageIndexError} if the page does not exist
   */
  addSignatureField(name: string, page: number, x: number, y: number, width: number, height: number): Uint8Array {
    this.expectState("addSignatureField", "Loaded", "FieldAdded");

    const placement = validate(FieldPlacementSchema, { name, page, x, y, width, height }, "signature field");
    const doc = this.requireDocument();

    if (doc.getSignatureFields().some(field => field.name === placement.name)) {
      throw new DuplicateFieldNameError(placement.name);
    }

    const pages = doc.getPages();

    if (placement.page < 1 || placement.page > pages.length) {
      throw new InvalidPageIndexError(placement.page, pages.length);
    }

    const pageRef = pages[placement.page - 1];
    const rect = toRect(placement.x, placement.y, placement.width, placement.height, this.settings.unit);
    const revision = new PendingRevision(doc);

    const appearanceRef = revision.register(buildEmptyAppearance(rect));
    const widgetRef = revision.register(
      buildSignatureWidget({ name: placement.name, pageRef, rect, appearanceRef }),
    );

    if (linkToAcroForm(revision, this.catalogRef(doc), widgetRef)) {
      this.warn("FIELD_FLAGS_UPDATED", "AcroForm /SigFlags raised to mark the document as signed");
    }

    linkToPage(revision, pageRef, widgetRef);

    const { bytes } = revision.commit();

    this.reload(bytes);
    this.state = "FieldAdded";

    return bytes;
  }

  /**
   * Append a revision holding the signature dictionary of `fieldName`
   * with a `/Contents` placeholder of `estimatedLength` bytes, and patch
   * its `/ByteRange`.
   *
   * @throws {FieldNotFoundError}
   * @throws {AlreadySignedError} if the field already has a value
   * @throws {UnsupportedAlgorithmError} for a digest other than SHA-256/384/512
   */
  prepareSignature(
    fieldName: string,
    digestAlgorithm: string = this.digestAlgorithm,
    estimatedLength: number = this.settings.estimatedLength,
    options: PrepareOptions = {},
  ): PreparedSignature {
    this.expectState("prepareSignature", "Loaded", "FieldAdded");
    assertDigestAlgorithm(digestAlgorithm);

    const length = validate(EstimatedLengthSchema, estimatedLength, "estimated length");
    const metadata = validate(PrepareOptionsSchema, options, "signature options");
    const doc = this.requireDocument();
    const fields = doc.getSignatureFields();
    const field = fields.find(candidate => candidate.name === fieldName);

    if (!field) {
      throw new FieldNotFoundError(fieldName);
    }

    if (field.signed) {
      throw new AlreadySignedError(fieldName);
    }

    if (metadata.certificationLevel !== undefined && fields.some(candidate => candidate.signed)) {
      throw new InvalidArgumentError("Only the first signature of a document can certify it");
    }

    const signingTime = metadata.signingTime ?? this.now();
    const allocator = new ByteRangeAllocator(length);
    const revision = new PendingRevision(doc);
    const sigRef = revision.register(buildSignatureDictionary(allocator, { ...metadata, signingTime }));

    const fieldRef = PdfRef.of(field.objectNumber, doc.xref.get(field.objectNumber)?.generation ?? 0);
    const fieldDict = this.requireDict(doc, fieldRef).clone();

    fieldDict.set("V", sigRef);
    revision.set(fieldRef, fieldDict);

    if (metadata.certificationLevel !== undefined) {
      setDocMdpPermission(revision, this.catalogRef(doc), sigRef);
    }

    const { bytes, spans } = revision.commit();
    const location = allocator.locate(bytes, spans.get(sigRef.objectNumber));
    const byteRange = allocator.computeByteRange(bytes.length, location);

    allocator.patchByteRange(bytes, location, byteRange);

    this.reload(bytes);
    this.pending = { fieldName, digestAlgorithm, signingTime, location, byteRange, digest: null };
    this.state = "Prepared";

    return { byteRange, contentsOffset: location.contentsStart, contentsLength: location.contentsLength };
  }

  /**
   * Hash the two intervals of the prepared byte range.
   */
  computeDigest(): Uint8Array {
    this.expectState("computeDigest", "Prepared");

    const pending = this.requirePending();
    const signedBytes = extractSignedBytes(this.getPdfContent(), pending.byteRange);

    pending.digest = hashData(signedBytes, pending.digestAlgorithm);

    return pending.digest;
  }

  /**
   * Sign the digest and write the CMS container into the placeholder.
   *
   * A failing signer or timestamp authority, or a chain or token that is
   * not DER, leaves the session prepared, so the call can be retried.
   *
   * @returns the signed buffer
   * @throws {SigningFailedError}
   * @throws {SignatureTooLargeError} before anything is written
   */
  async signAndEmbed(signer: Signer): Promise<Uint8Array> {
    this.expectState("signAndEmbed", "Prepared");

    const pending = this.requirePending();
    const { digest, digestAlgorithm } = pending;

    if (!digest) {
      throw new InvalidStateError("computeDigest() must be called before signAndEmbed()");
    }

    getSignatureAlgorithmOid(signer.signatureAlgorithm, digestAlgorithm);

    const cms = new CmsBuilder();
    const signedAttributes = cms.buildSignedAttributes(digest, digestAlgorithm, pending.signingTime);

    let output: SignerOutput;

    try {
      output = await signer.sign(signedAttributes, digestAlgorithm);
    } catch (error) {
      if (error instanceof UnsupportedAlgorithmError) {
        throw error;
      }

      throw new SigningFailedError(`Signer failed: ${describeError(error)}`, error);
    }

    let timestampToken: Uint8Array | undefined;

    if (this.options.timestampAuthority) {
      try {
        timestampToken = await this.options.timestampAuthority.timestamp(
          hashData(output.signature, digestAlgorithm),
          digestAlgorithm,
        );
      } catch (error) {
        throw new SigningFailedError(`Timestamp authority failed: ${describeError(error)}`, error);
      }
    }

    let container: Uint8Array;

    try {
      container = cms.finalize(output.signature, output.certificateChain, {
        signerIdentifier: signer.signerIdentifier,
        signatureAlgorithm: signer.signatureAlgorithm,
        timestampToken,
      });
    } catch (error) {
      if (error instanceof InvalidArgumentError) {
        throw new SigningFailedError(`Unusable signer output: ${error.message}`, error);
      }

      throw error;
    }

    const bytes = this.getPdfContent();

    patchContents(bytes, pending.location, container);

    const unused = pending.location.contentsLength / 2 - container.length;

    if (unused > OVERSIZED_THRESHOLD) {
      this.warn(
        "PLACEHOLDER_OVERSIZED",
        `Signature of "${pending.fieldName}" leaves ${unused} of ${pending.location.contentsLength / 2} reserved bytes unused`,
      );
    }

    this.state = "Signed";

    return bytes;
  }

  /**
   * End the session.
   *
   * @returns the final buffer
   * @throws {AlreadyFinalizedError} on a second call
   */
  finalize(): Uint8Array {
    this.expectState("finalize", "Signed");

    this.pending = null;
    this.state = "Finalized";

    return this.getPdfContent();
  }

  /**
   * Sign several fields, one complete cycle (and two revisions when the
   * field is created) per request, in order.
   *
   * @returns the buffer after the last signature; the manager is left
   *   `Loaded` on it
   */
  async signMultiple(requests: SignRequest[], signer: Signer): Promise<Uint8Array> {
    for (const request of requests) {
      this.expectState("signMultiple", "Loaded", "FieldAdded");

      const exists = this.getSignatureFields().some(field => field.name === request.fieldName);

      if (!exists) {
        if (!request.placement) {
          throw new FieldNotFoundError(request.fieldName);
        }

        const { page, x, y, width, height } = request.placement;

        this.addSignatureField(request.fieldName, page, x, y, width, height);
      }

      this.prepareSignature(
        request.fieldName,
        request.digestAlgorithm ?? this.digestAlgorithm,
        request.estimatedLength ?? this.settings.estimatedLength,
        request,
      );
      this.computeDigest();
      await this.signAndEmbed(signer);
      this.reload(this.finalize());
      this.state = "Loaded";
    }

    return this.getPdfContent();
  }

  private expectState(operation: string, ...allowed: SignatureState[]): void {
    if (allowed.includes(this.state)) {
      return;
    }

    if (this.state === "Finalized") {
      throw new AlreadyFinalizedError();
    }

    throw new InvalidStateError(`${operation}() is not allowed in state ${this.state}`);
  }

  private requireDocument(): ParsedDocument {
    if (!this.doc) {
      throw new InvalidStateError("No document loaded");
    }

    return this.doc;
  }

  private requirePending(): PendingSignature {
    if (!this.pending) {
      throw new InvalidStateError("No signature has been prepared");
    }

    return this.pending;
  }

  private requireDict(doc: ParsedDocument, ref: PdfRef): PdfDict {
    const value = doc.getObject(ref);

    if (!isPdfDict(value)) {
      throw new StructureError(`Object ${ref.toString()} is not a dictionary`);
    }

    return value;
  }

  private catalogRef(doc: ParsedDocument): PdfRef {
    const ref = doc.getTrailer().getRef("Root");

    if (!ref) {
      throw new StructureError("Trailer has no /Root reference");
    }

    return ref;
  }

  /**
   * Re-index the buffer after appending a revision. Warnings were
   * already reported when the document was loaded.
   */
  private reload(bytes: Uint8Array): void {
    this.doc = new StructuralParser(bytes).parse();
  }

  private now(): Date {
    const { signingTime } = this.options;

    if (typeof signingTime === "function") {
      return signingTime();
    }

    return signingTime ?? new Date();
  }

  private warn(code: SignWarning["code"], message: string): void {
    const warning = { code, message };

    this.warnings.push(warning);
    this.options.onWarning?.(warning);
  }
}
