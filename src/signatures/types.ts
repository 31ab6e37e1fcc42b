/**
 * Digital signature types and interfaces.
 *
 * PDF Reference: Section 12.8 "Digital Signatures"
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

/** Supported digest algorithms */
export type DigestAlgorithm = "SHA-256" | "SHA-384" | "SHA-512";

/** Key types */
export type KeyType = "RSA" | "EC";

/** Signature algorithms */
export type SignatureAlgorithm = "RSASSA-PKCS1-v1_5" | "RSA-PSS" | "ECDSA";

/** Units accepted for signature field geometry */
export type Unit = "pt" | "mm" | "cm" | "in";

/**
 * DocMDP permission level for a certification signature.
 *
 * 1: no changes; 2: form filling and signing; 3: also annotations.
 */
export type CertificationLevel = 1 | 2 | 3;

/** Four-integer `/ByteRange` value: `[0, beforeContents, afterContents, tailLength]` */
export type ByteRange = [number, number, number, number];

// ─────────────────────────────────────────────────────────────────────────────
// Signer Interface
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Issuer and serial number identifying the signing certificate in the
 * CMS `SignerInfo`.
 */
export interface SignerIdentifier {
  /** DER-encoded issuer `Name` */
  issuer: Uint8Array;

  /** Serial number as big-endian two's-complement integer bytes */
  serialNumber: Uint8Array;
}

/**
 * What a signer returns for one signature.
 */
export interface SignerOutput {
  /** Raw signature value (PKCS#1 v1.5 bytes, or DER ECDSA-Sig-Value) */
  signature: Uint8Array;

  /** DER certificates, signing certificate first */
  certificateChain: Uint8Array[];
}

/**
 * A signer provides cryptographic signing capabilities.
 *
 * Implementations can wrap local keys, HSM, cloud KMS, smart cards, etc.
 * The interface is async to support remote signing services. The key
 * never passes through this library.
 *
 * @example
 * ```typescript
 * class RemoteSigner implements Signer {
 *   readonly signerIdentifier = { issuer, serialNumber };
 *   readonly keyType = "RSA";
 *   readonly signatureAlgorithm = "RSASSA-PKCS1-v1_5";
 *
 *   async sign(data: Uint8Array, algorithm: DigestAlgorithm) {
 *     const signature = await remote.sign(data, algorithm);
 *
 *     return { signature, certificateChain: [leaf, intermediate] };
 *   }
 * }
 * ```
 */
export interface Signer {
  /** Issuer and serial of the signing certificate, pre-extracted */
  readonly signerIdentifier: SignerIdentifier;

  /** Key type (RSA or EC) */
  readonly keyType: KeyType;

  /** Signature algorithm, used for the SignerInfo algorithm identifier */
  readonly signatureAlgorithm: SignatureAlgorithm;

  /**
   * Sign data and return the signature bytes with the certificate chain.
   *
   * `data` is the DER-encoded signed attribute set, whose messageDigest
   * carries the document digest. The signer hashes it with `algorithm`.
   *
   * Signature format requirements:
   * - RSA: PKCS#1 v1.5 signature bytes
   * - ECDSA: DER-encoded SEQUENCE { INTEGER r, INTEGER s }
   */
  sign(data: Uint8Array, algorithm: DigestAlgorithm): Promise<SignerOutput>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Timestamp Authority Interface
// ─────────────────────────────────────────────────────────────────────────────

/**
 * RFC 3161 timestamp authority.
 *
 * The token is attached to the SignerInfo as the unsigned
 * `id-aa-timeStampToken` attribute. No transport is built in.
 */
export interface TimestampAuthority {
  /**
   * Get a timestamp token for the given digest.
   *
   * @param digest - Hash of the signature value
   * @param algorithm - The digest algorithm used
   * @returns DER-encoded TimeStampToken
   */
  timestamp(digest: Uint8Array, algorithm: DigestAlgorithm): Promise<Uint8Array>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Options and Results
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Warning emitted during signing.
 */
export interface SignWarning {
  code: "FIELD_FLAGS_UPDATED" | "PARSE_WARNING" | "PLACEHOLDER_OVERSIZED" | (string & {});

  /** Human-readable message */
  message: string;
}

/**
 * Defaults for a `SignatureManager`.
 */
export interface SignatureManagerOptions {
  /**
   * Unit of `addSignatureField` coordinates.
   * @default "pt"
   */
  unit?: Unit;

  /** @default "SHA-256" */
  digestAlgorithm?: DigestAlgorithm;

  /**
   * Bytes reserved for the CMS container.
   * @default 8192
   */
  estimatedLength?: number;

  /**
   * Signing time for `/M` and the signingTime attribute: a fixed date or
   * a clock. Defaults to the current time.
   */
  signingTime?: Date | (() => Date);

  /** Adds an RFC 3161 token to each signature */
  timestampAuthority?: TimestampAuthority;

  onWarning?: (warning: SignWarning) => void;
}

/**
 * Per-signature options for `prepareSignature`.
 */
export interface PrepareOptions {
  /** Signer name (`/Name`) */
  name?: string;

  /** Reason for signing */
  reason?: string;

  /** Location where signing occurred */
  location?: string;

  /** Contact information */
  contactInfo?: string;

  /**
   * Make this a certification signature with the given DocMDP level.
   * Only the first signature of a document may certify it.
   */
  certificationLevel?: CertificationLevel;

  /** Overrides the manager's signing time for this signature */
  signingTime?: Date;
}

/**
 * Where the placeholder of a prepared signature sits in the buffer.
 */
export interface PreparedSignature {
  byteRange: ByteRange;

  /** Offset of the first hex digit (just after `<`) */
  contentsOffset: number;

  /** Number of hex digits reserved */
  contentsLength: number;
}

/**
 * One signature for `SignatureManager.signMultiple`.
 */
export interface SignRequest extends PrepareOptions {
  fieldName: string;

  /** Field geometry; required when the field does not exist yet */
  placement?: {
    page: number;
    x: number;
    y: number;
    width: number;
    height: number;
  };

  digestAlgorithm?: DigestAlgorithm;

  estimatedLength?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Base error class for signature operations.
 */
export class SignatureError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "SignatureError";
    this.code = code;
  }
}

/**
 * A signature field with this name already exists.
 */
export class DuplicateFieldNameError extends SignatureError {
  constructor(readonly fieldName: string) {
    super("DUPLICATE_FIELD_NAME", `Signature field "${fieldName}" already exists`);
    this.name = "DuplicateFieldNameError";
  }
}

/**
 * Page number outside `[1, pageCount]`.
 */
export class InvalidPageIndexError extends SignatureError {
  constructor(
    readonly page: number,
    readonly pageCount: number,
  ) {
    super("INVALID_PAGE_INDEX", `Page ${page} is out of range (document has ${pageCount} pages)`);
    this.name = "InvalidPageIndexError";
  }
}

export class FieldNotFoundError extends SignatureError {
  constructor(readonly fieldName: string) {
    super("FIELD_NOT_FOUND", `Signature field "${fieldName}" not found`);
    this.name = "FieldNotFoundError";
  }
}

export class AlreadySignedError extends SignatureError {
  constructor(readonly fieldName: string) {
    super("ALREADY_SIGNED", `Signature field "${fieldName}" already has a value`);
    this.name = "AlreadySignedError";
  }
}

export class AlreadyFinalizedError extends SignatureError {
  constructor() {
    super("ALREADY_FINALIZED", "Signature has already been finalized");
    this.name = "AlreadyFinalizedError";
  }
}

/**
 * Error when the CMS container does not fit the reserved placeholder.
 */
export class SignatureTooLargeError extends SignatureError {
  /** Required size in bytes */
  readonly requiredSize: number;

  /** Available size in bytes */
  readonly availableSize: number;

  constructor(requiredSize: number, availableSize: number) {
    super(
      "SIGNATURE_TOO_LARGE",
      `Signature too large for placeholder: need ${requiredSize} bytes, have ${availableSize} bytes`,
    );
    this.name = "SignatureTooLargeError";
    this.requiredSize = requiredSize;
    this.availableSize = availableSize;
  }
}

export class UnsupportedAlgorithmError extends SignatureError {
  constructor(message: string) {
    super("UNSUPPORTED_ALGORITHM", message);
    this.name = "UnsupportedAlgorithmError";
  }
}

/**
 * The signer or timestamp authority failed. The operation may be retried.
 */
export class SigningFailedError extends SignatureError {
  override readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super("SIGNING_FAILED", message);
    this.name = "SigningFailedError";
    this.cause = cause;
  }
}

/**
 * A signature placeholder written by `prepareSignature` could not be found
 * in the signature object's bytes.
 */
export class PlaceholderNotFoundError extends SignatureError {
  constructor(readonly entry: "ByteRange" | "Contents") {
    super("PLACEHOLDER_NOT_FOUND", `${entry} placeholder not found`);
    this.name = "PlaceholderNotFoundError";
  }
}

/**
 * An operation was called out of order.
 */
export class InvalidStateError extends SignatureError {
  constructor(message: string) {
    super("INVALID_STATE", message);
    this.name = "InvalidStateError";
  }
}

/**
 * An argument failed validation.
 */
export class InvalidArgumentError extends SignatureError {
  constructor(
    message: string,
    /** One message per failed check, prefixed with its path */
    readonly issues: string[] = [],
  ) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}
