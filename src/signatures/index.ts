/**
 * Digital signatures module.
 *
 * Incremental signing of existing PDFs: signature fields, byte-range
 * placeholders, detached CMS containers and the session that ties them
 * together.
 *
 * @example
 * ```typescript
 * import { CryptoKeySigner, SignatureManager } from "incremental-pdf-signer";
 *
 * const signer = new CryptoKeySigner(privateKey, certificateDer, "EC", "ECDSA");
 * const manager = new SignatureManager();
 *
 * manager.loadPdf(bytes);
 * const signed = await manager.signMultiple(
 *   [{ fieldName: "Approval", placement: { page: 1, x: 50, y: 50, width: 200, height: 60 } }],
 *   signer,
 * );
 * ```
 */

// Placeholders
export {
  ByteRangeAllocator,
  DEFAULT_ESTIMATED_LENGTH,
  extractSignedBytes,
  type PlaceholderLocation,
  patchContents,
  readByteRange,
} from "./byte-range";
// CMS
export { CmsBuilder, type CmsFinalizeOptions } from "./cms-builder";
// Field objects
export { type Rect, toRect, UNIT_SCALE } from "./field-builder";
// Session
export { SignatureManager, type SignatureState } from "./signature-manager";
// Signers
export { CryptoKeySigner } from "./signers";
// Types
export type {
  ByteRange,
  CertificationLevel,
  DigestAlgorithm,
  KeyType,
  PreparedSignature,
  PrepareOptions,
  SignatureAlgorithm,
  SignatureManagerOptions,
  Signer,
  SignerIdentifier,
  SignerOutput,
  SignRequest,
  SignWarning,
  TimestampAuthority,
  Unit,
} from "./types";
// Errors
export {
  AlreadyFinalizedError,
  AlreadySignedError,
  DuplicateFieldNameError,
  FieldNotFoundError,
  InvalidArgumentError,
  InvalidPageIndexError,
  InvalidStateError,
  PlaceholderNotFoundError,
  SignatureError,
  SignatureTooLargeError,
  SigningFailedError,
  UnsupportedAlgorithmError,
} from "./types";
// Helpers
export { getDigestAlgorithmOid, getSignatureAlgorithmOid, hashData } from "./utils";
