/**
 * Shared utilities for signature operations.
 */

import { sha256, sha384, sha512 } from "@noble/hashes/sha2.js";
import {
  OID_ECDSA_WITH_SHA256,
  OID_ECDSA_WITH_SHA384,
  OID_ECDSA_WITH_SHA512,
  OID_SHA256,
  OID_SHA256_WITH_RSA,
  OID_SHA384,
  OID_SHA384_WITH_RSA,
  OID_SHA512,
  OID_SHA512_WITH_RSA,
} from "./oids";
import { type DigestAlgorithm, type SignatureAlgorithm, UnsupportedAlgorithmError } from "./types";

const DIGEST_ALGORITHMS: readonly string[] = ["SHA-256", "SHA-384", "SHA-512"];

/**
 * Narrow a caller-supplied name to a supported digest algorithm.
 *
 * @throws {UnsupportedAlgorithmError} for anything else
 */
export function assertDigestAlgorithm(algorithm: string): asserts algorithm is DigestAlgorithm {
  if (!DIGEST_ALGORITHMS.includes(algorithm)) {
    throw new UnsupportedAlgorithmError(`Unsupported digest algorithm: ${algorithm}`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Hashing
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Hash data using the specified algorithm.
 *
 * @param data - Data to hash
 * @param algorithm - Digest algorithm
 * @returns Hash bytes
 */
export function hashData(data: Uint8Array, algorithm: DigestAlgorithm): Uint8Array {
  assertDigestAlgorithm(algorithm);

  switch (algorithm) {
    case "SHA-256":
      return sha256(data);
    case "SHA-384":
      return sha384(data);
    case "SHA-512":
      return sha512(data);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Algorithm Identifiers
// ─────────────────────────────────────────────────────────────────────────────

export function getDigestAlgorithmOid(algorithm: DigestAlgorithm): string {
  assertDigestAlgorithm(algorithm);

  switch (algorithm) {
    case "SHA-256":
      return OID_SHA256;
    case "SHA-384":
      return OID_SHA384;
    case "SHA-512":
      return OID_SHA512;
  }
}

const SIGNATURE_ALGORITHM_OIDS: Partial<Record<SignatureAlgorithm, Record<DigestAlgorithm, string>>> = {
  "RSASSA-PKCS1-v1_5": {
    "SHA-256": OID_SHA256_WITH_RSA,
    "SHA-384": OID_SHA384_WITH_RSA,
    "SHA-512": OID_SHA512_WITH_RSA,
  },
  ECDSA: {
    "SHA-256": OID_ECDSA_WITH_SHA256,
    "SHA-384": OID_ECDSA_WITH_SHA384,
    "SHA-512": OID_ECDSA_WITH_SHA512,
  },
};

/**
 * OID for the SignerInfo `signatureAlgorithm`.
 *
 * RSA-PSS needs parameters this builder does not write, so it is
 * rejected along with unknown names.
 *
 * @throws {UnsupportedAlgorithmError}
 */
export function getSignatureAlgorithmOid(
  signatureAlgorithm: SignatureAlgorithm,
  digestAlgorithm: DigestAlgorithm,
): string {
  assertDigestAlgorithm(digestAlgorithm);

  const oid = SIGNATURE_ALGORITHM_OIDS[signatureAlgorithm]?.[digestAlgorithm];

  if (!oid) {
    throw new UnsupportedAlgorithmError(`Unsupported signature algorithm: ${signatureAlgorithm}`);
  }

  return oid;
}
