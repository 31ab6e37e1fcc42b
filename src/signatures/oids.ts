/**
 * OID constants used by CMS signature creation.
 */

// ─────────────────────────────────────────────────────────────────────────────
// CMS/PKCS#7 Content Types
// ─────────────────────────────────────────────────────────────────────────────

/** id-data (PKCS#7) */
export const OID_DATA = "1.2.840.113549.1.7.1";

/** id-signedData (PKCS#7) */
export const OID_SIGNED_DATA = "1.2.840.113549.1.7.2";

// ─────────────────────────────────────────────────────────────────────────────
// CMS Attributes
// ─────────────────────────────────────────────────────────────────────────────

/** id-contentType */
export const OID_CONTENT_TYPE = "1.2.840.113549.1.9.3";

/** id-messageDigest */
export const OID_MESSAGE_DIGEST = "1.2.840.113549.1.9.4";

/** id-signingTime */
export const OID_SIGNING_TIME = "1.2.840.113549.1.9.5";

/** id-aa-timeStampToken (RFC 3161) */
export const OID_TIMESTAMP_TOKEN = "1.2.840.113549.1.9.16.2.14";

// ─────────────────────────────────────────────────────────────────────────────
// Digest Algorithms
// ─────────────────────────────────────────────────────────────────────────────

/** id-sha256 */
export const OID_SHA256 = "2.16.840.1.101.3.4.2.1";

/** id-sha384 */
export const OID_SHA384 = "2.16.840.1.101.3.4.2.2";

/** id-sha512 */
export const OID_SHA512 = "2.16.840.1.101.3.4.2.3";

// ─────────────────────────────────────────────────────────────────────────────
// Signature Algorithms
// ─────────────────────────────────────────────────────────────────────────────

/** sha256WithRSAEncryption */
export const OID_SHA256_WITH_RSA = "1.2.840.113549.1.1.11";

/** sha384WithRSAEncryption */
export const OID_SHA384_WITH_RSA = "1.2.840.113549.1.1.12";

/** sha512WithRSAEncryption */
export const OID_SHA512_WITH_RSA = "1.2.840.113549.1.1.13";

/** ecdsa-with-SHA256 */
export const OID_ECDSA_WITH_SHA256 = "1.2.840.10045.4.3.2";

/** ecdsa-with-SHA384 */
export const OID_ECDSA_WITH_SHA384 = "1.2.840.10045.4.3.3";

/** ecdsa-with-SHA512 */
export const OID_ECDSA_WITH_SHA512 = "1.2.840.10045.4.3.4";
