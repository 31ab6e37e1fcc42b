/**
 * Web Crypto CryptoKey signer.
 *
 * Signs using a CryptoKey directly.
 */

import * as pkijs from "pkijs";
import { createCMSECDSASignature } from "pkijs";
import { toArrayBuffer } from "#src/helpers/buffer";
import {
  type DigestAlgorithm,
  type KeyType,
  type SignatureAlgorithm,
  type Signer,
  type SignerIdentifier,
  type SignerOutput,
  UnsupportedAlgorithmError,
} from "../types";

/**
 * Hash name of an RSA key's `RsaHashedKeyAlgorithm`, if it has one.
 */
function keyHashName(key: CryptoKey): string | undefined {
  const { algorithm } = key;

  if (!("hash" in algorithm)) {
    return undefined;
  }

  const { hash } = algorithm;

  if (typeof hash === "object" && hash !== null && "name" in hash && typeof hash.name === "string") {
    return hash.name;
  }

  return undefined;
}

/**
 * Signer that uses a Web Crypto CryptoKey directly.
 *
 * Useful when you already have a CryptoKey from Web Crypto API,
 * for example from `crypto.subtle.generateKey()` or `crypto.subtle.importKey()`.
 * Issuer and serial number are read from the certificate once, here.
 *
 * @example
 * ```typescript
 * const keyPair = await crypto.subtle.generateKey(
 *   { name: "ECDSA", namedCurve: "P-256" },
 *   true,
 *   ["sign", "verify"]
 * );
 *
 * // Use with signer (certificate is required)
 * const signer = new CryptoKeySigner(keyPair.privateKey, certificateDer, "EC", "ECDSA");
 * ```
 */
export class CryptoKeySigner implements Signer {
  readonly certificate: Uint8Array;
  readonly certificateChain: Uint8Array[];
  readonly keyType: KeyType;
  readonly signatureAlgorithm: SignatureAlgorithm;
  readonly signerIdentifier: SignerIdentifier;

  private readonly privateKey: CryptoKey;

  /**
   * Create a new CryptoKeySigner.
   *
   * @param privateKey - The CryptoKey for signing
   * @param certificate - DER-encoded X.509 certificate
   * @param keyType - Key type ("RSA" or "EC")
   * @param signatureAlgorithm - "RSASSA-PKCS1-v1_5" or "ECDSA"
   * @param certificateChain - Optional certificate chain [intermediate, ..., root]
   */
  constructor(
    privateKey: CryptoKey,
    certificate: Uint8Array,
    keyType: KeyType,
    signatureAlgorithm: SignatureAlgorithm,
    certificateChain?: Uint8Array[],
  ) {
    if (signatureAlgorithm === "RSA-PSS") {
      throw new UnsupportedAlgorithmError("RSA-PSS signatures are not supported");
    }

    this.privateKey = privateKey;
    this.certificate = certificate;
    this.keyType = keyType;
    this.signatureAlgorithm = signatureAlgorithm;
    this.certificateChain = certificateChain ?? [];

    const cert = pkijs.Certificate.fromBER(toArrayBuffer(certificate));

    this.signerIdentifier = {
      issuer: new Uint8Array(cert.issuer.toSchema().toBER(false)),
      serialNumber: new Uint8Array(cert.serialNumber.valueBlock.valueHexView),
    };
  }

  /**
   * Sign data using the private key.
   *
   * The data is hashed internally using the specified algorithm.
   *
   * @returns Signature bytes and the chain, signing certificate first
   */
  async sign(data: Uint8Array, algorithm: DigestAlgorithm): Promise<SignerOutput> {
    const cryptoEngine = pkijs.getCrypto(true);

    let signAlgorithm: { name: string; hash?: { name: string } };

    switch (this.signatureAlgorithm) {
      case "RSASSA-PKCS1-v1_5": {
        // The hash is bound to the key at import time
        const keyHash = keyHashName(this.privateKey);

        if (keyHash !== undefined && keyHash !== algorithm) {
          throw new UnsupportedAlgorithmError(`RSA key is bound to ${keyHash} and cannot sign with ${algorithm}`);
        }

        signAlgorithm = { name: "RSASSA-PKCS1-v1_5" };
        break;
      }
      case "ECDSA":
        // WebCrypto expects the hash algorithm name with hyphen (e.g., "SHA-256")
        signAlgorithm = { name: "ECDSA", hash: { name: algorithm } };
        break;
      default:
        throw new UnsupportedAlgorithmError(`Unsupported signature algorithm: ${this.signatureAlgorithm}`);
    }

    const signature = await cryptoEngine.sign(signAlgorithm, this.privateKey, toArrayBuffer(data));

    // WebCrypto ECDSA returns P1363 format (r || s), but CMS requires DER format
    const value =
      this.signatureAlgorithm === "ECDSA"
        ? new Uint8Array(createCMSECDSASignature(signature))
        : new Uint8Array(signature);

    return {
      signature: value,
      certificateChain: [this.certificate, ...this.certificateChain],
    };
  }
}
