/**
 * Detached CMS SignedData (adbe.pkcs7.detached).
 *
 * The signature is computed over the DER-encoded signed attribute set,
 * not over the document digest, so the container is built in two steps:
 * first the attributes to hand to the signer, then the SignedData around
 * the signature the signer returns.
 *
 * RFC 5652: Cryptographic Message Syntax
 */

import { fromBER, Integer, ObjectIdentifier, OctetString, Set as Asn1Set, UTCTime } from "asn1js";
import * as pkijs from "pkijs";
import { toArrayBuffer } from "#src/helpers/buffer";
import {
  OID_CONTENT_TYPE,
  OID_DATA,
  OID_MESSAGE_DIGEST,
  OID_SIGNED_DATA,
  OID_SIGNING_TIME,
  OID_TIMESTAMP_TOKEN,
} from "./oids";
import {
  type DigestAlgorithm,
  InvalidArgumentError,
  InvalidStateError,
  type SignatureAlgorithm,
  type SignerIdentifier,
} from "./types";
import { assertDigestAlgorithm, getDigestAlgorithmOid, getSignatureAlgorithmOid } from "./utils";

export interface CmsFinalizeOptions {
  /** Issuer and serial for the SignerInfo, as supplied by the signer */
  signerIdentifier: SignerIdentifier;

  signatureAlgorithm: SignatureAlgorithm;

  /** DER TimeStampToken, added as an unsigned attribute */
  timestampToken?: Uint8Array;
}

/**
 * Builds one detached SignedData with a single SignerInfo.
 *
 * @example
 * ```ts
 * const cms = new CmsBuilder();
 * const toSign = cms.buildSignedAttributes(digest, "SHA-256", new Date());
 * const { signature, certificateChain } = await signer.sign(toSign, "SHA-256");
 *
 * const der = cms.finalize(signature, certificateChain, {
 *   signerIdentifier: signer.signerIdentifier,
 *   signatureAlgorithm: signer.signatureAlgorithm,
 * });
 * ```
 */
export class CmsBuilder {
  private signedAttrs: pkijs.Attribute[] | null = null;
  private digestAlgorithm: DigestAlgorithm = "SHA-256";

  /**
   * Build the signed attributes: contentType (id-data), signingTime and
   * messageDigest, in that order (which is also their DER order).
   *
   * @returns DER `SET OF Attribute`, the bytes the signer signs
   * @throws {UnsupportedAlgorithmError} for an unknown digest algorithm
   */
  buildSignedAttributes(digest: Uint8Array, digestAlgorithm: DigestAlgorithm, signingTime: Date): Uint8Array {
    assertDigestAlgorithm(digestAlgorithm);

    this.digestAlgorithm = digestAlgorithm;
    this.signedAttrs = [
      new pkijs.Attribute({
        type: OID_CONTENT_TYPE,
        values: [new ObjectIdentifier({ value: OID_DATA })],
      }),
      new pkijs.Attribute({
        type: OID_SIGNING_TIME,
        values: [new UTCTime({ valueDate: signingTime })],
      }),
      new pkijs.Attribute({
        type: OID_MESSAGE_DIGEST,
        values: [new OctetString({ valueHex: toArrayBuffer(digest) })],
      }),
    ];

    const set = new Asn1Set({ value: this.signedAttrs.map(attr => attr.toSchema()) });

    return new Uint8Array(set.toBER(false));
  }

  /**
   * Assemble the `ContentInfo` around the signature value.
   *
   * @param certificateChain - DER certificates, copied as given
   * @returns DER-encoded ContentInfo
   * @throws {InvalidStateError} before `buildSignedAttributes`
   * @throws {UnsupportedAlgorithmError} for RSA-PSS or an unknown algorithm
   * @throws {InvalidArgumentError} for a chain entry or token that is not DER
   */
  finalize(signatureValue: Uint8Array, certificateChain: Uint8Array[], options: CmsFinalizeOptions): Uint8Array {
    if (!this.signedAttrs) {
      throw new InvalidStateError("Signed attributes must be built before finalizing");
    }

    const { signerIdentifier, signatureAlgorithm, timestampToken } = options;
    const digestAlgorithmOid = getDigestAlgorithmOid(this.digestAlgorithm);

    const signerInfo = new pkijs.SignerInfo({
      version: 1,
      sid: new pkijs.IssuerAndSerialNumber({
        issuer: pkijs.RelativeDistinguishedNames.fromBER(toArrayBuffer(signerIdentifier.issuer)),
        serialNumber: new Integer({ valueHex: toArrayBuffer(signerIdentifier.serialNumber) }),
      }),
      digestAlgorithm: new pkijs.AlgorithmIdentifier({ algorithmId: digestAlgorithmOid }),
      signedAttrs: new pkijs.SignedAndUnsignedAttributes({
        type: 0,
        attributes: this.signedAttrs,
      }),
      signatureAlgorithm: new pkijs.AlgorithmIdentifier({
        algorithmId: getSignatureAlgorithmOid(signatureAlgorithm, this.digestAlgorithm),
      }),
      signature: new OctetString({ valueHex: toArrayBuffer(signatureValue) }),
    });

    if (timestampToken) {
      signerInfo.unsignedAttrs = new pkijs.SignedAndUnsignedAttributes({
        type: 1,
        attributes: [
          new pkijs.Attribute({
            type: OID_TIMESTAMP_TOKEN,
            values: [parseDer(timestampToken, "timestamp token")],
          }),
        ],
      });
    }

    const signedData = new pkijs.SignedData({
      version: 1,
      encapContentInfo: new pkijs.EncapsulatedContentInfo({ eContentType: OID_DATA }),
      digestAlgorithms: [new pkijs.AlgorithmIdentifier({ algorithmId: digestAlgorithmOid })],
      certificates: certificateChain.map(parseCertificate),
      signerInfos: [signerInfo],
    });

    const contentInfo = new pkijs.ContentInfo({
      contentType: OID_SIGNED_DATA,
      content: signedData.toSchema(),
    });

    return new Uint8Array(contentInfo.toSchema().toBER(false));
  }
}

function parseCertificate(der: Uint8Array, index: number): pkijs.Certificate {
  try {
    return pkijs.Certificate.fromBER(toArrayBuffer(der));
  } catch {
    throw new InvalidArgumentError(`Failed to parse certificate ${index} of the chain`);
  }
}

function parseDer(bytes: Uint8Array, what: string) {
  const asn1 = fromBER(toArrayBuffer(bytes));

  if (asn1.offset === -1) {
    throw new InvalidArgumentError(`Failed to parse ${what}`);
  }

  return asn1.result;
}
