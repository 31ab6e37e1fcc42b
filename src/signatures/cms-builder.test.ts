import { Integer, Sequence } from "asn1js";
import * as pkijs from "pkijs";
import { beforeAll, describe, expect, it } from "vitest";
import { toArrayBuffer } from "#src/helpers/buffer";
import { createTestIdentity, stringToBytes, type TestIdentity } from "#src/test-utils";
import { CmsBuilder } from "./cms-builder";
import { OID_DATA, OID_MESSAGE_DIGEST, OID_SIGNED_DATA, OID_TIMESTAMP_TOKEN } from "./oids";
import { CryptoKeySigner } from "./signers/crypto-key";
import { InvalidArgumentError, InvalidStateError, UnsupportedAlgorithmError } from "./types";
import { hashData } from "./utils";

function decode(der: Uint8Array): { contentInfo: pkijs.ContentInfo; signedData: pkijs.SignedData } {
  const contentInfo = pkijs.ContentInfo.fromBER(toArrayBuffer(der));
  const signedData = new pkijs.SignedData({ schema: contentInfo.content });

  return { contentInfo, signedData };
}

describe("CmsBuilder", () => {
  let identity: TestIdentity;
  let signer: CryptoKeySigner;

  const content = stringToBytes("bytes covered by the signature");
  const digest = hashData(content, "SHA-256");
  const signingTime = new Date("2026-03-01T10:00:00Z");

  beforeAll(async () => {
    identity = await createTestIdentity();
    signer = new CryptoKeySigner(identity.privateKey, identity.certificate, "EC", "ECDSA");
  });

  async function build(timestampToken?: Uint8Array): Promise<Uint8Array> {
    const cms = new CmsBuilder();
    const attrs = cms.buildSignedAttributes(digest, "SHA-256", signingTime);
    const { signature, certificateChain } = await signer.sign(attrs, "SHA-256");

    return cms.finalize(signature, certificateChain, {
      signerIdentifier: signer.signerIdentifier,
      signatureAlgorithm: signer.signatureAlgorithm,
      timestampToken,
    });
  }

  it("encodes the signed attributes as a DER SET", () => {
    const attrs = new CmsBuilder().buildSignedAttributes(digest, "SHA-256", signingTime);

    expect(attrs[0]).toBe(0x31);
  });

  it("builds SignedData with one signer and the message digest", async () => {
    const { contentInfo, signedData } = decode(await build());

    expect(contentInfo.contentType).toBe(OID_SIGNED_DATA);
    expect(signedData.version).toBe(1);
    expect(signedData.encapContentInfo.eContentType).toBe(OID_DATA);
    expect(signedData.encapContentInfo.eContent).toBeUndefined();
    expect(signedData.digestAlgorithms).toHaveLength(1);
    expect(signedData.certificates).toHaveLength(1);
    expect(signedData.signerInfos).toHaveLength(1);

    const signerInfo = signedData.signerInfos[0];
    const messageDigest = signerInfo.signedAttrs?.attributes.find(attr => attr.type === OID_MESSAGE_DIGEST);

    expect(signerInfo.version).toBe(1);
    expect(signerInfo.signedAttrs?.attributes).toHaveLength(3);
    expect(new Uint8Array(messageDigest?.values[0].valueBlock.valueHexView)).toEqual(new Uint8Array(digest));
    expect(signerInfo.unsignedAttrs).toBeUndefined();
  });

  it("identifies the signer by the supplied issuer and serial", async () => {
    const { signedData } = decode(await build());
    const sid = signedData.signerInfos[0].sid;

    expect(sid).toBeInstanceOf(pkijs.IssuerAndSerialNumber);

    if (sid instanceof pkijs.IssuerAndSerialNumber) {
      expect(new Uint8Array(sid.issuer.toSchema().toBER(false))).toEqual(identity.issuer);
      expect(sid.serialNumber.valueBlock.valueDec).toBe(4242);
    }
  });

  it("produces a signature pkijs verifies against the content", async () => {
    const { signedData } = decode(await build());

    await expect(
      signedData.verify({ signer: 0, data: toArrayBuffer(content), checkChain: false }),
    ).resolves.toBe(true);
  });

  it("adds a timestamp token as an unsigned attribute", async () => {
    const token = new Uint8Array(new Sequence({ value: [new Integer({ value: 7 })] }).toBER(false));
    const { signedData } = decode(await build(token));
    const attrs = signedData.signerInfos[0].unsignedAttrs?.attributes ?? [];

    expect(attrs).toHaveLength(1);
    expect(attrs[0].type).toBe(OID_TIMESTAMP_TOKEN);
    expect(new Uint8Array(attrs[0].values[0].toBER(false))).toEqual(token);
  });

  it("rejects an unreadable timestamp token", () => {
    const cms = new CmsBuilder();

    cms.buildSignedAttributes(digest, "SHA-256", signingTime);

    expect(() =>
      cms.finalize(new Uint8Array(8), [], {
        signerIdentifier: signer.signerIdentifier,
        signatureAlgorithm: "ECDSA",
        timestampToken: new Uint8Array(0),
      }),
    ).toThrow(InvalidArgumentError);
  });

  it("rejects a chain entry that is not a certificate", async () => {
    const cms = new CmsBuilder();
    const attrs = cms.buildSignedAttributes(digest, "SHA-256", signingTime);
    const { signature } = await signer.sign(attrs, "SHA-256");

    expect(() =>
      cms.finalize(signature, [identity.certificate, new Uint8Array([0x30, 0x00])], {
        signerIdentifier: signer.signerIdentifier,
        signatureAlgorithm: signer.signatureAlgorithm,
      }),
    ).toThrow(new InvalidArgumentError("Failed to parse certificate 1 of the chain"));
  });

  it("requires the signed attributes first", () => {
    expect(() =>
      new CmsBuilder().finalize(new Uint8Array(8), [], {
        signerIdentifier: signer.signerIdentifier,
        signatureAlgorithm: "ECDSA",
      }),
    ).toThrow(InvalidStateError);
  });

  it("rejects RSA-PSS", () => {
    const cms = new CmsBuilder();

    cms.buildSignedAttributes(digest, "SHA-256", signingTime);

    expect(() =>
      cms.finalize(new Uint8Array(8), [], {
        signerIdentifier: signer.signerIdentifier,
        signatureAlgorithm: "RSA-PSS",
      }),
    ).toThrow(UnsupportedAlgorithmError);
  });
});
