import { beforeAll, describe, expect, it } from "vitest";
import { toArrayBuffer } from "#src/helpers/buffer";
import { createTestIdentity, stringToBytes, type TestIdentity } from "#src/test-utils";
import { UnsupportedAlgorithmError } from "../types";
import { CryptoKeySigner } from "./crypto-key";

describe("CryptoKeySigner", () => {
  let identity: TestIdentity;

  beforeAll(async () => {
    identity = await createTestIdentity("Key Signer", 77);
  });

  it("reads issuer and serial from the certificate", () => {
    const signer = new CryptoKeySigner(identity.privateKey, identity.certificate, "EC", "ECDSA");

    expect(signer.signerIdentifier.issuer).toEqual(identity.issuer);
    expect(signer.signerIdentifier.serialNumber).toEqual(new Uint8Array([77]));
  });

  it("returns the chain with the signing certificate first", async () => {
    const intermediate = new Uint8Array([0x30, 0x00]);
    const signer = new CryptoKeySigner(identity.privateKey, identity.certificate, "EC", "ECDSA", [
      intermediate,
    ]);

    const { certificateChain } = await signer.sign(stringToBytes("data"), "SHA-256");

    expect(certificateChain).toEqual([identity.certificate, intermediate]);
  });

  it("converts ECDSA signatures to DER", async () => {
    const signer = new CryptoKeySigner(identity.privateKey, identity.certificate, "EC", "ECDSA");

    const { signature } = await signer.sign(stringToBytes("data"), "SHA-256");

    // SEQUENCE { INTEGER r, INTEGER s }
    expect(signature[0]).toBe(0x30);
    expect(signature[1]).toBe(signature.length - 2);
  });

  describe("with an RSA key", () => {
    let keys: CryptoKeyPair;

    beforeAll(async () => {
      keys = await crypto.subtle.generateKey(
        {
          name: "RSASSA-PKCS1-v1_5",
          modulusLength: 2048,
          publicExponent: new Uint8Array([1, 0, 1]),
          hash: "SHA-256",
        },
        true,
        ["sign", "verify"],
      );
    });

    it("signs with the key's hash", async () => {
      const signer = new CryptoKeySigner(keys.privateKey, identity.certificate, "RSA", "RSASSA-PKCS1-v1_5");
      const data = stringToBytes("data");

      const { signature } = await signer.sign(data, "SHA-256");

      expect(signature).toHaveLength(256);
      await expect(
        crypto.subtle.verify("RSASSA-PKCS1-v1_5", keys.publicKey, toArrayBuffer(signature), toArrayBuffer(data)),
      ).resolves.toBe(true);
    });

    it("refuses a digest the key was not imported for", async () => {
      const signer = new CryptoKeySigner(keys.privateKey, identity.certificate, "RSA", "RSASSA-PKCS1-v1_5");

      await expect(signer.sign(stringToBytes("data"), "SHA-384")).rejects.toThrow(UnsupportedAlgorithmError);
      await expect(signer.sign(stringToBytes("data"), "SHA-512")).rejects.toThrow(
        "RSA key is bound to SHA-256 and cannot sign with SHA-512",
      );
    });
  });

  it("rejects RSA-PSS", () => {
    expect(() => new CryptoKeySigner(identity.privateKey, identity.certificate, "RSA", "RSA-PSS")).toThrow(
      UnsupportedAlgorithmError,
    );
  });
});
