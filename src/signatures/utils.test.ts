import { describe, expect, it } from "vitest";
import { bytesToHex } from "#src/helpers/buffer";
import { stringToBytes } from "#src/test-utils";
import { OID_ECDSA_WITH_SHA384, OID_SHA256_WITH_RSA, OID_SHA512 } from "./oids";
import { UnsupportedAlgorithmError } from "./types";
import { assertDigestAlgorithm, getDigestAlgorithmOid, getSignatureAlgorithmOid, hashData } from "./utils";

describe("hashData", () => {
  it("hashes with SHA-256", () => {
    expect(bytesToHex(hashData(stringToBytes("abc"), "SHA-256"))).toBe(
      "BA7816BF8F01CFEA414140DE5DAE2223B00361A396177A9CB410FF61F20015AD",
    );
  });

  it("returns digests of the algorithm's length", () => {
    expect(hashData(new Uint8Array(0), "SHA-384")).toHaveLength(48);
    expect(hashData(new Uint8Array(0), "SHA-512")).toHaveLength(64);
  });
});

describe("algorithm identifiers", () => {
  it("maps digest algorithms", () => {
    expect(getDigestAlgorithmOid("SHA-512")).toBe(OID_SHA512);
  });

  it("maps signature algorithms per digest", () => {
    expect(getSignatureAlgorithmOid("RSASSA-PKCS1-v1_5", "SHA-256")).toBe(OID_SHA256_WITH_RSA);
    expect(getSignatureAlgorithmOid("ECDSA", "SHA-384")).toBe(OID_ECDSA_WITH_SHA384);
  });

  it("rejects RSA-PSS", () => {
    expect(() => getSignatureAlgorithmOid("RSA-PSS", "SHA-256")).toThrow(UnsupportedAlgorithmError);
  });

  it("rejects unknown digest names", () => {
    expect(() => {
      assertDigestAlgorithm("MD5");
    }).toThrow("Unsupported digest algorithm: MD5");
    expect(() => {
      assertDigestAlgorithm("SHA-256");
    }).not.toThrow();
  });
});
