/**
 * Signer implementations.
 */

export type {
  DigestAlgorithm,
  KeyType,
  SignatureAlgorithm,
  Signer,
  SignerIdentifier,
  SignerOutput,
} from "../types";
export { CryptoKeySigner } from "./crypto-key";
