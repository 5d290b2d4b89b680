import { sha256 } from "@noble/hashes/sha2.js";
import { keccak_256 } from "@noble/hashes/sha3.js";

export type HashName = "sha256" | "keccak256";

/** 32-byte digest primitive used by the transcript. */
export interface Hasher {
  readonly name: HashName;
  hash: (data: Uint8Array) => Uint8Array;
}

export const sha256Hasher: Hasher = { name: "sha256", hash: (d) => sha256(d) };
export const keccakHasher: Hasher = { name: "keccak256", hash: (d) => keccak_256(d) };

export const hasherByName = (name: HashName): Hasher =>
  name === "keccak256" ? keccakHasher : sha256Hasher;
