import { describe, it, expect } from "vitest";
import { sha256 } from "@noble/hashes/sha2.js";
import { concat } from "uint8arrays";
import {
  generateAlphas,
  generateEtaChallenges,
  generateGateChallenges,
  generateTranscript,
  splitChallenge,
} from "../src/core/transcript";
import { bytesToWord, fr, toBytesBE, wordToBytes } from "../src/crypto/field";
import { type Hasher, keccakHasher, sha256Hasher } from "../src/crypto/hash";
import type { G1ProofPoint, Proof } from "../src/core/types";
import { mkVk } from "./helpers/vk";
import { mkValidProof } from "./helpers/proof";

const ctxFor = (hasher: Hasher = sha256Hasher) => ({
  hasher,
  circuitSize: 32,
  publicInputsSize: 2,
  pubInputsOffset: 1,
});

const limbBytes = (p: G1ProofPoint) => [p.x0, p.x1, p.y0, p.y1].map(toBytesBE);

describe("challenge split", () => {
  it("takes the low and high 128 bits", () => {
    const c = (5n << 128n) | 7n;
    expect(splitChallenge(c)).toEqual([7n, 5n]);
  });

  it("keeps both halves of an all-ones digest", () => {
    const max = (1n << 256n) - 1n;
    expect(splitChallenge(max)).toEqual([(1n << 128n) - 1n, (1n << 128n) - 1n]);
  });
});

describe("transcript", () => {
  it("derives eta from the circuit header, public inputs and first three wires", async () => {
    const vk = mkVk(5);
    const { proof, publicInputs } = await mkValidProof(vk);
    const eta = generateEtaChallenges(sha256Hasher, proof, publicInputs, 32, 2, 1);

    const digest = sha256(
      concat([
        toBytesBE(fr(32)),
        toBytesBE(fr(2)),
        toBytesBE(fr(1)),
        ...publicInputs.map(toBytesBE),
        ...limbBytes(proof.w1),
        ...limbBytes(proof.w2),
        ...limbBytes(proof.w3),
      ]),
    );
    const first = bytesToWord(digest);
    expect(eta.eta).toBe(first & ((1n << 128n) - 1n));
    expect(eta.etaTwo).toBe(first >> 128n);

    const second = bytesToWord(sha256(wordToBytes(first)));
    expect(eta.prev).toBe(second);
    expect(eta.etaThree).toBe(second & ((1n << 128n) - 1n));
  });

  it("produces 25 alphas and 28 gate challenges", async () => {
    const { proof } = await mkValidProof(mkVk(5));
    const al = generateAlphas(sha256Hasher, 1n, proof);
    expect(al.alphas).toHaveLength(25);
    const gates = generateGateChallenges(sha256Hasher, al.prev);
    expect(gates.gateChallenges).toHaveLength(28);
    const last = bytesToWord(sha256(wordToBytes(al.prev)));
    expect(gates.gateChallenges[0]).toBe(last & ((1n << 128n) - 1n));
  });

  it("takes alphas in pairs and only the low half of the last digest", async () => {
    const { proof } = await mkValidProof(mkVk(5));
    const al = generateAlphas(sha256Hasher, 1n, proof);

    let c = bytesToWord(
      sha256(concat([wordToBytes(1n), ...limbBytes(proof.lookupInverses), ...limbBytes(proof.zPerm)])),
    );
    const expected: bigint[] = [...splitChallenge(c)];
    for (let k = 1; k <= 11; k++) {
      c = bytesToWord(sha256(wordToBytes(c)));
      expected.push(...splitChallenge(c));
    }
    c = bytesToWord(sha256(wordToBytes(c)));
    expected.push(splitChallenge(c)[0]);

    expect(al.alphas).toEqual(expected);
    expect(al.prev).toBe(c);
  });

  it("is deterministic", async () => {
    const { proof, publicInputs } = await mkValidProof(mkVk(5));
    expect(generateTranscript(proof, publicInputs, ctxFor())).toEqual(
      generateTranscript(proof, publicInputs, ctxFor()),
    );
  });

  it("changes when a single absorbed byte changes", async () => {
    const { proof, publicInputs } = await mkValidProof(mkVk(5));
    const base = generateTranscript(proof, publicInputs, ctxFor());
    const tweaked: Proof = { ...proof, shplonkQ: { ...proof.shplonkQ, y1: fr(proof.shplonkQ.y1 + 1n) } };
    const next = generateTranscript(tweaked, publicInputs, ctxFor());
    expect(base.ok && next.ok).toBe(true);
    if (base.ok && next.ok) {
      expect(next.value.shplonkNu).toBe(base.value.shplonkNu);
      expect(next.value.shplonkZ).not.toBe(base.value.shplonkZ);
    }
  });

  it("depends on the hash function", async () => {
    const { proof, publicInputs } = await mkValidProof(mkVk(5));
    const a = generateTranscript(proof, publicInputs, ctxFor(sha256Hasher));
    const b = generateTranscript(proof, publicInputs, ctxFor(keccakHasher));
    if (!a.ok || !b.ok) throw new Error("transcript failed");
    expect(a.value.relationParameters.eta).not.toBe(b.value.relationParameters.eta);
  });

  it("maps a failing hash primitive to PrecompileCallFailed", async () => {
    const { proof, publicInputs } = await mkValidProof(mkVk(5));
    const broken: Hasher = {
      name: "sha256",
      hash: () => {
        throw new Error("host unavailable");
      },
    };
    expect(generateTranscript(proof, publicInputs, ctxFor(broken))).toEqual({
      ok: false,
      error: { type: "PrecompileCallFailed", precompile: "sha256" },
    });
  });

  it("rejects digests of the wrong width", async () => {
    const { proof, publicInputs } = await mkValidProof(mkVk(5));
    const short: Hasher = { name: "keccak256", hash: () => new Uint8Array(20) };
    expect(generateTranscript(proof, publicInputs, ctxFor(short))).toEqual({
      ok: false,
      error: { type: "PrecompileCallFailed", precompile: "keccak256" },
    });
  });
});
