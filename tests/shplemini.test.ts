import { describe, it, expect } from "vitest";
import {
  checkPairing,
  computeBatchOpeningClaim,
  computeSquares,
  verifyShplemini,
} from "../src/core/shplemini";
import { generateTranscript } from "../src/core/transcript";
import { unwrap } from "../src/core/errors";
import type { Proof, Transcript } from "../src/core/types";
import {
  type CurveBackend,
  DEFAULT_SRS_G2,
  G1_GENERATOR,
  convertProofPoint,
  nobleBackend,
} from "../src/crypto/bn254";
import { ONE, ZERO, fr } from "../src/crypto/field";
import { sha256Hasher } from "../src/crypto/hash";
import { mkValidProof } from "./helpers/proof";
import { mkVk } from "./helpers/vk";

const setup = async (logN = 5) => {
  const vk = mkVk(logN);
  const valid = await mkValidProof(vk);
  const tp = unwrap(
    generateTranscript(valid.proof, valid.publicInputs, {
      hasher: sha256Hasher,
      circuitSize: vk.circuitSize,
      publicInputsSize: vk.publicInputsSize,
      pubInputsOffset: 1,
    }),
  );
  return { vk, tp, ...valid };
};

const point = (p: Proof["w1"]) => unwrap(convertProofPoint(p));

describe("gemini powers", () => {
  it("squares repeatedly", () => {
    const powers = computeSquares(fr(3));
    expect(powers).toHaveLength(28);
    expect(powers.slice(0, 4)).toEqual([3n, 9n, 81n, 6561n]);
  });
});

describe("batch opening claim", () => {
  it("lays out shplonkQ, entities, folds, generator and quotient", async () => {
    const { vk, tp, proof } = await setup();
    const claim = unwrap(computeBatchOpeningClaim(proof, vk, tp));
    expect(claim.commitments).toHaveLength(70);
    expect(claim.scalars).toHaveLength(70);

    expect(claim.commitments[0]).toEqual(point(proof.shplonkQ));
    expect(claim.commitments[1]).toEqual(vk.qm);
    expect(claim.commitments[27]).toEqual(vk.lagrangeLast);
    expect(claim.commitments[28]).toEqual(point(proof.w1));
    expect(claim.commitments[33]).toEqual(point(proof.lookupInverses));
    expect(claim.commitments[36]).toEqual(point(proof.w1));
    expect(claim.commitments[40]).toEqual(point(proof.zPerm));
    expect(claim.commitments[41]).toEqual(point(proof.geminiFoldComms[0]));
    expect(claim.commitments[68]).toEqual(G1_GENERATOR);
    expect(claim.commitments[69]).toEqual(point(proof.kzgQuotient));

    expect(claim.scalars[0]).toBe(ONE);
    expect(claim.scalars[69]).toBe(tp.shplonkZ);
  });

  it("zeroes the fold scalars past the circuit size", async () => {
    const { vk, tp, proof } = await setup(5);
    const { scalars } = unwrap(computeBatchOpeningClaim(proof, vk, tp));
    const folds = scalars.slice(41, 68);
    expect(folds.slice(0, 4).every((s) => s !== ZERO)).toBe(true);
    expect(folds.slice(4).every((s) => s === ZERO)).toBe(true);
  });

  it("fails when z collides with r", async () => {
    const { vk, tp, proof } = await setup();
    const bad: Transcript = { ...tp, shplonkZ: tp.geminiR };
    expect(computeBatchOpeningClaim(proof, vk, bad)).toEqual({
      ok: false,
      error: { type: "ShpleminiFailed" },
    });
  });

  it("fails when r is zero", async () => {
    const { vk, tp, proof } = await setup();
    expect(computeBatchOpeningClaim(proof, vk, { ...tp, geminiR: ZERO })).toEqual({
      ok: false,
      error: { type: "ShpleminiFailed" },
    });
  });
});

describe("shplemini pairing", () => {
  const run = async (backend: CurveBackend) => {
    const s = await setup();
    return verifyShplemini(s.proof, s.vk, s.tp, backend, s.srsG2);
  };

  it("accepts an opening under the matching setup", async () => {
    expect(await run(nobleBackend)).toEqual({ ok: true, value: undefined });
  });

  it("rejects the same opening under another setup", async () => {
    const s = await setup();
    expect(await verifyShplemini(s.proof, s.vk, s.tp, nobleBackend, DEFAULT_SRS_G2)).toEqual({
      ok: false,
      error: { type: "PairingCheckFailed" },
    });
  });

  it("distinguishes a false pairing from a failed call", async () => {
    const says = (holds: boolean): CurveBackend => ({ ...nobleBackend, pairingCheck: async () => holds });
    expect(await run(says(false))).toEqual({ ok: false, error: { type: "PairingCheckFailed" } });
    expect(await run(says(true))).toEqual({ ok: true, value: undefined });

    const broken: CurveBackend = {
      ...nobleBackend,
      pairingCheck: async () => {
        throw new Error("precompile reverted");
      },
    };
    expect(await run(broken)).toEqual({
      ok: false,
      error: { type: "PrecompileCallFailed", precompile: "ecPairing" },
    });
  });

  it("maps a failing msm to ecMul", async () => {
    const broken: CurveBackend = {
      ...nobleBackend,
      msm: async () => {
        throw new Error("out of gas");
      },
    };
    expect(await run(broken)).toEqual({
      ok: false,
      error: { type: "PrecompileCallFailed", precompile: "ecMul" },
    });
  });

  it("passes both pairs to the backend in order", async () => {
    const s = await setup();
    const seen: unknown[] = [];
    const spy: CurveBackend = {
      ...nobleBackend,
      pairingCheck: async (pairs) => {
        seen.push(...pairs.map((p) => p.g2));
        return true;
      },
    };
    const p0 = G1_GENERATOR;
    expect(await checkPairing({ p0, p1: p0 }, spy, s.srsG2)).toEqual({ ok: true, value: undefined });
    expect(seen[1]).toEqual(s.srsG2);
  });
});
