import { describe, it, expect } from "vitest";
import type { Fr } from "../src/types/brands";
import { ONE, ZERO, addMod, divMod, fr, subMod } from "../src/crypto/field";
import { unwrap } from "../src/core/errors";
import {
  computeNextTargetSum,
  partiallyEvaluatePow,
  runSumcheckRounds,
  verifySumcheck,
} from "../src/core/sumcheck";
import { Wire } from "../src/core/entities";
import type { Proof, Transcript } from "../src/core/types";
import { mkValidProof } from "./helpers/proof";
import { mkVk } from "./helpers/vk";

/** Fixed challenges keep round targets independent of hashing. */
const mkTranscript = (): Transcript => ({
  relationParameters: {
    eta: fr(2),
    etaTwo: fr(3),
    etaThree: fr(5),
    beta: fr(11),
    gamma: fr(7),
    publicInputsDelta: ONE,
  },
  alphas: Array.from({ length: 25 }, (_, i) => fr(100 + i)),
  gateChallenges: Array.from({ length: 28 }, (_, i) => fr(20 + i)),
  sumcheckUChallenges: Array.from({ length: 28 }, (_, i) => fr(50 + i)),
  rho: fr(1),
  geminiR: fr(1),
  shplonkNu: fr(1),
  shplonkZ: fr(1),
});

/** Chains round polynomials so each round sum holds, then sets q_c to close the final check. */
const mkRounds = (tp: Transcript): { univariates: Fr[][]; evaluations: Fr[] } => {
  let target: Fr = ZERO;
  let pow: Fr = ONE;
  const univariates: Fr[][] = [];
  for (let round = 0; round < 28; round++) {
    const u = [subMod(target, fr(round + 3)), fr(round + 3)];
    for (let j = 2; j < 8; j++) u.push(fr(j * j + round));
    target = unwrap(computeNextTargetSum(u, tp.sumcheckUChallenges[round]));
    pow = partiallyEvaluatePow(pow, tp.gateChallenges[round], tp.sumcheckUChallenges[round]);
    univariates.push(u);
  }
  const evaluations: Fr[] = Array<Fr>(40).fill(ZERO);
  evaluations[Wire.Q_ARITH] = ONE;
  evaluations[Wire.Q_C] = divMod(target, pow);
  return { univariates, evaluations };
};

const withRounds = async (univariates: Fr[][], evaluations: Fr[]): Promise<Proof> => {
  const { proof } = await mkValidProof(mkVk(5));
  return { ...proof, sumcheckUnivariates: univariates, sumcheckEvaluations: evaluations };
};

describe("barycentric evaluation", () => {
  it("evaluates x at 100", () => {
    const u = Array.from({ length: 8 }, (_, i) => fr(i));
    expect(computeNextTargetSum(u, fr(100))).toEqual({ ok: true, value: 100n });
  });

  it("evaluates x^2 + 1 at 10", () => {
    const u = Array.from({ length: 8 }, (_, i) => fr(i * i + 1));
    expect(computeNextTargetSum(u, fr(10))).toEqual({ ok: true, value: 101n });
  });

  it("handles a challenge inside the domain as a division by zero", () => {
    const u = Array.from({ length: 8 }, (_, i) => fr(i));
    expect(computeNextTargetSum(u, fr(3))).toEqual({ ok: false, error: { type: "DivisionByZero" } });
  });
});

describe("pow polynomial", () => {
  it("multiplies by 1 + u * (gate - 1)", () => {
    // 2 * (1 + 3 * (5 - 1)) = 26
    expect(partiallyEvaluatePow(fr(2), fr(5), fr(3))).toBe(26n);
  });
});

describe("sumcheck", () => {
  it("accepts an all-zero proof", async () => {
    const zeros = Array.from({ length: 28 }, () => Array<Fr>(8).fill(ZERO));
    const proof = await withRounds(zeros, Array<Fr>(40).fill(ZERO));
    expect(verifySumcheck(proof, mkTranscript())).toEqual({ ok: true, value: undefined });
  });

  it("accepts chained rounds with a matching final evaluation", async () => {
    const tp = mkTranscript();
    const { univariates, evaluations } = mkRounds(tp);
    const proof = await withRounds(univariates, evaluations);
    expect(verifySumcheck(proof, tp)).toEqual({ ok: true, value: undefined });
  });

  it("fails at the round whose sum was broken", async () => {
    const tp = mkTranscript();
    const { univariates, evaluations } = mkRounds(tp);
    univariates[3][0] = addMod(univariates[3][0], ONE);
    const proof = await withRounds(univariates, evaluations);
    expect(runSumcheckRounds(proof, tp)).toEqual({
      ok: false,
      error: { type: "SumcheckFailed", round: 3 },
    });
  });

  it("fails one round later when only a higher coefficient changes", async () => {
    const tp = mkTranscript();
    const { univariates, evaluations } = mkRounds(tp);
    univariates[3][5] = addMod(univariates[3][5], ONE);
    const proof = await withRounds(univariates, evaluations);
    expect(verifySumcheck(proof, tp)).toEqual({
      ok: false,
      error: { type: "SumcheckFailed", round: 4 },
    });
  });

  it("reports a final mismatch from the last round", async () => {
    const tp = mkTranscript();
    const { univariates, evaluations } = mkRounds(tp);
    univariates[27][6] = addMod(univariates[27][6], ONE);
    const proof = await withRounds(univariates, evaluations);
    expect(verifySumcheck(proof, tp)).toEqual({
      ok: false,
      error: { type: "SumcheckEvaluationMismatch" },
    });
  });

  it("rejects evaluations that do not satisfy the relations", async () => {
    const tp = mkTranscript();
    const { univariates, evaluations } = mkRounds(tp);
    evaluations[Wire.W_L] = fr(1);
    evaluations[Wire.Q_RANGE] = fr(1);
    const proof = await withRounds(univariates, evaluations);
    expect(verifySumcheck(proof, tp)).toEqual({
      ok: false,
      error: { type: "SumcheckEvaluationMismatch" },
    });
  });
});
