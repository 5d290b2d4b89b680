import type { Fr } from "../types/brands";
import {
  ONE,
  ZERO,
  addMod,
  fr,
  mulMod,
  subMod,
  tryInvMod,
} from "../crypto/field";
import { BATCHED_RELATION_PARTIAL_LENGTH } from "./constants";
import { type Result, ok, err } from "./errors";
import { accumulateRelationEvaluations } from "./relations";
import type { Proof, Transcript } from "./types";

/** `d_i = prod_{j != i} (i - j)` over the evaluation domain `{0, .., 7}`. */
const BARYCENTRIC_DENOMINATORS: readonly Fr[] = Array.from(
  { length: BATCHED_RELATION_PARTIAL_LENGTH },
  (_, i) => {
    let d = 1n;
    for (let j = 0; j < BATCHED_RELATION_PARTIAL_LENGTH; j++) if (j !== i) d *= BigInt(i - j);
    return fr(d);
  },
);

export const checkRoundSum = (univariate: readonly Fr[], target: Fr): boolean =>
  addMod(univariate[0], univariate[1]) === target;

/** Evaluates the round polynomial, given by its values on the domain, at `challenge`. */
export const computeNextTargetSum = (univariate: readonly Fr[], challenge: Fr): Result<Fr> => {
  let vanishing: Fr = ONE;
  let acc: Fr = ZERO;
  for (let i = 0; i < BATCHED_RELATION_PARTIAL_LENGTH; i++) {
    const shifted = subMod(challenge, fr(i));
    vanishing = mulMod(vanishing, shifted);
    const inv = tryInvMod(mulMod(BARYCENTRIC_DENOMINATORS[i], shifted));
    if (!inv.ok) return inv;
    acc = addMod(acc, mulMod(univariate[i], inv.value));
  }
  return ok(mulMod(acc, vanishing));
};

export const partiallyEvaluatePow = (pow: Fr, gateChallenge: Fr, roundChallenge: Fr): Fr =>
  mulMod(pow, addMod(ONE, mulMod(roundChallenge, subMod(gateChallenge, ONE))));

/* ──────────── rounds ──────────── */
export interface SumcheckClaim {
  target: Fr;
  powPartialEval: Fr;
}

export const runSumcheckRounds = (proof: Proof, tp: Transcript): Result<SumcheckClaim> => {
  let target: Fr = ZERO;
  let powPartialEval: Fr = ONE;

  for (const [round, univariate] of proof.sumcheckUnivariates.entries()) {
    if (!checkRoundSum(univariate, target)) return err({ type: "SumcheckFailed", round });
    const challenge = tp.sumcheckUChallenges[round];
    const next = computeNextTargetSum(univariate, challenge);
    if (!next.ok) return next;
    target = next.value;
    powPartialEval = partiallyEvaluatePow(powPartialEval, tp.gateChallenges[round], challenge);
  }
  return ok({ target, powPartialEval });
};

export const checkFinalEvaluation = (
  proof: Proof,
  tp: Transcript,
  claim: SumcheckClaim,
): Result<void> => {
  const grand = accumulateRelationEvaluations(
    proof.sumcheckEvaluations,
    tp.relationParameters,
    tp.alphas,
    claim.powPartialEval,
  );
  return grand === claim.target ? ok(undefined) : err({ type: "SumcheckEvaluationMismatch" });
};

export const verifySumcheck = (proof: Proof, tp: Transcript): Result<void> => {
  const claim = runSumcheckRounds(proof, tp);
  return claim.ok ? checkFinalEvaluation(proof, tp, claim.value) : claim;
};
