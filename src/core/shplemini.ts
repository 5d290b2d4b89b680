import type { Fr } from "../types/brands";
import {
  ONE,
  ZERO,
  addMod,
  mulMod,
  negMod,
  sqrMod,
  subMod,
  tryInvMod,
} from "../crypto/field";
import {
  type CurveBackend,
  G1_GENERATOR,
  G2_GENERATOR,
  convertProofPoint,
  negateG1,
} from "../crypto/bn254";
import { CONST_PROOF_SIZE_LOG_N, NUMBER_OF_ENTITIES, NUMBER_UNSHIFTED } from "./constants";
import { type Result, ok, err } from "./errors";
import type { G1Point, G1ProofPoint, G2Point, Proof, Transcript, VerificationKey } from "./types";

export interface BatchOpeningClaim {
  commitments: G1Point[];
  scalars: Fr[];
}

export interface PairingPoints {
  p0: G1Point;
  p1: G1Point;
}

const failed = (): Result<never> => err({ type: "ShpleminiFailed" });

/** `r, r^2, r^4, ..` one per folding round. */
export const computeSquares = (r: Fr): Fr[] => {
  const out: Fr[] = [r];
  for (let i = 1; i < CONST_PROOF_SIZE_LOG_N; i++) out.push(sqrMod(out[i - 1]));
  return out;
};

/** `[1/(z - r), 1/(z + r), 1/(z + r^2), ..]`; rounds past `logN` stay zero. */
export const computeInvertedGeminiDenominators = (
  z: Fr,
  powers: readonly Fr[],
  logN: number,
): Result<Fr[]> => {
  const first = tryInvMod(subMod(z, powers[0]));
  if (!first.ok) return failed();
  const out: Fr[] = [first.value];
  for (let i = 0; i < CONST_PROOF_SIZE_LOG_N; i++) {
    if (i >= logN) {
      out.push(ZERO);
      continue;
    }
    const inv = tryInvMod(addMod(z, powers[i]));
    if (!inv.ok) return failed();
    out.push(inv.value);
  }
  return ok(out);
};

/** Unfolds the Gemini evaluations back to the positive opening `A_0(r)`. */
export const computeGeminiBatchedUnivariateEvaluation = (
  tp: Transcript,
  batchedEvaluation: Fr,
  geminiEvaluations: readonly Fr[],
  powers: readonly Fr[],
  logN: number,
): Result<Fr> => {
  let acc = batchedEvaluation;
  for (let i = logN; i > 0; i--) {
    const c = powers[i - 1];
    const u = tp.sumcheckUChallenges[i - 1];
    const evalNeg = geminiEvaluations[i - 1];
    const cOneMinusU = mulMod(c, subMod(ONE, u));
    const inv = tryInvMod(addMod(cOneMinusU, u));
    if (!inv.ok) return failed();
    const twice = mulMod(mulMod(c, acc), addMod(ONE, ONE));
    acc = mulMod(subMod(twice, mulMod(evalNeg, subMod(cOneMinusU, u))), inv.value);
  }
  return ok(acc);
};

const vkEntityCommitments = (vk: VerificationKey): G1Point[] => [
  vk.qm,
  vk.qc,
  vk.ql,
  vk.qr,
  vk.qo,
  vk.q4,
  vk.qLookup,
  vk.qArith,
  vk.qDeltaRange,
  vk.qElliptic,
  vk.qAux,
  vk.qPoseidon2External,
  vk.qPoseidon2Internal,
  vk.s1,
  vk.s2,
  vk.s3,
  vk.s4,
  vk.id1,
  vk.id2,
  vk.id3,
  vk.id4,
  vk.t1,
  vk.t2,
  vk.t3,
  vk.t4,
  vk.lagrangeFirst,
  vk.lagrangeLast,
];

const convertAll = (points: readonly G1ProofPoint[]): Result<G1Point[]> => {
  const out: G1Point[] = [];
  for (const p of points) {
    const c = convertProofPoint(p);
    if (!c.ok) return c;
    out.push(c.value);
  }
  return ok(out);
};

/**
 * Builds the single multi-scalar multiplication whose result, paired against the
 * KZG quotient, decides every claimed opening at once. Term order:
 * shplonkQ, 40 entities, 27 fold commitments, generator, kzgQuotient.
 */
export const computeBatchOpeningClaim = (
  proof: Proof,
  vk: VerificationKey,
  tp: Transcript,
): Result<BatchOpeningClaim> => {
  const logN = vk.logCircuitSize;
  const powers = computeSquares(tp.geminiR);
  const invs = computeInvertedGeminiDenominators(tp.shplonkZ, powers, logN);
  if (!invs.ok) return invs;
  const inv = invs.value;
  const rInv = tryInvMod(tp.geminiR);
  if (!rInv.ok) return failed();

  const nuInv1 = mulMod(tp.shplonkNu, inv[1]);
  const unshiftedScalar = addMod(inv[0], nuInv1);
  const shiftedScalar = mulMod(rInv.value, subMod(inv[0], nuInv1));

  const witness = convertAll([
    proof.w1,
    proof.w2,
    proof.w3,
    proof.w4,
    proof.zPerm,
    proof.lookupInverses,
    proof.lookupReadCounts,
    proof.lookupReadTags,
  ]);
  if (!witness.ok) return witness;
  const [w1, w2, w3, w4, zPerm] = witness.value;

  const extra = convertAll([proof.shplonkQ, proof.kzgQuotient, ...proof.geminiFoldComms]);
  if (!extra.ok) return extra;
  const [shplonkQ, kzgQuotient, ...folds] = extra.value;

  const commitments: G1Point[] = [
    shplonkQ,
    ...vkEntityCommitments(vk),
    ...witness.value,
    w1,
    w2,
    w3,
    w4,
    zPerm,
  ];
  const scalars: Fr[] = [ONE];

  let batching: Fr = ONE;
  let batchedEvaluation: Fr = ZERO;
  for (let i = 0; i < NUMBER_OF_ENTITIES; i++) {
    const base = i < NUMBER_UNSHIFTED ? unshiftedScalar : shiftedScalar;
    scalars.push(mulMod(negMod(base), batching));
    batchedEvaluation = addMod(
      batchedEvaluation,
      mulMod(proof.sumcheckEvaluations[i], batching),
    );
    batching = mulMod(batching, tp.rho);
  }

  let constantTerm: Fr = ZERO;
  batching = sqrMod(tp.shplonkNu);
  for (let i = 0; i < CONST_PROOF_SIZE_LOG_N - 1; i++) {
    const dummy = i >= logN - 1;
    let scale: Fr = ZERO;
    if (!dummy) {
      scale = mulMod(batching, inv[i + 2]);
      constantTerm = addMod(constantTerm, mulMod(scale, proof.geminiAEvaluations[i + 1]));
    }
    scalars.push(negMod(scale));
    commitments.push(folds[i]);
    batching = mulMod(batching, tp.shplonkNu);
  }

  const a0Pos = computeGeminiBatchedUnivariateEvaluation(
    tp,
    batchedEvaluation,
    proof.geminiAEvaluations,
    powers,
    logN,
  );
  if (!a0Pos.ok) return a0Pos;
  constantTerm = addMod(constantTerm, mulMod(a0Pos.value, inv[0]));
  constantTerm = addMod(constantTerm, mulMod(proof.geminiAEvaluations[0], nuInv1));

  commitments.push(G1_GENERATOR, kzgQuotient);
  scalars.push(constantTerm, tp.shplonkZ);
  return ok({ commitments, scalars });
};

/* ──────────── pairing ──────────── */
export const computePairingPoints = async (
  proof: Proof,
  vk: VerificationKey,
  tp: Transcript,
  backend: CurveBackend,
): Promise<Result<PairingPoints>> => {
  const claim = computeBatchOpeningClaim(proof, vk, tp);
  if (!claim.ok) return claim;
  const { commitments, scalars } = claim.value;

  let p0: G1Point;
  try {
    p0 = await backend.msm(commitments, scalars);
  } catch {
    return err({ type: "PrecompileCallFailed", precompile: "ecMul" });
  }
  return ok({ p0, p1: negateG1(commitments[commitments.length - 1]) });
};

/** `e(P0, [1]_2) * e(P1, [x]_2) == 1` */
export const checkPairing = async (
  points: PairingPoints,
  backend: CurveBackend,
  srsG2: G2Point,
): Promise<Result<void>> => {
  let holds: boolean;
  try {
    holds = await backend.pairingCheck([
      { g1: points.p0, g2: G2_GENERATOR },
      { g1: points.p1, g2: srsG2 },
    ]);
  } catch {
    return err({ type: "PrecompileCallFailed", precompile: "ecPairing" });
  }
  return holds ? ok(undefined) : err({ type: "PairingCheckFailed" });
};

export const verifyShplemini = async (
  proof: Proof,
  vk: VerificationKey,
  tp: Transcript,
  backend: CurveBackend,
  srsG2: G2Point,
): Promise<Result<void>> => {
  const points = await computePairingPoints(proof, vk, tp, backend);
  return points.ok ? checkPairing(points.value, backend, srsG2) : points;
};
