import type { Fr } from "../types/brands";
import {
  ONE,
  ZERO,
  addMod as add,
  fr,
  invMod,
  mulMod as mul,
  negMod,
  powMod,
  sqrMod as sqr,
  subMod as sub,
} from "../crypto/field";
import { NUMBER_OF_SUBRELATIONS } from "./constants";
import { Wire } from "./entities";
import type { RelationParameters } from "./types";

export type Evaluations = readonly Fr[];

const sum = (...xs: Fr[]): Fr => xs.reduce((a, b) => add(a, b), ZERO);
const prod = (...xs: Fr[]): Fr => xs.reduce((a, b) => mul(a, b), ONE);

/* ──────────── constants ──────────── */
const NEG_HALF = negMod(invMod(fr(2)));
const TWO = fr(2);
const THREE = fr(3);
const FOUR = fr(4);
const NINE = fr(9);
/** Grumpkin is `y^2 = x^3 - 17`. */
const GRUMPKIN_B_NEGATED = fr(17);
const LIMB_SIZE = fr(1n << 68n);
const SUBLIMB_SHIFT = fr(1n << 14n);

const INTERNAL_MATRIX_DIAGONAL: readonly Fr[] = [
  fr(0x10dc6e9c006ea38b04b1e03b4bd9490c0d03f98929ca1d7fb56821fd19d3b6e7n),
  fr(0x0c28145b6a44df3e0149b3d0a30b3bb599df9756d4dd9b84a86b38cfb45a740bn),
  fr(0x00544b8338791518b2c7645a50392798b21f75bb60e3596170067d00141cac15n),
  fr(0x222c01175718386f2e2e82eb122789e352e105a3b8fa852613bc534433ee428bn),
];

/* ──────────── arithmetic (0, 1) ──────────── */
export const accumulateArithmeticRelation = (
  p: Evaluations,
  out: Fr[],
  ds: Fr,
): void => {
  const qArith = p[Wire.Q_ARITH];

  let accum = prod(sub(qArith, THREE), p[Wire.Q_M], p[Wire.W_R], p[Wire.W_L], NEG_HALF);
  accum = sum(
    accum,
    mul(p[Wire.Q_L], p[Wire.W_L]),
    mul(p[Wire.Q_R], p[Wire.W_R]),
    mul(p[Wire.Q_O], p[Wire.W_O]),
    mul(p[Wire.Q_4], p[Wire.W_4]),
    p[Wire.Q_C],
    mul(sub(qArith, ONE), p[Wire.W_4_SHIFT]),
  );
  out[0] = prod(accum, qArith, ds);

  const bigAdd = add(sub(add(p[Wire.W_L], p[Wire.W_4]), p[Wire.W_L_SHIFT]), p[Wire.Q_M]);
  out[1] = prod(bigAdd, sub(qArith, TWO), sub(qArith, ONE), qArith, ds);
};

/* ──────────── permutation (2, 3) ──────────── */
export const accumulatePermutationRelation = (
  p: Evaluations,
  rp: RelationParameters,
  out: Fr[],
  ds: Fr,
): void => {
  const { beta, gamma } = rp;
  const term = (w: Fr, s: Fr): Fr => add(add(w, mul(s, beta)), gamma);

  const num = prod(
    term(p[Wire.W_L], p[Wire.ID_1]),
    term(p[Wire.W_R], p[Wire.ID_2]),
    term(p[Wire.W_O], p[Wire.ID_3]),
    term(p[Wire.W_4], p[Wire.ID_4]),
  );
  const den = prod(
    term(p[Wire.W_L], p[Wire.SIGMA_1]),
    term(p[Wire.W_R], p[Wire.SIGMA_2]),
    term(p[Wire.W_O], p[Wire.SIGMA_3]),
    term(p[Wire.W_4], p[Wire.SIGMA_4]),
  );

  const lhs = mul(add(p[Wire.Z_PERM], p[Wire.LAGRANGE_FIRST]), num);
  const rhs = mul(
    add(p[Wire.Z_PERM_SHIFT], mul(p[Wire.LAGRANGE_LAST], rp.publicInputsDelta)),
    den,
  );
  out[2] = mul(sub(lhs, rhs), ds);
  out[3] = prod(p[Wire.LAGRANGE_LAST], p[Wire.Z_PERM_SHIFT], ds);
};

/* ──────────── log-derivative lookup (4, 5) ──────────── */
export const accumulateLogDerivativeLookupRelation = (
  p: Evaluations,
  rp: RelationParameters,
  out: Fr[],
  ds: Fr,
): void => {
  const { eta, etaTwo, etaThree, gamma } = rp;

  const writeTerm = sum(
    p[Wire.TABLE_1],
    gamma,
    mul(p[Wire.TABLE_2], eta),
    mul(p[Wire.TABLE_3], etaTwo),
    mul(p[Wire.TABLE_4], etaThree),
  );

  const entry1 = sum(p[Wire.W_L], gamma, mul(p[Wire.Q_R], p[Wire.W_L_SHIFT]));
  const entry2 = add(p[Wire.W_R], mul(p[Wire.Q_M], p[Wire.W_R_SHIFT]));
  const entry3 = add(p[Wire.W_O], mul(p[Wire.Q_C], p[Wire.W_O_SHIFT]));
  const readTerm = sum(
    entry1,
    mul(entry2, eta),
    mul(entry3, etaTwo),
    mul(p[Wire.Q_O], etaThree),
  );

  const inverses = p[Wire.LOOKUP_INVERSES];
  const readInverse = mul(inverses, writeTerm);
  const writeInverse = mul(inverses, readTerm);

  const tags = p[Wire.LOOKUP_READ_TAGS];
  const qLookup = p[Wire.Q_LOOKUP];
  const inverseExists = sub(add(tags, qLookup), mul(tags, qLookup));

  out[4] = mul(sub(prod(readTerm, writeTerm, inverses), inverseExists), ds);
  // linearly dependent: no domain separation
  out[5] = sub(mul(qLookup, readInverse), mul(p[Wire.LOOKUP_READ_COUNTS], writeInverse));
};

/* ──────────── delta range (6..9) ──────────── */
export const accumulateDeltaRangeRelation = (p: Evaluations, out: Fr[], ds: Fr): void => {
  const deltas = [
    sub(p[Wire.W_R], p[Wire.W_L]),
    sub(p[Wire.W_O], p[Wire.W_R]),
    sub(p[Wire.W_4], p[Wire.W_O]),
    sub(p[Wire.W_L_SHIFT], p[Wire.W_4]),
  ];
  const scale = mul(p[Wire.Q_RANGE], ds);
  deltas.forEach((d, i) => {
    out[6 + i] = prod(d, sub(d, ONE), sub(d, TWO), sub(d, THREE), scale);
  });
};

/* ──────────── elliptic add/double (10, 11) ──────────── */
export const accumulateEllipticRelation = (p: Evaluations, out: Fr[], ds: Fr): void => {
  const x1 = p[Wire.W_R];
  const y1 = p[Wire.W_O];
  const x2 = p[Wire.W_L_SHIFT];
  const y2 = p[Wire.W_4_SHIFT];
  const y3 = p[Wire.W_O_SHIFT];
  const x3 = p[Wire.W_R_SHIFT];
  const qSign = p[Wire.Q_L];
  const qIsDouble = p[Wire.Q_M];
  const qElliptic = p[Wire.Q_ELLIPTIC];

  const xDiff = sub(x2, x1);
  const y1Sqr = sqr(y1);

  const addScale = prod(ds, qElliptic, sub(ONE, qIsDouble));
  const doubleScale = prod(ds, qElliptic, qIsDouble);

  // addition
  const y1y2 = prod(y1, y2, qSign);
  const xAdd = add(
    sub(sub(prod(sum(x3, x2, x1), xDiff, xDiff), sqr(y2)), y1Sqr),
    add(y1y2, y1y2),
  );
  const yAdd = add(
    mul(add(y1, y3), xDiff),
    mul(sub(x3, x1), sub(mul(y2, qSign), y1)),
  );

  // doubling: x1^4 = (y1^2 + 17) * x1 on the curve
  const xPow4 = mul(add(y1Sqr, GRUMPKIN_B_NEGATED), x1);
  const xDouble = sub(mul(sum(x3, x1, x1), mul(y1Sqr, FOUR)), mul(xPow4, NINE));
  const yDouble = sub(
    prod(THREE, x1, x1, sub(x1, x3)),
    mul(add(y1, y1), add(y1, y3)),
  );

  out[10] = add(mul(xAdd, addScale), mul(xDouble, doubleScale));
  out[11] = add(mul(yAdd, addScale), mul(yDouble, doubleScale));
};

/* ──────────── auxiliary: non-native field + memory (12..17) ──────────── */
export const accumulateAuxiliaryRelation = (
  p: Evaluations,
  rp: RelationParameters,
  out: Fr[],
  ds: Fr,
): void => {
  const { eta, etaTwo, etaThree } = rp;
  const wl = p[Wire.W_L];
  const wr = p[Wire.W_R];
  const wo = p[Wire.W_O];
  const w4 = p[Wire.W_4];
  const wlS = p[Wire.W_L_SHIFT];
  const wrS = p[Wire.W_R_SHIFT];
  const woS = p[Wire.W_O_SHIFT];
  const w4S = p[Wire.W_4_SHIFT];
  const qAuxDs = mul(p[Wire.Q_AUX], ds);

  // non-native field arithmetic over 68-bit limbs
  let limbSubproduct = add(mul(wl, wrS), mul(wlS, wr));
  let nnf2 = sub(add(mul(wl, w4), mul(wr, wo)), woS);
  nnf2 = sub(mul(nnf2, LIMB_SIZE), w4S);
  nnf2 = mul(add(nnf2, limbSubproduct), p[Wire.Q_4]);

  limbSubproduct = add(mul(limbSubproduct, LIMB_SIZE), mul(wlS, wrS));
  const nnf1 = mul(sub(limbSubproduct, add(wo, w4)), p[Wire.Q_O]);
  const nnf3 = mul(sub(add(limbSubproduct, w4), add(woS, w4S)), p[Wire.Q_M]);
  const nonNativeField = mul(sum(nnf1, nnf2, nnf3), p[Wire.Q_R]);

  // limb accumulators, 14-bit sublimbs
  const horner = (terms: Fr[]): Fr =>
    terms.slice(1).reduce((acc, t) => add(mul(acc, SUBLIMB_SHIFT), t), terms[0]);
  const acc1 = mul(sub(horner([wrS, wlS, wo, wr, wl]), w4), p[Wire.Q_4]);
  const acc2 = mul(sub(horner([woS, wrS, wlS, w4, wo]), w4S), p[Wire.Q_M]);
  const limbAccumulator = mul(add(acc1, acc2), p[Wire.Q_O]);

  // memory records: (index, timestamp/value, value) compressed through eta powers
  const partialRecord = sum(mul(wo, etaThree), mul(wr, etaTwo), mul(wl, eta), p[Wire.Q_C]);
  const memoryRecordCheck = sub(partialRecord, w4);

  const indexDelta = sub(wlS, wl);
  const recordDelta = sub(w4S, w4);
  const notIndexDelta = sub(ONE, indexDelta);
  const indexMonotonic = sub(sqr(indexDelta), indexDelta);
  const adjacentMatch = mul(notIndexDelta, recordDelta);

  const qlqr = mul(p[Wire.Q_L], p[Wire.Q_R]);
  out[13] = prod(adjacentMatch, qlqr, qAuxDs);
  out[14] = prod(indexMonotonic, qlqr, qAuxDs);
  const romConsistency = mul(memoryRecordCheck, qlqr);

  const accessType = sub(w4, partialRecord);
  const accessCheck = sub(sqr(accessType), accessType);
  const nextAccessType = sub(w4S, sum(mul(woS, etaThree), mul(wrS, etaTwo), mul(wlS, eta)));
  const valueDelta = sub(woS, wo);
  const adjacentMatchOnRead = prod(notIndexDelta, valueDelta, sub(ONE, nextAccessType));
  const nextAccessIsBoolean = sub(sqr(nextAccessType), nextAccessType);

  const qArith = p[Wire.Q_ARITH];
  out[15] = prod(adjacentMatchOnRead, qArith, qAuxDs);
  out[16] = prod(indexMonotonic, qArith, qAuxDs);
  out[17] = prod(nextAccessIsBoolean, qArith, qAuxDs);
  const ramConsistency = mul(accessCheck, qArith);

  const timestampDelta = sub(wrS, wr);
  const ramTimestamp = sub(mul(notIndexDelta, timestampDelta), wo);

  const memory = sum(
    romConsistency,
    prod(ramTimestamp, p[Wire.Q_4], p[Wire.Q_L]),
    prod(memoryRecordCheck, p[Wire.Q_M], p[Wire.Q_L]),
    ramConsistency,
  );

  out[12] = mul(sum(memory, nonNativeField, limbAccumulator), qAuxDs);
};

/* ──────────── poseidon2 (18..25) ──────────── */
const sbox = (x: Fr): Fr => powMod(x, 5n);

export const accumulatePoseidonExternalRelation = (
  p: Evaluations,
  out: Fr[],
  ds: Fr,
): void => {
  const u1 = sbox(add(p[Wire.W_L], p[Wire.Q_L]));
  const u2 = sbox(add(p[Wire.W_R], p[Wire.Q_R]));
  const u3 = sbox(add(p[Wire.W_O], p[Wire.Q_O]));
  const u4 = sbox(add(p[Wire.W_4], p[Wire.Q_4]));

  // external 4x4 matrix applied as an addition chain
  const t0 = add(u1, u2);
  const t1 = add(u3, u4);
  const t2 = sum(u2, u2, t1);
  const t3 = sum(u4, u4, t0);
  const v4 = add(mul(t1, FOUR), t3);
  const v2 = add(mul(t0, FOUR), t2);
  const v1 = add(t3, v2);
  const v3 = add(t2, v4);

  const scale = mul(p[Wire.Q_POSEIDON2_EXTERNAL], ds);
  out[18] = mul(scale, sub(v1, p[Wire.W_L_SHIFT]));
  out[19] = mul(scale, sub(v2, p[Wire.W_R_SHIFT]));
  out[20] = mul(scale, sub(v3, p[Wire.W_O_SHIFT]));
  out[21] = mul(scale, sub(v4, p[Wire.W_4_SHIFT]));
};

export const accumulatePoseidonInternalRelation = (
  p: Evaluations,
  out: Fr[],
  ds: Fr,
): void => {
  const u = [sbox(add(p[Wire.W_L], p[Wire.Q_L])), p[Wire.W_R], p[Wire.W_O], p[Wire.W_4]];
  const uSum = sum(...u);
  const shifted = [p[Wire.W_L_SHIFT], p[Wire.W_R_SHIFT], p[Wire.W_O_SHIFT], p[Wire.W_4_SHIFT]];

  const scale = mul(p[Wire.Q_POSEIDON2_INTERNAL], ds);
  u.forEach((ui, i) => {
    const v = add(mul(ui, INTERNAL_MATRIX_DIAGONAL[i]), uSum);
    out[22 + i] = mul(scale, sub(v, shifted[i]));
  });
};

/* ──────────── batching ──────────── */
/** All 26 subrelations, unbatched. */
export const evaluateSubrelations = (
  evals: Evaluations,
  rp: RelationParameters,
  powPartialEval: Fr,
): Fr[] => {
  const out: Fr[] = Array<Fr>(NUMBER_OF_SUBRELATIONS).fill(ZERO);
  accumulateArithmeticRelation(evals, out, powPartialEval);
  accumulatePermutationRelation(evals, rp, out, powPartialEval);
  accumulateLogDerivativeLookupRelation(evals, rp, out, powPartialEval);
  accumulateDeltaRangeRelation(evals, out, powPartialEval);
  accumulateEllipticRelation(evals, out, powPartialEval);
  accumulateAuxiliaryRelation(evals, rp, out, powPartialEval);
  accumulatePoseidonExternalRelation(evals, out, powPartialEval);
  accumulatePoseidonInternalRelation(evals, out, powPartialEval);
  return out;
};

export const batchSubrelations = (subrelations: readonly Fr[], alphas: readonly Fr[]): Fr =>
  subrelations
    .slice(1)
    .reduce((acc, e, i) => add(acc, mul(e, alphas[i])), subrelations[0]);

export const accumulateRelationEvaluations = (
  evals: Evaluations,
  rp: RelationParameters,
  alphas: readonly Fr[],
  powPartialEval: Fr,
): Fr => batchSubrelations(evaluateSubrelations(evals, rp, powPartialEval), alphas);
