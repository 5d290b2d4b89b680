import type { Fr } from "../types/brands";

/* ──────────── curve points ──────────── */
/** Affine G1 point; `(0, 0)` is the point at infinity. */
export interface G1Point {
  x: bigint;
  y: bigint;
}

/** Proof-side commitment with each coordinate split into two limbs. */
export interface G1ProofPoint {
  x0: Fr;
  x1: Fr;
  y0: Fr;
  y1: Fr;
}

export interface Fp2Value {
  c0: bigint;
  c1: bigint;
}

export interface G2Point {
  x: Fp2Value;
  y: Fp2Value;
}

export interface PairingInput {
  g1: G1Point;
  g2: G2Point;
}

/* ──────────── verification key ──────────── */
/** Commitment names in their serialized order. */
export const VK_POINT_NAMES = [
  "ql",
  "qr",
  "qo",
  "q4",
  "qm",
  "qc",
  "qArith",
  "qDeltaRange",
  "qElliptic",
  "qAux",
  "qLookup",
  "qPoseidon2External",
  "qPoseidon2Internal",
  "s1",
  "s2",
  "s3",
  "s4",
  "id1",
  "id2",
  "id3",
  "id4",
  "t1",
  "t2",
  "t3",
  "t4",
  "lagrangeFirst",
  "lagrangeLast",
] as const;

export type VkPointName = (typeof VK_POINT_NAMES)[number];

export type VerificationKey = {
  readonly circuitSize: number;
  readonly logCircuitSize: number;
  readonly publicInputsSize: number;
} & { readonly [K in VkPointName]: G1Point };

/* ──────────── proof ──────────── */
export interface Proof {
  readonly w1: G1ProofPoint;
  readonly w2: G1ProofPoint;
  readonly w3: G1ProofPoint;
  readonly w4: G1ProofPoint;
  readonly zPerm: G1ProofPoint;
  readonly lookupReadCounts: G1ProofPoint;
  readonly lookupReadTags: G1ProofPoint;
  readonly lookupInverses: G1ProofPoint;
  readonly sumcheckUnivariates: readonly (readonly Fr[])[];
  readonly sumcheckEvaluations: readonly Fr[];
  readonly geminiFoldComms: readonly G1ProofPoint[];
  readonly geminiAEvaluations: readonly Fr[];
  readonly shplonkQ: G1ProofPoint;
  readonly kzgQuotient: G1ProofPoint;
}

/** Witness commitments in serialized order. */
export const PROOF_COMMITMENT_NAMES = [
  "w1",
  "w2",
  "w3",
  "w4",
  "zPerm",
  "lookupReadCounts",
  "lookupReadTags",
  "lookupInverses",
] as const;

/* ──────────── transcript ──────────── */
export interface RelationParameters {
  eta: Fr;
  etaTwo: Fr;
  etaThree: Fr;
  beta: Fr;
  gamma: Fr;
  publicInputsDelta: Fr;
}

export interface Transcript {
  relationParameters: RelationParameters;
  alphas: readonly Fr[];
  gateChallenges: readonly Fr[];
  sumcheckUChallenges: readonly Fr[];
  rho: Fr;
  geminiR: Fr;
  shplonkNu: Fr;
  shplonkZ: Fr;
}
