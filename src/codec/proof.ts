import type { Fr } from "../types/brands";
import { asFr } from "../types/brands";
import { type Result, ok, err } from "../core/errors";
import {
  BATCHED_RELATION_PARTIAL_LENGTH,
  CONST_PROOF_SIZE_LOG_N,
  FIELD_BYTES,
  NUMBER_OF_ENTITIES,
  PROOF_BYTES,
} from "../core/constants";
import type { G1ProofPoint, Proof } from "../core/types";
import { PROOF_COMMITMENT_NAMES } from "../core/types";
import { bytesToWord, isCanonical, tryFromBytesBE } from "../crypto/field";
import { convertProofPoint } from "../crypto/bn254";
import { joinWords, splitWords } from "./bytes";

/* ──────────── sequential reader ──────────── */
class FieldCursor {
  private at = 0;

  constructor(private readonly words: readonly Fr[]) {}

  fr(): Fr {
    return this.words[this.at++];
  }

  point(): G1ProofPoint {
    return { x0: this.fr(), x1: this.fr(), y0: this.fr(), y1: this.fr() };
  }

  many<T>(n: number, read: () => T): T[] {
    return Array.from({ length: n }, read);
  }
}

/* ──────────── proof ──────────── */
export const parseProof = (bytes: Uint8Array): Result<Proof> => {
  if (bytes.length !== PROOF_BYTES) return err({ type: "InvalidProofFormat" });
  const raw = splitWords(bytes).map(bytesToWord);
  if (!raw.every(isCanonical)) return err({ type: "InvalidFieldElement" });

  const c = new FieldCursor(raw.map(asFr));
  const w1 = c.point();
  const w2 = c.point();
  const w3 = c.point();
  const w4 = c.point();
  const zPerm = c.point();
  const lookupReadCounts = c.point();
  const lookupReadTags = c.point();
  const lookupInverses = c.point();
  const sumcheckUnivariates = c.many(CONST_PROOF_SIZE_LOG_N, () =>
    c.many(BATCHED_RELATION_PARTIAL_LENGTH, () => c.fr()),
  );
  const sumcheckEvaluations = c.many(NUMBER_OF_ENTITIES, () => c.fr());
  const geminiFoldComms = c.many(CONST_PROOF_SIZE_LOG_N - 1, () => c.point());
  const geminiAEvaluations = c.many(CONST_PROOF_SIZE_LOG_N, () => c.fr());
  const shplonkQ = c.point();
  const kzgQuotient = c.point();

  return ok({
    w1,
    w2,
    w3,
    w4,
    zPerm,
    lookupReadCounts,
    lookupReadTags,
    lookupInverses,
    sumcheckUnivariates,
    sumcheckEvaluations,
    geminiFoldComms,
    geminiAEvaluations,
    shplonkQ,
    kzgQuotient,
  });
};

/** Every commitment the proof carries, in serialized order. */
export const proofCommitments = (proof: Proof): G1ProofPoint[] => [
  ...PROOF_COMMITMENT_NAMES.map((name) => proof[name]),
  ...proof.geminiFoldComms,
  proof.shplonkQ,
  proof.kzgQuotient,
];

export const validateProofPoints = (proof: Proof): Result<void> => {
  for (const p of proofCommitments(proof)) {
    const point = convertProofPoint(p);
    if (!point.ok) return point;
  }
  return ok(undefined);
};

const limbs = (p: G1ProofPoint): bigint[] => [p.x0, p.x1, p.y0, p.y1];

export const encodeProof = (proof: Proof): Uint8Array =>
  joinWords([
    ...PROOF_COMMITMENT_NAMES.flatMap((name) => limbs(proof[name])),
    ...proof.sumcheckUnivariates.flat(),
    ...proof.sumcheckEvaluations,
    ...proof.geminiFoldComms.flatMap(limbs),
    ...proof.geminiAEvaluations,
    ...limbs(proof.shplonkQ),
    ...limbs(proof.kzgQuotient),
  ]);

/* ──────────── public inputs ──────────── */
/** Count is checked before any word is decoded. */
export const parsePublicInputs = (
  inputs: readonly Uint8Array[],
  expected: number,
): Result<Fr[]> => {
  if (inputs.length !== expected)
    return err({ type: "InvalidPublicInputsLength", expected, got: inputs.length });
  const out: Fr[] = [];
  for (const [index, word] of inputs.entries()) {
    if (word.length !== FIELD_BYTES) return err({ type: "InvalidPublicInputFormat", index });
    const v = tryFromBytesBE(word);
    if (!v.ok) return v;
    out.push(v.value);
  }
  return ok(out);
};
