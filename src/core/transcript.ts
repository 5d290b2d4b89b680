import type { Fr } from "../types/brands";
import { asFr } from "../types/brands";
import { bytesToWord } from "../crypto/field";
import type { Hasher } from "../crypto/hash";
import { joinWords } from "../codec/bytes";
import { CONST_PROOF_SIZE_LOG_N, FIELD_BYTES, NUMBER_OF_ALPHAS } from "./constants";
import { type Result, ok, err, VerifierException, toVerifierError } from "./errors";
import { computePublicInputDelta } from "./publicInputs";
import type { G1ProofPoint, Proof, Transcript } from "./types";

const LO_MASK = (1n << 128n) - 1n;

/** Challenges are 128-bit halves of a digest, so both halves are already canonical. */
export const splitChallenge = (c: bigint): [Fr, Fr] => [asFr(c & LO_MASK), asFr(c >> 128n)];

const limbs = (p: G1ProofPoint): bigint[] => [p.x0, p.x1, p.y0, p.y1];

/** Hashes words and returns the raw digest; the unreduced value chains into the next step. */
const absorb = (hasher: Hasher, words: readonly bigint[]): bigint => {
  let digest: Uint8Array;
  try {
    digest = hasher.hash(joinWords(words));
  } catch {
    throw new VerifierException({ type: "PrecompileCallFailed", precompile: hasher.name });
  }
  if (digest.length !== FIELD_BYTES)
    throw new VerifierException({ type: "PrecompileCallFailed", precompile: hasher.name });
  return bytesToWord(digest);
};

/* ──────────── round steps ──────────── */
export interface EtaChallenges {
  eta: Fr;
  etaTwo: Fr;
  etaThree: Fr;
  prev: bigint;
}

export const generateEtaChallenges = (
  hasher: Hasher,
  proof: Proof,
  publicInputs: readonly Fr[],
  circuitSize: number,
  publicInputsSize: number,
  pubInputsOffset: number,
): EtaChallenges => {
  const first = absorb(hasher, [
    BigInt(circuitSize),
    BigInt(publicInputsSize),
    BigInt(pubInputsOffset),
    ...publicInputs,
    ...limbs(proof.w1),
    ...limbs(proof.w2),
    ...limbs(proof.w3),
  ]);
  const [eta, etaTwo] = splitChallenge(first);
  const prev = absorb(hasher, [first]);
  const [etaThree] = splitChallenge(prev);
  return { eta, etaTwo, etaThree, prev };
};

export const generateBetaGamma = (hasher: Hasher, prev: bigint, proof: Proof) => {
  const next = absorb(hasher, [
    prev,
    ...limbs(proof.lookupReadCounts),
    ...limbs(proof.lookupReadTags),
    ...limbs(proof.w4),
  ]);
  const [beta, gamma] = splitChallenge(next);
  return { beta, gamma, prev: next };
};

export const generateAlphas = (hasher: Hasher, prev: bigint, proof: Proof) => {
  let c = absorb(hasher, [prev, ...limbs(proof.lookupInverses), ...limbs(proof.zPerm)]);
  const alphas: Fr[] = [...splitChallenge(c)];
  while (alphas.length < NUMBER_OF_ALPHAS) {
    c = absorb(hasher, [c]);
    const [lo, hi] = splitChallenge(c);
    alphas.push(lo);
    // odd count: the last digest contributes only its low half
    if (alphas.length < NUMBER_OF_ALPHAS) alphas.push(hi);
  }
  return { alphas, prev: c };
};

export const generateGateChallenges = (hasher: Hasher, prev: bigint) => {
  const gateChallenges: Fr[] = [];
  let c = prev;
  for (let i = 0; i < CONST_PROOF_SIZE_LOG_N; i++) {
    c = absorb(hasher, [c]);
    gateChallenges.push(splitChallenge(c)[0]);
  }
  return { gateChallenges, prev: c };
};

/** One sumcheck round: the challenge binds the round's univariate. */
export const generateSumcheckChallenge = (
  hasher: Hasher,
  prev: bigint,
  univariate: readonly Fr[],
) => {
  const c = absorb(hasher, [prev, ...univariate]);
  return { challenge: splitChallenge(c)[0], prev: c };
};

export const generateSumcheckChallenges = (hasher: Hasher, prev: bigint, proof: Proof) => {
  const sumcheckUChallenges: Fr[] = [];
  let c = prev;
  for (const univariate of proof.sumcheckUnivariates) {
    const round = generateSumcheckChallenge(hasher, c, univariate);
    sumcheckUChallenges.push(round.challenge);
    c = round.prev;
  }
  return { sumcheckUChallenges, prev: c };
};

export const generateRho = (hasher: Hasher, prev: bigint, proof: Proof) => {
  const c = absorb(hasher, [prev, ...proof.sumcheckEvaluations]);
  return { rho: splitChallenge(c)[0], prev: c };
};

export const generateGeminiR = (hasher: Hasher, prev: bigint, proof: Proof) => {
  const c = absorb(hasher, [prev, ...proof.geminiFoldComms.flatMap(limbs)]);
  return { geminiR: splitChallenge(c)[0], prev: c };
};

export const generateShplonkNu = (hasher: Hasher, prev: bigint, proof: Proof) => {
  const c = absorb(hasher, [prev, ...proof.geminiAEvaluations]);
  return { shplonkNu: splitChallenge(c)[0], prev: c };
};

export const generateShplonkZ = (hasher: Hasher, prev: bigint, proof: Proof) => {
  const c = absorb(hasher, [prev, ...limbs(proof.shplonkQ)]);
  return { shplonkZ: splitChallenge(c)[0], prev: c };
};

/* ──────────── full chain ──────────── */
export interface TranscriptContext {
  hasher: Hasher;
  circuitSize: number;
  publicInputsSize: number;
  pubInputsOffset: number;
}

/**
 * Replays the Fiat-Shamir chain in protocol order and derives the public-input
 * delta from the resulting beta/gamma.
 */
export const generateTranscript = (
  proof: Proof,
  publicInputs: readonly Fr[],
  ctx: TranscriptContext,
): Result<Transcript> => {
  const { hasher } = ctx;
  try {
    const eta = generateEtaChallenges(
      hasher,
      proof,
      publicInputs,
      ctx.circuitSize,
      ctx.publicInputsSize,
      ctx.pubInputsOffset,
    );
    const bg = generateBetaGamma(hasher, eta.prev, proof);
    const al = generateAlphas(hasher, bg.prev, proof);
    const gate = generateGateChallenges(hasher, al.prev);
    const sc = generateSumcheckChallenges(hasher, gate.prev, proof);
    const rho = generateRho(hasher, sc.prev, proof);
    const gem = generateGeminiR(hasher, rho.prev, proof);
    const nu = generateShplonkNu(hasher, gem.prev, proof);
    const z = generateShplonkZ(hasher, nu.prev, proof);

    const delta = computePublicInputDelta(
      publicInputs,
      bg.beta,
      bg.gamma,
      ctx.circuitSize,
      ctx.pubInputsOffset,
    );
    if (!delta.ok) return delta;

    return ok({
      relationParameters: {
        eta: eta.eta,
        etaTwo: eta.etaTwo,
        etaThree: eta.etaThree,
        beta: bg.beta,
        gamma: bg.gamma,
        publicInputsDelta: delta.value,
      },
      alphas: al.alphas,
      gateChallenges: gate.gateChallenges,
      sumcheckUChallenges: sc.sumcheckUChallenges,
      rho: rho.rho,
      geminiR: gem.geminiR,
      shplonkNu: nu.shplonkNu,
      shplonkZ: z.shplonkZ,
    });
  } catch (e) {
    return err(toVerifierError(e));
  }
};
