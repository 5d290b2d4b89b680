import type { Fr, VkId } from "../types/brands";
import { parseProof, parsePublicInputs, validateProofPoints } from "../codec/proof";
import { parseVerificationKey } from "../codec/vk";
import { type CurveBackend, DEFAULT_SRS_G2, nobleBackend } from "../crypto/bn254";
import { type Hasher, hasherByName, sha256Hasher } from "../crypto/hash";
import { type ILogger, makeLogger, silentLogger } from "../logging";
import { type VerifierConfig, srsG2FromConfig } from "../config";
import { DEFAULT_PUB_INPUTS_OFFSET } from "./constants";
import {
  type Result,
  type VerifierError,
  ok,
  err,
  toVerifierError,
} from "./errors";
import { checkPairing, computePairingPoints } from "./shplemini";
import type { VerificationKeyStore } from "./store";
import { checkFinalEvaluation, runSumcheckRounds } from "./sumcheck";
import { generateTranscript } from "./transcript";
import type { G2Point, Proof, VerificationKey } from "./types";

export type Stage =
  | "idle"
  | "parseInputs"
  | "generateTranscript"
  | "runSumcheck"
  | "evaluateRelations"
  | "runShplemini"
  | "pairingCheck"
  | "done";

export interface VerifierOptions {
  logger?: ILogger;
  backend?: CurveBackend;
  hasher?: Hasher;
  pubInputsOffset?: number;
  /** `[x]_2` of the trusted setup. */
  srsG2?: G2Point;
}

export const optionsFromConfig = (cfg: VerifierConfig): VerifierOptions => ({
  logger: makeLogger(cfg.logLevel, { pretty: cfg.prettyLogs }),
  hasher: hasherByName(cfg.transcriptHash),
  pubInputsOffset: cfg.pubInputsOffset,
  srsG2: srsG2FromConfig(cfg),
});

/* ──────────── verifier ──────────── */
/**
 * Holds one verification key and checks proofs against it. Keeps no per-call
 * state, so concurrent `verify` calls are independent.
 */
export class HonkVerifier {
  private readonly log: ILogger;
  private readonly backend: CurveBackend;
  private readonly hasher: Hasher;
  private readonly pubInputsOffset: number;
  private readonly srsG2: G2Point;

  constructor(
    readonly vk: VerificationKey,
    opts: VerifierOptions = {},
  ) {
    this.log = opts.logger ?? silentLogger;
    this.backend = opts.backend ?? nobleBackend;
    this.hasher = opts.hasher ?? sha256Hasher;
    this.pubInputsOffset = opts.pubInputsOffset ?? DEFAULT_PUB_INPUTS_OFFSET;
    this.srsG2 = opts.srsG2 ?? DEFAULT_SRS_G2;
  }

  static fromBytes(bytes: Uint8Array, opts: VerifierOptions = {}): Result<HonkVerifier> {
    const vk = parseVerificationKey(bytes);
    return vk.ok ? ok(new HonkVerifier(vk.value, opts)) : vk;
  }

  static async fromStore(
    store: VerificationKeyStore,
    id: VkId,
    opts: VerifierOptions = {},
  ): Promise<Result<HonkVerifier>> {
    const bytes = await store.get(id);
    if (!bytes) return err({ type: "InvalidVerificationKey" });
    return HonkVerifier.fromBytes(bytes, opts);
  }

  /**
   * Resolves `ok(true)` only for an accepted proof; every rejection, a failed pairing
   * included, is an `err`.
   */
  async verify(proofBytes: Uint8Array, publicInputs: readonly Uint8Array[]): Promise<Result<true>> {
    let stage: Stage = "idle";
    const enter = (next: Stage) => {
      stage = next;
      this.log.debug({ stage }, "verifier stage");
    };
    const reject = (error: VerifierError): Result<true> => {
      this.log.warn({ stage, error: error.type }, "proof rejected");
      return err(error);
    };

    try {
      enter("parseInputs");
      const inputs = this.parseInputs(proofBytes, publicInputs);
      if (!inputs.ok) return reject(inputs.error);
      const { proof, pis } = inputs.value;

      enter("generateTranscript");
      const tp = generateTranscript(proof, pis, {
        hasher: this.hasher,
        circuitSize: this.vk.circuitSize,
        publicInputsSize: this.vk.publicInputsSize,
        pubInputsOffset: this.pubInputsOffset,
      });
      if (!tp.ok) return reject(tp.error);

      enter("runSumcheck");
      const claim = runSumcheckRounds(proof, tp.value);
      if (!claim.ok) return reject(claim.error);

      enter("evaluateRelations");
      const grand = checkFinalEvaluation(proof, tp.value, claim.value);
      if (!grand.ok) return reject(grand.error);

      enter("runShplemini");
      const points = await computePairingPoints(proof, this.vk, tp.value, this.backend);
      if (!points.ok) return reject(points.error);

      enter("pairingCheck");
      const paired = await checkPairing(points.value, this.backend, this.srsG2);
      if (!paired.ok) return reject(paired.error);

      enter("done");
      this.log.info({ publicInputs: pis.length }, "proof verified");
      return ok(true);
    } catch (e) {
      return reject(toVerifierError(e));
    }
  }

  /** Every length and bound check happens here, before any transcript or curve work. */
  private parseInputs(
    proofBytes: Uint8Array,
    publicInputs: readonly Uint8Array[],
  ): Result<{ proof: Proof; pis: Fr[] }> {
    const pis = parsePublicInputs(publicInputs, this.vk.publicInputsSize);
    if (!pis.ok) return pis;
    const proof = parseProof(proofBytes);
    if (!proof.ok) return proof;
    const points = validateProofPoints(proof.value);
    if (!points.ok) return points;
    return ok({ proof: proof.value, pis: pis.value });
  }
}

/** One-shot entry point: parses the key (when given as bytes) and verifies. Never resolves `ok(false)`. */
export const verify = async (
  proof: Uint8Array,
  publicInputs: readonly Uint8Array[],
  vk: Uint8Array | VerificationKey,
  opts: VerifierOptions = {},
): Promise<Result<true>> => {
  if (vk instanceof Uint8Array) {
    const verifier = HonkVerifier.fromBytes(vk, opts);
    return verifier.ok ? verifier.value.verify(proof, publicInputs) : verifier;
  }
  return new HonkVerifier(vk, opts).verify(proof, publicInputs);
};
