export * from "./core/errors";
export * from "./core/constants";
export * from "./core/types";
export { Wire } from "./core/entities";
export { HonkVerifier, verify, optionsFromConfig } from "./core/verifier";
export type { Stage, VerifierOptions } from "./core/verifier";
export { MemoryVkStore } from "./core/store";
export type { VerificationKeyStore } from "./core/store";
export { generateTranscript } from "./core/transcript";
export { computePublicInputDelta } from "./core/publicInputs";
export { accumulateRelationEvaluations, evaluateSubrelations } from "./core/relations";
export { verifySumcheck } from "./core/sumcheck";
export { computeBatchOpeningClaim, verifyShplemini } from "./core/shplemini";
export { parseProof, encodeProof, parsePublicInputs } from "./codec/proof";
export { parseVerificationKey, encodeVerificationKey } from "./codec/vk";
export { bytesToHex, hexToBytes } from "./codec/bytes";
export type { Hex } from "./codec/bytes";
export * from "./crypto/field";
export { nobleBackend, DEFAULT_SRS_G2, G2_GENERATOR, splitPoint } from "./crypto/bn254";
export type { CurveBackend } from "./crypto/bn254";
export { sha256Hasher, keccakHasher, hasherByName } from "./crypto/hash";
export type { Hasher, HashName } from "./crypto/hash";
export { loadConfig, ConfigSchema } from "./config";
export type { VerifierConfig } from "./config";
export { makeLogger } from "./logging";
export type { ILogger, LogLevel } from "./logging";
export type { Fr, VkId } from "./types/brands";
export { asVkId } from "./types/brands";
