/* ──────────── protocol sizes ──────────── */
export const CONST_PROOF_SIZE_LOG_N = 28;
export const NUMBER_OF_SUBRELATIONS = 26;
export const BATCHED_RELATION_PARTIAL_LENGTH = 8;
export const NUMBER_OF_ENTITIES = 40;
export const NUMBER_UNSHIFTED = 35;
export const NUMBER_TO_BE_SHIFTED = 5;
export const NUMBER_OF_ALPHAS = NUMBER_OF_SUBRELATIONS - 1;
export const NUMBER_OF_WITNESS_COMMITMENTS = 8;

/* ──────────── wire sizes ──────────── */
export const FIELD_BYTES = 32;
export const LIMBS_PER_POINT = 4;
export const VK_FIELDS = 128;
export const VK_HEADER_FIELDS = 3;
export const VK_POINTS = 27;
export const VK_BYTES = VK_FIELDS * FIELD_BYTES;

export const PROOF_FIELDS =
  NUMBER_OF_WITNESS_COMMITMENTS * LIMBS_PER_POINT +
  CONST_PROOF_SIZE_LOG_N * BATCHED_RELATION_PARTIAL_LENGTH +
  NUMBER_OF_ENTITIES +
  (CONST_PROOF_SIZE_LOG_N - 1) * LIMBS_PER_POINT +
  CONST_PROOF_SIZE_LOG_N +
  2 * LIMBS_PER_POINT;
export const PROOF_BYTES = PROOF_FIELDS * FIELD_BYTES;

export const DEFAULT_PUB_INPUTS_OFFSET = 1;

/* ──────────── curve ──────────── */
/** Base-field modulus of BN254 (coordinates of G1). */
export const BASE_MODULUS =
  21888242871839275222246405745257275088696311157297823662689037894645226208583n;

/** Limb split used by proof commitments: `x = lo + hi * 2^136`. */
export const LIMB_SHIFT = 136n;
