/**
 * Position of each claimed evaluation inside `Proof.sumcheckEvaluations`.
 * Precomputed columns first, then witnesses, then the shifted witnesses.
 */
export enum Wire {
  Q_M,
  Q_C,
  Q_L,
  Q_R,
  Q_O,
  Q_4,
  Q_LOOKUP,
  Q_ARITH,
  Q_RANGE,
  Q_ELLIPTIC,
  Q_AUX,
  Q_POSEIDON2_EXTERNAL,
  Q_POSEIDON2_INTERNAL,
  SIGMA_1,
  SIGMA_2,
  SIGMA_3,
  SIGMA_4,
  ID_1,
  ID_2,
  ID_3,
  ID_4,
  TABLE_1,
  TABLE_2,
  TABLE_3,
  TABLE_4,
  LAGRANGE_FIRST,
  LAGRANGE_LAST,
  W_L,
  W_R,
  W_O,
  W_4,
  Z_PERM,
  LOOKUP_INVERSES,
  LOOKUP_READ_COUNTS,
  LOOKUP_READ_TAGS,
  W_L_SHIFT,
  W_R_SHIFT,
  W_O_SHIFT,
  W_4_SHIFT,
  Z_PERM_SHIFT,
}
