import type { Fr } from "../types/brands";
import { ONE, addMod, fr, mulMod, subMod, tryDivMod } from "../crypto/field";
import type { Result } from "./errors";

/**
 * Grand-product correction for public inputs placed at rows
 * `offset .. offset + k`: prod(gamma + beta * id + pi) / prod(gamma + beta * sigma + pi),
 * where ids continue after the circuit size and sigmas count down from `-(offset + 1)`.
 */
export const computePublicInputDelta = (
  publicInputs: readonly Fr[],
  beta: Fr,
  gamma: Fr,
  circuitSize: number,
  offset: number,
): Result<Fr> => {
  let numerator: Fr = ONE;
  let denominator: Fr = ONE;
  let numAcc = addMod(gamma, mulMod(beta, fr(circuitSize + offset)));
  let denAcc = subMod(gamma, mulMod(beta, fr(offset + 1)));

  for (const pi of publicInputs) {
    numerator = mulMod(numerator, addMod(numAcc, pi));
    denominator = mulMod(denominator, addMod(denAcc, pi));
    numAcc = addMod(numAcc, beta);
    denAcc = subMod(denAcc, beta);
  }
  return tryDivMod(numerator, denominator);
};
