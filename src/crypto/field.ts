import { bytesToNumberBE, numberToBytesBE } from "@noble/curves/utils.js";
import { type Fr, asFr } from "../types/brands";
import { type Result, ok, err, unwrap } from "../core/errors";

/* ──────────── BN254 scalar field ──────────── */
export const MODULUS =
  21888242871839275222246405745257275088548364400416034343698204186575808495617n;

export const ZERO = asFr(0n);
export const ONE = asFr(1n);

const BYTES = 32;

/** Reduces any integer (negative included) into the field. */
export const fr = (n: bigint | number): Fr => {
  const v = BigInt(n) % MODULUS;
  return asFr(v < 0n ? v + MODULUS : v);
};

export const isCanonical = (n: bigint): boolean => n >= 0n && n < MODULUS;

export const addMod = (a: Fr, b: Fr): Fr => {
  const s = a + b;
  return asFr(s >= MODULUS ? s - MODULUS : s);
};

export const subMod = (a: Fr, b: Fr): Fr => asFr(a >= b ? a - b : a + MODULUS - b);

export const negMod = (a: Fr): Fr => asFr(a === 0n ? 0n : MODULUS - a);

export const mulMod = (a: Fr, b: Fr): Fr => asFr((a * b) % MODULUS);

export const sqrMod = (a: Fr): Fr => mulMod(a, a);

export const powMod = (base: Fr, exp: bigint): Fr => {
  let result = 1n;
  let b: bigint = base;
  let e = exp;
  while (e > 0n) {
    if (e & 1n) result = (result * b) % MODULUS;
    b = (b * b) % MODULUS;
    e >>= 1n;
  }
  return asFr(result);
};

export const tryInvMod = (a: Fr): Result<Fr> =>
  a === 0n ? err({ type: "DivisionByZero" }) : ok(powMod(a, MODULUS - 2n));

export const invMod = (a: Fr): Fr => unwrap(tryInvMod(a));

export const tryDivMod = (a: Fr, b: Fr): Result<Fr> => {
  const inv = tryInvMod(b);
  return inv.ok ? ok(mulMod(a, inv.value)) : inv;
};

export const divMod = (a: Fr, b: Fr): Fr => unwrap(tryDivMod(a, b));

/* ──────────── big-endian words ──────────── */
/** Encodes any integer in `[0, 2^256)` as one 32-byte word. */
export const wordToBytes = (n: bigint): Uint8Array => numberToBytesBE(n, BYTES);

export const bytesToWord = (bytes: Uint8Array): bigint => bytesToNumberBE(bytes);

export const toBytesBE = (a: Fr): Uint8Array => wordToBytes(a);

export const tryFromBytesBE = (bytes: Uint8Array): Result<Fr> => {
  if (bytes.length !== BYTES) return err({ type: "InvalidProofFormat" });
  const v = bytesToWord(bytes);
  return isCanonical(v) ? ok(asFr(v)) : err({ type: "InvalidFieldElement" });
};

export const fromBytesBE = (bytes: Uint8Array): Fr => unwrap(tryFromBytesBE(bytes));
