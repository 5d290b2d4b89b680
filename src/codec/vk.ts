import { type Result, ok, err } from "../core/errors";
import {
  CONST_PROOF_SIZE_LOG_N,
  VK_BYTES,
  VK_FIELDS,
  VK_HEADER_FIELDS,
  VK_POINTS,
} from "../core/constants";
import { VK_POINT_NAMES, type G1Point, type VerificationKey } from "../core/types";
import { isCanonical, bytesToWord } from "../crypto/field";
import { isOnCurve } from "../crypto/bn254";
import { joinWords, splitWords } from "./bytes";

const MAX_PUBLIC_INPUTS = 0xffffffffn;

const invalid = (): Result<VerificationKey> => err({ type: "InvalidVerificationKey" });

/**
 * Reads the fixed 128-word key layout: three header words, 27 affine points,
 * then reserved words that must still be field elements.
 */
export const parseVerificationKey = (bytes: Uint8Array): Result<VerificationKey> => {
  if (bytes.length !== VK_BYTES) return invalid();
  const words = splitWords(bytes).map(bytesToWord);
  const pointWords = VK_HEADER_FIELDS + 2 * VK_POINTS;
  // point coordinates live in the base field and are range-checked on the curve
  const scalarWords = [...words.slice(0, VK_HEADER_FIELDS), ...words.slice(pointWords)];
  if (!scalarWords.every(isCanonical)) return invalid();

  const [size, log, pis] = words;
  if (log < 1n || log > BigInt(CONST_PROOF_SIZE_LOG_N)) return invalid();
  if (size !== 1n << log) return invalid();
  if (pis > MAX_PUBLIC_INPUTS) return invalid();

  let cursor = VK_HEADER_FIELDS;
  const next = (): G1Point => {
    const point = { x: words[cursor], y: words[cursor + 1] };
    cursor += 2;
    return point;
  };

  const vk: VerificationKey = {
    circuitSize: Number(size),
    logCircuitSize: Number(log),
    publicInputsSize: Number(pis),
    ql: next(),
    qr: next(),
    qo: next(),
    q4: next(),
    qm: next(),
    qc: next(),
    qArith: next(),
    qDeltaRange: next(),
    qElliptic: next(),
    qAux: next(),
    qLookup: next(),
    qPoseidon2External: next(),
    qPoseidon2Internal: next(),
    s1: next(),
    s2: next(),
    s3: next(),
    s4: next(),
    id1: next(),
    id2: next(),
    id3: next(),
    id4: next(),
    t1: next(),
    t2: next(),
    t3: next(),
    t4: next(),
    lagrangeFirst: next(),
    lagrangeLast: next(),
  };

  return VK_POINT_NAMES.every((name) => isOnCurve(vk[name])) ? ok(vk) : invalid();
};

export const encodeVerificationKey = (vk: VerificationKey): Uint8Array => {
  const words: bigint[] = [
    BigInt(vk.circuitSize),
    BigInt(vk.logCircuitSize),
    BigInt(vk.publicInputsSize),
    ...VK_POINT_NAMES.flatMap((name) => [vk[name].x, vk[name].y]),
  ];
  const padding = VK_FIELDS - VK_HEADER_FIELDS - 2 * VK_POINTS;
  return joinWords([...words, ...Array<bigint>(padding).fill(0n)]);
};
