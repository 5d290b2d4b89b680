import { bn254 } from "@noble/curves/bn254.js";
import { pippenger } from "@noble/curves/abstract/curve.js";
import type { WeierstrassPoint } from "@noble/curves/abstract/weierstrass.js";
import type { Fp2 } from "@noble/curves/abstract/tower.js";
import type { Fr } from "../types/brands";
import { asFr } from "../types/brands";
import { BASE_MODULUS, LIMB_SHIFT } from "../core/constants";
import { type Result, ok, err } from "../core/errors";
import type { G1Point, G1ProofPoint, G2Point, PairingInput } from "../core/types";

const G1 = bn254.G1.Point;
const G2 = bn254.G2.Point;
const { Fp2: Fp2Field, Fp12 } = bn254.fields;

type NobleG1 = WeierstrassPoint<bigint>;
type NobleG2 = WeierstrassPoint<Fp2>;

/* ──────────── backend contract ──────────── */
/** Host capability for group operations; swap in an accelerated one in production. */
export interface CurveBackend {
  msm: (points: readonly G1Point[], scalars: readonly Fr[]) => Promise<G1Point>;
  /** True when the product of all pairings is the identity in GT. */
  pairingCheck: (pairs: readonly PairingInput[]) => Promise<boolean>;
}

/* ──────────── fixed points ──────────── */
export const G1_GENERATOR: G1Point = { x: 1n, y: 2n };
export const G1_INFINITY: G1Point = { x: 0n, y: 0n };

const fromNobleG2 = (p: NobleG2): G2Point => {
  const { x, y } = p.toAffine();
  return { x: { c0: x.c0, c1: x.c1 }, y: { c0: y.c0, c1: y.c1 } };
};

export const G2_GENERATOR: G2Point = fromNobleG2(G2.BASE);

/** `[x]_2` from the public BN254 powers-of-tau ceremony. */
export const DEFAULT_SRS_G2: G2Point = {
  x: {
    c0: 0x0118c4d5b837bcc2bc89b5b398b5974e9f5944073b32078b7e231fec938883b0n,
    c1: 0x260e01b251f6f1c7e7ff4e580791dee8ea51d87a358e038b4efe30fac09383c1n,
  },
  y: {
    c0: 0x22febda3c0c0632a56475b4214e5615e11e6dd3f96e6cea2854a87d4dacc5e55n,
    c1: 0x04fc6369f7110fe3d25156c1bb9a72859cf2a04641f99ba4ee413c80da6a5fe4n,
  },
};

/* ──────────── point helpers ──────────── */
export const isInfinity = (p: G1Point): boolean => p.x === 0n && p.y === 0n;

const toNobleG1 = (p: G1Point): NobleG1 => {
  if (isInfinity(p)) return G1.ZERO;
  const point = G1.fromAffine({ x: p.x, y: p.y });
  point.assertValidity();
  return point;
};

const toNobleG2 = (p: G2Point): NobleG2 => {
  const point = G2.fromAffine({
    x: Fp2Field.create({ c0: p.x.c0, c1: p.x.c1 }),
    y: Fp2Field.create({ c0: p.y.c0, c1: p.y.c1 }),
  });
  point.assertValidity();
  return point;
};

const fromNobleG1 = (p: NobleG1): G1Point => {
  if (p.is0()) return G1_INFINITY;
  const { x, y } = p.toAffine();
  return { x, y };
};

export const isOnCurve = (p: G1Point): boolean => {
  if (isInfinity(p)) return true;
  if (p.x >= BASE_MODULUS || p.y >= BASE_MODULUS) return false;
  return (p.y * p.y - p.x * p.x * p.x - 3n) % BASE_MODULUS === 0n;
};

export const negateG1 = (p: G1Point): G1Point =>
  isInfinity(p) ? p : { x: p.x, y: p.y === 0n ? 0n : BASE_MODULUS - p.y };

const LIMB_MASK = (1n << LIMB_SHIFT) - 1n;

/** Recombines limbs into an affine point; a point off the curve is malformed input. */
export const convertProofPoint = (p: G1ProofPoint): Result<G1Point> => {
  const point = { x: p.x0 + (p.x1 << LIMB_SHIFT), y: p.y0 + (p.y1 << LIMB_SHIFT) };
  return isOnCurve(point) ? ok(point) : err({ type: "InvalidProofFormat" });
};

export const splitPoint = (p: G1Point): G1ProofPoint => ({
  x0: asFr(p.x & LIMB_MASK),
  x1: asFr(p.x >> LIMB_SHIFT),
  y0: asFr(p.y & LIMB_MASK),
  y1: asFr(p.y >> LIMB_SHIFT),
});

/* ──────────── default backend ──────────── */
export const nobleBackend: CurveBackend = {
  msm: async (points, scalars) => {
    if (points.length !== scalars.length) throw new Error("msm: length mismatch");
    const sum = pippenger(G1, points.map(toNobleG1), [...scalars]);
    return fromNobleG1(sum);
  },
  pairingCheck: async (pairs) => {
    // e(O, Q) = 1, so identity terms drop out
    const live = pairs.filter(({ g1 }) => !isInfinity(g1));
    if (live.length === 0) return true;
    const res = bn254.pairingBatch(
      live.map(({ g1, g2 }) => ({ g1: toNobleG1(g1), g2: toNobleG2(g2) })),
    );
    return Fp12.eql(res, Fp12.ONE);
  },
};
