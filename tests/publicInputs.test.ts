import { describe, it, expect } from "vitest";
import { computePublicInputDelta } from "../src/core/publicInputs";
import { ONE, divMod, fr, mulMod } from "../src/crypto/field";

describe("public input delta", () => {
  it("is one with no public inputs", () => {
    expect(computePublicInputDelta([], fr(2), fr(3), 8, 1)).toEqual({ ok: true, value: ONE });
  });

  it("matches the hand-computed ratio", () => {
    // num = 3 + 2 * (8 + 1) + 5 = 26, den = 3 - 2 * 2 + 5 = 4
    expect(computePublicInputDelta([fr(5)], fr(2), fr(3), 8, 1)).toEqual({
      ok: true,
      value: divMod(fr(26), fr(4)),
    });
  });

  it("advances the permutation ids per input", () => {
    // num: (3 + 18 + 5) * (3 + 20 + 6) = 26 * 29; den: (3 - 4 + 5) * (3 - 6 + 6) = 4 * 3
    expect(computePublicInputDelta([fr(5), fr(6)], fr(2), fr(3), 8, 1)).toEqual({
      ok: true,
      value: divMod(mulMod(fr(26), fr(29)), fr(12)),
    });
  });

  it("reports a vanishing denominator", () => {
    // den = 3 - 2 * 2 + 1 = 0
    expect(computePublicInputDelta([fr(1)], fr(2), fr(3), 8, 1)).toEqual({
      ok: false,
      error: { type: "DivisionByZero" },
    });
  });
});
