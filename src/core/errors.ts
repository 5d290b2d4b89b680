/* ──────────── error taxonomy ──────────── */
export type Precompile = "sha256" | "keccak256" | "ecAdd" | "ecMul" | "ecPairing";

export type VerifierError =
  | { type: "InvalidProofFormat" }
  | { type: "InvalidPublicInputsLength"; expected: number; got: number }
  | { type: "InvalidPublicInputFormat"; index: number }
  | { type: "InvalidFieldElement" }
  | { type: "InvalidVerificationKey" }
  | { type: "SumcheckFailed"; round: number }
  | { type: "SumcheckEvaluationMismatch" }
  | { type: "ShpleminiFailed" }
  | { type: "PairingCheckFailed" }
  | { type: "PrecompileCallFailed"; precompile: Precompile }
  | { type: "DivisionByZero" }
  | { type: "Other"; message: string };

export type VerifierErrorType = VerifierError["type"];

/* ──────────── result ──────────── */
export type Result<T> = { ok: true; value: T } | { ok: false; error: VerifierError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });
export const err = <T = never>(error: VerifierError): Result<T> => ({ ok: false, error });

/** Thrown by the non-`try` field helpers; the verifier turns it back into a `Result`. */
export class VerifierException extends Error {
  readonly error: VerifierError;

  constructor(error: VerifierError) {
    super(formatError(error));
    this.name = "VerifierException";
    this.error = error;
  }
}

export const unwrap = <T>(r: Result<T>): T => {
  if (!r.ok) throw new VerifierException(r.error);
  return r.value;
};

/** Maps anything caught at a stage boundary onto the taxonomy. */
export const toVerifierError = (e: unknown): VerifierError => {
  if (e instanceof VerifierException) return e.error;
  return { type: "Other", message: e instanceof Error ? e.message : String(e) };
};

export const formatError = (e: VerifierError): string => {
  switch (e.type) {
    case "InvalidProofFormat":
      return "proof has an invalid format";
    case "InvalidPublicInputsLength":
      return `expected ${e.expected} public inputs, got ${e.got}`;
    case "InvalidPublicInputFormat":
      return `public input ${e.index} is not a 32-byte word`;
    case "InvalidFieldElement":
      return "field element is not below the modulus";
    case "InvalidVerificationKey":
      return "verification key is invalid";
    case "SumcheckFailed":
      return `sumcheck round ${e.round} failed`;
    case "SumcheckEvaluationMismatch":
      return "sumcheck final evaluation mismatch";
    case "ShpleminiFailed":
      return "shplemini batch opening failed";
    case "PairingCheckFailed":
      return "pairing check failed";
    case "PrecompileCallFailed":
      return `${e.precompile} call failed`;
    case "DivisionByZero":
      return "division by zero";
    case "Other":
      return e.message;
  }
};
