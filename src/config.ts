import {
  type InferOutput,
  boolean,
  integer,
  minValue,
  number,
  object,
  optional,
  parse,
  picklist,
  pipe,
  regex,
  string,
} from "valibot";
import { DEFAULT_PUB_INPUTS_OFFSET } from "./core/constants";
import type { G2Point } from "./core/types";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const wordHex = pipe(string(), regex(/^0x[0-9a-fA-F]{1,64}$/, "expected a 0x-prefixed 32-byte hex word"));

export const ConfigSchema = object({
  logLevel: optional(picklist(LOG_LEVELS), "info"),
  prettyLogs: optional(boolean(), false),
  pubInputsOffset: optional(pipe(number(), integer(), minValue(0)), DEFAULT_PUB_INPUTS_OFFSET),
  transcriptHash: optional(picklist(["sha256", "keccak256"]), "sha256"),
  /** `[x]_2` of the trusted setup, coordinates as `c0 + c1 * i`. */
  srsG2: optional(
    object({
      xC0: wordHex,
      xC1: wordHex,
      yC0: wordHex,
      yC1: wordHex,
    }),
  ),
});

export type VerifierConfig = InferOutput<typeof ConfigSchema>;

/** Explicit settings win over the environment; throws `ValiError` on bad input. */
export const loadConfig = (
  input: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env,
): VerifierConfig => parse(ConfigSchema, { logLevel: env.LOG_LEVEL, ...input });

export const srsG2FromConfig = (cfg: VerifierConfig): G2Point | undefined =>
  cfg.srsG2 && {
    x: { c0: BigInt(cfg.srsG2.xC0), c1: BigInt(cfg.srsG2.xC1) },
    y: { c0: BigInt(cfg.srsG2.yC0), c1: BigInt(cfg.srsG2.yC1) },
  };
