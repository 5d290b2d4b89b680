import { concat, fromString, toString } from "uint8arrays";
import { FIELD_BYTES } from "../core/constants";
import { wordToBytes } from "../crypto/field";

export type Hex = `0x${string}`;

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${toString(bytes, "base16")}`;

/** Accepts `0x`-prefixed or bare hex, either case. */
export const hexToBytes = (hex: string): Uint8Array => {
  const body = (hex.startsWith("0x") ? hex.slice(2) : hex).toLowerCase();
  if (body.length % 2 !== 0 || !/^[0-9a-f]*$/.test(body))
    throw new Error(`invalid hex string: ${hex}`);
  return fromString(body, "base16");
};

/** Splits a buffer into consecutive 32-byte words; the caller checks alignment. */
export const splitWords = (bytes: Uint8Array): Uint8Array[] => {
  const out: Uint8Array[] = [];
  for (let i = 0; i + FIELD_BYTES <= bytes.length; i += FIELD_BYTES)
    out.push(bytes.subarray(i, i + FIELD_BYTES));
  return out;
};

export const joinWords = (words: readonly bigint[]): Uint8Array =>
  concat(words.map(wordToBytes));
