/**
 * Session ID generation
 *
 * Ids are `<time>[.<seed>]<random>`: the current millisecond in a URL-safe
 * base-64 alphabet, a counter when several ids share a millisecond, and eight
 * random base64url characters. Within one process the time/seed prefix alone
 * never repeats.
 */

import { randomBytes } from "node:crypto";

const ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz-_";
const RANDOM_BYTES = 6;

export interface IdGeneratorOptions {
  now?: () => number;
  random?: (size: number) => Buffer;
}

/**
 * Encode a non-negative integer in the URL-safe alphabet, most significant digit first.
 */
export function encodeTime(value: number): string {
  let remaining = Math.floor(value);
  let encoded = "";
  do {
    encoded = ALPHABET[remaining % ALPHABET.length] + encoded;
    remaining = Math.floor(remaining / ALPHABET.length);
  } while (remaining > 0);
  return encoded;
}

export function createIdGenerator(options: IdGeneratorOptions = {}): () => string {
  const now = options.now ?? Date.now;
  const random = options.random ?? randomBytes;
  let previous = "";
  let seed = 0;

  return () => {
    const time = encodeTime(now());
    let prefix = time;
    if (time === previous) {
      prefix = `${time}.${encodeTime(++seed)}`;
    } else {
      previous = time;
      seed = 0;
    }
    return prefix + random(RANDOM_BYTES).toString("base64url");
  };
}
