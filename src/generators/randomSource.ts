import { randomBytes } from "node:crypto";
import { InvalidParameterError } from "../errors";
import type { Randomness, RandomSource } from "./types";

/** Box-Muller transform over any uniform source. */
export function gaussianFrom(next: () => number): number {
  const u1 = 1 - next(); // (0, 1], keeps log() finite
  const u2 = next();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

export function checkSeed(seed: number): void {
  if (!Number.isSafeInteger(seed)) {
    throw new InvalidParameterError(`seed must be an integer; got ${seed}.`);
  }
}

// murmur3 finalizer: neighbouring inputs land far apart
function mix32(x: number): number {
  x = Math.imul(x ^ (x >>> 16), 0x85ebca6b);
  x = Math.imul(x ^ (x >>> 13), 0xc2b2ae35);
  return (x ^ (x >>> 16)) | 0;
}

function rotl(x: number, k: number): number {
  return (x << k) | (x >>> (32 - k));
}

/**
 * Deterministic xoshiro128** stream; the same seed replays the same values.
 * The four state words are drawn from a splitmix32 walk over the whole seed,
 * including the bits above 2^32.
 */
export class PseudoRandomSource implements RandomSource {
  private readonly s = new Int32Array(4);

  constructor(seed: number = Date.now()) {
    checkSeed(seed);

    let z = (seed >>> 0) ^ mix32(Math.floor(seed / 0x100000000) | 0);
    for (let i = 0; i < 4; i++) {
      z = (z + 0x9e3779b9) | 0;
      this.s[i] = mix32(z);
    }
    if (this.s.every((word) => word === 0)) this.s[0] = 1;
  }

  next(): number {
    const s = this.s;
    const result = Math.imul(rotl(Math.imul(s[1], 5), 7), 9);
    const t = s[1] << 9;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];
    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return (result >>> 0) / 0x100000000;
  }

  nextGaussian(): number {
    return gaussianFrom(() => this.next());
  }
}

/** Operating-system entropy; cannot be seeded. */
export class TrueRandomSource implements RandomSource {
  next(): number {
    return randomBytes(4).readUInt32LE(0) / 0x100000000;
  }

  nextGaussian(): number {
    return gaussianFrom(() => this.next());
  }
}

export function isRandomness(value: unknown): value is Randomness {
  return value === "pseudo" || value === "true";
}

export function createRandomSource(
  randomness: Randomness = "pseudo",
  seed?: number
): RandomSource {
  if (seed !== undefined) checkSeed(seed);

  switch (randomness) {
    case "pseudo":
      return new PseudoRandomSource(seed);
    case "true":
      return new TrueRandomSource();
    default:
      throw new InvalidParameterError(
        `randomness must be either "pseudo" or "true"; got ${JSON.stringify(randomness)}.`
      );
  }
}
