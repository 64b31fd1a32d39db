import { InvalidParameterError } from "../errors";
import type { SignalGenerator } from "./types";

function checkSampleCount(count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidParameterError(
      `sample count must be a non-negative integer; got ${count}.`
    );
  }
}

export function* sampleForever(
  generator: SignalGenerator,
  dt: number
): Generator<number, never, undefined> {
  while (true) {
    yield generator.sample(dt);
  }
}

export function* sampleCount(
  generator: SignalGenerator,
  dt: number,
  count: number
): Generator<number, void, undefined> {
  for (let i = 0; i < count; i++) {
    yield generator.sample(dt);
  }
}

/**
 * Lazily draws samples at a fixed timestep. Without `count` the sequence
 * never ends; with it, exactly `count` samples are produced.
 *
 * Nothing is sampled until the sequence is consumed, and every value
 * advances the generator.
 */
export function sampleIter(generator: SignalGenerator, dt: number): Iterable<number>;
export function sampleIter(
  generator: SignalGenerator,
  dt: number,
  count: number
): Iterable<number>;
export function sampleIter(
  generator: SignalGenerator,
  dt: number,
  count?: number
): Iterable<number> {
  if (count === undefined) {
    return sampleForever(generator, dt);
  }
  checkSampleCount(count);
  return sampleCount(generator, dt, count);
}

export function takeSamples(
  generator: SignalGenerator,
  dt: number,
  count: number
): number[] {
  return Array.from(sampleIter(generator, dt, count));
}
