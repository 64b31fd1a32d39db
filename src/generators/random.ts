import { InvalidParameterError } from "../errors";
import { createRandomSource } from "./randomSource";
import type {
  GaussianOptions,
  RandomOptions,
  RandomSource,
  SignalGenerator,
  UniformOptions,
} from "./types";

function resolveSource(options: RandomOptions): RandomSource {
  return options.source ?? createRandomSource(options.randomness, options.seed);
}

function checkRange(low: number, high: number): void {
  if (!Number.isFinite(low) || !Number.isFinite(high)) {
    throw new InvalidParameterError(`low and high must be finite; got ${low} and ${high}.`);
  }
  if (!(low < high)) {
    throw new InvalidParameterError(`low (${low}) must be less than high (${high}).`);
  }
}

function checkMean(mean: number): void {
  if (!Number.isFinite(mean)) {
    throw new InvalidParameterError(`mean must be a finite number; got ${mean}.`);
  }
}

function checkStdDev(stdDev: number): void {
  if (!Number.isFinite(stdDev) || stdDev < 0) {
    throw new InvalidParameterError(`stdDev must be a finite number >= 0; got ${stdDev}.`);
  }
}

/** Draws independently from [low, high) on every call; `dt` is ignored. */
export class UniformRandomSignalGenerator implements SignalGenerator {
  readonly kind = "uniform";
  private readonly source: RandomSource;
  private low: number;
  private high: number;

  constructor(options: UniformOptions = {}) {
    const low = options.low ?? 0.0;
    const high = options.high ?? 1.0;
    checkRange(low, high);

    this.source = resolveSource(options);
    this.low = low;
    this.high = high;
  }

  getLow(): number {
    return this.low;
  }

  getHigh(): number {
    return this.high;
  }

  setRange(low: number, high: number): void {
    checkRange(low, high);
    this.low = low;
    this.high = high;
  }

  sample(_dt: number): number {
    return this.low + (this.high - this.low) * this.source.next();
  }
}

/** Draws independently from N(mean, stdDev²) on every call; `dt` is ignored. */
export class GaussianRandomSignalGenerator implements SignalGenerator {
  readonly kind = "gaussian";
  private readonly source: RandomSource;
  private mean: number;
  private stdDev: number;

  constructor(options: GaussianOptions = {}) {
    const mean = options.mean ?? 0.0;
    const stdDev = options.stdDev ?? 1.0;
    checkMean(mean);
    checkStdDev(stdDev);

    this.source = resolveSource(options);
    this.mean = mean;
    this.stdDev = stdDev;
  }

  getMean(): number {
    return this.mean;
  }

  setMean(mean: number): void {
    checkMean(mean);
    this.mean = mean;
  }

  getStdDev(): number {
    return this.stdDev;
  }

  setStdDev(stdDev: number): void {
    checkStdDev(stdDev);
    this.stdDev = stdDev;
  }

  sample(_dt: number): number {
    return this.mean + this.stdDev * this.source.nextGaussian();
  }
}
