import { InvalidParameterError } from "../errors";
import { checkTimestep } from "../filters/validation";
import type { GeneratorKind, PeriodicOptions, SignalGenerator } from "./types";

function checkFreq(freq: number, name = "freq"): void {
  if (!Number.isFinite(freq) || freq <= 0) {
    throw new InvalidParameterError(`${name} must be a finite number > 0; got ${freq}.`);
  }
}

function freqFromPeriod(period: number): number {
  checkFreq(period, "period");
  const freq = 1 / period;
  // subnormal periods overflow
  if (!Number.isFinite(freq)) {
    throw new InvalidParameterError(`period is too small to invert; got ${period}.`);
  }
  return freq;
}

/**
 * A signal that repeats every `period` seconds. Keeps its own clock, which
 * advances by `dt` on every `sample` call and is never rewound.
 */
export abstract class PeriodicSignalGenerator implements SignalGenerator {
  abstract readonly kind: GeneratorKind;
  protected freq: number;
  protected t = 0;

  constructor(options: PeriodicOptions) {
    const { freq, period } = options;

    if (freq !== undefined && period !== undefined) {
      throw new InvalidParameterError(
        "Only one of freq or period should be given, not both."
      );
    }

    if (freq !== undefined) {
      checkFreq(freq);
      this.freq = freq;
    } else if (period !== undefined) {
      this.freq = freqFromPeriod(period);
    } else {
      throw new InvalidParameterError("Either freq or period must be given.");
    }
  }

  getFreq(): number {
    return this.freq;
  }

  setFreq(freq: number): void {
    checkFreq(freq);
    this.freq = freq;
  }

  getPeriod(): number {
    return 1 / this.freq;
  }

  setPeriod(period: number): void {
    this.freq = freqFromPeriod(period);
  }

  /** Seconds accumulated since construction. */
  getTime(): number {
    return this.t;
  }

  sample(dt: number): number {
    checkTimestep(dt);
    this.t += dt;
    return this.valueAt();
  }

  protected abstract valueAt(): number;
}

export class SineWaveGenerator extends PeriodicSignalGenerator {
  readonly kind = "sine";

  protected valueAt(): number {
    return Math.sin(2 * Math.PI * this.freq * this.t);
  }
}
