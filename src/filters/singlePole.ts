import type { Filter, HighPassState, LowPassState } from "./types";
import { checkCutoffFreq, checkTimestep } from "./validation";

export function computeAlphaLowPass(cutoffFreq: number, dt: number): number {
  const a = 2 * Math.PI * dt * cutoffFreq;
  return a / (a + 1);
}

export function computeAlphaHighPass(cutoffFreq: number, dt: number): number {
  return 1 / (2 * Math.PI * dt * cutoffFreq + 1);
}

/**
 * Passes signals below the cutoff frequency and attenuates those above it,
 * the further above the more. Also known as an exponential moving average.
 *
 * Useful for smoothing a noisy sensor (accelerometer, range finder) into a
 * slower-moving reading.
 *
 * ```
 *   gain
 *   1|-------\
 *    |       .\
 *   0|_______.__\_______ freq
 *            ^cutoffFreq
 * ```
 */
export class LowPassFilter implements Filter {
  readonly kind = "lowPass";
  private cutoffFreq: number;
  private prevOutput: number;

  constructor(cutoffFreq: number, initValue: number = 0) {
    checkCutoffFreq(cutoffFreq);
    this.cutoffFreq = cutoffFreq;
    this.prevOutput = initValue;
  }

  getCutoffFreq(): number {
    return this.cutoffFreq;
  }

  setCutoffFreq(cutoffFreq: number): void {
    checkCutoffFreq(cutoffFreq);
    this.cutoffFreq = cutoffFreq;
  }

  getState(): LowPassState {
    return { prevOutput: this.prevOutput };
  }

  filter(value: number, dt: number): number {
    checkTimestep(dt);

    const alpha = computeAlphaLowPass(this.cutoffFreq, dt);
    const output = alpha * value + (1 - alpha) * this.prevOutput;
    this.prevOutput = output;
    return output;
  }
}

/**
 * Passes signals above the cutoff frequency and attenuates those below it.
 *
 * Useful for removing a slowly drifting bias, e.g. from a gyroscope, while
 * keeping the fast-moving part of the reading.
 *
 * ```
 *   gain
 *   1|          /-------
 *    |         /.
 *   0|_______/__._______ freq
 *               ^cutoffFreq
 * ```
 */
export class HighPassFilter implements Filter {
  readonly kind = "highPass";
  private cutoffFreq: number;
  private prevValue: number;
  private prevOutput: number;

  constructor(cutoffFreq: number, initValue: number = 0) {
    checkCutoffFreq(cutoffFreq);
    this.cutoffFreq = cutoffFreq;
    this.prevValue = initValue;
    this.prevOutput = initValue;
  }

  getCutoffFreq(): number {
    return this.cutoffFreq;
  }

  setCutoffFreq(cutoffFreq: number): void {
    checkCutoffFreq(cutoffFreq);
    this.cutoffFreq = cutoffFreq;
  }

  getState(): HighPassState {
    return { prevValue: this.prevValue, prevOutput: this.prevOutput };
  }

  filter(value: number, dt: number): number {
    checkTimestep(dt);

    const dValue = value - this.prevValue;
    this.prevValue = value;

    const alpha = computeAlphaHighPass(this.cutoffFreq, dt);
    const output = alpha * (this.prevOutput + dValue);
    this.prevOutput = output;
    return output;
  }
}
