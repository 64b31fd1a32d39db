import { InvalidParameterError } from "../errors";

export function checkCutoffFreq(cutoffFreq: number, name = "cutoffFreq"): void {
  if (Number.isNaN(cutoffFreq) || cutoffFreq < 0) {
    throw new InvalidParameterError(`${name} must be >= 0; got ${cutoffFreq}.`);
  }
  // alpha is NaN at an infinite cutoff
  if (cutoffFreq === Number.POSITIVE_INFINITY) {
    throw new InvalidParameterError(`${name} must be finite.`);
  }
}

export function checkCutoffFreqs(
  lowCutoffFreq: number,
  highCutoffFreq: number
): void {
  checkCutoffFreq(lowCutoffFreq, "lowCutoffFreq");
  checkCutoffFreq(highCutoffFreq, "highCutoffFreq");

  if (lowCutoffFreq > highCutoffFreq) {
    throw new InvalidParameterError(
      `lowCutoffFreq (${lowCutoffFreq}) cannot be higher than highCutoffFreq (${highCutoffFreq}).`
    );
  }
}

/**
 * The timestep is supplied by the caller on every tick, so it is checked on
 * every tick. Zero is allowed: both alpha formulas stay finite at dt = 0.
 */
export function checkTimestep(dt: number): void {
  if (!Number.isFinite(dt) || dt < 0) {
    throw new InvalidParameterError(`dt must be a finite number >= 0; got ${dt}.`);
  }
}
