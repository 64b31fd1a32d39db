import { InvalidParameterError } from "../errors";
import { PeriodicSignalGenerator } from "./periodic";
import type { DutyCycleOptions } from "./types";

function checkDutyCycle(dutyCycle: number): void {
  if (!(dutyCycle >= 0 && dutyCycle <= 1)) {
    throw new InvalidParameterError(
      `dutyCycle must be in range [0.0, 1.0]; got ${dutyCycle}.`
    );
  }
}

export abstract class DutyCycleSignalGenerator extends PeriodicSignalGenerator {
  private dutyCycle: number;

  constructor(options: DutyCycleOptions) {
    super(options);

    const dutyCycle = options.dutyCycle ?? 0.5;
    checkDutyCycle(dutyCycle);
    this.dutyCycle = dutyCycle;
  }

  getDutyCycle(): number {
    return this.dutyCycle;
  }

  setDutyCycle(dutyCycle: number): void {
    checkDutyCycle(dutyCycle);
    this.dutyCycle = dutyCycle;
  }

  /** Position inside the current period, in [0, 1). */
  protected periodFraction(): number {
    const period = this.getPeriod();
    return (this.t % period) / period;
  }

  protected inDutyCycle(): boolean {
    return this.periodFraction() < this.dutyCycle;
  }
}

/** Outputs 1.0 during the duty portion of each period and 0.0 otherwise. */
export class SquareWaveGenerator extends DutyCycleSignalGenerator {
  readonly kind = "square";

  protected valueAt(): number {
    return this.inDutyCycle() ? 1.0 : 0.0;
  }
}

/**
 * Ramps 0 → 1 across the duty portion of each period, then 1 → 0 across
 * the rest. A duty cycle of 0 gives a falling sawtooth, 1 a rising one.
 */
export class TriangleWaveGenerator extends DutyCycleSignalGenerator {
  readonly kind = "triangle";

  protected valueAt(): number {
    const fraction = this.periodFraction();
    const dutyCycle = this.getDutyCycle();

    // Only the branch that is taken divides, so neither 0 nor 1 hits zero.
    if (fraction < dutyCycle) {
      return fraction / dutyCycle;
    }
    return (1 - fraction) / (1 - dutyCycle);
  }
}
