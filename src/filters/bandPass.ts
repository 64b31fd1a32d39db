import { HighPassFilter, LowPassFilter } from "./singlePole";
import type { BandPassState, Filter } from "./types";
import { checkCutoffFreqs } from "./validation";

/**
 * Passes the band between the two cutoff frequencies.
 *
 * A high-pass tuned to the low cutoff feeds a low-pass tuned to the high
 * cutoff. The order is fixed.
 */
export class BandPassFilter implements Filter {
  readonly kind = "bandPass";
  private readonly highPass: HighPassFilter;
  private readonly lowPass: LowPassFilter;

  constructor(
    lowCutoffFreq: number,
    highCutoffFreq: number,
    initValue: number = 0
  ) {
    checkCutoffFreqs(lowCutoffFreq, highCutoffFreq);

    this.highPass = new HighPassFilter(lowCutoffFreq, initValue);
    this.lowPass = new LowPassFilter(highCutoffFreq, initValue);
  }

  getLowCutoffFreq(): number {
    return this.highPass.getCutoffFreq();
  }

  getHighCutoffFreq(): number {
    return this.lowPass.getCutoffFreq();
  }

  /** Retunes both stages in place; their recursive state is kept. */
  setCutoffFreqs(lowCutoffFreq: number, highCutoffFreq: number): void {
    checkCutoffFreqs(lowCutoffFreq, highCutoffFreq);

    this.highPass.setCutoffFreq(lowCutoffFreq);
    this.lowPass.setCutoffFreq(highCutoffFreq);
  }

  getState(): BandPassState {
    return {
      highPass: this.highPass.getState(),
      lowPass: this.lowPass.getState(),
    };
  }

  filter(value: number, dt: number): number {
    // High-pass first
    const hpOutput = this.highPass.filter(value, dt);

    // Then low-pass
    return this.lowPass.filter(hpOutput, dt);
  }
}
