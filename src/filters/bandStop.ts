import { HighPassFilter, LowPassFilter } from "./singlePole";
import type { BandStopState, Filter } from "./types";
import { checkCutoffFreqs } from "./validation";

/**
 * Attenuates the band between the two cutoff frequencies.
 *
 * A low-pass at the low cutoff and a high-pass at the high cutoff both see
 * the raw input; the result is the sum of their outputs.
 *
 * ```
 *   gain
 *   1|--------\           /--------
 *    |        .\         /.
 *   0|________.__\_____/__.________ freq
 *   lowCutoffFreq^       ^highCutoffFreq
 * ```
 */
export class BandStopFilter implements Filter {
  readonly kind = "bandStop";
  private readonly lowPass: LowPassFilter;
  private readonly highPass: HighPassFilter;

  constructor(
    lowCutoffFreq: number,
    highCutoffFreq: number,
    initValue: number = 0
  ) {
    checkCutoffFreqs(lowCutoffFreq, highCutoffFreq);

    this.lowPass = new LowPassFilter(lowCutoffFreq, initValue);
    this.highPass = new HighPassFilter(highCutoffFreq, initValue);
  }

  getLowCutoffFreq(): number {
    return this.lowPass.getCutoffFreq();
  }

  getHighCutoffFreq(): number {
    return this.highPass.getCutoffFreq();
  }

  setCutoffFreqs(lowCutoffFreq: number, highCutoffFreq: number): void {
    checkCutoffFreqs(lowCutoffFreq, highCutoffFreq);

    this.lowPass.setCutoffFreq(lowCutoffFreq);
    this.highPass.setCutoffFreq(highCutoffFreq);
  }

  getState(): BandStopState {
    return {
      lowPass: this.lowPass.getState(),
      highPass: this.highPass.getState(),
    };
  }

  filter(value: number, dt: number): number {
    const lpOutput = this.lowPass.filter(value, dt);
    const hpOutput = this.highPass.filter(value, dt);
    return lpOutput + hpOutput;
  }
}
