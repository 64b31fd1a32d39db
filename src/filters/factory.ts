import { BandPassFilter } from "./bandPass";
import { BandStopFilter } from "./bandStop";
import { HighPassFilter, LowPassFilter } from "./singlePole";
import type { Filter, FilterSpec } from "./types";
import { checkTimestep } from "./validation";

export type AnyFilter =
  | LowPassFilter
  | HighPassFilter
  | BandPassFilter
  | BandStopFilter;

export function createFilter(spec: FilterSpec): AnyFilter {
  switch (spec.type) {
    case "lowPass":
      return new LowPassFilter(spec.cutoffFreq, spec.initValue);
    case "highPass":
      return new HighPassFilter(spec.cutoffFreq, spec.initValue);
    case "bandPass":
      return new BandPassFilter(
        spec.lowCutoffFreq,
        spec.highCutoffFreq,
        spec.initValue
      );
    case "bandStop":
      return new BandStopFilter(
        spec.lowCutoffFreq,
        spec.highCutoffFreq,
        spec.initValue
      );
  }
}

/**
 * Runs a block of samples through `filter` at a fixed timestep. The filter
 * keeps its state, so consecutive blocks join up seamlessly.
 */
export function filterBlock(
  filter: Filter,
  values: ArrayLike<number>,
  dt: number
): Float64Array {
  checkTimestep(dt);

  const filtered = new Float64Array(values.length);
  for (let i = 0; i < values.length; i++) {
    filtered[i] = filter.filter(values[i], dt);
  }
  return filtered;
}
