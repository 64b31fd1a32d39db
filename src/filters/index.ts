export { computeAlphaHighPass, computeAlphaLowPass, HighPassFilter, LowPassFilter } from "./singlePole";
export { BandPassFilter } from "./bandPass";
export { BandStopFilter } from "./bandStop";
export { createFilter, filterBlock, type AnyFilter } from "./factory";
export { checkCutoffFreq, checkCutoffFreqs, checkTimestep } from "./validation";
export type {
  BandPassState,
  BandStopState,
  DualCutoffFilterSpec,
  Filter,
  FilterKind,
  FilterSpec,
  HighPassState,
  LowPassState,
  SingleCutoffFilterSpec,
} from "./types";
