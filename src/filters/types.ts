export type FilterKind = "lowPass" | "highPass" | "bandPass" | "bandStop";

export interface Filter {
  readonly kind: FilterKind;
  filter(value: number, dt: number): number;
}

export interface SingleCutoffFilterSpec {
  type: "lowPass" | "highPass";
  cutoffFreq: number;
  initValue?: number;
}

export interface DualCutoffFilterSpec {
  type: "bandPass" | "bandStop";
  lowCutoffFreq: number;
  highCutoffFreq: number;
  initValue?: number;
}

/** Plain-data description of a filter, as accepted by `createFilter`. */
export type FilterSpec = SingleCutoffFilterSpec | DualCutoffFilterSpec;

export interface LowPassState {
  prevOutput: number;
}

export interface HighPassState {
  prevValue: number; // last raw input
  prevOutput: number;
}

export interface BandPassState {
  highPass: HighPassState;
  lowPass: LowPassState;
}

export interface BandStopState {
  lowPass: LowPassState;
  highPass: HighPassState;
}
