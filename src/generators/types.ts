export type GeneratorKind =
  | "sine"
  | "square"
  | "triangle"
  | "uniform"
  | "gaussian";

export interface SignalGenerator {
  readonly kind: GeneratorKind;
  sample(dt: number): number;
}

/** Exactly one of `freq` or `period` must be given. */
export interface PeriodicOptions {
  freq?: number;
  period?: number;
}

export interface DutyCycleOptions extends PeriodicOptions {
  /** Fraction of each period spent in the "on" part. Defaults to 0.5. */
  dutyCycle?: number;
}

export type Randomness = "pseudo" | "true";

export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
  /** Standard normal (mean 0, standard deviation 1). */
  nextGaussian(): number;
}

export interface RandomOptions {
  /** Only used by the "pseudo" source. */
  seed?: number;
  randomness?: Randomness;
  /** Overrides `seed` and `randomness`. */
  source?: RandomSource;
}

export interface UniformOptions extends RandomOptions {
  low?: number;
  high?: number;
}

export interface GaussianOptions extends RandomOptions {
  mean?: number;
  stdDev?: number;
}

export type GeneratorSpec =
  | ({ type: "sine" } & PeriodicOptions)
  | ({ type: "square" | "triangle" } & DutyCycleOptions)
  | ({ type: "uniform" } & Omit<UniformOptions, "source">)
  | ({ type: "gaussian" } & Omit<GaussianOptions, "source">);
