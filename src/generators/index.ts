export { PeriodicSignalGenerator, SineWaveGenerator } from "./periodic";
export {
  DutyCycleSignalGenerator,
  SquareWaveGenerator,
  TriangleWaveGenerator,
} from "./dutyCycle";
export {
  GaussianRandomSignalGenerator,
  UniformRandomSignalGenerator,
} from "./random";
export {
  createRandomSource,
  gaussianFrom,
  isRandomness,
  PseudoRandomSource,
  TrueRandomSource,
} from "./randomSource";
export { sampleCount, sampleForever, sampleIter, takeSamples } from "./sampleIter";
export { createGenerator, type AnyGenerator } from "./factory";
export type {
  DutyCycleOptions,
  GaussianOptions,
  GeneratorKind,
  GeneratorSpec,
  PeriodicOptions,
  Randomness,
  RandomOptions,
  RandomSource,
  SignalGenerator,
  UniformOptions,
} from "./types";
