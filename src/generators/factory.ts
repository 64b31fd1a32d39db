import { SquareWaveGenerator, TriangleWaveGenerator } from "./dutyCycle";
import { SineWaveGenerator } from "./periodic";
import {
  GaussianRandomSignalGenerator,
  UniformRandomSignalGenerator,
} from "./random";
import type { GeneratorSpec } from "./types";

export type AnyGenerator =
  | SineWaveGenerator
  | SquareWaveGenerator
  | TriangleWaveGenerator
  | UniformRandomSignalGenerator
  | GaussianRandomSignalGenerator;

export function createGenerator(spec: GeneratorSpec): AnyGenerator {
  switch (spec.type) {
    case "sine":
      return new SineWaveGenerator(spec);
    case "square":
      return new SquareWaveGenerator(spec);
    case "triangle":
      return new TriangleWaveGenerator(spec);
    case "uniform":
      return new UniformRandomSignalGenerator(spec);
    case "gaussian":
      return new GaussianRandomSignalGenerator(spec);
  }
}
