import { describe, expect, it } from "vitest";
import { InvalidParameterError } from "../errors";
import { SquareWaveGenerator, TriangleWaveGenerator } from "./dutyCycle";

describe("SquareWaveGenerator", () => {
  it("is high for the duty portion of each period", () => {
    const square = new SquareWaveGenerator({ freq: 1.0, dutyCycle: 0.5 });
    expect(square.sample(0.3)).toBe(1.0);
    expect(square.sample(0.3)).toBe(0.0);
    expect(square.sample(0.3)).toBe(0.0);
  });

  it("repeats every period", () => {
    const square = new SquareWaveGenerator({ period: 2, dutyCycle: 0.25 });
    const samples = [0.25, 0.25, 0.5, 1, 0.25, 0.25].map((dt) => square.sample(dt));
    // t = 0.25, 0.5, 1, 2, 2.25, 2.5
    expect(samples).toEqual([1, 0, 0, 1, 1, 0]);
  });

  it("defaults to a 50% duty cycle", () => {
    expect(new SquareWaveGenerator({ freq: 1 }).getDutyCycle()).toBe(0.5);
  });

  it("is always low at duty cycle 0 and always high at 1", () => {
    const off = new SquareWaveGenerator({ freq: 1, dutyCycle: 0 });
    const on = new SquareWaveGenerator({ freq: 1, dutyCycle: 1 });
    for (let i = 0; i < 8; i++) {
      expect(off.sample(0.125)).toBe(0);
      expect(on.sample(0.125)).toBe(1);
    }
  });

  it("rejects a duty cycle outside [0, 1]", () => {
    expect(() => new SquareWaveGenerator({ freq: 1, dutyCycle: 1.5 })).toThrow(
      "dutyCycle must be in range [0.0, 1.0]; got 1.5."
    );
    expect(() => new SquareWaveGenerator({ freq: 1, dutyCycle: -0.1 })).toThrow(
      InvalidParameterError
    );
  });

  it("keeps the old duty cycle when the setter rejects", () => {
    const square = new SquareWaveGenerator({ freq: 1, dutyCycle: 0.3 });
    expect(() => square.setDutyCycle(2)).toThrow(InvalidParameterError);
    expect(square.getDutyCycle()).toBe(0.3);

    square.setDutyCycle(0.8);
    expect(square.getDutyCycle()).toBe(0.8);
  });
});

describe("TriangleWaveGenerator", () => {
  it("ramps up across the duty portion and down across the rest", () => {
    const triangle = new TriangleWaveGenerator({ freq: 1, dutyCycle: 0.5 });
    const samples = [0.25, 0.25, 0.25, 0.25].map((dt) => triangle.sample(dt));
    expect(samples).toEqual([0.5, 1, 0.5, 0]);
  });

  it("uses duty-normalised fractions for an asymmetric wave", () => {
    const triangle = new TriangleWaveGenerator({ freq: 1, dutyCycle: 0.25 });
    // t = 0.125 -> 0.125 / 0.25; t = 0.625 -> 0.375 / 0.75
    expect(triangle.sample(0.125)).toBe(0.5);
    expect(triangle.sample(0.5)).toBe(0.5);
  });

  it("falls as a sawtooth at duty cycle 0", () => {
    const triangle = new TriangleWaveGenerator({ freq: 1, dutyCycle: 0 });
    expect(triangle.sample(0.25)).toBe(0.75);
    expect(triangle.sample(0.25)).toBe(0.5);
  });

  it("rises as a sawtooth at duty cycle 1", () => {
    const triangle = new TriangleWaveGenerator({ freq: 1, dutyCycle: 1 });
    expect(triangle.sample(0.25)).toBe(0.25);
    expect(triangle.sample(0.25)).toBe(0.5);
  });
});
