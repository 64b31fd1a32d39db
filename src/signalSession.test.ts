import { describe, expect, it } from "vitest";
import { InvalidParameterError } from "./errors";
import { BandPassFilter, LowPassFilter } from "./filters";
import { SquareWaveGenerator, TriangleWaveGenerator } from "./generators";
import { SignalSession } from "./signalSession";

describe("SignalSession", () => {
  it("reports what was configured", () => {
    const session = new SignalSession();
    expect(
      session.handle({
        event: "configure",
        filter: { type: "bandPass", lowCutoffFreq: 1, highCutoffFreq: 10 },
      })
    ).toEqual({ event: "configured", filter: "bandPass", generator: null });

    expect(
      session.handle({ event: "configure", generator: { type: "sine", freq: 2 } })
    ).toEqual({ event: "configured", filter: "bandPass", generator: "sine" });
  });

  it("filters ticks and numbers the replies", () => {
    const session = new SignalSession();
    session.handle({
      event: "configure",
      filter: { type: "lowPass", cutoffFreq: 0, initValue: 5 },
      generator: { type: "square", freq: 1 },
    });

    expect(session.handle({ event: "filter", value: 100, dt: 0.01 })).toEqual({
      event: "filtered",
      output: 5,
      sequenceNumber: 1,
    });
    expect(session.handle({ event: "sample", dt: 0.3 })).toEqual({
      event: "sampled",
      value: 1,
      sequenceNumber: 2,
    });
  });

  it("refuses ticks before anything is configured", () => {
    const session = new SignalSession();
    expect(() => session.handle({ event: "filter", value: 1, dt: 0.1 })).toThrow(
      "No filter configured."
    );
    expect(() => session.handle({ event: "sample", dt: 0.1 })).toThrow(
      "No generator configured."
    );
  });

  it("keeps the old instances when a configure is rejected", () => {
    const session = new SignalSession();
    session.handle({ event: "configure", filter: { type: "lowPass", cutoffFreq: 1 } });
    const filter = session.getFilter();

    expect(() =>
      session.handle({
        event: "configure",
        filter: { type: "highPass", cutoffFreq: 2 },
        generator: { type: "square", freq: 1, dutyCycle: 3 },
      })
    ).toThrow(InvalidParameterError);

    expect(session.getFilter()).toBe(filter);
    expect(session.getGenerator()).toBeNull();
  });

  it("retunes single-pole and band filters in place", () => {
    const session = new SignalSession();
    session.handle({ event: "configure", filter: { type: "lowPass", cutoffFreq: 1 } });
    expect(session.handle({ event: "retune", cutoffFreq: 4 })).toEqual({ event: "retuned" });

    const lowPass = session.getFilter();
    expect(lowPass).toBeInstanceOf(LowPassFilter);
    expect(lowPass instanceof LowPassFilter && lowPass.getCutoffFreq()).toBe(4);

    session.handle({
      event: "configure",
      filter: { type: "bandPass", lowCutoffFreq: 1, highCutoffFreq: 10 },
    });
    session.handle({ event: "retune", lowCutoffFreq: 2, highCutoffFreq: 20 });

    const bandPass = session.getFilter();
    expect(bandPass instanceof BandPassFilter && bandPass.getHighCutoffFreq()).toBe(20);
  });

  it("rejects a retune that does not fit the filter", () => {
    const session = new SignalSession();
    session.handle({
      event: "configure",
      filter: { type: "bandStop", lowCutoffFreq: 1, highCutoffFreq: 10 },
    });
    expect(() => session.handle({ event: "retune", cutoffFreq: 3 })).toThrow(
      "bandStop filters need lowCutoffFreq and highCutoffFreq."
    );
    expect(() =>
      session.handle({ event: "retune", lowCutoffFreq: 10, highCutoffFreq: 1 })
    ).toThrow(InvalidParameterError);
  });

  it("tunes periodic generators", () => {
    const session = new SignalSession();
    session.handle({ event: "configure", generator: { type: "square", freq: 1 } });
    session.handle({ event: "tune", period: 4, dutyCycle: 0.75 });

    const square = session.getGenerator();
    expect(square instanceof SquareWaveGenerator && square.getFreq()).toBe(0.25);
    expect(square instanceof SquareWaveGenerator && square.getDutyCycle()).toBe(0.75);
  });

  it("rolls back the frequency when the duty cycle is rejected", () => {
    const session = new SignalSession();
    session.handle({ event: "configure", generator: { type: "triangle", freq: 1 } });

    expect(() => session.handle({ event: "tune", freq: 8, dutyCycle: 2 })).toThrow(
      InvalidParameterError
    );

    const triangle = session.getGenerator();
    expect(triangle).toBeInstanceOf(TriangleWaveGenerator);
    expect(triangle instanceof TriangleWaveGenerator && triangle.getFreq()).toBe(1);
    expect(triangle instanceof TriangleWaveGenerator && triangle.getDutyCycle()).toBe(0.5);
  });

  it("refuses to tune random generators", () => {
    const session = new SignalSession();
    session.handle({ event: "configure", generator: { type: "uniform", seed: 1 } });
    expect(() => session.handle({ event: "tune", freq: 2 })).toThrow(
      "uniform generators cannot be tuned."
    );
  });
});
