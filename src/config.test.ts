import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      streamPath: "/stream",
      maxSampleCount: 10_000,
    });
  });

  it("reads overrides from the environment", () => {
    expect(
      loadConfig({ PORT: "8080", STREAM_PATH: "/signals", MAX_SAMPLE_COUNT: "50" })
    ).toEqual({ port: 8080, streamPath: "/signals", maxSampleCount: 50 });
  });

  it("rejects malformed values", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow(
      'PORT must be a positive integer; got "eighty".'
    );
    expect(() => loadConfig({ MAX_SAMPLE_COUNT: "0" })).toThrow(
      'MAX_SAMPLE_COUNT must be a positive integer; got "0".'
    );
    expect(() => loadConfig({ STREAM_PATH: "stream" })).toThrow(
      'STREAM_PATH must start with "/"; got "stream".'
    );
  });
});
