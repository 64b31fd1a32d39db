import { InvalidParameterError } from "./errors";
import type { FilterKind, FilterSpec } from "./filters";
import {
  isRandomness,
  type GeneratorKind,
  type GeneratorSpec,
  type Randomness,
} from "./generators";

/** A payload that is not shaped like any message we accept. */
export class MessageFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MessageFormatError";
  }
}

export interface ConfigureMessage {
  event: "configure";
  filter?: FilterSpec;
  generator?: GeneratorSpec;
}

export interface FilterMessage {
  event: "filter";
  value: number;
  dt: number;
}

export interface SampleMessage {
  event: "sample";
  dt: number;
}

/** `cutoffFreq` for single-pole filters, the pair for band filters. */
export interface RetuneMessage {
  event: "retune";
  cutoffFreq?: number;
  lowCutoffFreq?: number;
  highCutoffFreq?: number;
}

export interface TuneMessage {
  event: "tune";
  freq?: number;
  period?: number;
  dutyCycle?: number;
}

export interface StopMessage {
  event: "stop";
}

export type ClientMessage =
  | ConfigureMessage
  | FilterMessage
  | SampleMessage
  | RetuneMessage
  | TuneMessage
  | StopMessage;

export type ServerMessage =
  | {
      event: "configured";
      filter: FilterKind | null;
      generator: GeneratorKind | null;
    }
  | { event: "filtered"; output: number; sequenceNumber: number }
  | { event: "sampled"; value: number; sequenceNumber: number }
  | { event: "retuned" }
  | { event: "tuned" }
  | { event: "error"; message: string };

export interface FilterRequest {
  filter: FilterSpec;
  dt: number;
  values: number[];
}

export interface GenerateRequest {
  generator: GeneratorSpec;
  dt: number;
  count: number;
}

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, what: string): Fields {
  if (!isRecord(value)) {
    throw new MessageFormatError(`${what} must be an object.`);
  }
  return value;
}

function optionalNumber(fields: Fields, key: string): number | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number") {
    throw new MessageFormatError(`"${key}" must be a number.`);
  }
  return value;
}

function requireNumber(fields: Fields, key: string): number {
  const value = optionalNumber(fields, key);
  if (value === undefined) {
    throw new MessageFormatError(`"${key}" is required.`);
  }
  return value;
}

function requireNumberArray(fields: Fields, key: string): number[] {
  const value = fields[key];
  if (!Array.isArray(value)) {
    throw new MessageFormatError(`"${key}" must be an array of numbers.`);
  }

  const numbers: number[] = [];
  for (const item of value) {
    if (typeof item !== "number") {
      throw new MessageFormatError(`"${key}" must be an array of numbers.`);
    }
    numbers.push(item);
  }
  return numbers;
}

export function parseFilterSpec(value: unknown): FilterSpec {
  const fields = requireRecord(value, "filter");
  const { type } = fields;
  const initValue = optionalNumber(fields, "initValue");

  if (type === "lowPass" || type === "highPass") {
    return { type, cutoffFreq: requireNumber(fields, "cutoffFreq"), initValue };
  }
  if (type === "bandPass" || type === "bandStop") {
    return {
      type,
      lowCutoffFreq: requireNumber(fields, "lowCutoffFreq"),
      highCutoffFreq: requireNumber(fields, "highCutoffFreq"),
      initValue,
    };
  }
  throw new MessageFormatError(`Unknown filter type: ${JSON.stringify(type)}.`);
}

function parseRandomness(fields: Fields): Randomness | undefined {
  const { randomness } = fields;
  if (randomness === undefined || isRandomness(randomness)) {
    return randomness;
  }
  throw new InvalidParameterError(
    `randomness must be either "pseudo" or "true"; got ${JSON.stringify(randomness)}.`
  );
}

export function parseGeneratorSpec(value: unknown): GeneratorSpec {
  const fields = requireRecord(value, "generator");
  const { type } = fields;
  const freq = optionalNumber(fields, "freq");
  const period = optionalNumber(fields, "period");

  if (type === "sine") {
    return { type, freq, period };
  }
  if (type === "square" || type === "triangle") {
    return { type, freq, period, dutyCycle: optionalNumber(fields, "dutyCycle") };
  }
  if (type === "uniform") {
    return {
      type,
      low: optionalNumber(fields, "low"),
      high: optionalNumber(fields, "high"),
      seed: optionalNumber(fields, "seed"),
      randomness: parseRandomness(fields),
    };
  }
  if (type === "gaussian") {
    return {
      type,
      mean: optionalNumber(fields, "mean"),
      stdDev: optionalNumber(fields, "stdDev"),
      seed: optionalNumber(fields, "seed"),
      randomness: parseRandomness(fields),
    };
  }
  throw new MessageFormatError(`Unknown generator type: ${JSON.stringify(type)}.`);
}

export function parseClientMessage(raw: string): ClientMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MessageFormatError("Message is not valid JSON.");
  }

  const fields = requireRecord(parsed, "message");

  switch (fields.event) {
    case "configure": {
      if (fields.filter === undefined && fields.generator === undefined) {
        throw new MessageFormatError(
          "configure needs a filter, a generator, or both."
        );
      }
      return {
        event: "configure",
        filter:
          fields.filter === undefined ? undefined : parseFilterSpec(fields.filter),
        generator:
          fields.generator === undefined
            ? undefined
            : parseGeneratorSpec(fields.generator),
      };
    }
    case "filter":
      return {
        event: "filter",
        value: requireNumber(fields, "value"),
        dt: requireNumber(fields, "dt"),
      };
    case "sample":
      return { event: "sample", dt: requireNumber(fields, "dt") };
    case "retune":
      return {
        event: "retune",
        cutoffFreq: optionalNumber(fields, "cutoffFreq"),
        lowCutoffFreq: optionalNumber(fields, "lowCutoffFreq"),
        highCutoffFreq: optionalNumber(fields, "highCutoffFreq"),
      };
    case "tune":
      return {
        event: "tune",
        freq: optionalNumber(fields, "freq"),
        period: optionalNumber(fields, "period"),
        dutyCycle: optionalNumber(fields, "dutyCycle"),
      };
    case "stop":
      return { event: "stop" };
    default:
      throw new MessageFormatError(
        `Unhandled event type: ${JSON.stringify(fields.event)}.`
      );
  }
}

export function parseFilterRequest(body: unknown): FilterRequest {
  const fields = requireRecord(body, "request body");
  return {
    filter: parseFilterSpec(fields.filter),
    dt: requireNumber(fields, "dt"),
    values: requireNumberArray(fields, "values"),
  };
}

export function parseGenerateRequest(body: unknown): GenerateRequest {
  const fields = requireRecord(body, "request body");
  return {
    generator: parseGeneratorSpec(fields.generator),
    dt: requireNumber(fields, "dt"),
    count: requireNumber(fields, "count"),
  };
}
