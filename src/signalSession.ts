import { InvalidParameterError } from "./errors";
import { createFilter, type AnyFilter } from "./filters";
import { createGenerator, type AnyGenerator } from "./generators";
import type {
  ClientMessage,
  RetuneMessage,
  ServerMessage,
  TuneMessage,
} from "./messages";

/**
 * Per-connection state: at most one filter and one generator, driven one
 * tick at a time by the peer. Sessions never share instances.
 */
export class SignalSession {
  private filter: AnyFilter | null = null;
  private generator: AnyGenerator | null = null;
  private sequenceNumber = 0;

  getFilter(): AnyFilter | null {
    return this.filter;
  }

  getGenerator(): AnyGenerator | null {
    return this.generator;
  }

  /**
   * Applies one message and returns the reply. Throws InvalidParameterError
   * when the message is rejected; the session is left as it was.
   */
  handle(message: Exclude<ClientMessage, { event: "stop" }>): ServerMessage {
    switch (message.event) {
      case "configure": {
        // Build both before replacing either
        const filter = message.filter ? createFilter(message.filter) : this.filter;
        const generator = message.generator
          ? createGenerator(message.generator)
          : this.generator;
        this.filter = filter;
        this.generator = generator;
        return {
          event: "configured",
          filter: filter?.kind ?? null,
          generator: generator?.kind ?? null,
        };
      }

      case "filter": {
        if (!this.filter) {
          throw new InvalidParameterError("No filter configured.");
        }
        const output = this.filter.filter(message.value, message.dt);
        return { event: "filtered", output, sequenceNumber: ++this.sequenceNumber };
      }

      case "sample": {
        if (!this.generator) {
          throw new InvalidParameterError("No generator configured.");
        }
        const value = this.generator.sample(message.dt);
        return { event: "sampled", value, sequenceNumber: ++this.sequenceNumber };
      }

      case "retune":
        this.retune(message);
        return { event: "retuned" };

      case "tune":
        this.tune(message);
        return { event: "tuned" };
    }
  }

  private retune(message: RetuneMessage): void {
    const filter = this.filter;
    if (!filter) {
      throw new InvalidParameterError("No filter configured.");
    }

    switch (filter.kind) {
      case "lowPass":
      case "highPass":
        if (message.cutoffFreq === undefined) {
          throw new InvalidParameterError(`${filter.kind} filters need cutoffFreq.`);
        }
        filter.setCutoffFreq(message.cutoffFreq);
        return;
      case "bandPass":
      case "bandStop":
        if (
          message.lowCutoffFreq === undefined ||
          message.highCutoffFreq === undefined
        ) {
          throw new InvalidParameterError(
            `${filter.kind} filters need lowCutoffFreq and highCutoffFreq.`
          );
        }
        filter.setCutoffFreqs(message.lowCutoffFreq, message.highCutoffFreq);
        return;
    }
  }

  private tune(message: TuneMessage): void {
    const generator = this.generator;
    if (!generator) {
      throw new InvalidParameterError("No generator configured.");
    }
    if (generator.kind === "uniform" || generator.kind === "gaussian") {
      throw new InvalidParameterError(`${generator.kind} generators cannot be tuned.`);
    }
    if (message.freq !== undefined && message.period !== undefined) {
      throw new InvalidParameterError(
        "Only one of freq or period should be given, not both."
      );
    }
    if (message.dutyCycle !== undefined && generator.kind === "sine") {
      throw new InvalidParameterError("sine generators have no duty cycle.");
    }

    // A rejected duty cycle must not leave the new freq behind.
    const previousFreq = generator.getFreq();
    if (message.freq !== undefined) generator.setFreq(message.freq);
    if (message.period !== undefined) generator.setPeriod(message.period);
    if (message.dutyCycle !== undefined && generator.kind !== "sine") {
      try {
        generator.setDutyCycle(message.dutyCycle);
      } catch (error) {
        generator.setFreq(previousFreq);
        throw error;
      }
    }
  }
}
