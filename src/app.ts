import express, { type NextFunction, type Request, type Response } from "express";
import type { ServerConfig } from "./config";
import { InvalidParameterError } from "./errors";
import { createFilter, filterBlock } from "./filters";
import { createGenerator, takeSamples } from "./generators";
import {
  MessageFormatError,
  parseFilterRequest,
  parseGenerateRequest,
} from "./messages";

/** Errors raised by express.json() carry a `type` and an HTTP `status`. */
function isBodyParserError(
  err: unknown
): err is Error & { type: string; status: number } {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  );
}

export function createApp(config: ServerConfig): express.Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/filter", (req, res) => {
    const { filter: spec, dt, values } = parseFilterRequest(req.body);

    const filter = createFilter(spec);
    const outputs = filterBlock(filter, values, dt);

    console.log(`Filtered block - type=${spec.type}, length=${values.length}`);
    res.json({ outputs: Array.from(outputs) });
  });

  app.post("/generate", (req, res) => {
    const { generator: spec, dt, count } = parseGenerateRequest(req.body);
    if (count > config.maxSampleCount) {
      throw new InvalidParameterError(
        `count must be <= ${config.maxSampleCount}; got ${count}.`
      );
    }

    const generator = createGenerator(spec);
    const samples = takeSamples(generator, dt, count);

    console.log(`Generated samples - type=${spec.type}, count=${count}`);
    res.json({ samples });
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof InvalidParameterError || err instanceof MessageFormatError) {
      res.status(400).json({ error: err.message });
      return;
    }
    if (isBodyParserError(err)) {
      if (err.type === "entity.parse.failed") {
        res.status(400).json({ error: "Request body is not valid JSON." });
        return;
      }
      if (err.status >= 400 && err.status < 500) {
        res.status(err.status).json({ error: err.message });
        return;
      }
    }
    next(err);
  });

  return app;
}
