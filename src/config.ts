export interface ServerConfig {
  port: number;
  streamPath: string;
  maxSampleCount: number;
}

function parsePositiveInt(
  raw: string | undefined,
  fallback: number,
  name: string
): number {
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer; got "${raw}".`);
  }
  return value;
}

/** Reads the host's settings from the environment (after dotenv has run). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const streamPath = env.STREAM_PATH || "/stream";
  if (!streamPath.startsWith("/")) {
    throw new Error(`STREAM_PATH must start with "/"; got "${streamPath}".`);
  }

  return {
    port: parsePositiveInt(env.PORT, 3000, "PORT"),
    streamPath,
    maxSampleCount: parsePositiveInt(env.MAX_SAMPLE_COUNT, 10_000, "MAX_SAMPLE_COUNT"),
  };
}
