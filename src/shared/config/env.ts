export type Env = {
  MONGO_URI: string;
  MONGO_DB: string;
  REDIS_URL: string;
  SCAN_QUEUE_NAME: string;
  PORT: number;
};

const validateUrlScheme = (name: string, value: string, schemes: string[]): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute URL. Received: ${value}`);
  }

  if (!schemes.includes(parsed.protocol)) {
    throw new Error(`${name} must use one of ${schemes.join(", ")} schemes. Received: ${value}`);
  }

  return value;
};

const parsePort = (raw: string | undefined): number => {
  if (raw == null || raw.trim() === "") return 8080;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new Error(`PORT=${raw} is out of allowed range [0..65535]`);
  }
  return value;
};

const nonEmpty = (value: string | undefined, fallback: string): string =>
  value != null && value.trim() !== "" ? value.trim() : fallback;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = validateUrlScheme("MONGO_URI", env.MONGO_URI ?? "mongodb://localhost:27017/scans", [
    "mongodb:",
    "mongodb+srv:"
  ]);
  const REDIS_URL = validateUrlScheme("REDIS_URL", env.REDIS_URL ?? "redis://localhost:6379", ["redis:", "rediss:"]);

  return {
    MONGO_URI,
    MONGO_DB: nonEmpty(env.MONGO_DB, "scans"),
    REDIS_URL,
    SCAN_QUEUE_NAME: nonEmpty(env.SCAN_QUEUE_NAME, "scan_queue"),
    PORT: parsePort(env.PORT)
  };
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};
