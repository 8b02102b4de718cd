import pino from "pino";

// Structural subset of the pino logger; Fastify's `app.log` satisfies it too.
export type LogFn = (obj: object, msg?: string) => void;

export interface TrackerLogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  const v = env.LOG_LEVEL?.trim().toLowerCase();
  return LEVELS.find((l) => l === v) ?? "info";
}

// Passed to Fastify as `logger`, and to pino directly where there is no server.
export function loggerOptions(env: NodeJS.ProcessEnv = process.env): { level: string; name: string } {
  return { level: resolveLogLevel(env), name: "seasonwatch-tracker" };
}

export function createLogger(env: NodeJS.ProcessEnv = process.env, destination?: pino.DestinationStream): TrackerLogger {
  return destination ? pino(loggerOptions(env), destination) : pino(loggerOptions(env));
}

/** For command-line tools: stdout carries the tool's output, logs go to stderr. */
export function createCliLogger(
  env: NodeJS.ProcessEnv = process.env,
  destination: pino.DestinationStream = process.stderr
): TrackerLogger {
  return createLogger(env, destination);
}
