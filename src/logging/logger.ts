import { Logger, type ILogObj } from "tslog";

const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

export type LogFormat = "pretty" | "json" | "hidden";

/** The subset of a tslog logger the renaming engine writes to. */
export type SubsystemLogger = Pick<Logger<ILogObj>, "debug" | "info" | "warn" | "error">;

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.MEDIA_RENAMER_LOG_LEVEL?.trim().toLowerCase();
  const index = LOG_LEVELS.findIndex((level) => level === raw);
  return index === -1 ? LOG_LEVELS.indexOf("info") : index;
}

export function resolveLogFormat(env: NodeJS.ProcessEnv = process.env): LogFormat {
  const raw = env.MEDIA_RENAMER_LOG_FORMAT?.trim().toLowerCase();
  if (raw === "json" || raw === "hidden") {
    return raw;
  }
  return "pretty";
}

const rootLogger = new Logger<ILogObj>({
  name: "media-renamer",
  minLevel: resolveLogLevel(),
  type: resolveLogFormat(),
});

export function createSubsystemLogger(name: string): Logger<ILogObj> {
  return rootLogger.getSubLogger({ name });
}
