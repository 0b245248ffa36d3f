import pino, { type LevelWithSilent, type Logger } from "pino";

export type Reporter = Pick<Logger, "debug" | "info" | "warn" | "error">;

export const allowedLevels: LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export const resolveLevel = (value: string | undefined): LevelWithSilent => {
  const match = allowedLevels.find((level) => level === value);
  return match ?? "info";
};

let cached: Logger | null = null;
let loggerLevel: LevelWithSilent = resolveLevel(process.env.BOOKPRESS_LOG_LEVEL);
let logFile: string | null = null;

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Also write a debug-level log to this file. Only honoured before the logger is first used. */
  logFile?: string;
}

export const configureLogger = (options: LoggerOptions = {}) => {
  if (options.level) {
    loggerLevel = options.level;
    if (cached && !logFile) {
      cached.level = options.level;
    }
  }
  if (options.logFile && !cached) {
    logFile = options.logFile;
  }
};

const createLogger = (): Logger => {
  if (!logFile) {
    return pino({ level: loggerLevel });
  }
  const consoleLevel = loggerLevel;
  const streams = pino.multistream([
    ...(consoleLevel === "silent" ? [] : [{ level: consoleLevel, stream: process.stdout }]),
    { level: "debug" as const, stream: pino.destination({ dest: logFile, sync: true, mkdir: true, append: false }) },
  ]);
  return pino({ level: "trace" }, streams);
};

export const getLogger = (): Logger => {
  if (cached) return cached;
  cached = createLogger();
  return cached;
};
