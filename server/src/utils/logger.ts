import env from "./env-vars";

// Differentiates between development and production. Tests are silent unless
// LOG_LEVEL asks for output.

const LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
type Level = (typeof LEVELS)[number];

const isDev = env.NODE_ENV !== "production";

const defaultLevel: Level =
  env.NODE_ENV === "test" ? "silent" : isDev ? "debug" : "info";
const threshold = LEVELS.indexOf(env.LOG_LEVEL ?? defaultLevel);

const enabled = (level: Level) => LEVELS.indexOf(level) >= threshold;

function format(level: string, ...args: unknown[]) {
  const time = new Date().toISOString();
  const processedArgs = args.map((arg) => {
    if (arg instanceof Error) {
      return arg.stack ?? `${arg.name}: ${arg.message}`;
    }
    if (typeof arg === "object" && arg !== null) {
      try {
        return JSON.stringify(arg);
      } catch {
        return String(arg);
      }
    }
    return String(arg);
  });
  return isDev
    ? `[${time}] [${level}]` + (processedArgs.length ? " " : "") + processedArgs.join(" ")
    : `[${level}]` + (processedArgs.length ? " " : "") + processedArgs.join(" ");
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (enabled("debug")) console.debug(format("DEBUG", ...args));
  },
  info: (...args: unknown[]) => {
    if (enabled("info")) console.info(format("INFO", ...args));
  },
  warn: (...args: unknown[]) => {
    if (enabled("warn")) console.warn(format("WARN", ...args));
  },
  error: (...args: unknown[]) => {
    if (enabled("error")) console.error(format("ERROR", ...args));
  },
};
