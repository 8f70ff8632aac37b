export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(LEVELS, value);

const readLevel = (): LogLevel => {
  const raw = process.env.EN2VAULT_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : "warn";
};

let currentLevel: LogLevel = readLevel();

const enabled = (level: LogLevel) => LEVELS[level] >= LEVELS[currentLevel];

export const setLogLevel = (level: LogLevel) => {
  currentLevel = level;
};

export const logError = (context: string, error: unknown) => {
  if (!enabled("error")) return;
  console.error(context, error);
};

export const logWarn = (context: string, detail?: unknown) => {
  if (!enabled("warn")) return;
  if (detail === undefined) console.warn(context);
  else console.warn(context, detail);
};

export const logInfo = (context: string, detail?: unknown) => {
  if (!enabled("info")) return;
  if (detail === undefined) console.info(context);
  else console.info(context, detail);
};

export const logDebug = (context: string, detail?: unknown) => {
  if (!enabled("debug")) return;
  console.debug(context, detail ?? "");
};
