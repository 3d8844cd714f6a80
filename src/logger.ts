type LogLevel = "debug" | "info" | "warn" | "error";

const levelOrder: Record<LogLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levelOrder;
}

const envLevel = (process.env.LOG_LEVEL ?? "info").toLowerCase();
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

const shouldLog = (level: LogLevel): boolean =>
  levelOrder[level] >= levelOrder[currentLevel];

// Error instances lose their fields under JSON.stringify
function serialize(meta?: Record<string, unknown>): Record<string, unknown> {
  if (!meta) return {};
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] =
      value instanceof Error
        ? { name: value.name, message: value.message, stack: value.stack }
        : value;
  }
  return out;
}

const log = (
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
): void => {
  if (!shouldLog(level)) return;
  const line = JSON.stringify({
    level,
    time: new Date().toISOString(),
    msg: message,
    ...serialize(meta),
  });
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log("debug", msg, meta),
  info: (msg: string, meta?: Record<string, unknown>) => log("info", msg, meta),
  warn: (msg: string, meta?: Record<string, unknown>) => log("warn", msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log("error", msg, meta),
};
