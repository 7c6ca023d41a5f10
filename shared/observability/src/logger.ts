import { logs, SeverityNumber, type AnyValueMap } from "@opentelemetry/api-logs";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogAttributes = Record<string, string | number | boolean | undefined>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SEVERITY: Record<LogLevel, SeverityNumber> = {
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
};

function resolveLevel(raw: string | undefined): LogLevel {
  const value = raw?.toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

const LOGGER_NAME = process.env.OTEL_SERVICE_NAME || "acl-cache";

function toAttributeMap(attrs?: LogAttributes): AnyValueMap {
  const out: AnyValueMap = {};
  if (!attrs) return out;
  for (const [k, v] of Object.entries(attrs)) {
    if (v !== undefined) out[k] = v;
  }
  return out;
}

function emit(level: LogLevel, message: string, attrs?: LogAttributes): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveLevel(process.env.LOG_LEVEL)]) return;

  // Resolved per call: the host may register its LoggerProvider after import.
  // Without one the OTel API is a no-op and only the console line remains.
  logs.getLogger(LOGGER_NAME).emit({
    severityNumber: SEVERITY[level],
    severityText: level.toUpperCase(),
    body: message,
    attributes: toAttributeMap(attrs),
  });

  const line = attrs && Object.keys(attrs).length > 0
    ? `[${level.toUpperCase()}] ${message} ${JSON.stringify(attrs)}`
    : `[${level.toUpperCase()}] ${message}`;

  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export const logger = {
  debug: (message: string, attrs?: LogAttributes) => emit("debug", message, attrs),
  info: (message: string, attrs?: LogAttributes) => emit("info", message, attrs),
  warn: (message: string, attrs?: LogAttributes) => emit("warn", message, attrs),
  error: (message: string, attrs?: LogAttributes) => emit("error", message, attrs),
};
