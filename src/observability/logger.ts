import { getRunContext } from "./runContext";

type LogLevel = "info" | "warn" | "error";

type LogFields = {
  runId?: string;
  customer?: string;
  durationMs?: number;
  [key: string]: unknown;
};

function buildPayload(level: LogLevel, event: string, fields: LogFields = {}): Record<string, unknown> {
  const context = getRunContext();
  const runId = fields.runId ?? context?.runId ?? "none";
  const customer = fields.customer ?? context?.customer;
  const { runId: _runId, customer: _customer, ...rest } = fields;

  const payload: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    event,
    runId,
  };
  if (customer !== undefined) {
    payload.customer = customer;
  }
  return { ...payload, ...rest };
}

function writeLog(level: LogLevel, event: string, fields?: LogFields): void {
  if (process.env.NODE_ENV === "test" && process.env.TEST_LOGGING !== "true") {
    return;
  }
  try {
    const output = JSON.stringify(buildPayload(level, event, fields));
    if (level === "error") {
      process.stderr.write(`${output}\n`);
    } else {
      process.stdout.write(`${output}\n`);
    }
  } catch {
    // Unserializable fields drop the line.
  }
}

export function logInfo(event: string, fields?: LogFields): void {
  writeLog("info", event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  writeLog("warn", event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  writeLog("error", event, fields);
}
