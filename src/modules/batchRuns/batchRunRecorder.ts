import type { SessionManager } from "../../db";
import { ConfigurationError, RecordingError, describeError } from "../../errors/AppError";
import { logError, logInfo } from "../../observability/logger";
import { getRunDurationMs, withRunContext } from "../../observability/runContext";
import { recordBatchRunFailure } from "./batchRuns.repo";
import type { RunMetadata } from "./batchRuns.types";

export type RunRecordingOptions = {
  /** Reporting sessions. Without them no audit row is attempted. */
  sessions?: SessionManager | null;
  customer?: string;
  now?: () => Date;
};

function assertMetadata(metadata: RunMetadata): void {
  const missing: string[] = [];
  if (!metadata.runId.trim()) missing.push("runId");
  if (!metadata.model.trim()) missing.push("model");
  if (Number.isNaN(metadata.startTime.getTime())) missing.push("startTime");
  if (missing.length > 0) {
    throw new ConfigurationError(`Run metadata incomplete: ${missing.join(", ")}`);
  }
}

async function recordFailure(
  sessions: SessionManager,
  metadata: RunMetadata,
  cause: unknown,
  endTime: Date
): Promise<void> {
  try {
    await sessions.withUnitOfWork((client) =>
      recordBatchRunFailure({ client, metadata, endTime, errorCode: describeError(cause) })
    );
  } catch (error) {
    const recordingError = new RecordingError(`Failure of run ${metadata.runId} could not be recorded.`, {
      cause: error,
    });
    logError("batch_run_failure_recording_failed", {
      error: recordingError.message,
      cause: describeError(error),
      originalError: describeError(cause),
    });
  }
}

/**
 * Runs `job` and guarantees a failed run leaves an audit row when reporting is configured.
 *
 * The job's result is returned unchanged; the success row is the caller's to write. When the job
 * throws, one unit of work records `success=false` with the stringified error, and the original
 * error is rethrown even if that write fails. With `reportingRequired` and no sessions the job is
 * refused up front with a {@link ConfigurationError}.
 */
export async function withRunRecording<T>(
  metadata: RunMetadata,
  job: () => Promise<T>,
  options: RunRecordingOptions = {}
): Promise<T> {
  assertMetadata(metadata);
  const sessions = options.sessions ?? null;
  if (metadata.reportingRequired && !sessions) {
    throw new ConfigurationError(
      `Run ${metadata.runId} requires reporting but no database configuration was provided.`
    );
  }
  const now = options.now ?? (() => new Date());

  return withRunContext(
    { runId: metadata.runId, customer: options.customer, startTime: metadata.startTime.getTime() },
    async () => {
      try {
        return await job();
      } catch (error) {
        const endTime = now();
        logError("batch_run_failed", {
          model: metadata.model,
          error: describeError(error),
          durationMs: getRunDurationMs(endTime.getTime()),
        });
        if (sessions) {
          await recordFailure(sessions, metadata, error, endTime);
        } else {
          logInfo("batch_run_failure_not_recorded", { reason: "reporting_not_configured" });
        }
        throw error;
      }
    }
  );
}
