import path from "path";
import type { Queryable } from "../../db";
import type { BatchRunRecord, RunMetadata } from "./batchRuns.types";

/**
 * Model identifier stored with a run: the file name of the weights it loaded.
 */
export function modelIdentifier(weightsPath: string): string {
  return path.basename(weightsPath);
}

async function insertBatchRun(params: {
  client: Queryable;
  runId: string;
  startTime: Date;
  endTime: Date;
  model: string;
  success: boolean;
  errorCode: string | null;
}): Promise<void> {
  await params.client.query(
    `insert into batch_run_information (run_id, start_time, end_time, model, success, error_code)
     values ($1, $2, $3, $4, $5, $6)`,
    [
      params.runId,
      params.startTime.toISOString(),
      params.endTime.toISOString(),
      params.model,
      params.success,
      params.success ? null : params.errorCode,
    ]
  );
}

export async function recordBatchRunSuccess(params: {
  client: Queryable;
  metadata: RunMetadata;
  endTime: Date;
}): Promise<void> {
  const { metadata } = params;
  await insertBatchRun({
    client: params.client,
    runId: metadata.runId,
    startTime: metadata.startTime,
    endTime: params.endTime,
    model: metadata.model,
    success: true,
    errorCode: null,
  });
}

export async function recordBatchRunFailure(params: {
  client: Queryable;
  metadata: RunMetadata;
  endTime: Date;
  errorCode: string;
}): Promise<void> {
  const { metadata } = params;
  await insertBatchRun({
    client: params.client,
    runId: metadata.runId,
    startTime: metadata.startTime,
    endTime: params.endTime,
    model: metadata.model,
    success: false,
    errorCode: params.errorCode,
  });
}

export async function getBatchRuns(params: { client: Queryable; runId: string }): Promise<BatchRunRecord[]> {
  const res = await params.client.query<BatchRunRecord>(
    `select id, run_id, start_time, end_time, model, success, error_code
     from batch_run_information
     where run_id = $1
     order by id asc`,
    [params.runId]
  );
  return res.rows;
}
