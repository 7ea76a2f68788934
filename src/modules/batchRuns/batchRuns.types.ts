/**
 * Metadata every recorded run must carry. Nothing here has a default.
 */
export type RunMetadata = {
  runId: string;
  startTime: Date;
  model: string;
  /** When true, a run without reporting sessions is refused before the job starts. */
  reportingRequired: boolean;
};

export type BatchRunRecord = {
  id: number;
  run_id: string;
  start_time: Date;
  end_time: Date;
  model: string;
  success: boolean;
  error_code: string | null;
};
