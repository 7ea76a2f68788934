import { getClaimMode, loadDatabaseConfig } from "./config/env";
import { withSessionManager, type SessionManagerOptions } from "./db";
import { ConfigurationError } from "./errors/AppError";
import { runMigrations } from "./migrations";
import type { RunMetadata } from "./modules/batchRuns/batchRuns.types";
import { runRecordedBatch, type BatchSummary, type Detector, type ImageSource } from "./modules/pipeline/orchestrator";

export type BatchJobParams = {
  customer: string;
  images: ImageSource;
  detector: Detector;
  metadata: RunMetadata;
  resumable: boolean;
  env?: Record<string, string | undefined>;
  sessionOptions?: SessionManagerOptions;
  migrationsDir?: string;
};

/**
 * Process entry: resolves the database from the environment, applies pending migrations,
 * runs one recorded batch and disposes the pool on every exit path.
 */
export async function runBatchJob(params: BatchJobParams): Promise<BatchSummary> {
  const env = params.env ?? process.env;
  const config = loadDatabaseConfig(env);
  if (!config) {
    throw new ConfigurationError(
      "Database configuration is required to track job state. Set DB_HOST, DB_NAME and DB_USER, " +
        "plus DB_PASSWORD or DB_AUTH_MODE=managed_identity with AZURE_CLIENT_ID."
    );
  }
  const claimMode = getClaimMode(env);

  return withSessionManager(
    config,
    async (sessions) => {
      await runMigrations(sessions, params.migrationsDir);
      return runRecordedBatch({
        customer: params.customer,
        images: params.images,
        detector: params.detector,
        sessions,
        metadata: params.metadata,
        resumable: params.resumable,
        claimMode,
      });
    },
    params.sessionOptions
  );
}
