export { CredentialProvider, DEFAULT_RENEWAL_MARGIN_MS } from "./auth/credentialProvider";
export type { Authenticator, Credential, CredentialProviderOptions } from "./auth/credentialProvider";
export { ManagedIdentityAuthenticator, POSTGRES_TOKEN_SCOPE } from "./auth/managedIdentity";
export { runBatchJob } from "./bootstrap";
export type { BatchJobParams } from "./bootstrap";
export { getClaimMode, loadDatabaseConfig } from "./config/env";
export type { ClaimMode, DatabaseConfig, ManagedIdentityDatabaseConfig, PasswordDatabaseConfig } from "./config/env";
export { SessionManager, withSessionManager } from "./db";
export type { PoolFactory, Queryable, SessionManagerOptions, SessionPool } from "./db";
export {
  AppError,
  AuthRenewalError,
  ClaimConflictError,
  ConfigurationError,
  ConnectionError,
  InvalidImagePathError,
  RecordingError,
  TransactionError,
  describeError,
} from "./errors/AppError";
export { getPendingMigrations, runMigrations } from "./migrations";
export { withRunRecording } from "./modules/batchRuns/batchRunRecorder";
export type { RunRecordingOptions } from "./modules/batchRuns/batchRunRecorder";
export {
  getBatchRuns,
  modelIdentifier,
  recordBatchRunFailure,
  recordBatchRunSuccess,
} from "./modules/batchRuns/batchRuns.repo";
export type { BatchRunRecord, RunMetadata } from "./modules/batchRuns/batchRuns.types";
export {
  claimImage,
  claimImages,
  completeImage,
  getImageStatus,
  listDetections,
  queryCompletedImages,
  recordDetection,
} from "./modules/jobState/jobState.repo";
export type * from "./modules/jobState/jobState.types";
export { parseImagePath } from "./modules/pipeline/imagePath";
export type { ImageRef } from "./modules/pipeline/imagePath";
export { runDetectionBatch, runRecordedBatch } from "./modules/pipeline/orchestrator";
export type { BatchSummary, DetectionBatchParams, Detector, ImageSource } from "./modules/pipeline/orchestrator";
