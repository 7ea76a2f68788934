import type { ClaimMode } from "../../config/env";
import type { SessionManager } from "../../db";
import { logInfo } from "../../observability/logger";
import { getRunDurationMs } from "../../observability/runContext";
import { recordBatchRunSuccess } from "../batchRuns/batchRuns.repo";
import { withRunRecording } from "../batchRuns/batchRunRecorder";
import type { RunMetadata } from "../batchRuns/batchRuns.types";
import {
  claimImage,
  completeImage,
  queryCompletedImages,
  recordDetection,
} from "../jobState/jobState.repo";
import type { DetectionOutcome, ImageKey } from "../jobState/jobState.types";
import { parseImagePath, type ImageRef } from "./imagePath";

/**
 * Inference collaborator. An outcome with no detections is a valid negative result;
 * a rejected promise is a failure of the run.
 */
export interface Detector {
  detect(image: ImageRef): Promise<DetectionOutcome>;
}

export type ImageSource = Iterable<string> | AsyncIterable<string>;

export type BatchSummary = {
  processed: number;
  skipped: number;
  detections: number;
};

export type DetectionBatchParams = {
  customer: string;
  images: ImageSource;
  detector: Detector;
  sessions: SessionManager;
  runId: string;
  /** Skip images already processed and track claim/complete state per image. */
  resumable: boolean;
  claimMode?: ClaimMode;
};

function completedKey(uploadDate: string, filename: string): string {
  return `${uploadDate}/${filename}`;
}

/**
 * Drives claim → detect → record + complete for each image, one image at a time.
 *
 * A crash between claim and complete leaves the image `in_progress`; claims carry no lease.
 */
export async function runDetectionBatch(params: DetectionBatchParams): Promise<BatchSummary> {
  const { customer, detector, sessions, runId, resumable } = params;
  const summary: BatchSummary = { processed: 0, skipped: 0, detections: 0 };

  const done = new Set<string>();
  if (resumable) {
    const completed = await sessions.withUnitOfWork((client) =>
      queryCompletedImages({ client, customer, statuses: ["processed"] })
    );
    for (const image of completed) {
      done.add(completedKey(image.uploadDate, image.filename));
    }
  }

  for await (const imagePath of params.images) {
    const image = parseImagePath(imagePath);
    if (done.has(completedKey(image.uploadDate, image.filename))) {
      summary.skipped += 1;
      logInfo("image_skipped", { uploadDate: image.uploadDate, filename: image.filename });
      continue;
    }

    const key: ImageKey = { customer, uploadDate: image.uploadDate, filename: image.filename };
    if (resumable) {
      await sessions.withUnitOfWork((client) => claimImage({ client, key, mode: params.claimMode }));
    }

    const outcome = await detector.detect(image);

    const detections = await sessions.withUnitOfWork(async (client) => {
      const recorded = await recordDetection({ client, key, runId, outcome });
      if (resumable) {
        await completeImage({ client, key });
      }
      return recorded.hasDetection ? recorded.inserted : 0;
    });

    summary.processed += 1;
    summary.detections += detections;
    done.add(completedKey(image.uploadDate, image.filename));
    logInfo("image_processed", { uploadDate: image.uploadDate, filename: image.filename, detections });
  }

  return summary;
}

/**
 * Runs a detection batch under run recording and writes the success row once it finishes.
 */
export async function runRecordedBatch(
  params: Omit<DetectionBatchParams, "runId"> & { metadata: RunMetadata; now?: () => Date }
): Promise<BatchSummary> {
  const { metadata, sessions } = params;
  const now = params.now ?? (() => new Date());
  return withRunRecording(
    metadata,
    async () => {
      const summary = await runDetectionBatch({ ...params, runId: metadata.runId });
      const endTime = now();
      await sessions.withUnitOfWork((client) => recordBatchRunSuccess({ client, metadata, endTime }));
      logInfo("batch_run_completed", {
        ...summary,
        model: metadata.model,
        durationMs: getRunDurationMs(endTime.getTime()),
      });
      return summary;
    },
    { sessions, customer: params.customer, now }
  );
}
