import type { ClaimMode } from "../../config/env";
import type { Queryable } from "../../db";
import { AppError, ClaimConflictError } from "../../errors/AppError";
import {
  type CompletedImage,
  type Detection,
  type DetectionOutcome,
  type DetectionRecord,
  type ImageKey,
  type ImageSize,
  type ImageStatus,
  type ImageStatusRecord,
} from "./jobState.types";

// Every operation here runs on the caller's unit of work; none opens its own transaction.

const STATUS_COLUMNS = "customer_name, upload_date::text as upload_date, filename, status";

async function upsertStatus(client: Queryable, key: ImageKey, status: ImageStatus): Promise<ImageStatusRecord> {
  const res = await client.query<ImageStatusRecord>(
    `insert into image_processing_status (customer_name, upload_date, filename, status, updated_at)
     values ($1, $2, $3, $4, now())
     on conflict (customer_name, upload_date, filename)
     do update set status = excluded.status, updated_at = excluded.updated_at
     returning ${STATUS_COLUMNS}`,
    [key.customer, key.uploadDate, key.filename, status]
  );
  const record = res.rows[0];
  if (!record) {
    throw new AppError("data_error", `Status for ${describeKey(key)} was not written.`);
  }
  return record;
}

function describeKey(key: ImageKey): string {
  return `${key.customer}/${key.uploadDate}/${key.filename}`;
}

/**
 * Marks an image as `in_progress`.
 *
 * In `last_write_wins` mode concurrent claims on the same key race and the last one wins;
 * nothing is locked. In `exclusive` mode the claim only succeeds when no row exists yet,
 * otherwise a {@link ClaimConflictError} is raised.
 */
export async function claimImage(params: {
  client: Queryable;
  key: ImageKey;
  mode?: ClaimMode;
}): Promise<ImageStatusRecord> {
  const { client, key } = params;
  if ((params.mode ?? "last_write_wins") === "last_write_wins") {
    return upsertStatus(client, key, "in_progress");
  }

  const res = await client.query<ImageStatusRecord>(
    `insert into image_processing_status (customer_name, upload_date, filename, status, updated_at)
     values ($1, $2, $3, 'in_progress', now())
     on conflict (customer_name, upload_date, filename) do nothing
     returning ${STATUS_COLUMNS}`,
    [key.customer, key.uploadDate, key.filename]
  );
  const record = res.rows[0];
  if (!record) {
    const current = await getImageStatus({ client, key });
    throw new ClaimConflictError(`Image ${describeKey(key)} is already claimed (status: ${current ?? "unknown"}).`);
  }
  return record;
}

export async function claimImages(params: {
  client: Queryable;
  keys: ImageKey[];
  mode?: ClaimMode;
}): Promise<number> {
  for (const key of params.keys) {
    await claimImage({ client: params.client, key, mode: params.mode });
  }
  return params.keys.length;
}

/**
 * Marks an image as `processed`. Repeating it leaves the same single row.
 */
export async function completeImage(params: { client: Queryable; key: ImageKey }): Promise<ImageStatusRecord> {
  return upsertStatus(params.client, params.key, "processed");
}

export async function getImageStatus(params: { client: Queryable; key: ImageKey }): Promise<ImageStatus | null> {
  const { key } = params;
  const res = await params.client.query<{ status: ImageStatus }>(
    `select status
     from image_processing_status
     where customer_name = $1 and upload_date = $2 and filename = $3`,
    [key.customer, key.uploadDate, key.filename]
  );
  return res.rows[0]?.status ?? null;
}

/**
 * Lists the (date, filename) pairs of a customer whose status is one of `statuses`.
 * Used on resume to skip work that is already done.
 */
export async function queryCompletedImages(params: {
  client: Queryable;
  customer: string;
  statuses?: readonly ImageStatus[];
}): Promise<CompletedImage[]> {
  const statuses = params.statuses ?? ["processed"];
  if (statuses.length === 0) {
    return [];
  }
  const placeholders = statuses.map((_, index) => `$${index + 2}`).join(", ");
  const res = await params.client.query<{ upload_date: string; filename: string }>(
    `select upload_date::text as upload_date, filename
     from image_processing_status
     where customer_name = $1 and status in (${placeholders})
     order by upload_date asc, filename asc`,
    [params.customer, ...statuses]
  );
  return res.rows.map((row) => ({ uploadDate: row.upload_date, filename: row.filename }));
}

function hasPositiveArea(detection: Detection): boolean {
  const { x1, y1, x2, y2 } = detection.box;
  return x2 > x1 && y2 > y1;
}

function normalizeBox(detection: Detection, image: ImageSize) {
  const { x1, y1, x2, y2 } = detection.box;
  return {
    x: (x1 + x2) / 2 / image.width,
    y: (y1 + y2) / 2 / image.height,
    w: (x2 - x1) / image.width,
    h: (y2 - y1) / image.height,
  };
}

/**
 * Appends the detections of one image for one run.
 *
 * Each detection with a positive-area box becomes one row with its box normalized to the image
 * (centre x/y, width, height). When there is no outcome, or no detection survives, exactly one
 * negative row is written with every geometry column null.
 *
 * @returns rows inserted, and whether they are positive detections
 */
export async function recordDetection(params: {
  client: Queryable;
  key: ImageKey;
  runId: string;
  outcome: DetectionOutcome | null;
}): Promise<{ inserted: number; hasDetection: boolean }> {
  const { client, key, runId, outcome } = params;
  const detections = outcome ? outcome.detections.filter(hasPositiveArea) : [];

  if (!outcome || detections.length === 0) {
    await client.query(
      `insert into detection_information
       (customer_name, upload_date, filename, has_detection, class_id, x_norm, y_norm, w_norm, h_norm,
        confidence, image_width, image_height, run_id)
       values ($1, $2, $3, false, null, null, null, null, null, null, null, null, $4)`,
      [key.customer, key.uploadDate, key.filename, runId]
    );
    return { inserted: 1, hasDetection: false };
  }

  const { width, height } = outcome.image;
  if (!(width > 0) || !(height > 0)) {
    throw new AppError("invalid_image_size", `Image ${describeKey(key)} has invalid size ${width}x${height}.`);
  }

  for (const detection of detections) {
    const box = normalizeBox(detection, outcome.image);
    await client.query(
      `insert into detection_information
       (customer_name, upload_date, filename, has_detection, class_id, x_norm, y_norm, w_norm, h_norm,
        confidence, image_width, image_height, run_id)
       values ($1, $2, $3, true, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
      [
        key.customer,
        key.uploadDate,
        key.filename,
        detection.classId,
        box.x,
        box.y,
        box.w,
        box.h,
        detection.confidence,
        width,
        height,
        runId,
      ]
    );
  }
  return { inserted: detections.length, hasDetection: true };
}

export async function listDetections(params: {
  client: Queryable;
  key: ImageKey;
  runId?: string;
}): Promise<DetectionRecord[]> {
  const { key } = params;
  const values: unknown[] = [key.customer, key.uploadDate, key.filename];
  let runFilter = "";
  if (params.runId !== undefined) {
    values.push(params.runId);
    runFilter = "and run_id = $4";
  }
  const res = await params.client.query<DetectionRecord>(
    `select id, customer_name, upload_date::text as upload_date, filename, has_detection, class_id,
            x_norm, y_norm, w_norm, h_norm, confidence, image_width, image_height, run_id
     from detection_information
     where customer_name = $1 and upload_date = $2 and filename = $3 ${runFilter}
     order by id asc`,
    values
  );
  return res.rows;
}
