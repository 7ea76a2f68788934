import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { SessionManager } from "../../../db";
import { ClaimConflictError } from "../../../errors/AppError";
import { countRows, createTestSessions } from "../../../test/db";
import {
  claimImage,
  claimImages,
  completeImage,
  getImageStatus,
  listDetections,
  queryCompletedImages,
  recordDetection,
} from "../jobState.repo";
import type { ImageKey } from "../jobState.types";

const KEY: ImageKey = { customer: "acme", uploadDate: "2024-01-01", filename: "img1.jpg" };

describe("job state repository", () => {
  let sessions: SessionManager;

  beforeEach(async () => {
    ({ sessions } = await createTestSessions());
  });

  afterEach(async () => {
    await sessions.dispose();
  });

  describe("claim and complete", () => {
    it("moves an image from in_progress to processed and lists it as completed", async () => {
      const claimed = await sessions.withUnitOfWork((client) => claimImage({ client, key: KEY }));
      expect(claimed.status).toBe("in_progress");

      const completed = await sessions.withUnitOfWork((client) => completeImage({ client, key: KEY }));
      expect(completed.status).toBe("processed");

      const listed = await sessions.withUnitOfWork((client) =>
        queryCompletedImages({ client, customer: "acme", statuses: ["processed"] })
      );
      expect(listed).toEqual([{ uploadDate: "2024-01-01", filename: "img1.jpg" }]);
    });

    it("keeps exactly one row when complete is repeated", async () => {
      await sessions.withUnitOfWork((client) => claimImage({ client, key: KEY }));
      await sessions.withUnitOfWork((client) => completeImage({ client, key: KEY }));
      await sessions.withUnitOfWork((client) => completeImage({ client, key: KEY }));

      expect(await countRows(sessions, "image_processing_status")).toBe(1);
      await expect(sessions.withUnitOfWork((client) => getImageStatus({ client, key: KEY }))).resolves.toBe(
        "processed"
      );
    });

    it("lets a later claim overwrite a processed row in last_write_wins mode", async () => {
      await sessions.withUnitOfWork((client) => completeImage({ client, key: KEY }));
      await sessions.withUnitOfWork((client) => claimImage({ client, key: KEY }));

      await expect(sessions.withUnitOfWork((client) => getImageStatus({ client, key: KEY }))).resolves.toBe(
        "in_progress"
      );
      expect(await countRows(sessions, "image_processing_status")).toBe(1);
    });

    it("refuses a second claim in exclusive mode", async () => {
      await sessions.withUnitOfWork((client) => claimImage({ client, key: KEY, mode: "exclusive" }));

      const error = await sessions
        .withUnitOfWork((client) => claimImage({ client, key: KEY, mode: "exclusive" }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ClaimConflictError);
      expect(error instanceof ClaimConflictError && error.message).toBe(
        "Image acme/2024-01-01/img1.jpg is already claimed (status: in_progress)."
      );
    });

    it("claims a whole batch atomically", async () => {
      const keys: ImageKey[] = [KEY, { ...KEY, filename: "img2.jpg" }, { ...KEY, uploadDate: "2024-01-02" }];

      const claimed = await sessions.withUnitOfWork((client) => claimImages({ client, keys }));

      expect(claimed).toBe(3);
      expect(await countRows(sessions, "image_processing_status")).toBe(3);
    });

    it("returns null for an image never claimed", async () => {
      await expect(sessions.withUnitOfWork((client) => getImageStatus({ client, key: KEY }))).resolves.toBeNull();
    });
  });

  describe("queryCompletedImages", () => {
    beforeEach(async () => {
      await sessions.withUnitOfWork(async (client) => {
        await completeImage({ client, key: { customer: "acme", uploadDate: "2024-01-02", filename: "b.jpg" } });
        await completeImage({ client, key: { customer: "acme", uploadDate: "2024-01-01", filename: "c.jpg" } });
        await claimImage({ client, key: { customer: "acme", uploadDate: "2024-01-01", filename: "a.jpg" } });
        await completeImage({ client, key: { customer: "globex", uploadDate: "2024-01-01", filename: "a.jpg" } });
      });
    });

    it("filters by customer and status, ordered by date then filename", async () => {
      const listed = await sessions.withUnitOfWork((client) =>
        queryCompletedImages({ client, customer: "acme", statuses: ["processed"] })
      );

      expect(listed).toEqual([
        { uploadDate: "2024-01-01", filename: "c.jpg" },
        { uploadDate: "2024-01-02", filename: "b.jpg" },
      ]);
    });

    it("accepts several statuses", async () => {
      const listed = await sessions.withUnitOfWork((client) =>
        queryCompletedImages({ client, customer: "acme", statuses: ["processed", "in_progress"] })
      );

      expect(listed.map((image) => image.filename)).toEqual(["a.jpg", "c.jpg", "b.jpg"]);
    });

    it("returns nothing for an empty status list", async () => {
      const listed = await sessions.withUnitOfWork((client) =>
        queryCompletedImages({ client, customer: "acme", statuses: [] })
      );

      expect(listed).toEqual([]);
    });
  });

  describe("recordDetection", () => {
    it("writes one negative row with null geometry when there is no outcome", async () => {
      const recorded = await sessions.withUnitOfWork((client) =>
        recordDetection({ client, key: KEY, runId: "run-1", outcome: null })
      );

      expect(recorded).toEqual({ inserted: 1, hasDetection: false });
      const rows = await sessions.withUnitOfWork((client) => listDetections({ client, key: KEY }));
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        customer_name: "acme",
        upload_date: "2024-01-01",
        filename: "img1.jpg",
        has_detection: false,
        class_id: null,
        x_norm: null,
        y_norm: null,
        w_norm: null,
        h_norm: null,
        confidence: null,
        image_width: null,
        image_height: null,
        run_id: "run-1",
      });
    });

    it("writes one negative row for an empty detection list", async () => {
      await sessions.withUnitOfWork((client) =>
        recordDetection({
          client,
          key: KEY,
          runId: "run-1",
          outcome: { image: { width: 200, height: 100 }, detections: [] },
        })
      );

      const rows = await sessions.withUnitOfWork((client) => listDetections({ client, key: KEY }));
      expect(rows.map((row) => row.has_detection)).toEqual([false]);
    });

    it("writes one normalized row per detection", async () => {
      const recorded = await sessions.withUnitOfWork((client) =>
        recordDetection({
          client,
          key: KEY,
          runId: "run-1",
          outcome: {
            image: { width: 200, height: 100 },
            detections: [
              { classId: 0, box: { x1: 20, y1: 10, x2: 60, y2: 50 }, confidence: 0.5 },
              { classId: 1, box: { x1: 0, y1: 0, x2: 100, y2: 100 }, confidence: 0.25 },
            ],
          },
        })
      );

      expect(recorded).toEqual({ inserted: 2, hasDetection: true });
      const rows = await sessions.withUnitOfWork((client) => listDetections({ client, key: KEY, runId: "run-1" }));
      expect(rows).toHaveLength(2);
      expect(rows[0]).toMatchObject({
        has_detection: true,
        class_id: 0,
        x_norm: 0.2,
        y_norm: 0.3,
        w_norm: 0.2,
        h_norm: 0.4,
        confidence: 0.5,
        image_width: 200,
        image_height: 100,
      });
      expect(rows[1]).toMatchObject({
        has_detection: true,
        class_id: 1,
        x_norm: 0.25,
        y_norm: 0.5,
        w_norm: 0.5,
        h_norm: 1,
      });
    });

    it("drops zero-area boxes and falls back to the negative row", async () => {
      const recorded = await sessions.withUnitOfWork((client) =>
        recordDetection({
          client,
          key: KEY,
          runId: "run-1",
          outcome: {
            image: { width: 200, height: 100 },
            detections: [{ classId: 0, box: { x1: 20, y1: 10, x2: 20, y2: 50 }, confidence: 0.9 }],
          },
        })
      );

      expect(recorded).toEqual({ inserted: 1, hasDetection: false });
      expect(await countRows(sessions, "detection_information")).toBe(1);
    });

    it("appends rows per run without touching earlier runs", async () => {
      await sessions.withUnitOfWork((client) => recordDetection({ client, key: KEY, runId: "run-1", outcome: null }));
      await sessions.withUnitOfWork((client) => recordDetection({ client, key: KEY, runId: "run-2", outcome: null }));

      const runOne = await sessions.withUnitOfWork((client) => listDetections({ client, key: KEY, runId: "run-1" }));
      const all = await sessions.withUnitOfWork((client) => listDetections({ client, key: KEY }));
      expect(runOne).toHaveLength(1);
      expect(all.map((row) => row.run_id)).toEqual(["run-1", "run-2"]);
    });
  });
});
