export type ImageStatus = "in_progress" | "processed";

/**
 * Identity of one customer image. `uploadDate` is a calendar date, `YYYY-MM-DD`.
 */
export type ImageKey = {
  customer: string;
  uploadDate: string;
  filename: string;
};

export type CompletedImage = {
  uploadDate: string;
  filename: string;
};

/**
 * Pixel-space box, corners (x1, y1) and (x2, y2).
 */
export type PixelBox = {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
};

export type Detection = {
  classId: number;
  box: PixelBox;
  confidence: number;
};

export type ImageSize = {
  width: number;
  height: number;
};

export type DetectionOutcome = {
  image: ImageSize;
  detections: Detection[];
};

export type ImageStatusRecord = {
  customer_name: string;
  upload_date: string;
  filename: string;
  status: ImageStatus;
};

export type DetectionRecord = {
  id: number;
  customer_name: string;
  upload_date: string;
  filename: string;
  has_detection: boolean;
  class_id: number | null;
  x_norm: number | null;
  y_norm: number | null;
  w_norm: number | null;
  h_norm: number | null;
  confidence: number | null;
  image_width: number | null;
  image_height: number | null;
  run_id: string;
};
