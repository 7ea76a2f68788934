import { InvalidImagePathError } from "../../errors/AppError";

export type ImageRef = {
  path: string;
  uploadDate: string;
  filename: string;
};

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Splits an image path laid out as `.../<YYYY-MM-DD>/<filename>` into its upload date and file name.
 */
export function parseImagePath(imagePath: string): ImageRef {
  const segments = imagePath.split(/[\\/]+/).filter((segment) => segment.length > 0);
  const filename = segments[segments.length - 1];
  const uploadDate = segments[segments.length - 2];
  if (!filename || !uploadDate || !isCalendarDate(uploadDate)) {
    throw new InvalidImagePathError(`Image path ${imagePath} is not laid out as <YYYY-MM-DD>/<filename>.`);
  }
  return { path: imagePath, uploadDate, filename };
}
