import { describe, expect, it } from "vitest";
import { InvalidImagePathError } from "../../../errors/AppError";
import { parseImagePath } from "../imagePath";

describe("parseImagePath", () => {
  it("reads the upload date folder and file name", () => {
    expect(parseImagePath("/mnt/images/acme/2024-01-31/pano_0001.jpg")).toEqual({
      path: "/mnt/images/acme/2024-01-31/pano_0001.jpg",
      uploadDate: "2024-01-31",
      filename: "pano_0001.jpg",
    });
  });

  it("accepts relative and Windows-style paths", () => {
    expect(parseImagePath("2024-02-29/a.png").uploadDate).toBe("2024-02-29");
    expect(parseImagePath("C:\\data\\2024-01-01\\b.png")).toMatchObject({ uploadDate: "2024-01-01", filename: "b.png" });
  });

  it("rejects a folder that is not a calendar date", () => {
    expect(() => parseImagePath("2023-02-29/a.png")).toThrow(InvalidImagePathError);
    expect(() => parseImagePath("uploads/a.png")).toThrow(InvalidImagePathError);
    expect(() => parseImagePath("a.png")).toThrow(InvalidImagePathError);
  });
});
