import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { sanitizeFilename, withTempDir } from "./tempfiles";

describe("withTempDir", () => {
  it("removes the directory and its contents after success", async () => {
    let seen = "";
    const result = await withTempDir("scope-test", async (dir) => {
      seen = dir;
      await writeFile(path.join(dir, "a.txt"), "x");
      return "ok";
    });

    expect(result).toBe("ok");
    expect(path.basename(seen)).toMatch(/^scope-test-/);
    expect(existsSync(seen)).toBe(false);
  });

  it("removes the directory when the callback throws", async () => {
    let seen = "";
    await expect(
      withTempDir("scope-test", async (dir) => {
        seen = dir;
        throw new Error("handler failed");
      }),
    ).rejects.toThrow("handler failed");

    expect(existsSync(seen)).toBe(false);
  });
});

describe("sanitizeFilename", () => {
  it("keeps safe names", () => {
    expect(sanitizeFilename("q-1_data.csv")).toBe("q-1_data.csv");
  });

  it("strips directories and replaces unsafe characters", () => {
    expect(sanitizeFilename("../../etc/passwd")).toBe("passwd");
    expect(sanitizeFilename("C:\\Users\\me\\data set.csv")).toBe("data_set.csv");
    expect(sanitizeFilename("résumé.zip")).toBe("r_sum_.zip");
  });

  it("keeps the extension of names that start with a dot", () => {
    expect(sanitizeFilename(".csv")).toBe("upload.csv");
    expect(sanitizeFilename("..data.zip")).toBe("upload.data.zip");
  });

  it("falls back for empty or dot-only names", () => {
    expect(sanitizeFilename("")).toBe("upload");
    expect(sanitizeFilename("..")).toBe("upload");
  });
});
