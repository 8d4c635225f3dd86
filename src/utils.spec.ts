/* src/utils.spec.ts */

import { expect, test } from "@playwright/test";
import { errorMessage, formatEta, formatFileSize, formatSpeed } from "./utils";

test.describe("formatting", () => {
  test("file sizes", () => {
    expect(formatFileSize(0)).toBe("0 Bytes");
    expect(formatFileSize(512)).toBe("512 Bytes");
    expect(formatFileSize(1536)).toBe("1.5 KB");
    expect(formatFileSize(10 * 1024 * 1024)).toBe("10 MB");
  });

  test("speeds", () => {
    expect(formatSpeed(0)).toBe("0 B/s");
    expect(formatSpeed(2048)).toBe("2 KB/s");
    expect(formatSpeed(1.5 * 1024 * 1024)).toBe("1.5 MB/s");
  });

  test("eta", () => {
    expect(formatEta(null)).toBe("unknown");
    expect(formatEta(4.2)).toBe("5s");
    expect(formatEta(59.2)).toBe("1m 0s");
    expect(formatEta(3700)).toBe("1h 1m");
  });

  test("error messages", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(404)).toBe("404");
  });
});
