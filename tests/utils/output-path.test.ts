import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  prepareOutputPath,
  resolveFilenameConflict,
  validateOutputPath,
  withXlsxExtension,
} from "../../src/utils/output-path.js";
import { ReportError } from "../../src/utils/errors.js";

describe("validateOutputPath", () => {
  const base = path.resolve(os.tmpdir(), "reports-base");

  it("resolves a plain filename inside the base directory", () => {
    expect(validateOutputPath(base, "report.xlsx")).toBe(path.join(base, "report.xlsx"));
  });

  it("strips path separators so the file stays inside", () => {
    expect(validateOutputPath(base, "../evil.xlsx")).toBe(path.join(base, "..evil.xlsx"));
  });

  it("rejects names that sanitize to nothing", () => {
    expect(() => validateOutputPath(base, "..")).toThrow(ReportError);
    expect(() => validateOutputPath(base, "   ")).toThrow(ReportError);
  });
});

describe("withXlsxExtension", () => {
  it("adds the extension only when missing", () => {
    expect(withXlsxExtension("report")).toBe("report.xlsx");
    expect(withXlsxExtension("report.XLSX")).toBe("report.XLSX");
  });
});

describe("output files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "output-path-test-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("keeps a free filename", async () => {
    expect(await resolveFilenameConflict(dir, "a.xlsx")).toBe("a.xlsx");
  });

  it("numbers conflicting filenames", async () => {
    await fs.writeFile(path.join(dir, "a.xlsx"), "");
    await fs.writeFile(path.join(dir, "a (1).xlsx"), "");

    expect(await resolveFilenameConflict(dir, "a.xlsx")).toBe("a (2).xlsx");
  });

  it("creates the output directory and returns an .xlsx path", async () => {
    const nested = path.join(dir, "new", "reports");

    const filePath = await prepareOutputPath(nested, "Fall Report");

    expect(filePath).toBe(path.join(nested, "Fall Report.xlsx"));
    expect((await fs.stat(nested)).isDirectory()).toBe(true);
  });
});
