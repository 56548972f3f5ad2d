import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { DEFAULT_COLORS, loadConfig } from "../../src/utils/config.js";
import { loadConfigStore, updateConfigStore } from "../../src/utils/config-store.js";
import { ConfigError } from "../../src/utils/errors.js";

describe("loadConfig", () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "config-test-"));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("uses defaults under the data directory", () => {
    const config = loadConfig({ CANVAS_DATA_DIR: dataDir });

    expect(config.baseUrl).toBeUndefined();
    expect(config.apiToken).toBeUndefined();
    expect(config.configFile).toBe(path.join(dataDir, "config.json"));
    expect(config.sessionDir).toBe(path.join(dataDir, "session"));
    expect(config.templateDir).toBe(path.join(dataDir, "templates"));
    expect(config.reportDir).toBe(path.join(dataDir, "reports"));
    expect(config.timeoutMs).toBe(30_000);
    expect(config.adminMode).toBe(false);
    expect(config.logLevel).toBe("INFO");
    expect(config.report).toEqual({
      defaultThreshold: 70,
      borderlineRange: 5,
      timestampFiles: true,
      includeSummarySheet: true,
      colors: DEFAULT_COLORS,
    });
  });

  it("reads the JSON config store", () => {
    fs.writeFileSync(
      path.join(dataDir, "config.json"),
      JSON.stringify({
        baseUrl: "https://canvas.example.edu",
        adminMode: true,
        defaultThreshold: 75,
        includeCourses: [101, 102],
        colors: { met: "00FF00" },
      }),
    );

    const config = loadConfig({ CANVAS_DATA_DIR: dataDir });

    expect(config.baseUrl).toBe("https://canvas.example.edu");
    expect(config.adminMode).toBe(true);
    expect(config.report.defaultThreshold).toBe(75);
    expect(config.courseFilter.includeCourseIds).toEqual([101, 102]);
    expect(config.report.colors).toEqual({ met: "00FF00", notMet: "FFB6C1", borderline: "FFFFE0" });
  });

  it("lets environment variables override the store", () => {
    fs.writeFileSync(
      path.join(dataDir, "config.json"),
      JSON.stringify({ baseUrl: "https://old.example.edu", adminMode: true, borderlineRange: 3 }),
    );

    const config = loadConfig({
      CANVAS_DATA_DIR: dataDir,
      CANVAS_BASE_URL: "https://canvas.example.edu",
      CANVAS_API_TOKEN: "test-secret",
      CANVAS_ADMIN_MODE: "false",
      CANVAS_EXCLUDE_COURSES: "7, 8,abc",
      REPORT_BORDERLINE_RANGE: "2.5",
      REPORT_TIMESTAMP_FILES: "FALSE",
      LOG_LEVEL: "debug",
    });

    expect(config.baseUrl).toBe("https://canvas.example.edu");
    expect(config.apiToken).toBe("test-secret");
    expect(config.adminMode).toBe(false);
    expect(config.courseFilter.excludeCourseIds).toEqual([7, 8]);
    expect(config.report.borderlineRange).toBe(2.5);
    expect(config.report.timestampFiles).toBe(false);
    expect(config.logLevel).toBe("DEBUG");
  });

  it("falls back to INFO for an unknown log level", () => {
    expect(loadConfig({ CANVAS_DATA_DIR: dataDir, LOG_LEVEL: "verbose" }).logLevel).toBe("INFO");
  });

  it("rejects a non-numeric number setting", () => {
    expect(() => loadConfig({ CANVAS_DATA_DIR: dataDir, CANVAS_TIMEOUT_MS: "soon" })).toThrow(
      ConfigError,
    );
  });

  it("rejects an invalid config store", () => {
    fs.writeFileSync(path.join(dataDir, "config.json"), JSON.stringify({ defaultThreshold: 150 }));

    expect(() => loadConfig({ CANVAS_DATA_DIR: dataDir })).toThrow(/invalid .*defaultThreshold/);
  });

  it("expands a tilde in directory settings", () => {
    const config = loadConfig({ CANVAS_DATA_DIR: dataDir, CANVAS_REPORT_DIR: "~/reports" });
    expect(config.reportDir).toBe(path.join(os.homedir(), "reports"));
  });
});

describe("updateConfigStore", () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "config-store-test-"));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("creates the file and merges later updates", () => {
    const configFile = path.join(dataDir, "nested", "config.json");

    updateConfigStore(configFile, { baseUrl: "https://canvas.example.edu" });
    updateConfigStore(configFile, { adminMode: true });

    expect(loadConfigStore(configFile)).toEqual({
      baseUrl: "https://canvas.example.edu",
      adminMode: true,
    });
  });
});
