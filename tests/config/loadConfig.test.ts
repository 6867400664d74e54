import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "../../src/config";
import { makeTempDir } from "../helpers/fakeTransport";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("config");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(value: unknown): string {
    const filePath = path.join(dir, "harvest.json");
    fs.writeFileSync(filePath, JSON.stringify(value));
    return filePath;
  }

  it("returns the defaults without a file or environment", () => {
    expect(loadConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
  });

  it("uses the public endpoint and conservative pacing by default", () => {
    const config = loadConfig(undefined, {});

    expect(config.baseUrl).toBe("https://opendata.finlex.fi/finlex/avoindata/v1");
    expect(config.sleepSeconds).toBe(5);
    expect(config.maxRetries).toBe(5);
    expect(config.requestTimeoutMs).toBe(30_000);
    expect(config.langAndVersion).toBe("fin@");
  });

  it("applies file values and merges nested objects", () => {
    const filePath = writeConfig({
      outputDir: "/data/akn",
      types: ["judgment", "authority-regulation"],
      companions: { pdf: true },
      yearOverrides: { judgment: 3 },
    });

    const config = loadConfig(filePath, {});

    expect(config.outputDir).toBe("/data/akn");
    expect(config.types).toEqual(["judgment", "authority-regulation"]);
    expect(config.companions).toEqual({ pdf: true, zip: false, media: false });
    expect(config.yearOverrides).toEqual({ judgment: 3 });
    expect(config.sleepSeconds).toBe(5);
  });

  it("lets the environment override the file", () => {
    const filePath = writeConfig({ outputDir: "/from/file", sleepSeconds: 2 });

    const config = loadConfig(filePath, {
      AKN_OUTPUT_DIR: "/from/env",
      AKN_SLEEP_SECONDS: "0.5",
      AKN_MAX_RETRIES: "2",
      AKN_IGNORE_HTTPS_ERRORS: "yes",
      AKN_LANG: "swe@",
    });

    expect(config.outputDir).toBe("/from/env");
    expect(config.sleepSeconds).toBe(0.5);
    expect(config.maxRetries).toBe(2);
    expect(config.ignoreHttpsErrors).toBe(true);
    expect(config.langAndVersion).toBe("swe@");
  });

  it("ignores unparseable environment numbers", () => {
    const config = loadConfig(undefined, { AKN_MAX_RETRIES: "many", AKN_IGNORE_HTTPS_ERRORS: "maybe" });

    expect(config.maxRetries).toBe(5);
    expect(config.ignoreHttpsErrors).toBe(false);
  });

  it("rejects a missing file", () => {
    const missing = path.join(dir, "missing.json");
    expect(() => loadConfig(missing, {})).toThrow(`Config file not found: ${missing}`);
  });

  it("rejects unknown keys and bad values", () => {
    expect(() => loadConfig(writeConfig({ outputDirectory: "x" }), {})).toThrow(/Invalid config file/);
    expect(() => loadConfig(writeConfig({ types: ["statute"] }), {})).toThrow(/types\.0/);
    expect(() => loadConfig(writeConfig({ sleepSeconds: -1 }), {})).toThrow(/sleepSeconds/);
  });
});
