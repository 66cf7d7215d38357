/**
 * config.test.ts — YAML config reading and option precedence
 */

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, it, expect } from "vitest";
import {
  configValuesFromScalars,
  DEFAULT_LOG_FILE,
  DEFAULT_PID_FILE,
  parseYamlScalars,
  readConfigFile,
  resolveSchedulerOptions,
} from "../config.js";

const SAMPLE = `# wallshade
catalog:
  path: /home/test/walls.csv  # written by the scorer
  delimiter: ";"
action:
  exec: plasma-apply-wallpaperimage
loop:
  sleep_ms: 30000
  poll_interval_ms: 0
`;

describe("parseYamlScalars", () => {
  it("flattens nested keys to dotted paths", () => {
    expect(parseYamlScalars(SAMPLE)).toEqual({
      "catalog.path": "/home/test/walls.csv",
      "catalog.delimiter": ";",
      "action.exec": "plasma-apply-wallpaperimage",
      "loop.sleep_ms": "30000",
      "loop.poll_interval_ms": "0",
    });
  });

  it("accepts CRLF line endings", () => {
    expect(parseYamlScalars("daemon:\r\n  pid_file: /run/w.pid\r\n")).toEqual({
      "daemon.pid_file": "/run/w.pid",
    });
  });
});

describe("configValuesFromScalars", () => {
  it("maps known keys and drops values that are not positive integers", () => {
    const values = configValuesFromScalars(parseYamlScalars(SAMPLE));
    expect(values.input).toBe("/home/test/walls.csv");
    expect(values.delimiter).toBe(";");
    expect(values.exec).toBe("plasma-apply-wallpaperimage");
    expect(values.sleepMs).toBe(30000);
    expect(values.pollIntervalMs).toBeUndefined();
    expect(values.logFile).toBeUndefined();
  });
});

describe("readConfigFile", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("returns undefined for a missing file", () => {
    dir = mkdtempSync(join(tmpdir(), "wallshade-config-"));
    expect(readConfigFile(join(dir, "absent.yaml"))).toBeUndefined();
  });

  it("reads values from disk", () => {
    dir = mkdtempSync(join(tmpdir(), "wallshade-config-"));
    const path = join(dir, "config.yaml");
    writeFileSync(path, SAMPLE);
    expect(readConfigFile(path)?.sleepMs).toBe(30000);
  });
});

describe("resolveSchedulerOptions", () => {
  it("fills defaults", () => {
    const resolved = resolveSchedulerOptions({}, { input: "/walls.csv" });
    expect(resolved).toEqual({
      ok: true,
      value: {
        input: "/walls.csv",
        exec: "",
        daemon: false,
        loop: false,
        sleepMs: 60000,
        errorBackoffMs: 60000,
        pollIntervalMs: 100,
        delimiter: ",",
        logFile: DEFAULT_LOG_FILE,
        pidFile: DEFAULT_PID_FILE,
      },
    });
  });

  it("lets flags override the file and the file override defaults", () => {
    const resolved = resolveSchedulerOptions(
      { input: "/file.csv", exec: "setter", sleepMs: 5000 },
      { sleepMs: 2000, loop: true },
    );
    if (!resolved.ok) throw new Error(resolved.error);
    expect(resolved.value.input).toBe("/file.csv");
    expect(resolved.value.exec).toBe("setter");
    expect(resolved.value.sleepMs).toBe(2000);
    expect(resolved.value.loop).toBe(true);
  });

  it("ignores flags left undefined", () => {
    const resolved = resolveSchedulerOptions({ input: "/file.csv" }, { input: undefined });
    expect(resolved.ok && resolved.value.input).toBe("/file.csv");
  });

  it("requires an input catalog", () => {
    expect(resolveSchedulerOptions({}, {})).toEqual({
      ok: false,
      error: "input: --input is required",
    });
  });

  it("rejects a multi-character delimiter", () => {
    expect(resolveSchedulerOptions({ input: "/a.csv", delimiter: ";;" }, {})).toEqual({
      ok: false,
      error: "delimiter: catalog delimiter must be a single character",
    });
  });
});
