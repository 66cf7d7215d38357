/**
 * action-invoker.test.ts — external program outcomes
 */

import { describe, it, expect } from "vitest";
import { createProcessActionInvoker } from "../action-invoker.js";
import type { SpawnSyncFn } from "../action-invoker.js";

function spawnReturning(result: ReturnType<SpawnSyncFn>, calls: unknown[][] = []): SpawnSyncFn {
  return (program, args, options) => {
    calls.push([program, args, options]);
    return result;
  };
}

describe("createProcessActionInvoker", () => {
  it("passes the image path as the only argument, without a shell", () => {
    const calls: unknown[][] = [];
    const invoker = createProcessActionInvoker(spawnReturning({ status: 0, signal: null }, calls));

    const result = invoker.invoke("plasma-apply-wallpaperimage", "/walls/it's $HOME.jpg");

    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(calls).toEqual([
      ["plasma-apply-wallpaperimage", ["/walls/it's $HOME.jpg"], { stdio: "ignore" }],
    ]);
  });

  it("reports a non-zero exit status", () => {
    const result = createProcessActionInvoker(spawnReturning({ status: 3, signal: null })).invoke("setter", "/a.jpg");
    expect(result).toMatchObject({
      success: false,
      exitCode: 3,
      error: "Command exited with status: 3",
    });
  });

  it("reports termination by signal", () => {
    const result = createProcessActionInvoker(spawnReturning({ status: null, signal: "SIGKILL" })).invoke(
      "setter",
      "/a.jpg",
    );
    expect(result).toMatchObject({
      success: false,
      exitCode: null,
      signal: "SIGKILL",
      error: "Command did not exit normally (signal SIGKILL)",
    });
  });

  it("reports a program that could not be started", () => {
    const result = createProcessActionInvoker(
      spawnReturning({ status: null, signal: null, error: new Error("spawn setter ENOENT") }),
    ).invoke("setter", "/a.jpg");
    expect(result).toMatchObject({ success: false, exitCode: null, error: "spawn setter ENOENT" });
  });

  it("turns a thrown error into a failed result", () => {
    const invoker = createProcessActionInvoker(() => {
      throw new Error("spawn failed");
    });
    expect(invoker.invoke("setter", "/a.jpg")).toMatchObject({ success: false, error: "spawn failed" });
  });
});
