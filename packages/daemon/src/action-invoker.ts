/**
 * action-invoker.ts — hand the chosen image to an external program
 *
 * The program is started directly with the image path as its only argument.
 * No shell is involved, so paths with spaces, quotes or `$` need no escaping.
 * The loop waits for the program to exit before carrying on.
 */

import { spawnSync } from "child_process";
import type { SpawnSyncReturns } from "child_process";
import type { ActionInvoker, ActionResult } from "@wallshade/core";
import { errorMessage } from "@wallshade/core";

export type SpawnSyncFn = (
  program: string,
  args: string[],
  options: { stdio: "ignore" },
) => Pick<SpawnSyncReturns<Buffer>, "status" | "signal" | "error">;

export function createProcessActionInvoker(spawn: SpawnSyncFn = spawnSync): ActionInvoker {
  return {
    invoke(program: string, imagePath: string): ActionResult {
      const start = Date.now();
      try {
        const result = spawn(program, [imagePath], { stdio: "ignore" });
        const durationMs = Date.now() - start;

        if (result.error) {
          return {
            success: false,
            exitCode: result.status,
            error: result.error.message,
            durationMs,
          };
        }
        if (result.signal) {
          return {
            success: false,
            exitCode: null,
            signal: result.signal,
            error: `Command did not exit normally (signal ${result.signal})`,
            durationMs,
          };
        }
        if (result.status !== 0) {
          return {
            success: false,
            exitCode: result.status,
            error: `Command exited with status: ${result.status}`,
            durationMs,
          };
        }
        return { success: true, exitCode: 0, durationMs };
      } catch (error: unknown) {
        return {
          success: false,
          exitCode: null,
          error: errorMessage(error),
          durationMs: Date.now() - start,
        };
      }
    },
  };
}
