/**
 * ports.ts — seams between the scheduler and the operating system
 *
 * The selection loop only talks to these interfaces. The daemon package
 * provides Node-backed implementations; tests provide in-process fakes.
 */

export type DetachOutcome =
  /** Launching process: the detached copy is running, caller should exit. */
  | { role: "parent"; pid: number }
  /** Running as the detached background process. */
  | { role: "daemon" };

export interface LifecycleProvider {
  detachToBackground(): DetachOutcome;
}

export interface InputPoller {
  /** Enter non-canonical input mode. */
  start(): void;
  /** Restore the terminal. Safe to call more than once. */
  stop(): void;
  /** True when a key is waiting; consumes it. Never blocks. */
  tryReadKey(): boolean;
  /** Discard any buffered input. */
  drain(): void;
}

export interface ActionResult {
  success: boolean;
  exitCode: number | null;
  signal?: string;
  error?: string;
  durationMs: number;
}

export interface ActionInvoker {
  invoke(program: string, imagePath: string): ActionResult;
}

export type Delay = (ms: number) => Promise<void>;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const timerDelay: Delay = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
