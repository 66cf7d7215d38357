/**
 * input-poller.ts — keypress detection for interruptible sleep
 *
 * The terminal poller switches stdin to raw mode and counts incoming bytes;
 * the sleep loop asks `tryReadKey()` between short waits. In raw mode Ctrl-C
 * no longer raises SIGINT, so it is caught here and handed to `onInterrupt`.
 */

import type { InputPoller } from "@wallshade/core";

const CTRL_C = 0x03;

/** The slice of `process.stdin` the poller touches. */
export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  off(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalInputPollerOptions {
  stdin?: TerminalInput;
  onInterrupt?: () => void;
}

export class TerminalInputPoller implements InputPoller {
  private readonly stdin: TerminalInput;
  private readonly onInterrupt?: () => void;
  private pending = 0;
  private active = false;

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    if (bytes.includes(CTRL_C)) {
      this.onInterrupt?.();
      return;
    }
    this.pending += bytes.length;
  };

  constructor(options: TerminalInputPollerOptions = {}) {
    this.stdin = options.stdin ?? process.stdin;
    this.onInterrupt = options.onInterrupt;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    if (this.stdin.isTTY) {
      this.stdin.setRawMode?.(true);
    }
    this.stdin.on("data", this.onData);
    this.stdin.resume();
  }

  stop(): void {
    if (!this.active) return;
    this.active = false;
    this.stdin.off("data", this.onData);
    if (this.stdin.isTTY) {
      this.stdin.setRawMode?.(false);
    }
    this.stdin.pause();
    this.pending = 0;
  }

  tryReadKey(): boolean {
    if (this.pending === 0) return false;
    this.pending--;
    return true;
  }

  drain(): void {
    this.pending = 0;
  }
}
