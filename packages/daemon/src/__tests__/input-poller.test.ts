/**
 * input-poller.test.ts — raw-mode keypress detection
 */

import { EventEmitter } from "events";
import { describe, it, expect } from "vitest";
import { TerminalInputPoller } from "../input-poller.js";
import type { TerminalInput } from "../input-poller.js";

class FakeStdin extends EventEmitter implements TerminalInput {
  isTTY = true;
  rawModes: boolean[] = [];
  paused = true;

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }
}

describe("TerminalInputPoller", () => {
  it("enters raw mode on start and restores it on stop", () => {
    const stdin = new FakeStdin();
    const poller = new TerminalInputPoller({ stdin });

    poller.start();
    expect(stdin.rawModes).toEqual([true]);
    expect(stdin.paused).toBe(false);

    poller.stop();
    poller.stop();
    expect(stdin.rawModes).toEqual([true, false]);
    expect(stdin.paused).toBe(true);
    expect(stdin.listenerCount("data")).toBe(0);
  });

  it("leaves raw mode alone when stdin is not a terminal", () => {
    const stdin = new FakeStdin();
    stdin.isTTY = false;
    const poller = new TerminalInputPoller({ stdin });
    poller.start();
    poller.stop();
    expect(stdin.rawModes).toEqual([]);
  });

  it("reports one key per byte received", () => {
    const stdin = new FakeStdin();
    const poller = new TerminalInputPoller({ stdin });
    poller.start();

    expect(poller.tryReadKey()).toBe(false);
    stdin.emit("data", Buffer.from("ab"));
    expect(poller.tryReadKey()).toBe(true);
    expect(poller.tryReadKey()).toBe(true);
    expect(poller.tryReadKey()).toBe(false);

    stdin.emit("data", "xyz");
    poller.drain();
    expect(poller.tryReadKey()).toBe(false);
  });

  it("hands Ctrl-C to the interrupt callback instead of counting it", () => {
    const stdin = new FakeStdin();
    let interrupts = 0;
    const poller = new TerminalInputPoller({
      stdin,
      onInterrupt: () => {
        interrupts++;
      },
    });
    poller.start();

    stdin.emit("data", Buffer.from([0x03]));

    expect(interrupts).toBe(1);
    expect(poller.tryReadKey()).toBe(false);
  });
});
