import { describe, expect, it } from "vitest";
import { CrawlControl } from "./control";

describe("CrawlControl", () => {
  it("continues by default", async () => {
    expect(await new CrawlControl().checkpoint()).toBe("continue");
  });

  it("reports stop once stopped", async () => {
    const control = new CrawlControl();
    control.stop();
    expect(control.isStopped).toBe(true);
    expect(await control.checkpoint()).toBe("stop");
  });

  it("holds callers while paused until resumed", async () => {
    const control = new CrawlControl();
    control.pause();
    let decision: string | null = null;
    const waiting = control.checkpoint().then((d) => {
      decision = d;
    });
    await Promise.resolve();
    expect(decision).toBeNull();

    control.resume();
    await waiting;
    expect(decision).toBe("continue");
  });

  it("releases paused callers with stop", async () => {
    const control = new CrawlControl();
    control.pause();
    const waiting = control.checkpoint();
    control.stop();
    expect(await waiting).toBe("stop");
  });
});
