import { describe, expect, it } from "vitest";
import { withTimeout } from "./clock";

describe("withTimeout", () => {
  it("resolves with the operation result when it settles in time", async () => {
    await expect(withTimeout(Promise.resolve(3), 1000, () => new Error("late"))).resolves.toBe(3);
  });

  it("rejects with the timeout error when the operation hangs", async () => {
    const hanging = new Promise<never>(() => undefined);
    await expect(withTimeout(hanging, 5, () => new Error("step timed out"))).rejects.toThrow(
      "step timed out",
    );
  });

  it("does not bound the operation when the limit is zero", async () => {
    const slow = new Promise<string>((resolve) => setTimeout(() => resolve("done"), 10));
    await expect(withTimeout(slow, 0, () => new Error("late"))).resolves.toBe("done");
  });
});
