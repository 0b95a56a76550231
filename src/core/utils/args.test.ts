import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors";
import { parseCliArgs } from "./args";

describe("parseCliArgs", () => {
  it("reads crawl flags", () => {
    const args = parseCliArgs(["crawl", "--workers", "8", "--pages", "120", "--strategy", "sequential"]);
    expect(args.command).toBe("crawl");
    expect(args.crawl).toMatchObject({ workers: 8, totalPages: 120, strategy: "sequential" });
    expect(args.crawl.checkpointEvery).toBeUndefined();
  });

  it("shares the base URL and data directory with evaluate", () => {
    const args = parseCliArgs(["evaluate", "--base-url", "https://auction.test/", "--max-pages", "3"]);
    expect(args.evaluate).toEqual({ baseUrl: "https://auction.test/", dataDir: undefined, maxPages: 3 });
  });

  it("falls back to help", () => {
    expect(parseCliArgs([]).command).toBe("help");
    expect(parseCliArgs(["crawl", "--help"]).command).toBe("help");
  });

  it("rejects unknown commands and bad values", () => {
    expect(() => parseCliArgs(["export"])).toThrow(ConfigError);
    expect(() => parseCliArgs(["crawl", "--workers", "many"])).toThrow("--workers expects an integer (got many)");
    expect(() => parseCliArgs(["crawl", "--snapshot", "xml"])).toThrow(ConfigError);
  });
});
