/**
 * Command-line flag parsing shared by the entry points
 */

import { ConfigError } from "../errors";
import type { CrawlOptions, EvaluationOptions } from "../types";

export type CliCommand = "crawl" | "evaluate" | "help";

export interface CliArgs {
  command: CliCommand;
  crawl: CrawlOptions;
  evaluate: EvaluationOptions;
}

/** Flag lookup over an argv slice; the last occurrence of a flag wins */
export function argReader(argv: readonly string[]) {
  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string): string | undefined => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };
  const getInt = (flag: string): number | undefined => {
    const v = getArg(flag);
    if (v === undefined) return undefined;
    const n = Number(v);
    if (!Number.isInteger(n)) {
      throw new ConfigError(`${flag} expects an integer (got ${v})`, flag);
    }
    return n;
  };
  const getChoice = <T extends string>(flag: string, allowed: readonly T[]): T | undefined => {
    const v = getArg(flag);
    if (v === undefined) return undefined;
    const found = allowed.find((a) => a === v);
    if (!found) {
      throw new ConfigError(`${flag} expects one of ${allowed.join(", ")} (got ${v})`, flag);
    }
    return found;
  };
  return { hasFlag, getArg, getInt, getChoice };
}

/**
 * Parses `<command> [flags]`. Flags only override the options they name;
 * the rest come from the environment.
 * @throws ConfigError on an unknown command or a malformed flag value
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { hasFlag, getArg, getInt, getChoice } = argReader(argv);
  const first = argv[0];
  if (first === undefined || first === "--help" || first === "-h" || hasFlag("--help")) {
    return { command: "help", crawl: {}, evaluate: {} };
  }
  if (first !== "crawl" && first !== "evaluate") {
    throw new ConfigError(`Unknown command: ${first}`, "command");
  }

  const baseUrl = getArg("--base-url");
  const dataDir = getArg("--data-dir");
  return {
    command: first,
    crawl: {
      baseUrl,
      dataDir,
      totalPages: getInt("--pages"),
      workers: getInt("--workers"),
      strategy: getChoice("--strategy", ["striped", "sequential"]),
      checkpointEvery: getInt("--checkpoint-every"),
      snapshotFormat: getChoice("--snapshot", ["basic", "detailed", "none"]),
    },
    evaluate: {
      baseUrl,
      dataDir,
      maxPages: getInt("--max-pages"),
    },
  };
}
