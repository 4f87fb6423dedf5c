import { ValidationError } from "./core/errors";
import type { SamplerOptions } from "./core/types";

export interface CliArgs {
  help: boolean;
  json: boolean;
  options: Partial<SamplerOptions>;
}

export const USAGE = `Usage:
recipe-roulette [--technique <kw>] [--course <kw>] [--count N] [--attempts N]

Pick a random recipe whose page mentions both keywords.

Options:
  --technique  First keyword, e.g. a cooking technique (default: koken)
  --course     Second keyword, e.g. a menu course (default: hoofdgerecht)
  --count      Number of matches to collect before stopping (default: 1)
  --attempts   Max recipe pages to fetch (default: 60)
  --delay      Seconds to wait after each page (default: 0.6)
  --timeout    Per-request timeout in seconds (default: 14)
  --seed       Integer seed for a repeatable order
  --sitemap    Sitemap URL
  --marker     Path segment that marks a recipe URL
  --max-urls   Max candidate URLs read from the sitemap (default: 8000)
  --json       Print the result as JSON
  --help       Show this help

Defaults can also be set with RECIPE_* variables (see .env.example).

Examples:
  npm run cli -- --technique bakken --course dessert --count 3
  npm run cli -- --seed 42 --json`;

function toNumber(flag: string, raw: string, integer: boolean): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n) || (integer && !Number.isInteger(n))) {
    throw new ValidationError(`${flag} expects ${integer ? "an integer" : "a number"}, got "${raw}"`);
  }
  return n;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    if (i < 0) return undefined;
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ValidationError(`Missing value for ${flag}`);
    }
    return value;
  };
  const getInt = (flag: string) => {
    const raw = getArg(flag);
    return raw === undefined ? undefined : toNumber(flag, raw, true);
  };
  const getSeconds = (flag: string) => {
    const raw = getArg(flag);
    return raw === undefined ? undefined : Math.round(toNumber(flag, raw, false) * 1000);
  };

  // unset flags stay absent so they don't override configured defaults
  const options: Partial<SamplerOptions> = {};
  const set = <K extends keyof SamplerOptions>(
    key: K,
    value: SamplerOptions[K] | undefined,
  ) => {
    if (value !== undefined) options[key] = value;
  };

  set("sitemapUrl", getArg("--sitemap"));
  set("pathMarker", getArg("--marker"));
  set("technique", getArg("--technique"));
  set("course", getArg("--course"));
  set("maxSitemapUrls", getInt("--max-urls"));
  set("maxAttempts", getInt("--attempts"));
  set("targetMatches", getInt("--count"));
  set("delayMs", getSeconds("--delay"));
  set("timeoutMs", getSeconds("--timeout"));
  set("seed", getInt("--seed"));

  return { help: hasFlag("--help"), json: hasFlag("--json"), options };
}
