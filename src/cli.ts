#!/usr/bin/env node
import "dotenv/config";
import { parseCliArgs, USAGE } from "./cli-args";
import { AppConfig } from "./core/config/app-config";
import { NoCandidatesError, ValidationError } from "./core/errors";
import { pickRandomRecipe } from "./core/sampling/picker";
import { runSampling } from "./core/sampling/sampler";
import type { Recipe, SamplingReport } from "./core/types";
import { Logger } from "./core/utils/logger";

function printText(report: SamplingReport, chosen: Recipe): void {
  if (report.recipes.length > 1) {
    console.log(`Found ${report.recipes.length} matching recipes:`);
    for (const r of report.recipes) console.log(`- ${r.title}\n  ${r.url}`);
    console.log("");
  }
  console.log("🎲 Random pick:");
  console.log(`- ${chosen.title}`);
  console.log(`- ${chosen.url}`);
}

function printJson(report: SamplingReport, chosen: Recipe): void {
  console.log(
    JSON.stringify(
      {
        pick: chosen,
        matches: report.recipes,
        candidates: report.candidates,
        attempts: report.attempts,
        failures: report.failures,
        interrupted: report.interrupted,
      },
      null,
      2,
    ),
  );
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  // first Ctrl+C stops sampling and keeps what was found; a second one kills
  const controller = new AbortController();
  const onSigint = () => {
    Logger.warn("⛔️ Interrupted, returning what was found so far");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const report = await runSampling(
      { ...AppConfig.samplerDefaults(), ...args.options },
      { signal: controller.signal },
    );
    const chosen = pickRandomRecipe(report.recipes);

    const json = args.json || AppConfig.getBoolean("RECIPE_JSON", false);
    if (json) printJson(report, chosen);
    else printText(report, chosen);
    return 0;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof NoCandidatesError) {
      Logger.error(`❌ ${error.message}`);
    } else if (error instanceof ValidationError) {
      Logger.error(`❌ ${error.message}`);
      console.error(USAGE);
    } else if (error instanceof Error) {
      Logger.error(`❌ Run failed: ${error.message}`, error);
    } else {
      Logger.error(`❌ Run failed: ${String(error)}`);
    }
    process.exitCode = 1;
  });
