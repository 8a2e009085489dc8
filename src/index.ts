#!/usr/bin/env node
/**
 * Run full pipeline: fetch → combine → render
 *
 * Usage: npm run all -- --base-url <url> --root <topic-id> [options]
 */

import * as path from "node:path";
import { COMBINED_FILENAME, combineManual } from "./combine.js";
import { EXIT_DEGRADED, EXIT_FATAL, ManualError, errorMessage } from "./errors.js";
import { type FetchOptions, parseArgs as parseFetchArgs, printFetchSummary, runFetch } from "./fetch.js";
import { HTML_FILENAME, printRenderSummary, renderManual } from "./render.js";
import { MISSING_POLICIES, getMultiStringArg, isMainModule, setupSignalHandlers, validateUrl } from "./utils.js";

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(95000) // '1m 35s'
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

export interface StepTiming {
  step: string;
  duration: number;
}

export interface PipelineOptions extends FetchOptions {
  /** Table of contents paths left out of the rendered document */
  skipPaths: string[];
}

/**
 * Parse command line arguments: every fetch option plus --skip-path.
 */
export function parseArgs(args: string[] = process.argv.slice(2)): PipelineOptions {
  return { ...parseFetchArgs(args), skipPaths: getMultiStringArg(args, "--skip-path") };
}

/**
 * Run one stage with a description header and timing.
 *
 * @param timings - Receives the stage's duration once it completes
 */
export async function runStep<T>(description: string, timings: StepTiming[], action: () => Promise<T>): Promise<T> {
  console.log(`\n${"=".repeat(50)}`);
  console.log(`Step: ${description}`);
  console.log("=".repeat(50));

  const start = Date.now();
  const result = await action();
  const duration = Date.now() - start;

  console.log(`\n  Completed in ${formatDuration(duration)}`);
  timings.push({ step: description, duration });
  return result;
}

function showUsage(): void {
  console.log("Usage: npm run all -- --base-url <url> --root <topic-id> [options]");
  console.log("");
  console.log("Fetch a manual, optionally combine it to markdown, and render manual.html.");
  console.log("Accepts every fetch option (see npm run fetch -- --help) and:");
  console.log("  --skip-path <path>     Leave a table of contents path out of the HTML (can be repeated)");
  console.log("");
  console.log("Example:");
  console.log('  npm run all -- --base-url https://manual.example.com --root abc123_3_en_GB --title "Family Car Manual"');
}

/**
 * Main entry point for the pipeline.
 *
 * @throws Exits with the worst exit code of the stages
 */
export async function main(): Promise<void> {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  if (!options.baseUrl || !options.rootTopicId) {
    console.error("Error: --base-url and --root are required.");
    showUsage();
    process.exit(EXIT_FATAL);
  }

  const urlValidation = validateUrl(options.baseUrl);
  if (!urlValidation.isValid) {
    console.error(`Error: ${urlValidation.error}`);
    process.exit(EXIT_FATAL);
  }

  const { onMissing } = options;
  if (onMissing === null) {
    console.error(`Error: --on-missing must be one of: ${MISSING_POLICIES.join(", ")}`);
    process.exit(EXIT_FATAL);
  }

  console.log("Starting full pipeline...");
  console.log(`API: ${options.baseUrl}`);
  console.log(`Title: ${options.title}`);

  const pipelineStart = Date.now();
  const timings: StepTiming[] = [];
  let exitCode = 0;

  try {
    const fetched = await runStep("Fetching topics", timings, () => runFetch(options));
    exitCode = Math.max(exitCode, printFetchSummary(fetched, options.outputDir));

    if (options.combine) {
      const combined = await runStep("Combining markdown", timings, () =>
        combineManual({ outputDir: options.outputDir, title: options.title, onMissing }),
      );
      if (combined.skipped.length > 0) exitCode = Math.max(exitCode, EXIT_DEGRADED);
    }

    const rendered = await runStep("Rendering HTML", timings, () =>
      renderManual({ outputDir: options.outputDir, title: options.title, onMissing, skipPaths: options.skipPaths }),
    );
    exitCode = Math.max(exitCode, printRenderSummary(rendered));
  } catch (error) {
    const prefix = error instanceof ManualError ? `Error (${error.kind})` : "Error";
    console.error(`\nPipeline failed. ${prefix}: ${errorMessage(error)}`);
    process.exit(EXIT_FATAL);
  }

  const totalDuration = Date.now() - pipelineStart;

  console.log("\n" + "=".repeat(50));
  console.log(exitCode === 0 ? "Pipeline complete!" : "Pipeline complete with warnings.");
  console.log("=".repeat(50));

  // Display timing summary
  console.log("\nTiming Summary:");
  console.log("-".repeat(35));
  for (const { step, duration } of timings) {
    console.log(`  ${step.padEnd(20)} ${formatDuration(duration)}`);
  }
  console.log("-".repeat(35));
  console.log(`  ${"Total".padEnd(20)} ${formatDuration(totalDuration)}`);

  console.log("\nOutput files:");
  console.log(`  - ${path.join(options.outputDir, "<topic path>")}/  (raw.json and content.md per topic)`);
  console.log(`  - ${path.join(options.outputDir, "index.json")}  (table of contents)`);
  console.log(`  - ${path.join(options.outputDir, "images")}/  (downloaded images)`);
  if (options.combine) {
    console.log(`  - ${path.join(options.outputDir, COMBINED_FILENAME)}  (combined markdown)`);
  }
  console.log(`  - ${path.join(options.outputDir, HTML_FILENAME)}  (offline manual)`);

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

// Only run main when executed directly (not when imported for testing)
if (isMainModule(import.meta.url)) {
  setupSignalHandlers("Pipeline");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(EXIT_FATAL);
  });
}
