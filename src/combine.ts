#!/usr/bin/env node
/**
 * Merge downloaded topic files into a single markdown document
 *
 * Usage: npm run combine [-- --title "Manual Title"]
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { EXIT_DEGRADED, EXIT_FATAL, MissingInputError, errorMessage } from "./errors.js";
import type { MissingPolicy, TopicEntry, TopicFailure } from "./types.js";
import {
  CONTENT_FILENAME,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_TITLE,
  MISSING_POLICIES,
  formatSize,
  generateAnchor,
  getChoiceArg,
  getStringArg,
  hasHelpFlag,
  isMainModule,
  readManualIndex,
  setupSignalHandlers,
  writeOutputFile,
} from "./utils.js";

export const COMBINED_FILENAME = "combined_manual.md";

/** Options for {@link combineManual} */
export interface CombineOptions {
  /** Directory written by the fetch command */
  outputDir: string;
  /** Title of the document */
  title: string;
  /** What to do with topics whose content.md is missing */
  onMissing: MissingPolicy;
}

/** Outcome of a combine run */
export interface CombineResult {
  /** Path of the written document */
  outputFile: string;
  /** Topics whose content was included */
  includedCount: number;
  /** Topics left out because their content.md was missing */
  skipped: TopicFailure[];
}

/**
 * Print usage information for the combine command.
 */
function showUsage(): void {
  console.log('Usage: npm run combine [-- --title "Manual Title"]');
  console.log("");
  console.log("Merge downloaded topics into a single markdown document with a table of contents.");
  console.log("");
  console.log("Options:");
  console.log(`  --out <dir>            Directory written by fetch (default: ${DEFAULT_OUTPUT_DIR})`);
  console.log(`  --title <text>         Document title (default: "${DEFAULT_TITLE}")`);
  console.log("  --on-missing <policy>  skip or abort when a topic was not downloaded (default: skip)");
  console.log("  --help, -h             Show this help message");
  console.log("");
  console.log("Example:");
  console.log('  npm run combine -- --title "Family Car Manual" --on-missing abort');
}

/**
 * Parse command line arguments for the combine command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @returns Parsed options; onMissing is null for an unknown policy
 */
export function parseArgs(args: string[] = process.argv.slice(2)): {
  outputDir: string;
  title: string;
  onMissing: MissingPolicy | null;
  showHelp: boolean;
} {
  return {
    outputDir: getStringArg(args, "--out", DEFAULT_OUTPUT_DIR),
    title: getStringArg(args, "--title", DEFAULT_TITLE),
    onMissing: getChoiceArg(args, "--on-missing", MISSING_POLICIES, "skip"),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Fix image paths in topic content for the combined document.
 * Topic files reference images relative to their own directory
 * (../../images/), the combined document sits next to images/.
 *
 * @param content - Markdown content with image references
 * @returns Content with corrected image paths
 */
export function fixImagePaths(content: string): string {
  return content.replace(/(?:\.\.\/)+(images\/)/g, "$1");
}

/**
 * Push every ATX heading down by the given number of levels, capped at 6.
 * Lines inside fenced code blocks are left alone.
 *
 * @example
 * shiftHeadings('# Wipers\n\n## Service position', 1) // '## Wipers\n\n### Service position'
 */
export function shiftHeadings(markdown: string, by: number): string {
  if (by <= 0) return markdown;

  let inFence = false;
  return markdown
    .split("\n")
    .map((line) => {
      if (/^(```|~~~)/.test(line)) {
        inFence = !inFence;
        return line;
      }
      if (inFence) return line;
      return line.replace(/^(#{1,6})(?=\s)/, (hashes) => "#".repeat(Math.min(hashes.length + by, 6)));
    })
    .join("\n");
}

/**
 * Anchor id of a table of contents entry, derived from its unique path.
 */
export function topicAnchor(topic: TopicEntry): string {
  return generateAnchor(topic.path);
}

/**
 * Generate a table of contents entry for a topic, indented by depth.
 *
 * @param topic - Table of contents entry
 * @returns Formatted entry (e.g., '  - [Wipers](#exterior-wipers)')
 */
export function generateTocEntry(topic: TopicEntry): string {
  const text = topic.label.replace(/[\\[\]]/g, "\\$&");
  return `${"  ".repeat(topic.depth)}- [${text}](#${topicAnchor(topic)})`;
}

/**
 * Write combined_manual.md from index.json and every topic's content.md.
 * Categories become headings; topic headings are shifted by the topic's depth
 * so the document keeps the table of contents hierarchy.
 *
 * @throws {MissingInputError} If index.json is missing, or a topic is missing under the abort policy
 */
export async function combineManual(options: CombineOptions): Promise<CombineResult> {
  const index = await readManualIndex(options.outputDir);

  if (index.topics.length === 0) {
    throw new MissingInputError(options.outputDir, "No topics found in the index.");
  }

  console.log(`Combining ${index.topics.length} topics...`);

  const parts: string[] = [];
  const skipped: TopicFailure[] = [];
  let includedCount = 0;

  // Title block with metadata
  parts.push(`# ${options.title}\n`);
  parts.push(`Fetched from: ${index.baseUrl}`);
  parts.push(`Date: ${index.fetchedAt.slice(0, 10)}`);
  parts.push(`Topics: ${index.topics.filter((topic) => !topic.isCategory).length}`);
  parts.push("\n---\n");

  parts.push("## Contents\n");
  for (const topic of index.topics) {
    parts.push(generateTocEntry(topic));
  }
  parts.push("\n---\n");

  for (const topic of index.topics) {
    const anchor = `<a id="${topicAnchor(topic)}"></a>\n`;

    if (topic.isCategory) {
      parts.push(anchor);
      parts.push(`${"#".repeat(Math.min(topic.depth + 1, 6))} ${topic.label}\n`);
      continue;
    }

    const contentPath = path.join(options.outputDir, topic.path, CONTENT_FILENAME);
    let content: string;
    try {
      content = await fs.readFile(contentPath, "utf-8");
    } catch {
      const message = `Topic "${topic.label}" [${topic.id}] was not downloaded: ${contentPath} not found`;
      if (options.onMissing === "abort") {
        throw new MissingInputError(contentPath, message);
      }
      console.error(`  Warning: Could not read ${path.join(topic.path, CONTENT_FILENAME)}, skipping.`);
      skipped.push({ id: topic.id, label: topic.label, path: topic.path, message });
      continue;
    }

    parts.push(anchor);
    parts.push(fixImagePaths(shiftHeadings(content.trimEnd(), topic.depth)));
    parts.push("\n---\n");
    includedCount++;
  }

  const outputFile = path.join(options.outputDir, COMBINED_FILENAME);
  await writeOutputFile(outputFile, parts.join("\n"));

  const stats = await fs.stat(outputFile);
  console.log(`\nCombined manual saved to: ${outputFile} (${formatSize(stats.size)})`);

  if (skipped.length > 0) {
    console.log(`\nSkipped topics (${skipped.length}):`);
    for (const { id, path: topicPath } of skipped) {
      console.log(`  ${topicPath} [${id}]`);
    }
  }

  return { outputFile, includedCount, skipped };
}

/**
 * Main entry point for the combine command.
 *
 * @throws Exits with code 1 if index.json is missing or a topic is missing under the abort policy,
 * 2 if topics were skipped
 */
export async function main(): Promise<void> {
  const { outputDir, title, onMissing, showHelp } = parseArgs();

  if (showHelp) {
    showUsage();
    process.exit(0);
  }

  if (onMissing === null) {
    console.error(`Error: --on-missing must be one of: ${MISSING_POLICIES.join(", ")}`);
    process.exit(EXIT_FATAL);
  }

  let result: CombineResult;
  try {
    result = await combineManual({ outputDir, title, onMissing });
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(EXIT_FATAL);
  }

  if (result.skipped.length > 0) {
    process.exit(EXIT_DEGRADED);
  }
}

// Only run main when executed directly (not when imported for testing)
if (isMainModule(import.meta.url)) {
  setupSignalHandlers("Combine");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(EXIT_FATAL);
  });
}
