#!/usr/bin/env node
/**
 * Build a single self-contained HTML manual from the downloaded topics
 *
 * Usage: npm run render [-- --title "Manual Title"]
 */

import * as cheerio from "cheerio";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { parseTopicContent } from "./api.js";
import { EXIT_DEGRADED, EXIT_FATAL, type MissingAssetError, MissingInputError, errorMessage } from "./errors.js";
import { prepareTopicHtml } from "./html.js";
import { IMAGES_DIRNAME, loadImageManifest } from "./images.js";
import { buildSidebarTree, collectHeadings, renderSidebar } from "./sidebar.js";
import type { MissingPolicy, TopicContent, TopicEntry, TopicFailure } from "./types.js";
import {
  DEFAULT_OUTPUT_DIR,
  DEFAULT_TITLE,
  MISSING_POLICIES,
  RAW_FILENAME,
  escapeHtml,
  formatSize,
  generateAnchor,
  getChoiceArg,
  getMultiStringArg,
  getStringArg,
  hasHelpFlag,
  isMainModule,
  readManualIndex,
  setupSignalHandlers,
  writeOutputFile,
} from "./utils.js";

export const HTML_FILENAME = "manual.html";

/** Stylesheet and client script, next to src/ and dist/ alike */
const ASSETS_DIR = fileURLToPath(new URL("../assets/", import.meta.url));

/** Options for {@link renderManual} */
export interface RenderOptions {
  /** Directory written by the fetch command */
  outputDir: string;
  /** Title of the document */
  title: string;
  /** What to do with topics whose raw.json is missing */
  onMissing: MissingPolicy;
  /** Table of contents paths to leave out, including everything below them */
  skipPaths: string[];
}

/** Outcome of a render run */
export interface RenderResult {
  /** Path of the written document */
  outputFile: string;
  /** Topics whose content was rendered */
  renderedCount: number;
  /** Topics left out because their raw.json was missing or unreadable */
  skipped: TopicFailure[];
  /** Images that were referenced but not found */
  missingAssets: MissingAssetError[];
  /** Size of the written document in bytes */
  size: number;
}

/** Contents of the rendered page */
export interface ManualPage {
  title: string;
  /** BCP 47 language tag of the content */
  lang: string;
  body: string;
  css: string;
  script: string;
}

/**
 * Print usage information for the render command.
 */
function showUsage(): void {
  console.log('Usage: npm run render [-- --title "Manual Title"]');
  console.log("");
  console.log("Build a single self-contained HTML file from the downloaded topics.");
  console.log("");
  console.log("Options:");
  console.log(`  --out <dir>            Directory written by fetch (default: ${DEFAULT_OUTPUT_DIR})`);
  console.log(`  --title <text>         Document title (default: "${DEFAULT_TITLE}")`);
  console.log("  --on-missing <policy>  skip or abort when a topic was not downloaded (default: skip)");
  console.log("  --skip-path <path>     Leave a table of contents path out (can be repeated)");
  console.log("  --help, -h             Show this help message");
  console.log("");
  console.log("Example:");
  console.log('  npm run render -- --title "Family Car Manual" --skip-path "Manual/Legal notices"');
}

/**
 * Parse command line arguments for the render command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @returns Parsed options; onMissing is null for an unknown policy
 */
export function parseArgs(args: string[] = process.argv.slice(2)): {
  outputDir: string;
  title: string;
  onMissing: MissingPolicy | null;
  skipPaths: string[];
  showHelp: boolean;
} {
  return {
    outputDir: getStringArg(args, "--out", DEFAULT_OUTPUT_DIR),
    title: getStringArg(args, "--title", DEFAULT_TITLE),
    onMissing: getChoiceArg(args, "--on-missing", MISSING_POLICIES, "skip"),
    skipPaths: getMultiStringArg(args, "--skip-path"),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Whether a table of contents entry lies at or below one of the skipped paths.
 */
export function isSkippedPath(topicPath: string, skipPaths: string[]): boolean {
  return skipPaths.some((skip) => topicPath === skip || topicPath.startsWith(`${skip}/`));
}

/**
 * Heading level of a table of contents entry, capped at 6.
 */
export function headingLevel(depth: number): number {
  return Math.min(depth + 1, 6);
}

/**
 * Turn an API language code into an HTML language tag.
 *
 * @example
 * toLanguageTag('en_GB') // 'en-GB'
 */
export function toLanguageTag(language: string): string {
  return language.replace(/_/g, "-");
}

/**
 * Build the complete page around the rendered topics.
 * The sidebar is filled in once the headings of the body are known.
 */
export function buildPage(page: ManualPage): string {
  return `<!DOCTYPE html>
<html lang="${escapeHtml(page.lang)}">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(page.title)}</title>
<style>
${page.css}
</style>
</head>
<body>
<button type="button" class="sidebar-toggle" aria-controls="sidebar" aria-expanded="false">Contents</button>
<nav class="sidebar" id="sidebar" aria-label="Contents"></nav>
<header class="document-header">
<h1 class="document-title">${escapeHtml(page.title)}</h1>
</header>
<main class="main-content">
${page.body}
</main>
<script>
${page.script}
</script>
</body>
</html>
`;
}

async function readTopicContent(topic: TopicEntry, outputDir: string): Promise<TopicContent> {
  const file = path.join(outputDir, topic.path, RAW_FILENAME);

  let content: string;
  try {
    content = await fs.readFile(file, "utf-8");
  } catch {
    throw new MissingInputError(file, `Topic "${topic.label}" [${topic.id}] was not downloaded: ${file} not found`);
  }

  try {
    return parseTopicContent(JSON.parse(content), file);
  } catch (error) {
    throw new MissingInputError(file, `Topic "${topic.label}" [${topic.id}] has an unreadable ${file}: ${errorMessage(error)}`);
  }
}

/**
 * Write manual.html from index.json, the topics' raw.json files and the downloaded images.
 *
 * @throws {MissingInputError} If index.json is missing, or a topic is missing under the abort policy
 */
export async function renderManual(options: RenderOptions): Promise<RenderResult> {
  const index = await readManualIndex(options.outputDir);
  const manifest = await loadImageManifest(options.outputDir);
  const topics = index.topics.filter((topic) => !isSkippedPath(topic.path, options.skipPaths));

  console.log(`Rendering ${topics.length} entries...`);

  const imageContext = {
    baseUrl: index.baseUrl,
    imagesDir: path.join(options.outputDir, IMAGES_DIRNAME),
    manifest,
    dataUris: new Map<string, string>(),
  };

  const parts: string[] = [];
  const skipped: TopicFailure[] = [];
  const missingAssets: MissingAssetError[] = [];
  let renderedCount = 0;

  for (let i = 0; i < topics.length; i++) {
    const topic = topics[i];
    const level = headingLevel(topic.depth);
    const anchor = escapeHtml(generateAnchor(topic.path));
    const label = escapeHtml(topic.label);

    if (topic.isCategory) {
      parts.push(`<h${level} class="category-header" id="${anchor}">${label}</h${level}>`);
      continue;
    }

    let content: TopicContent;
    try {
      content = await readTopicContent(topic, options.outputDir);
    } catch (error) {
      if (!(error instanceof MissingInputError) || options.onMissing === "abort") throw error;
      console.error(`  Warning: ${error.message}, skipping.`);
      skipped.push({ id: topic.id, label: topic.label, path: topic.path, message: error.message });
      continue;
    }

    const prepared = await prepareTopicHtml(content.bodyHtml, imageContext);
    for (const missing of prepared.missingAssets) {
      console.error(`  Warning: ${missing.message} in "${topic.label}"`);
    }
    missingAssets.push(...prepared.missingAssets);

    parts.push(
      `<section class="topic-section" id="${anchor}">\n<h${level}>${label}</h${level}>\n${prepared.html}\n</section>`,
    );
    renderedCount++;

    if ((i + 1) % 50 === 0) {
      console.log(`  Processed ${i + 1}/${topics.length} entries...`);
    }
  }

  const [css, script] = await Promise.all([
    fs.readFile(path.join(ASSETS_DIR, "manual.css"), "utf-8"),
    fs.readFile(path.join(ASSETS_DIR, "manual.js"), "utf-8"),
  ]);

  const $ = cheerio.load(
    buildPage({ title: options.title, lang: toLanguageTag(index.language), body: parts.join("\n"), css, script }),
  );
  $("nav.sidebar").html(renderSidebar(buildSidebarTree(collectHeadings($))));

  const outputFile = path.join(options.outputDir, HTML_FILENAME);
  await writeOutputFile(outputFile, $.html());

  const { size } = await fs.stat(outputFile);
  console.log(`\nCreated: ${outputFile}`);
  console.log(`Size: ${formatSize(size)}`);

  return { outputFile, renderedCount, skipped, missingAssets, size };
}

/**
 * Print what was left out of the document.
 *
 * @returns Exit code: 0 if the document is complete, 2 if anything is missing
 */
export function printRenderSummary(result: RenderResult): number {
  console.log(`\nRendered ${result.renderedCount} topics.`);

  if (result.skipped.length > 0) {
    console.log(`\nSkipped topics (${result.skipped.length}):`);
    for (const { id, path: topicPath } of result.skipped) {
      console.log(`  ${topicPath} [${id}]`);
    }
  }

  if (result.missingAssets.length > 0) {
    console.log(`\nMissing images (${result.missingAssets.length}):`);
    for (const asset of result.missingAssets) {
      console.log(`  ${asset.path}`);
    }
  }

  return result.skipped.length > 0 || result.missingAssets.length > 0 ? EXIT_DEGRADED : 0;
}

/**
 * Main entry point for the render command.
 *
 * @throws Exits with code 1 on a fatal error or an aborted run, 2 if the document is incomplete
 */
export async function main(): Promise<void> {
  const { outputDir, title, onMissing, skipPaths, showHelp } = parseArgs();

  if (showHelp) {
    showUsage();
    process.exit(0);
  }

  if (onMissing === null) {
    console.error(`Error: --on-missing must be one of: ${MISSING_POLICIES.join(", ")}`);
    process.exit(EXIT_FATAL);
  }

  let result: RenderResult;
  try {
    result = await renderManual({ outputDir, title, onMissing, skipPaths });
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(EXIT_FATAL);
  }

  const exitCode = printRenderSummary(result);
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

// Only run main when executed directly (not when imported for testing)
if (isMainModule(import.meta.url)) {
  setupSignalHandlers("Render");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(EXIT_FATAL);
  });
}
