#!/usr/bin/env node
/**
 * Download all topics and images of a manual from its web API
 *
 * Usage: npm run fetch -- --base-url <url> --root <topic-id> [options]
 * Example: npm run fetch -- --base-url https://manual.example.com --root abc123_3_en_GB --language en_GB
 *
 * Options:
 *   --cookies <file>     Cookie file (default: cookies.txt)
 *   --out <dir>          Output directory (default: manual_output)
 *   --delay <ms>         Delay between topics (default: 300)
 *   --resume <n>         Skip the first n table of contents entries
 *   --combine            Write combined_manual.md afterwards
 */

import * as path from "node:path";
import { DEFAULT_RETRY_OPTIONS, ManualApi, loadCookies } from "./api.js";
import { type CombineResult, combineManual } from "./combine.js";
import { EXIT_DEGRADED, EXIT_FATAL, HttpError, ManualError, errorMessage } from "./errors.js";
import { IMAGES_DIRNAME, ImageStore, loadImageManifest, resolveImageUrl } from "./images.js";
import { collectImageUrls, htmlToMarkdown } from "./markdown.js";
import { flattenTopicTree, stripHtmlTags } from "./toc.js";
import type { ManualIndex, MissingPolicy, TopicEntry, TopicFailure } from "./types.js";
import {
  CONTENT_FILENAME,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_TITLE,
  INDEX_FILENAME,
  MISSING_POLICIES,
  RAW_FILENAME,
  delay,
  getChoiceArg,
  getNumberArg,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  isMainModule,
  onInterrupt,
  setupSignalHandlers,
  validateUrl,
  writeOutputFile,
} from "./utils.js";

const DEFAULT_COOKIES_FILE = "cookies.txt";
const DEFAULT_LANGUAGE = "en_GB";

// Default timing values (in ms)
const DEFAULT_TOPIC_DELAY = 300;
const DEFAULT_IMAGE_DELAY = 100;

/** Configuration options for the fetcher */
export interface FetchOptions {
  /** API origin */
  baseUrl: string;
  /** Key of the manual's root topic */
  rootTopicId: string;
  /** API language code */
  language: string;
  /** Path of the cookie file */
  cookiesFile: string;
  /** Directory receiving index.json, topics and images */
  outputDir: string;
  /** Delay between topic requests (ms) */
  topicDelay: number;
  /** Delay after each image download (ms) */
  imageDelay: number;
  /** Attempts per request */
  retries: number;
  /** Base wait between attempts (ms) */
  backoff: number;
  /** Per-request timeout (ms) */
  timeout: number;
  /** Number of table of contents entries to skip */
  resumeFrom: number;
  /** Whether to write combined_manual.md afterwards */
  combine: boolean;
  /** Title of the combined document */
  title: string;
  /** Missing-topic policy for the combine step, null if the given value is unknown */
  onMissing: MissingPolicy | null;
  /** Whether to show help and exit */
  showHelp: boolean;
}

/**
 * Print usage information for the fetch command.
 */
function showUsage(): void {
  console.log("Usage: npm run fetch -- --base-url <url> --root <topic-id> [options]");
  console.log("");
  console.log("Download every topic and image of a manual using browser session cookies.");
  console.log("");
  console.log("Options:");
  console.log("  --base-url <url>       API origin (required)");
  console.log("  --root <id>            Root topic key of the table of contents (required)");
  console.log(`  --language <code>      API language code (default: ${DEFAULT_LANGUAGE})`);
  console.log(`  --cookies <file>       Cookie file (default: ${DEFAULT_COOKIES_FILE})`);
  console.log(`  --out <dir>            Output directory (default: ${DEFAULT_OUTPUT_DIR})`);
  console.log(`  --delay <ms>           Delay between topics (default: ${DEFAULT_TOPIC_DELAY})`);
  console.log(`  --image-delay <ms>     Delay after each image (default: ${DEFAULT_IMAGE_DELAY})`);
  console.log(`  --retries <n>          Attempts per request (default: ${DEFAULT_RETRY_OPTIONS.retries})`);
  console.log(`  --backoff <ms>         First retry wait, doubled after (default: ${DEFAULT_RETRY_OPTIONS.backoff})`);
  console.log(`  --timeout <ms>         Request timeout (default: ${DEFAULT_RETRY_OPTIONS.timeout})`);
  console.log("  --resume <n>           Skip the first n table of contents entries");
  console.log("  --combine              Write combined_manual.md after fetching");
  console.log(`  --title <text>         Title of the combined document (default: "${DEFAULT_TITLE}")`);
  console.log("  --on-missing <policy>  skip or abort when combining finds a missing topic (default: skip)");
  console.log("  --help, -h             Show this help message");
  console.log("");
  console.log("Example:");
  console.log("  npm run fetch -- --base-url https://manual.example.com --root abc123_3_en_GB --combine");
}

/**
 * Parse command line arguments for the fetch command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @returns Parsed fetch options
 */
export function parseArgs(args: string[] = process.argv.slice(2)): FetchOptions {
  return {
    baseUrl: getStringArg(args, "--base-url", "").replace(/\/+$/, ""),
    rootTopicId: getStringArg(args, "--root", ""),
    language: getStringArg(args, "--language", DEFAULT_LANGUAGE),
    cookiesFile: getStringArg(args, "--cookies", DEFAULT_COOKIES_FILE),
    outputDir: getStringArg(args, "--out", DEFAULT_OUTPUT_DIR),
    topicDelay: getNumberArg(args, "--delay", DEFAULT_TOPIC_DELAY),
    imageDelay: getNumberArg(args, "--image-delay", DEFAULT_IMAGE_DELAY),
    retries: Math.max(1, getNumberArg(args, "--retries", DEFAULT_RETRY_OPTIONS.retries)),
    backoff: getNumberArg(args, "--backoff", DEFAULT_RETRY_OPTIONS.backoff),
    timeout: getNumberArg(args, "--timeout", DEFAULT_RETRY_OPTIONS.timeout),
    resumeFrom: Math.max(0, getNumberArg(args, "--resume", 0)),
    combine: hasFlag(args, "--combine"),
    title: getStringArg(args, "--title", DEFAULT_TITLE),
    onMissing: getChoiceArg(args, "--on-missing", MISSING_POLICIES, "skip"),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Display a progress bar in the terminal.
 * Shows percentage, counts, and current item title.
 *
 * @param current - Current item number (1-based)
 * @param total - Total number of items
 * @param title - Title of the current item being processed
 */
export function progressBar(current: number, total: number, title: string): void {
  const barWidth = 30;
  const percent = Math.round((current / total) * 100);
  const filled = Math.round((current / total) * barWidth);
  const empty = barWidth - filled;
  const bar = "=".repeat(filled) + " ".repeat(empty);

  // Truncate title to fit in terminal
  const maxTitleLen = 40;
  const shortTitle = title.length > maxTitleLen ? `${title.slice(0, maxTitleLen - 3)}...` : title.padEnd(maxTitleLen);

  process.stdout.write(`\r[${bar}] ${percent.toString().padStart(3)}% (${current}/${total}) ${shortTitle}`);

  if (current === total) {
    process.stdout.write("\n");
  }
}

/**
 * Relative prefix from a topic directory back to the output directory.
 *
 * @example
 * topicRootPrefix(0) // '../'
 * topicRootPrefix(2) // '../../../'
 */
export function topicRootPrefix(depth: number): string {
  return "../".repeat(depth + 1);
}

/**
 * Fetch one topic, download its images and write raw.json and content.md.
 *
 * @returns Number of image references that could not be resolved to a local file
 * @throws {HttpError} If the topic could not be fetched
 */
export async function fetchTopic(
  api: ManualApi,
  images: ImageStore,
  topic: TopicEntry,
  options: Pick<FetchOptions, "baseUrl" | "outputDir">,
): Promise<number> {
  if (topic.id === null) return 0;

  const content = await api.fetchTopicContent(topic.id);
  const imageUrls = collectImageUrls(content.bodyHtml, options.baseUrl);

  const localFiles = new Map<string, string>();
  for (const url of imageUrls) {
    const filename = await images.ensure(url);
    if (filename) localFiles.set(url, filename);
  }

  const prefix = topicRootPrefix(topic.depth);
  const markdown = htmlToMarkdown(content.bodyHtml, (src) => {
    const url = resolveImageUrl(src, options.baseUrl);
    if (!url) return src;
    const filename = localFiles.get(url);
    return filename ? `${prefix}${IMAGES_DIRNAME}/${filename}` : url;
  });

  const title = stripHtmlTags(content.title ?? "") || topic.label;
  const topicDir = path.join(options.outputDir, topic.path);

  await writeOutputFile(path.join(topicDir, CONTENT_FILENAME), `# ${title}\n\n${markdown}\n`);
  await writeOutputFile(path.join(topicDir, RAW_FILENAME), `${JSON.stringify(content, null, 2)}\n`);

  return imageUrls.length - localFiles.size;
}

/** Outcome of a fetch run */
export interface FetchResult {
  /** Full table of contents */
  topics: TopicEntry[];
  /** Topics written during this run */
  fetchedCount: number;
  /** Category entries, which carry no content */
  categoryCount: number;
  /** Topics skipped after all attempts failed */
  failures: TopicFailure[];
  /** Images downloaded during this run */
  imagesDownloaded: number;
  /** Image URLs that could not be downloaded */
  imageFailures: string[];
}

/**
 * Run the fetch stage: table of contents, then every topic in order.
 * A topic that fails after all retries is recorded and skipped;
 * authentication, schema and write errors end the run.
 *
 * @throws {ManualError} On fatal errors
 */
export async function runFetch(
  options: Omit<FetchOptions, "showHelp" | "combine" | "title" | "onMissing">,
): Promise<FetchResult> {
  console.log("Loading cookies...");
  const cookies = await loadCookies(options.cookiesFile);

  const api = new ManualApi({
    baseUrl: options.baseUrl,
    language: options.language,
    cookies,
    retries: options.retries,
    backoff: options.backoff,
    timeout: options.timeout,
  });

  console.log(`Fetching topic tree from root: ${options.rootTopicId}...`);
  const topics = flattenTopicTree(await api.fetchTopicTree(options.rootTopicId));
  console.log(`Found ${topics.length} topics to download`);

  const index: ManualIndex = {
    fetchedAt: new Date().toISOString(),
    baseUrl: options.baseUrl,
    rootTopicId: options.rootTopicId,
    language: options.language,
    topics,
  };
  const indexPath = path.join(options.outputDir, INDEX_FILENAME);
  await writeOutputFile(indexPath, `${JSON.stringify(index, null, 2)}\n`);
  console.log(`Saved topic index to ${indexPath}`);

  const images = new ImageStore(options.outputDir, api, options.imageDelay, await loadImageManifest(options.outputDir));
  const result: FetchResult = {
    topics,
    fetchedCount: 0,
    categoryCount: 0,
    failures: [],
    imagesDownloaded: 0,
    imageFailures: images.failed,
  };

  let current = options.resumeFrom;
  onInterrupt(async () => {
    await images.save();
    console.log(`Resume with: --resume ${current}`);
  });

  if (options.resumeFrom > 0) {
    console.log(`Resuming from topic ${options.resumeFrom}...`);
  }
  console.log("");

  for (let i = options.resumeFrom; i < topics.length; i++) {
    current = i;
    const topic = topics[i];

    if (topic.isCategory) {
      result.categoryCount++;
      progressBar(i + 1, topics.length, topic.label);
      continue;
    }

    try {
      await fetchTopic(api, images, topic, options);
      result.fetchedCount++;
      progressBar(i + 1, topics.length, topic.label);
    } catch (error) {
      if (!(error instanceof HttpError)) throw error;
      result.failures.push({ id: topic.id, label: topic.label, path: topic.path, message: error.message });
      progressBar(i + 1, topics.length, `FAILED: ${topic.label}`);
    }

    if (i < topics.length - 1) {
      await delay(options.topicDelay);
    }
  }

  await images.save();
  result.imagesDownloaded = images.downloadedCount;
  return result;
}

/**
 * Print fetch summary and return exit code.
 */
export function printFetchSummary(result: FetchResult, outputDir: string): number {
  console.log("");
  console.log("=".repeat(40));
  console.log("Download complete!");
  console.log(
    `Topics: ${result.fetchedCount} fetched, ${result.failures.length} failed, ${result.categoryCount} categories`,
  );
  console.log(`Images downloaded: ${result.imagesDownloaded}`);
  console.log(`Output: ${path.resolve(outputDir)}`);

  if (result.imageFailures.length > 0) {
    console.log(`\nFailed images (${result.imageFailures.length}):`);
    for (const url of result.imageFailures) {
      console.log(`  ${url}`);
    }
  }

  if (result.failures.length > 0) {
    console.log(`\nFailed topics (${result.failures.length}):`);
    for (const { id, path: topicPath, message } of result.failures) {
      console.log(`  ${topicPath} [${id}]: ${message}`);
    }
    const firstFailed = result.topics.findIndex((topic) => topic.path === result.failures[0].path);
    if (firstFailed >= 0) {
      console.log(`\nTo retry from the first failed topic, run again with: --resume ${firstFailed}`);
    }
  }

  return result.failures.length > 0 || result.imageFailures.length > 0 ? EXIT_DEGRADED : 0;
}

/**
 * Main entry point for the fetcher.
 *
 * @throws Exits with code 1 on missing options or fatal errors, 2 if any topic or image failed
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

  let exitCode: number;
  try {
    const result = await runFetch(options);
    exitCode = printFetchSummary(result, options.outputDir);

    if (options.combine) {
      console.log("");
      const combined: CombineResult = await combineManual({
        outputDir: options.outputDir,
        title: options.title,
        onMissing,
      });
      if (combined.skipped.length > 0) exitCode = EXIT_DEGRADED;
    } else {
      console.log("\nTo create a single combined file, run:");
      console.log("  npm run combine");
    }
  } catch (error) {
    const prefix = error instanceof ManualError ? `Error (${error.kind})` : "Error";
    console.error(`\n${prefix}: ${errorMessage(error)}`);
    process.exit(EXIT_FATAL);
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

// Only run main when executed directly (not when imported for testing)
if (isMainModule(import.meta.url)) {
  setupSignalHandlers("Fetch");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(EXIT_FATAL);
  });
}
