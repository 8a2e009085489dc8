/**
 * Utility functions shared by the fetch, combine and render commands
 * Extracted for testability
 */

import { realpathSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { MissingInputError, WriteError } from "./errors.js";
import type { ManualIndex, MissingPolicy, TopicEntry } from "./types.js";

// Output layout shared by all stages
export const DEFAULT_OUTPUT_DIR = "manual_output";
export const INDEX_FILENAME = "index.json";
export const CONTENT_FILENAME = "content.md";
export const RAW_FILENAME = "raw.json";

export const DEFAULT_TITLE = "Owner's Manual";
export const MISSING_POLICIES: readonly MissingPolicy[] = ["skip", "abort"];

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 */
export function onInterrupt(callback: CleanupCallback): void {
  cleanupCallbacks.push(callback);
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Fetch", "Render")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = async (signal: NodeJS.Signals) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);

    for (const callback of cleanupCallbacks) {
      try {
        await callback();
      } catch (error) {
        console.error(`Warning: cleanup failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    // 128 + signal number: SIGINT = 2, SIGTERM = 15
    const exitCode = signal === "SIGINT" ? 130 : 143;
    process.exit(exitCode);
  };

  process.on("SIGINT", (signal) => void handler(signal));
  process.on("SIGTERM", (signal) => void handler(signal));
}

/**
 * Whether the module with the given import.meta.url is the process entry point.
 * Resolves symlinks so installed bin links count as well.
 */
export function isMainModule(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return moduleUrl === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Make a label usable as a directory name.
 * Drops everything except letters, digits, underscores, whitespace and dashes,
 * then truncates to 50 characters.
 *
 * @example
 * sanitizePathSegment('Lights & Vision') // 'Lights  Vision'
 * sanitizePathSegment('Wipers/Washers') // 'WipersWashers'
 */
export function sanitizePathSegment(label: string): string {
  return label
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .slice(0, 50)
    .trim();
}

/**
 * Generate an anchor id from a heading title or topic path.
 * Slashes count as word separators.
 *
 * @example
 * generateAnchor('Hello World') // 'hello-world'
 * generateAnchor('Seats: Front row') // 'seats-front-row'
 * generateAnchor('Verlichting/Koplampen') // 'verlichting-koplampen'
 */
export function generateAnchor(title: string): string {
  return title
    .toLowerCase()
    .replace(/[ /]/g, "-")
    .replace(/[^\p{L}\p{N}_-]/gu, "")
    .replace(/^-+|-+$/g, "");
}

/**
 * Escape text for use in HTML content and attribute values.
 */
export function escapeHtml(text: string): string {
  return text
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");
}

/**
 * Format a byte count as kilobytes or megabytes.
 *
 * @example
 * formatSize(1536) // '1.5 KB'
 * formatSize(5 * 1024 * 1024) // '5.00 MB'
 */
export function formatSize(bytes: number): string {
  if (bytes >= 1024 * 1024) {
    return `${(bytes / 1024 / 1024).toFixed(2)} MB`;
  }
  return `${(bytes / 1024).toFixed(1)} KB`;
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Check if a boolean flag is present in arguments.
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--title')
 * @param defaultValue - Default value if flag not found
 * @returns The argument value or default
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  let result = defaultValue;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith("--")) {
      result = args[i + 1];
    }
  }
  return result;
}

/**
 * Get a nullable string argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--root')
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: string): string | null {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith("--")) {
      return args[i + 1];
    }
  }
  return null;
}

/**
 * Get a number argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--delay')
 * @param defaultValue - Default value if flag not found
 * @returns The parsed number or default
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1]) {
      const parsed = parseInt(args[i + 1], 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return defaultValue;
}

/**
 * Get all values for a repeatable string argument.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--skip-path')
 * @returns Array of all values for the flag
 */
export function getMultiStringArg(args: string[], flag: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith("--")) {
      values.push(args[i + 1]);
    }
  }
  return values;
}

/**
 * Get an argument restricted to a set of values.
 *
 * @returns The value, the default if the flag is absent, or null if the value is not allowed
 */
export function getChoiceArg<T extends string>(
  args: string[],
  flag: string,
  choices: readonly T[],
  defaultValue: T,
): T | null {
  const value = getNullableStringArg(args, flag);
  if (value === null) return defaultValue;
  return choices.find((choice) => choice === value) ?? null;
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @param url - URL string to validate
 * @returns Object with isValid boolean and error message if invalid
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http or https protocol' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url) {
    return { isValid: false, error: "URL is required" };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { isValid: false, error: "URL must use http or https protocol" };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: "Invalid URL format" };
  }
}

/** Result of index.json validation */
export type IndexValidationResult = { isValid: true; index: ManualIndex } | { isValid: false; error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate the structure of index.json content.
 * Checks that all required fields exist and have correct types.
 *
 * @param data - Parsed JSON data to validate
 * @returns The typed index, or an error message naming the first invalid field
 *
 * @example
 * validateManualIndex({ baseUrl: 'https://example.com' }) // { isValid: false, error: 'Missing or invalid field: fetchedAt (expected string)' }
 */
export function validateManualIndex(data: unknown): IndexValidationResult {
  if (!isRecord(data)) {
    return { isValid: false, error: "index.json must be an object" };
  }

  const { fetchedAt, baseUrl, rootTopicId, language, topics } = data;

  if (typeof fetchedAt !== "string") {
    return { isValid: false, error: "Missing or invalid field: fetchedAt (expected string)" };
  }

  if (typeof baseUrl !== "string") {
    return { isValid: false, error: "Missing or invalid field: baseUrl (expected string)" };
  }

  if (typeof rootTopicId !== "string") {
    return { isValid: false, error: "Missing or invalid field: rootTopicId (expected string)" };
  }

  if (typeof language !== "string") {
    return { isValid: false, error: "Missing or invalid field: language (expected string)" };
  }

  if (!Array.isArray(topics)) {
    return { isValid: false, error: "Missing or invalid field: topics (expected array)" };
  }

  const entries: TopicEntry[] = [];
  for (let i = 0; i < topics.length; i++) {
    const topic: unknown = topics[i];
    if (!isRecord(topic)) {
      return { isValid: false, error: `topics[${i}] must be an object` };
    }

    const { id, label, path, depth, isCategory } = topic;

    if (id !== null && typeof id !== "string") {
      return { isValid: false, error: `topics[${i}].id must be a string or null` };
    }

    if (typeof label !== "string") {
      return { isValid: false, error: `topics[${i}].label must be a string` };
    }

    if (typeof path !== "string") {
      return { isValid: false, error: `topics[${i}].path must be a string` };
    }

    if (typeof depth !== "number") {
      return { isValid: false, error: `topics[${i}].depth must be a number` };
    }

    if (typeof isCategory !== "boolean") {
      return { isValid: false, error: `topics[${i}].isCategory must be a boolean` };
    }

    entries.push({ id, label, path, depth, isCategory });
  }

  return { isValid: true, index: { fetchedAt, baseUrl, rootTopicId, language, topics: entries } };
}

/**
 * Read and validate index.json from an output directory.
 *
 * @throws {MissingInputError} If the file is missing or malformed
 */
export async function readManualIndex(outputDir: string): Promise<ManualIndex> {
  const file = path.join(outputDir, INDEX_FILENAME);

  let content: string;
  try {
    content = await fs.readFile(file, "utf-8");
  } catch {
    throw new MissingInputError(file, `${file} not found. Run 'npm run fetch' first.`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    throw new MissingInputError(file, `Invalid ${file}: not valid JSON`);
  }

  const validation = validateManualIndex(data);
  if (!validation.isValid) {
    throw new MissingInputError(file, `Invalid ${file}: ${validation.error}`);
  }
  return validation.index;
}

/**
 * Write a file, creating its directory first.
 *
 * @throws {WriteError} If the directory or file cannot be written
 */
export async function writeOutputFile(filepath: string, data: string | Buffer): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filepath), { recursive: true });
    await fs.writeFile(filepath, data);
  } catch (error) {
    throw new WriteError(filepath, error);
  }
}
