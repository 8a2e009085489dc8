/**
 * HTTP access to the manual's web API
 *
 * Every request carries the session cookies exported from a logged-in browser.
 */

import * as fs from "node:fs/promises";
import { ApiSchemaError, AuthenticationError, HttpError, ManualError, errorMessage } from "./errors.js";
import type { TopicContent, TopicTreeResponse, TreeNode } from "./types.js";
import { delay, isRecord } from "./utils.js";

/**
 * Realistic Chrome user agent; the API rejects requests that look scripted.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const TOPIC_TREE_PATH = "/api/vw-topic/V1/topic";
const TOPIC_CONTENT_PATH = "/api/web/V6/topic";

/** Retry behaviour for a single request */
export interface RetryOptions {
  /** Total attempts, at least 1 */
  retries: number;
  /** Wait before the second attempt (ms); doubles for every further attempt */
  backoff: number;
  /** Abort an attempt after this many ms */
  timeout: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  retries: 3,
  backoff: 1000,
  timeout: 30000,
};

/** Connection settings for {@link ManualApi} */
export interface ApiConfig extends RetryOptions {
  /** API origin (e.g., 'https://manual.example.com') */
  baseUrl: string;
  /** Language code sent with every request */
  language: string;
  /** Value of the Cookie header */
  cookies: string;
}

/**
 * Turn the content of a cookie file into a Cookie header value.
 * Accepts either the header value itself or a Netscape cookie jar
 * (seven tab-separated fields per line, name and value last).
 *
 * @example
 * parseCookieFile('session=abc; lang=nl\n') // 'session=abc; lang=nl'
 */
export function parseCookieFile(content: string): string {
  const lines = content.split(/\r?\n/);
  const jarLines = lines.filter((line) => line.split("\t").length >= 7);

  if (jarLines.length === 0) {
    return content.trim();
  }

  const pairs: string[] = [];
  for (const line of jarLines) {
    // "#HttpOnly_" marks an HttpOnly cookie, every other "#" line is a comment
    if (line.startsWith("#") && !line.startsWith("#HttpOnly_")) continue;
    const fields = line.split("\t");
    const name = fields[5].trim();
    const value = fields.slice(6).join("\t").trim();
    if (name) pairs.push(`${name}=${value}`);
  }
  return pairs.join("; ");
}

/**
 * Load session cookies from disk.
 *
 * @throws {AuthenticationError} If the file is missing or holds no cookies
 */
export async function loadCookies(file: string): Promise<string> {
  let content: string;
  try {
    content = await fs.readFile(file, "utf-8");
  } catch {
    throw new AuthenticationError(`Cookies file not found: ${file}`);
  }

  const cookies = parseCookieFile(content);
  if (!cookies) {
    throw new AuthenticationError(`Cookies file is empty: ${file}`);
  }
  return cookies;
}

/**
 * Fetch a URL and read its body, retrying transient failures with exponential backoff.
 * Network errors (including a connection lost while the body is read), timeouts,
 * 429 and 5xx responses are retried; 401 and 403 raise an AuthenticationError straight away.
 *
 * @param read - Reads the body of a successful response
 * @returns What `read` returned for the first successful attempt
 * @throws {HttpError} When every attempt failed or the status is not retryable
 */
export async function fetchWithRetry<T>(
  url: string,
  init: RequestInit,
  read: (response: Response) => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS,
): Promise<T> {
  const attempts = Math.max(1, options.retries);
  let lastError: HttpError | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const response = await fetch(url, { ...init, signal: AbortSignal.timeout(options.timeout) });

      if (response.status === 401 || response.status === 403) {
        throw new AuthenticationError(`Request rejected with HTTP ${response.status}: ${url}. Refresh the cookies file.`);
      }
      if (response.redirected && /login|signin|auth/i.test(new URL(response.url).pathname)) {
        throw new AuthenticationError(`Redirected to ${response.url}: the session has expired. Refresh the cookies file.`);
      }
      if (!response.ok) {
        throw new HttpError(url, response.status, `HTTP ${response.status} for ${url}`);
      }
      return await read(response);
    } catch (error) {
      if (error instanceof ManualError && !(error instanceof HttpError)) throw error;
      lastError =
        error instanceof HttpError
          ? error
          : new HttpError(url, undefined, `Request failed for ${url}: ${errorMessage(error)}`, { cause: error });
      if (!lastError.retryable) throw lastError;
    }

    if (attempt < attempts) {
      console.error(`  Attempt ${attempt} failed for ${url}, retrying...`);
      await delay(options.backoff * 2 ** (attempt - 1));
    }
  }

  throw lastError ?? new HttpError(url, undefined, `Request failed for ${url}`);
}

function parseTreeNode(value: unknown, url: string, where: string): TreeNode {
  if (!isRecord(value) || typeof value.label !== "string") {
    throw new ApiSchemaError(url, `${where} has no label`);
  }

  const { label, linkTarget, children } = value;
  if (linkTarget !== undefined && linkTarget !== null && typeof linkTarget !== "string") {
    throw new ApiSchemaError(url, `${where}.linkTarget must be a string`);
  }
  if (children !== undefined && !Array.isArray(children)) {
    throw new ApiSchemaError(url, `${where}.children must be an array`);
  }

  return {
    label,
    linkTarget: linkTarget ?? null,
    children: (children ?? []).map((child: unknown, i: number) => parseTreeNode(child, url, `${where}.children[${i}]`)),
  };
}

/**
 * Check the shape of a topic tree response.
 *
 * @throws {ApiSchemaError} If the response is not a tree
 */
export function parseTopicTree(data: unknown, url: string): TopicTreeResponse {
  if (!isRecord(data) || !Array.isArray(data.trees)) {
    throw new ApiSchemaError(url, "missing 'trees' array");
  }
  return { trees: data.trees.map((tree: unknown, i: number) => parseTreeNode(tree, url, `trees[${i}]`)) };
}

/**
 * Check the shape of a topic content response.
 * All fields are kept so the response can be saved verbatim.
 *
 * @throws {ApiSchemaError} If bodyHtml is missing
 */
export function parseTopicContent(data: unknown, url: string): TopicContent {
  if (!isRecord(data) || typeof data.bodyHtml !== "string") {
    throw new ApiSchemaError(url, "missing 'bodyHtml' string");
  }
  const { title } = data;
  return { ...data, bodyHtml: data.bodyHtml, title: typeof title === "string" ? title : undefined };
}

/**
 * Client for the manual's topic endpoints.
 */
export class ManualApi {
  private readonly config: ApiConfig;

  constructor(config: ApiConfig) {
    this.config = config;
  }

  /** URL of the table of contents below a root topic */
  topicTreeUrl(rootId: string): string {
    const params = new URLSearchParams({ key: rootId, displaytype: "desktop", language: this.config.language });
    return `${this.config.baseUrl}${TOPIC_TREE_PATH}?${params}`;
  }

  /** URL of a single topic's content */
  topicContentUrl(topicId: string): string {
    const params = new URLSearchParams({
      key: topicId,
      displaytype: "topic",
      language: this.config.language,
      query: "undefined",
    });
    return `${this.config.baseUrl}${TOPIC_CONTENT_PATH}?${params}`;
  }

  async fetchTopicTree(rootId: string): Promise<TopicTreeResponse> {
    const url = this.topicTreeUrl(rootId);
    return parseTopicTree(await this.requestJson(url), url);
  }

  async fetchTopicContent(topicId: string): Promise<TopicContent> {
    const url = this.topicContentUrl(topicId);
    return parseTopicContent(await this.requestJson(url), url);
  }

  /** Download an image or other binary resource */
  async fetchBinary(url: string): Promise<Buffer> {
    return fetchWithRetry(
      url,
      { headers: this.headers("*/*") },
      async (response) => Buffer.from(await response.arrayBuffer()),
      this.config,
    );
  }

  private headers(accept: string): Record<string, string> {
    return {
      Accept: accept,
      "User-Agent": DEFAULT_USER_AGENT,
      Cookie: this.config.cookies,
    };
  }

  private async requestJson(url: string): Promise<unknown> {
    const { contentType, body } = await fetchWithRetry(
      url,
      { headers: this.headers("application/json") },
      async (response) => ({ contentType: response.headers.get("content-type") ?? "", body: await response.text() }),
      this.config,
    );

    // An expired session answers with the login page instead of JSON
    if (contentType.includes("text/html")) {
      throw new AuthenticationError(`Received an HTML page instead of JSON from ${url}. Refresh the cookies file.`);
    }

    try {
      return JSON.parse(body);
    } catch {
      throw new ApiSchemaError(url, "response is not valid JSON");
    }
  }
}
