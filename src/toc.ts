/**
 * Flatten the API's topic tree into the ordered table of contents
 */

import * as cheerio from "cheerio";
import type { TopicEntry, TopicTreeResponse, TreeNode } from "./types.js";
import { sanitizePathSegment } from "./utils.js";

/**
 * Reduce a label that may contain markup to plain text.
 * Entities are decoded and whitespace runs collapse to single spaces.
 *
 * @example
 * stripHtmlTags('<b>Lights</b> &amp;  Vision') // 'Lights & Vision'
 */
export function stripHtmlTags(text: string): string {
  if (!text) return "";
  const $ = cheerio.load(text, null, false);
  return $.root().text().replace(/\s+/g, " ").trim();
}

/**
 * Walk the topic tree in pre-order and list every node, categories included.
 * Each entry's path is built from the sanitized labels of its ancestors.
 * Sibling labels that sanitize to the same path get " (2)", " (3)" appended.
 *
 * @param tree - Topic tree response
 * @returns Table of contents in document order
 */
export function flattenTopicTree(tree: TopicTreeResponse): TopicEntry[] {
  const topics: TopicEntry[] = [];
  const usedPaths = new Set<string>();

  function uniquePath(candidate: string): string {
    let result = candidate;
    for (let n = 2; usedPaths.has(result); n++) {
      result = `${candidate} (${n})`;
    }
    usedPaths.add(result);
    return result;
  }

  function visit(node: TreeNode, parentPath: string, depth: number): void {
    const label = stripHtmlTags(node.label) || "Untitled";
    const segment = sanitizePathSegment(label) || "Untitled";
    const path = uniquePath(parentPath ? `${parentPath}/${segment}` : segment);
    const id = node.linkTarget ?? null;

    topics.push({ id, label, path, depth, isCategory: id === null });

    for (const child of node.children ?? []) {
      visit(child, path, depth + 1);
    }
  }

  for (const root of tree.trees) {
    visit(root, "", 0);
  }

  return topics;
}

