/**
 * Shared type definitions for the manual toolchain
 */

/** One entry of the flattened table of contents, stored in index.json */
export interface TopicEntry {
  /** API key of the topic, null for category headers without content */
  id: string | null;
  /** Topic label with markup stripped */
  label: string;
  /** Slash-separated chain of sanitized labels, also the topic's directory */
  path: string;
  /** Number of ancestors in the table of contents */
  depth: number;
  /** True for nodes without content of their own */
  isCategory: boolean;
}

/** Metadata for the entire manual, stored in index.json */
export interface ManualIndex {
  /** ISO timestamp of the fetch run */
  fetchedAt: string;
  /** API origin the manual was fetched from */
  baseUrl: string;
  /** Key of the root topic */
  rootTopicId: string;
  /** API language code (e.g., 'nl_NL') */
  language: string;
  /** Table of contents in document order */
  topics: TopicEntry[];
}

/** Node of the topic tree returned by the API */
export interface TreeNode {
  label: string;
  linkTarget?: string | null;
  children?: TreeNode[];
}

/** Response of the topic tree endpoint */
export interface TopicTreeResponse {
  trees: TreeNode[];
}

/** Response of the topic content endpoint, saved verbatim as raw.json */
export interface TopicContent {
  bodyHtml: string;
  title?: string;
  [key: string]: unknown;
}

/** Image URL to local filename, stored in images.json */
export type ImageManifest = Record<string, string>;

/** A topic that could not be fetched or assembled */
export interface TopicFailure {
  id: string | null;
  label: string;
  path: string;
  message: string;
}

/** Policy for topics referenced by the table of contents but absent on disk */
export type MissingPolicy = "abort" | "skip";

/** Heading found in the rendered content */
export interface Heading {
  id: string;
  text: string;
  level: number;
}

/** Entry of the generated navigation sidebar */
export interface SidebarNode extends Heading {
  children: SidebarNode[];
}
