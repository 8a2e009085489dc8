/**
 * Convert topic HTML to markdown and find the images it references
 */

import * as cheerio from "cheerio";
import TurndownService from "turndown";
import { resolveImageUrl } from "./images.js";

/** Panel types rendered as quoted notices */
const NOTICE_TYPES = ["warning", "note", "caution"];

/**
 * Source of an <img>: lazy-loaded images keep the real URL in data-src.
 */
function imageSource(getAttribute: (name: string) => string | null | undefined): string {
  return getAttribute("data-src") || getAttribute("src") || "";
}

function isElement(node: TurndownService.Node): node is HTMLElement {
  return "getAttribute" in node;
}

/**
 * List the absolute URLs of all images in a topic, in order of first appearance.
 *
 * @param html - Topic body HTML
 * @param baseUrl - Origin used to resolve relative references
 */
export function collectImageUrls(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html, null, false);
  const urls: string[] = [];

  $("img").each((_, img) => {
    const url = resolveImageUrl(imageSource((name) => $(img).attr(name)), baseUrl);
    if (url && !urls.includes(url)) urls.push(url);
  });

  return urls;
}

/**
 * Create a turndown converter that rewrites image references.
 *
 * @param imagePathFor - Maps an image's src attribute to the path written into the markdown
 */
export function createMarkdownConverter(imagePathFor: (src: string) => string): TurndownService {
  const converter = new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
  });

  converter.remove(["script", "style", "noscript", "iframe"]);

  converter.addRule("manualImage", {
    filter: "img",
    replacement: (_content, node) => {
      if (!isElement(node)) return "";
      const src = imageSource((name) => node.getAttribute(name));
      if (!src) return "";
      const alt = node.getAttribute("alt") || "image";
      return `\n![${alt}](${imagePathFor(src)})\n`;
    },
  });

  converter.addRule("notice", {
    filter: (node) => node.nodeName === "DIV" && NOTICE_TYPES.includes(node.getAttribute("data-type") ?? ""),
    replacement: (content, node) => {
      const type = isElement(node) ? (node.getAttribute("data-type") ?? "").toUpperCase() : "NOTE";
      const lines = `**${type}**: ${content.trim()}`.split("\n");
      return `\n\n${lines.map((line) => (line ? `> ${line}` : ">")).join("\n")}\n\n`;
    },
  });

  return converter;
}

/**
 * Convert a topic's HTML body to markdown.
 *
 * @param html - Topic body HTML
 * @param imagePathFor - Maps an image's src attribute to the path written into the markdown
 * @returns Markdown with runs of blank lines collapsed and surrounding whitespace removed
 */
export function htmlToMarkdown(html: string, imagePathFor: (src: string) => string): string {
  const markdown = createMarkdownConverter(imagePathFor).turndown(html);
  return markdown.replace(/\n{3,}/g, "\n\n").trim();
}
