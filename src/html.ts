/**
 * Clean a topic's HTML body for the offline document and embed its images
 */

import * as cheerio from "cheerio";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { MissingAssetError } from "./errors.js";
import { mimeTypeFor, resolveImageUrl, urlToFilename } from "./images.js";
import type { ImageManifest } from "./types.js";
import { escapeHtml } from "./utils.js";

/** Classes that survive cleanup; everything else the vendor markup carries is dropped */
const KEPT_CLASSES = new Set(["signalword-panel", "sub-header", "img-qr", "img-icon", "img-figure", "missing-image"]);

/** Vendor attributes without meaning offline */
const DROPPED_ATTRIBUTES = new Set(["id", "media-link", "checked-link"]);

/** Where a topic's images are looked up */
export interface TopicHtmlContext {
  /** Origin used to resolve relative image references */
  baseUrl: string;
  /** Directory holding downloaded images */
  imagesDir: string;
  /** Image URL to filename mapping written by the fetch command */
  manifest: ImageManifest;
  /** Data URIs by file path, shared between topics so each file is read once */
  dataUris?: Map<string, string>;
}

/** A cleaned topic body */
export interface PreparedTopic {
  html: string;
  /** Images that were referenced but not found on disk */
  missingAssets: MissingAssetError[];
}

/**
 * Size class of an embedded image.
 *
 * @example
 * imageClass('https://example.com/imgqr/abc.png', 'abc.png') // 'img-qr'
 */
export function imageClass(url: string, filename: string): string {
  const lower = url.toLowerCase();
  if (lower.includes("imgqr")) return "img-qr";
  if (lower.includes(".svg") || path.extname(filename).toLowerCase() === ".svg") return "img-icon";
  return "img-figure";
}

/**
 * Placeholder markup for an image that could not be found.
 */
export function missingImagePlaceholder(filename: string): string {
  const label = escapeHtml(`Missing image: ${filename}`);
  return `<span class="missing-image" role="img" aria-label="${label}">[image unavailable]</span>`;
}

async function readDataUri(filepath: string, cache: Map<string, string> | undefined): Promise<string | null> {
  const cached = cache?.get(filepath);
  if (cached) return cached;

  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filepath);
  } catch {
    return null;
  }

  const dataUri = `data:${mimeTypeFor(filepath)};base64,${buffer.toString("base64")}`;
  cache?.set(filepath, dataUri);
  return dataUri;
}

/**
 * Prepare a topic body for the offline document.
 *
 * Images are embedded first because their URLs live in data-* attributes
 * that the cleanup removes afterwards.
 *
 * @param bodyHtml - bodyHtml field of a topic's raw.json
 * @param context - Where to find the topic's images
 */
export async function prepareTopicHtml(bodyHtml: string, context: TopicHtmlContext): Promise<PreparedTopic> {
  const outer = cheerio.load(bodyHtml, null, false);
  const wrapper = outer(".topic-content").first();
  const $ = wrapper.length > 0 ? cheerio.load(wrapper.html() ?? "", null, false) : outer;

  $("script, style").remove();

  const missingAssets: MissingAssetError[] = [];

  for (const img of $("img").toArray()) {
    const $img = $(img);
    const src = $img.attr("data-src") || $img.attr("src") || "";
    if (!src) {
      $img.remove();
      continue;
    }

    const url = resolveImageUrl(src, context.baseUrl);
    // Inline data needs no lookup
    if (url === null) {
      $img.attr("class", "img-figure");
      continue;
    }

    const filename = context.manifest[url] ?? urlToFilename(url);
    const filepath = path.join(context.imagesDir, filename);
    const dataUri = await readDataUri(filepath, context.dataUris);

    if (dataUri === null) {
      missingAssets.push(new MissingAssetError(url, filepath));
      $img.replaceWith(missingImagePlaceholder(filename));
      continue;
    }

    const alt = $img.attr("alt");
    const embedded = $("<img>").attr("src", dataUri).attr("class", imageClass(url, filename));
    if (alt) embedded.attr("alt", alt);
    $img.replaceWith(embedded);
  }

  $('[data-role="signalword-panel"]').addClass("signalword-panel");

  $('p[data-role="bridgehead"][data-type="titel"]').each((_, el) => {
    const inner = ($(el).html() ?? "").trim();
    $(el).replaceWith(`<p class="sub-header"><strong>${inner}</strong></p>`);
  });

  // A paragraph that is nothing but bold text works as a sub-header too
  $("p").each((_, el) => {
    const $p = $(el);
    const children = $p.children();
    if (children.length === 1 && children.is("strong") && $p.text().trim() === children.text().trim()) {
      $p.addClass("sub-header");
    }
  });

  for (const el of $.root().find("*").toArray()) {
    for (const [name, value] of Object.entries(el.attribs)) {
      if (name.startsWith("data-") || DROPPED_ATTRIBUTES.has(name) || (name === "alt" && !value)) {
        $(el).removeAttr(name);
      } else if (name === "class") {
        const kept = value.split(/\s+/).filter((cls) => KEPT_CLASSES.has(cls));
        if (kept.length > 0) {
          $(el).attr("class", kept.join(" "));
        } else {
          $(el).removeAttr("class");
        }
      }
    }
  }

  // Links into the vendor application lead nowhere offline
  $('a[href="#"]').each((_, el) => {
    $(el).replaceWith($(el).contents());
  });

  $("p").each((_, el) => {
    if ($(el).children().length === 0 && $(el).text().trim() === "") {
      $(el).remove();
    }
  });

  return { html: ($.root().html() ?? "").trim(), missingAssets };
}
