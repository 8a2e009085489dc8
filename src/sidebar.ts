/**
 * Heading navigation for the rendered manual
 */

import type { CheerioAPI } from "cheerio";
import type { Heading, SidebarNode } from "./types.js";
import { escapeHtml, generateAnchor } from "./utils.js";

/**
 * Walk the headings of the main content in document order and give each a unique id.
 * Ids a heading already has are kept unless another element uses them first;
 * new ids come from the heading text with -2, -3 appended on collision.
 *
 * @param $ - Loaded document containing a `.main-content` element
 * @returns Headings in document order
 */
export function collectHeadings($: CheerioAPI): Heading[] {
  const headingElements = $(".main-content").find("h1, h2, h3, h4, h5, h6").toArray();
  const headingSet = new Set(headingElements);

  const usedIds = new Set<string>();
  $("[id]").each((_, el) => {
    const id = $(el).attr("id");
    if (id && !headingSet.has(el)) usedIds.add(id);
  });

  const headings: Heading[] = [];
  for (const el of headingElements) {
    const $heading = $(el);
    const text = $heading.text().replace(/\s+/g, " ").trim();
    const level = Number(el.tagName.slice(1));

    let id = $heading.attr("id") ?? "";
    if (!id || usedIds.has(id)) {
      const base = generateAnchor(text) || "section";
      id = base;
      for (let n = 2; usedIds.has(id); n++) {
        id = `${base}-${n}`;
      }
      $heading.attr("id", id);
    }
    usedIds.add(id);

    headings.push({ id, text, level });
  }

  return headings;
}

/**
 * Arrange headings into a tree. A heading becomes a child of the nearest
 * preceding heading with a lower level, or a root if there is none.
 *
 * @example
 * buildSidebarTree([
 *   { id: 'overview', text: 'Overview', level: 1 },
 *   { id: 'specs', text: 'Specs', level: 2 },
 *   { id: 'overview-2', text: 'Overview', level: 1 },
 * ])
 * // two roots named Overview, the first with child Specs
 */
export function buildSidebarTree(headings: Heading[]): SidebarNode[] {
  const roots: SidebarNode[] = [];
  const stack: SidebarNode[] = [];

  for (const heading of headings) {
    const node: SidebarNode = { ...heading, children: [] };

    while (stack.length > 0 && stack[stack.length - 1].level >= heading.level) {
      stack.pop();
    }

    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    stack.push(node);
  }

  return roots;
}

/**
 * Render a sidebar tree as nested ordered lists of links.
 *
 * @returns HTML, or an empty string for an empty tree
 */
export function renderSidebar(nodes: SidebarNode[]): string {
  if (nodes.length === 0) return "";

  const items = nodes.map(
    (node) =>
      `<li><a href="#${escapeHtml(node.id)}">${escapeHtml(node.text)}</a>${renderSidebar(node.children)}</li>`,
  );
  return `<ol>${items.join("")}</ol>`;
}
