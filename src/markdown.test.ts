import { describe, expect, it } from "vitest";
import { collectImageUrls, htmlToMarkdown } from "./markdown.js";

const BASE_URL = "https://manual.example.com";

/** Maps an image reference to images/<last path segment> */
const toLocal = (src: string): string => `images/${src.split("/").pop()}`;

describe("collectImageUrls", () => {
  it("lists absolute URLs in order, without duplicates or inline data", () => {
    const html = [
      '<p><img data-src="/media/a.png" src="/media/lazy.gif"></p>',
      '<img src="https://cdn.example.com/b.svg">',
      '<img src="/media/a.png">',
      '<img src="data:image/png;base64,AAAA">',
    ].join("");

    expect(collectImageUrls(html, BASE_URL)).toEqual([`${BASE_URL}/media/a.png`, "https://cdn.example.com/b.svg"]);
  });

  it("returns an empty list for content without images", () => {
    expect(collectImageUrls("<p>No pictures here.</p>", BASE_URL)).toEqual([]);
  });
});

describe("htmlToMarkdown", () => {
  it("uses ATX headings", () => {
    expect(htmlToMarkdown("<h2>Seats</h2><p>Adjust the seat.</p>", toLocal)).toBe("## Seats\n\nAdjust the seat.");
  });

  it("rewrites image references", () => {
    const html = '<p>Before</p><img src="/media/a.png" alt="Seat lever">';
    expect(htmlToMarkdown(html, toLocal)).toBe("Before\n\n![Seat lever](images/a.png)");
  });

  it("prefers data-src and defaults the alt text", () => {
    const html = '<img data-src="/media/real.png" src="/media/lazy.gif">';
    expect(htmlToMarkdown(html, toLocal)).toBe("![image](images/real.png)");
  });

  it("renders warning panels as quoted notices", () => {
    const html = '<div data-type="warning"><p>Do not drive.</p></div>';
    expect(htmlToMarkdown(html, toLocal)).toBe("> **WARNING**: Do not drive.");
  });

  it("quotes every line of a multi-paragraph notice", () => {
    const html = '<div data-type="note"><p>One.</p><p>Two.</p></div>';
    expect(htmlToMarkdown(html, toLocal)).toBe("> **NOTE**: One.\n>\n> Two.");
  });

  it("treats other panels as plain content", () => {
    expect(htmlToMarkdown('<div data-type="info"><p>Plain</p></div>', toLocal)).toBe("Plain");
  });

  it("drops scripts and styles", () => {
    expect(htmlToMarkdown("<p>Text</p><script>alert(1)</script><style>p{}</style>", toLocal)).toBe("Text");
  });
});
