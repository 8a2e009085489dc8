import { describe, expect, it } from "vitest";
import { flattenTopicTree, stripHtmlTags } from "./toc.js";

describe("stripHtmlTags", () => {
  it("removes tags and decodes entities", () => {
    expect(stripHtmlTags("<b>Lights</b> &amp;  Vision")).toBe("Lights & Vision");
  });

  it("collapses line breaks and surrounding whitespace", () => {
    expect(stripHtmlTags("\n  Tyre\n pressure  ")).toBe("Tyre pressure");
  });

  it("returns empty string for empty input", () => {
    expect(stripHtmlTags("")).toBe("");
  });
});

describe("flattenTopicTree", () => {
  const topics = flattenTopicTree({
    trees: [
      {
        label: "<b>Manual</b>",
        children: [
          {
            label: "Lights &amp; Vision",
            linkTarget: null,
            children: [{ label: "Headlights", linkTarget: "t-1" }],
          },
          { label: "Seats", linkTarget: "t-2" },
          { label: "Seats", linkTarget: "t-3" },
          { label: "???", linkTarget: "t-4" },
          { label: "", linkTarget: "t-5" },
        ],
      },
    ],
  });

  it("lists nodes in pre-order", () => {
    expect(topics.map((topic) => topic.id)).toEqual([null, null, "t-1", "t-2", "t-3", "t-4", "t-5"]);
  });

  it("marks nodes without a link as categories", () => {
    expect(topics.map((topic) => topic.isCategory)).toEqual([true, true, false, false, false, false, false]);
  });

  it("records depth", () => {
    expect(topics.map((topic) => topic.depth)).toEqual([0, 1, 2, 1, 1, 1, 1]);
  });

  it("builds paths from sanitized labels", () => {
    expect(topics[0]).toEqual({ id: null, label: "Manual", path: "Manual", depth: 0, isCategory: true });
    expect(topics[1].label).toBe("Lights & Vision");
    expect(topics[2].path).toBe("Manual/Lights  Vision/Headlights");
  });

  it("makes duplicate sibling paths unique", () => {
    expect(topics[3].path).toBe("Manual/Seats");
    expect(topics[4].path).toBe("Manual/Seats (2)");
  });

  it("falls back to Untitled for labels without usable characters", () => {
    expect(topics[5]).toMatchObject({ label: "???", path: "Manual/Untitled" });
    expect(topics[6]).toMatchObject({ label: "Untitled", path: "Manual/Untitled (2)" });
  });

  it("returns an empty list for an empty tree", () => {
    expect(flattenTopicTree({ trees: [] })).toEqual([]);
  });
});
