import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  combineManual,
  fixImagePaths,
  generateTocEntry,
  main,
  parseArgs,
  shiftHeadings,
} from "./combine.js";
import { MissingInputError } from "./errors.js";
import type { ManualIndex } from "./types.js";

const INDEX: ManualIndex = {
  fetchedAt: "2026-01-15T10:00:00.000Z",
  baseUrl: "https://manual.example.com",
  rootTopicId: "root-1",
  language: "en_GB",
  topics: [
    { id: null, label: "Manual", path: "Manual", depth: 0, isCategory: true },
    { id: "t-a", label: "Seats", path: "Manual/Seats", depth: 1, isCategory: false },
    { id: "t-b", label: "Lights", path: "Manual/Lights", depth: 1, isCategory: false },
    { id: "t-c", label: "Wipers", path: "Manual/Wipers", depth: 1, isCategory: false },
  ],
};

const CONTENT: Record<string, string> = {
  "Manual/Seats": "# Seats\n\nAdjust.\n\n![Seat](../../images/seat.png)\n",
  "Manual/Lights": "# Lights\n\nSwitch on.\n",
  "Manual/Wipers": "# Wipers\n\n```\n# not a heading\n```\n",
};

async function writeFixture(dir: string, skip: string[] = []): Promise<void> {
  await fs.writeFile(path.join(dir, "index.json"), JSON.stringify(INDEX, null, 2));
  for (const [topicPath, content] of Object.entries(CONTENT)) {
    if (skip.includes(topicPath)) continue;
    await fs.mkdir(path.join(dir, topicPath), { recursive: true });
    await fs.writeFile(path.join(dir, topicPath, "content.md"), content);
  }
}

describe("parseArgs", () => {
  it("returns defaults when no args provided", () => {
    expect(parseArgs([])).toEqual({
      outputDir: "manual_output",
      title: "Owner's Manual",
      onMissing: "skip",
      showHelp: false,
    });
  });

  it("parses --out, --title and --on-missing", () => {
    expect(parseArgs(["--out", "out", "--title", "Family Car", "--on-missing", "abort"])).toEqual({
      outputDir: "out",
      title: "Family Car",
      onMissing: "abort",
      showHelp: false,
    });
  });

  it("parses --help flag", () => {
    expect(parseArgs(["--help"]).showHelp).toBe(true);
  });
});

describe("fixImagePaths", () => {
  it("rewrites image paths of any depth to images/", () => {
    expect(fixImagePaths("![a](../../images/x.png) ![b](../images/y.png)")).toBe(
      "![a](images/x.png) ![b](images/y.png)",
    );
  });

  it("preserves other paths unchanged", () => {
    expect(fixImagePaths("![alt](./other/path.jpg)")).toBe("![alt](./other/path.jpg)");
  });

  it("leaves remote image URLs alone", () => {
    expect(fixImagePaths("![x](https://manual.example.com/api/image?key=x.png)")).toBe(
      "![x](https://manual.example.com/api/image?key=x.png)",
    );
  });
});

describe("shiftHeadings", () => {
  it("pushes headings down by the given levels", () => {
    expect(shiftHeadings("# A\n\n## B", 1)).toBe("## A\n\n### B");
  });

  it("caps headings at level 6", () => {
    expect(shiftHeadings("##### E\n###### F", 2)).toBe("###### E\n###### F");
  });

  it("leaves fenced code untouched", () => {
    expect(shiftHeadings("# T\n```\n# code\n```\n# U", 1)).toBe("## T\n```\n# code\n```\n## U");
  });

  it("ignores hashes that do not start a heading", () => {
    expect(shiftHeadings("#tag and # middle", 1)).toBe("#tag and # middle");
  });

  it("returns content unchanged for depth 0", () => {
    expect(shiftHeadings("# A", 0)).toBe("# A");
  });
});

describe("generateTocEntry", () => {
  it("indents by depth and links to the path anchor", () => {
    expect(
      generateTocEntry({ id: "t-1", label: "Wipers", path: "Manual/Exterior/Wipers", depth: 2, isCategory: false }),
    ).toBe("    - [Wipers](#manual-exterior-wipers)");
  });

  it("escapes brackets in the label", () => {
    expect(
      generateTocEntry({ id: "t-2", label: "Fuses [A] and [B]", path: "Manual/Fuses A and B", depth: 1, isCategory: false }),
    ).toBe("  - [Fuses \\[A\\] and \\[B\\]](#manual-fuses-a-and-b)");
  });

  it("links top-level entries without indentation", () => {
    expect(generateTocEntry({ id: null, label: "Manual", path: "Manual", depth: 0, isCategory: true })).toBe(
      "- [Manual](#manual)",
    );
  });
});

describe("combineManual", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "manual-combine-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes the combined document in table of contents order", async () => {
    await writeFixture(dir);

    const result = await combineManual({ outputDir: dir, title: "Owner's Manual", onMissing: "skip" });

    const expected = [
      "# Owner's Manual\n",
      "Fetched from: https://manual.example.com",
      "Date: 2026-01-15",
      "Topics: 3",
      "\n---\n",
      "## Contents\n",
      "- [Manual](#manual)",
      "  - [Seats](#manual-seats)",
      "  - [Lights](#manual-lights)",
      "  - [Wipers](#manual-wipers)",
      "\n---\n",
      '<a id="manual"></a>\n',
      "# Manual\n",
      '<a id="manual-seats"></a>\n',
      "## Seats\n\nAdjust.\n\n![Seat](images/seat.png)",
      "\n---\n",
      '<a id="manual-lights"></a>\n',
      "## Lights\n\nSwitch on.",
      "\n---\n",
      '<a id="manual-wipers"></a>\n',
      "## Wipers\n\n```\n# not a heading\n```",
      "\n---\n",
    ].join("\n");

    await expect(fs.readFile(path.join(dir, "combined_manual.md"), "utf-8")).resolves.toBe(expected);
    expect(result).toEqual({ outputFile: path.join(dir, "combined_manual.md"), includedCount: 3, skipped: [] });
  });

  it("skips a missing topic with a warning under the skip policy", async () => {
    await writeFixture(dir, ["Manual/Lights"]);

    const result = await combineManual({ outputDir: dir, title: "Owner's Manual", onMissing: "skip" });
    const document = await fs.readFile(path.join(dir, "combined_manual.md"), "utf-8");

    expect(document).not.toContain("## Lights");
    expect(document.indexOf("## Seats")).toBeLessThan(document.indexOf("## Wipers"));
    expect(result.includedCount).toBe(2);
    expect(result.skipped).toEqual([
      {
        id: "t-b",
        label: "Lights",
        path: "Manual/Lights",
        message: `Topic "Lights" [t-b] was not downloaded: ${path.join(dir, "Manual/Lights", "content.md")} not found`,
      },
    ]);
    expect(console.error).toHaveBeenCalledWith(
      `  Warning: Could not read ${path.join("Manual/Lights", "content.md")}, skipping.`,
    );
  });

  it("fails naming the missing topic under the abort policy", async () => {
    await writeFixture(dir, ["Manual/Lights"]);

    const error = await combineManual({ outputDir: dir, title: "Owner's Manual", onMissing: "abort" }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(MissingInputError);
    expect(error).toMatchObject({ path: path.join(dir, "Manual/Lights", "content.md") });
    expect(String(error)).toContain('Topic "Lights" [t-b]');
    await expect(fs.access(path.join(dir, "combined_manual.md"))).rejects.toThrow();
  });

  it("fails when index.json is missing", async () => {
    await expect(combineManual({ outputDir: dir, title: "Manual", onMissing: "skip" })).rejects.toThrow(
      `${path.join(dir, "index.json")} not found. Run 'npm run fetch' first.`,
    );
  });

  it("fails when the index lists no topics", async () => {
    await fs.writeFile(path.join(dir, "index.json"), JSON.stringify({ ...INDEX, topics: [] }));

    await expect(combineManual({ outputDir: dir, title: "Manual", onMissing: "skip" })).rejects.toThrow(
      "No topics found in the index.",
    );
  });
});

describe("main", () => {
  let dir: string;
  const originalArgv = process.argv;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "manual-combine-"));
    vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    process.argv = originalArgv;
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("completes without exiting when every topic is present", async () => {
    await writeFixture(dir);
    process.argv = ["node", "combine.ts", "--out", dir];

    await main();

    expect(process.exit).not.toHaveBeenCalled();
  });

  it("exits with 2 when a topic was skipped", async () => {
    await writeFixture(dir, ["Manual/Wipers"]);
    process.argv = ["node", "combine.ts", "--out", dir];

    await expect(main()).rejects.toThrow("process.exit called");
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it("exits with 1 when aborting on a missing topic", async () => {
    await writeFixture(dir, ["Manual/Wipers"]);
    process.argv = ["node", "combine.ts", "--out", dir, "--on-missing", "abort"];

    await expect(main()).rejects.toThrow("process.exit called");
    expect(process.exit).toHaveBeenCalledWith(1);
    expect(console.error).toHaveBeenCalledWith(
      `Error: Topic "Wipers" [t-c] was not downloaded: ${path.join(dir, "Manual/Wipers", "content.md")} not found`,
    );
  });

  it("exits with 1 when index.json is missing", async () => {
    process.argv = ["node", "combine.ts", "--out", dir];

    await expect(main()).rejects.toThrow("process.exit called");
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it("exits with 1 for an unknown missing policy", async () => {
    process.argv = ["node", "combine.ts", "--on-missing", "ignore"];

    await expect(main()).rejects.toThrow("process.exit called");
    expect(console.error).toHaveBeenCalledWith("Error: --on-missing must be one of: skip, abort");
  });
});
