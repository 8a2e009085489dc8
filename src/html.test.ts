import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MissingAssetError } from "./errors.js";
import { type TopicHtmlContext, imageClass, missingImagePlaceholder, prepareTopicHtml } from "./html.js";

const BASE_URL = "https://manual.example.com";

describe("imageClass", () => {
  it("recognizes QR codes", () => {
    expect(imageClass(`${BASE_URL}/api/image?key=imgqr-1.png`, "imgqr-1.png")).toBe("img-qr");
  });

  it("treats SVG images as icons", () => {
    expect(imageClass(`${BASE_URL}/api/image?key=warn.svg`, "warn.svg")).toBe("img-icon");
    expect(imageClass(`${BASE_URL}/api/image?id=5`, "5.svg")).toBe("img-icon");
  });

  it("treats everything else as figures", () => {
    expect(imageClass(`${BASE_URL}/api/image?key=seat.png`, "seat.png")).toBe("img-figure");
  });
});

describe("missingImagePlaceholder", () => {
  it("names the missing file", () => {
    expect(missingImagePlaceholder("gone.png")).toBe(
      '<span class="missing-image" role="img" aria-label="Missing image: gone.png">[image unavailable]</span>',
    );
  });
});

describe("prepareTopicHtml", () => {
  let dir: string;
  let context: TopicHtmlContext;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "manual-html-"));
    const imagesDir = path.join(dir, "images");
    await fs.mkdir(imagesDir);
    await fs.writeFile(path.join(imagesDir, "seat.png"), "png");
    await fs.writeFile(path.join(imagesDir, "warn.svg"), "<svg/>");
    await fs.writeFile(path.join(imagesDir, "imgqr-1.png"), "qr");
    context = {
      baseUrl: BASE_URL,
      imagesDir,
      manifest: { [`${BASE_URL}/api/image?key=seat.png`]: "seat.png" },
    };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("unwraps the topic wrapper and drops scripts and vendor attributes", async () => {
    const body =
      '<html><div><div class="topic-content"><p id="p1" data-foo="x" class="intro">Hello</p><script>track()</script></div></div></html>';

    const { html, missingAssets } = await prepareTopicHtml(body, context);

    expect(html).toBe("<p>Hello</p>");
    expect(missingAssets).toEqual([]);
  });

  it("embeds images found through the manifest", async () => {
    const body =
      '<p><img data-src="/api/image?key=seat.png" src="/lazy.gif" alt="Seat lever" class="media" media-link=""></p>';

    const { html } = await prepareTopicHtml(body, context);

    expect(html).toBe('<p><img src="data:image/png;base64,cG5n" class="img-figure" alt="Seat lever"></p>');
  });

  it("falls back to the derived filename and sizes icons", async () => {
    const { html } = await prepareTopicHtml('<img src="/api/image?key=warn.svg" alt="">', context);

    expect(html).toBe('<img src="data:image/svg+xml;base64,PHN2Zy8+" class="img-icon">');
  });

  it("sizes QR codes", async () => {
    const { html } = await prepareTopicHtml('<img src="/api/image?key=imgqr-1.png">', context);

    expect(html).toBe('<img src="data:image/png;base64,cXI=" class="img-qr">');
  });

  it("leaves inline images in place", async () => {
    const { html } = await prepareTopicHtml('<img src="data:image/png;base64,AAAA">', context);

    expect(html).toBe('<img src="data:image/png;base64,AAAA" class="img-figure">');
  });

  it("replaces a missing image with a placeholder and records it", async () => {
    const { html, missingAssets } = await prepareTopicHtml('<p><img src="/api/image?key=gone.png"></p>', context);

    expect(html).toBe(`<p>${missingImagePlaceholder("gone.png")}</p>`);
    expect(missingAssets).toHaveLength(1);
    expect(missingAssets[0]).toBeInstanceOf(MissingAssetError);
    expect(missingAssets[0]).toMatchObject({
      src: `${BASE_URL}/api/image?key=gone.png`,
      path: path.join(dir, "images", "gone.png"),
    });
  });

  it("keeps signal word panels", async () => {
    const body = '<div data-role="signalword-panel" class="panel warning"><p>WARNING</p></div>';

    const { html } = await prepareTopicHtml(body, context);

    expect(html).toBe('<div class="signalword-panel"><p>WARNING</p></div>');
  });

  it("turns bridgehead titles into sub-headers", async () => {
    const body = '<p data-role="bridgehead" data-type="titel">Operation &amp; care</p>';

    const { html } = await prepareTopicHtml(body, context);

    expect(html).toBe('<p class="sub-header"><strong>Operation &amp; care</strong></p>');
  });

  it("keeps inline markup inside bridgehead titles", async () => {
    const body = '<p data-role="bridgehead" data-type="titel">Use <em>only</em> approved fluid</p>';

    const { html } = await prepareTopicHtml(body, context);

    expect(html).toBe('<p class="sub-header"><strong>Use <em>only</em> approved fluid</strong></p>');
  });

  it("marks paragraphs of bold text only as sub-headers", async () => {
    const body = '<p class="intro"><strong>Maintenance</strong></p><p><strong>Note:</strong> check the oil.</p>';

    const { html } = await prepareTopicHtml(body, context);

    expect(html).toBe(
      '<p class="sub-header"><strong>Maintenance</strong></p><p><strong>Note:</strong> check the oil.</p>',
    );
  });

  it("unwraps placeholder links and keeps real ones", async () => {
    const body = '<p>See <a href="#" checked-link="true">Seats</a> and <a href="https://example.com/x">site</a>.</p>';

    const { html } = await prepareTopicHtml(body, context);

    expect(html).toBe('<p>See Seats and <a href="https://example.com/x">site</a>.</p>');
  });

  it("drops empty paragraphs", async () => {
    const { html } = await prepareTopicHtml("<p>  </p><p>Text</p>", context);

    expect(html).toBe("<p>Text</p>");
  });

  it("reads each image file once when given a shared cache", async () => {
    const shared = { ...context, dataUris: new Map<string, string>() };
    const body = '<img src="/api/image?key=seat.png">';

    await prepareTopicHtml(body, shared);
    await fs.rm(path.join(dir, "images", "seat.png"));
    const { html, missingAssets } = await prepareTopicHtml(body, shared);

    expect(html).toBe('<img src="data:image/png;base64,cG5n" class="img-figure">');
    expect(missingAssets).toEqual([]);
  });
});
