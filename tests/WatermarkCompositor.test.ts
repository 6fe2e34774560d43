import { WatermarkCompositor } from "imagesmith/pipeline/WatermarkCompositor";
import { SharpTextRenderer } from "imagesmith/pipeline/TextRenderer";
import { FakeTextRenderer, pixelAt, rawImage } from "./helpers/Images";
import { ImageBuffer } from "imagesmith/model/ImageBuffer";

function black(width: number, height: number): ImageBuffer {
  return { pixels: Buffer.alloc(width * height * 3), width, height, channels: 3, orientation: undefined };
}

describe("WatermarkCompositor", () => {
  test("Does nothing without text", async () => {
    const renderer = new FakeTextRenderer(40, 10);
    const compositor = new WatermarkCompositor(renderer);
    const image = black(200, 100);
    expect(await compositor.apply(image, undefined)).toBe(image);
    expect(await compositor.apply(image, { text: "", position: "center", opacity: 128 })).toBe(image);
    expect(renderer.rendered).toEqual([]);
  });

  test("Centers opaque white text and adds an alpha channel", async () => {
    const compositor = new WatermarkCompositor(new FakeTextRenderer(40, 10));
    const result = await compositor.apply(black(200, 100), { text: "DRAFT", position: "center", opacity: 255 });

    expect([result.width, result.height, result.channels]).toEqual([200, 100, 4]);
    // Text box spans x 80-119, y 45-54.
    expect(pixelAt(result, 80, 45)).toEqual([255, 255, 255, 255]);
    expect(pixelAt(result, 119, 54)).toEqual([255, 255, 255, 255]);
    expect(pixelAt(result, 79, 45)).toEqual([0, 0, 0, 255]);
    expect(pixelAt(result, 120, 54)).toEqual([0, 0, 0, 255]);
    expect(pixelAt(result, 80, 55)).toEqual([0, 0, 0, 255]);
  });

  test("Blends the text at the requested opacity", async () => {
    const compositor = new WatermarkCompositor(new FakeTextRenderer(40, 10));
    const result = await compositor.apply(black(200, 100), { text: "DRAFT", position: "center", opacity: 128 });
    const [r, g, b, a] = pixelAt(result, 100, 50);

    expect(a).toBe(255);
    expect(r).toBeGreaterThanOrEqual(127);
    expect(r).toBeLessThanOrEqual(129);
    expect(g).toBe(r);
    expect(b).toBe(r);
  });

  test("Places text in the bottom-right corner with a margin", async () => {
    const compositor = new WatermarkCompositor(new FakeTextRenderer(40, 10));
    const result = await compositor.apply(black(200, 100), { text: "x", position: "bottom-right", opacity: 255 });
    expect(pixelAt(result, 140, 70)).toEqual([255, 255, 255, 255]);
    expect(pixelAt(result, 179, 79)).toEqual([255, 255, 255, 255]);
    expect(pixelAt(result, 180, 79)).toEqual([0, 0, 0, 255]);
  });

  test("Converts greyscale input to RGBA before compositing", async () => {
    const compositor = new WatermarkCompositor(new FakeTextRenderer(2, 2));
    const grey = rawImage(4, 4, 1, new Array<number>(16).fill(100));
    const result = await compositor.apply(grey, { text: "x", position: "top-left", opacity: 255 });
    expect(result.channels).toBe(4);
    expect(pixelAt(result, 0, 0)).toEqual([100, 100, 100, 255]);
  });
});

describe("SharpTextRenderer", () => {
  test("Renders whitespace as an empty mask", async () => {
    expect(await new SharpTextRenderer().render("  ")).toEqual({ data: Buffer.alloc(0), width: 0, height: 0 });
  });

  test("Whitespace watermarks leave the pixels unchanged but add alpha", async () => {
    const compositor = new WatermarkCompositor(new SharpTextRenderer());
    const result = await compositor.apply(black(20, 10), { text: " ", position: "center", opacity: 255 });
    expect([result.width, result.height, result.channels]).toEqual([20, 10, 4]);
    expect(pixelAt(result, 10, 5)).toEqual([0, 0, 0, 255]);
  });
});

describe("WatermarkCompositor.buildOverlay", () => {
  const mask = { data: Buffer.from([0, 0, 0, 255, 0, 0, 0, 128]), width: 2, height: 1 };

  test("Writes white pixels with coverage scaled by opacity", () => {
    const overlay = WatermarkCompositor.buildOverlay({ width: 4, height: 2 }, mask, { x: 1, y: 1 }, 255);
    expect(Array.from(overlay.subarray(20, 28))).toEqual([255, 255, 255, 255, 255, 255, 255, 128]);
    expect(overlay.subarray(0, 20).every(x => x === 0)).toBe(true);
  });

  test("Clips glyphs outside the canvas", () => {
    const left = WatermarkCompositor.buildOverlay({ width: 4, height: 2 }, mask, { x: -1, y: 0 }, 100);
    expect(Array.from(left.subarray(0, 4))).toEqual([255, 255, 255, 50]);

    const right = WatermarkCompositor.buildOverlay({ width: 4, height: 2 }, mask, { x: 3, y: 1 }, 255);
    expect(Array.from(right.subarray(28, 32))).toEqual([255, 255, 255, 255]);
    expect(right.length).toBe(32);
  });
});

describe("SharpTextRenderer.escapeMarkup", () => {
  test("Escapes Pango markup characters", () => {
    expect(SharpTextRenderer.escapeMarkup("<b>A & B</b>")).toBe("&lt;b&gt;A &amp; B&lt;/b&gt;");
  });
});
