import sharp from "sharp";
import { GeometricTransformer } from "imagesmith/pipeline/GeometricTransformer";
import { GeometryUtils } from "imagesmith/common/GeometryUtils";
import { ImageDecoder } from "imagesmith/codec/ImageDecoder";
import { TransformSpec } from "imagesmith/params/TransformSpec";
import { ImageBuffer } from "imagesmith/model/ImageBuffer";
import { rawImage } from "./helpers/Images";

const transformer = new GeometricTransformer();

// 3x2 greyscale:
// 10 20 30
// 40 50 60
function sample(orientation?: number): ImageBuffer {
  return { ...rawImage(3, 2, 1, [10, 20, 30, 40, 50, 60]), orientation };
}

function blank(width: number, height: number): ImageBuffer {
  return { pixels: Buffer.alloc(width * height), width, height, channels: 1, orientation: undefined };
}

describe("Orientation normalization", () => {
  test("Orientation 6 is a clockwise quarter turn", async () => {
    const upright = await transformer.normalizeOrientation(sample(6));
    expect([upright.width, upright.height]).toEqual([2, 3]);
    expect(Array.from(upright.pixels)).toEqual([40, 10, 50, 20, 60, 30]);
    expect(upright.orientation).toBeUndefined();
  });

  test("Orientation 5 transposes across the main diagonal", async () => {
    const upright = await transformer.normalizeOrientation(sample(5));
    expect(Array.from(upright.pixels)).toEqual([10, 40, 20, 50, 30, 60]);
  });

  test("Orientation 2 mirrors left-right", async () => {
    const upright = await transformer.normalizeOrientation(sample(2));
    expect(Array.from(upright.pixels)).toEqual([30, 20, 10, 60, 50, 40]);
  });

  test.each([
    [3, [3, 2], [60, 50, 40, 30, 20, 10]],
    [4, [3, 2], [40, 50, 60, 10, 20, 30]],
    [7, [2, 3], [60, 30, 50, 20, 40, 10]],
    [8, [2, 3], [30, 60, 20, 50, 10, 40]]
  ])("Orientation %p", async (orientation, size, pixels) => {
    const upright = await transformer.normalizeOrientation(sample(orientation));
    expect([upright.width, upright.height]).toEqual(size);
    expect(Array.from(upright.pixels)).toEqual(pixels);
    expect(upright.channels).toBe(1);
  });

  test("Applying it twice equals applying it once", async () => {
    const once = await transformer.normalizeOrientation(sample(8));
    const twice = await transformer.normalizeOrientation(once);
    expect(twice).toEqual(once);
  });

  test("Decoded EXIF orientation is applied before other steps", async () => {
    const jpeg = await sharp({ create: { width: 30, height: 20, channels: 3, background: { r: 9, g: 9, b: 9 } } })
      .jpeg()
      .withMetadata({ orientation: 6 })
      .toBuffer();
    const decoded = await new ImageDecoder().decode(jpeg);
    expect([decoded.width, decoded.height, decoded.orientation]).toEqual([30, 20, 6]);

    const result = await transformer.apply(decoded, TransformSpec.identity);
    expect([result.width, result.height, result.orientation]).toEqual([20, 30, undefined]);
  });
});

describe("Rotation and flips", () => {
  test("Rotation happens before the horizontal flip", async () => {
    const result = await transformer.apply(sample(), { ...TransformSpec.identity, rotate: 90, flipHorizontal: true });
    expect([result.width, result.height]).toEqual([2, 3]);
    expect(Array.from(result.pixels)).toEqual([10, 40, 20, 50, 30, 60]);
  });

  test("Vertical flip mirrors top-bottom", async () => {
    const result = await transformer.apply(sample(), { ...TransformSpec.identity, flipVertical: true });
    expect(Array.from(result.pixels)).toEqual([40, 50, 60, 10, 20, 30]);
  });

  test("Four quarter turns restore the original dimensions", async () => {
    let image = blank(7, 3);
    for (let i = 0; i < 4; i++) {
      image = await transformer.apply(image, { ...TransformSpec.identity, rotate: 90 });
    }
    expect([image.width, image.height]).toEqual([7, 3]);
  });

  test("No requested operations leaves the buffer untouched", async () => {
    const image = sample();
    expect(await transformer.apply(image, TransformSpec.identity)).toBe(image);
  });
});

describe("Resize", () => {
  test("Percent scales and floors both sides", async () => {
    const result = await transformer.apply(blank(200, 101), {
      ...TransformSpec.identity,
      resize: { type: "percent", percent: 50 }
    });
    expect([result.width, result.height]).toEqual([100, 50]);
  });

  test("Percent never goes below one pixel", () => {
    expect(transformer.getResizeOperation({ width: 50, height: 50 }, { type: "percent", percent: 1 })).toEqual({
      type: "resize",
      size: { width: 1, height: 1 }
    });
  });

  test("Percent of 100 is skipped", () => {
    expect(transformer.getResizeOperation({ width: 50, height: 50 }, { type: "percent", percent: 100 })).toBeUndefined();
  });

  test("Exact without aspect stretches to the box", async () => {
    const result = await transformer.apply(blank(30, 30), {
      ...TransformSpec.identity,
      resize: { type: "exact", width: 50, height: 40, preserveAspect: false }
    });
    expect([result.width, result.height]).toEqual([50, 40]);
  });

  test("Exact with aspect fits a wide image to the box width", async () => {
    const result = await transformer.apply(blank(1600, 900), {
      ...TransformSpec.identity,
      resize: { type: "exact", width: 800, height: 600, preserveAspect: true }
    });
    expect([result.width, result.height]).toEqual([800, 450]);
  });

  test("A side of 0 skips the exact resize", () => {
    expect(
      transformer.getResizeOperation(
        { width: 10, height: 10 },
        { type: "exact", width: 0, height: 600, preserveAspect: false }
      )
    ).toBeUndefined();
  });

  test("Resize is computed from the rotated dimensions", () => {
    expect(
      transformer.getResizeOperation(
        { width: 900, height: 1600 },
        { type: "exact", width: 800, height: 600, preserveAspect: true }
      )
    ).toEqual({ type: "resize", size: { width: 337, height: 600 } });
  });
});

describe("GeometryUtils.fitInside", () => {
  test("Never exceeds the box and matches it on one side", () => {
    const boxes = [
      { width: 800, height: 600 },
      { width: 100, height: 100 },
      { width: 37, height: 500 }
    ];
    const sizes = [
      { width: 1600, height: 900 },
      { width: 900, height: 1600 },
      { width: 333, height: 333 },
      { width: 5, height: 2000 }
    ];
    for (const box of boxes) {
      for (const size of sizes) {
        const fitted = GeometryUtils.fitInside(size, box);
        expect(fitted.width).toBeLessThanOrEqual(box.width);
        expect(fitted.height).toBeLessThanOrEqual(box.height);
        expect(fitted.width === box.width || fitted.height === box.height).toBe(true);
      }
    }
  });
});

describe("GeometryUtils.anchorOffset", () => {
  const canvas = { width: 200, height: 100 };
  const text = { width: 40, height: 10 };

  test("Places corners with a 20 pixel margin", () => {
    expect(GeometryUtils.anchorOffset("top-left", canvas, text)).toEqual({ x: 20, y: 20 });
    expect(GeometryUtils.anchorOffset("top-right", canvas, text)).toEqual({ x: 140, y: 20 });
    expect(GeometryUtils.anchorOffset("bottom-left", canvas, text)).toEqual({ x: 20, y: 70 });
    expect(GeometryUtils.anchorOffset("bottom-right", canvas, text)).toEqual({ x: 140, y: 70 });
  });

  test("Centers with floor division", () => {
    expect(GeometryUtils.anchorOffset("center", canvas, text)).toEqual({ x: 80, y: 45 });
    expect(GeometryUtils.anchorOffset("center", { width: 201, height: 11 }, text)).toEqual({ x: 80, y: 0 });
    expect(GeometryUtils.anchorOffset("center", { width: 30, height: 100 }, text)).toEqual({ x: -5, y: 45 });
  });
});
