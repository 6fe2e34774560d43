import { ImageBuffer } from "imagesmith/model/ImageBuffer";
import { WatermarkSpec } from "imagesmith/params/WatermarkSpec";
import { TextMask, TextRenderer } from "imagesmith/pipeline/TextRenderer";
import { ImageWidthHeight } from "imagesmith/types/ImageWidthHeight";
import { ImageOffset } from "imagesmith/types/ImageOffset";
import { GeometryUtils } from "imagesmith/common/GeometryUtils";

export class WatermarkCompositor {
  constructor(private readonly textRenderer: TextRenderer) {}

  /**
   * Returns the image untouched when there is no text; otherwise an RGBA image with the text composited on top.
   */
  async apply(image: ImageBuffer, watermark: WatermarkSpec | undefined): Promise<ImageBuffer> {
    if (watermark === undefined || watermark.text === "") {
      return image;
    }

    const mask = await this.textRenderer.render(watermark.text);
    const offset = GeometryUtils.anchorOffset(watermark.position, image, mask);
    const overlay = WatermarkCompositor.buildOverlay(image, mask, offset, watermark.opacity);
    const rgba = await this.ensureRgba(image);

    return await ImageBuffer.fromSharp(
      ImageBuffer.toSharp(rgba).composite([
        {
          input: overlay,
          raw: { width: rgba.width, height: rgba.height, channels: 4 },
          blend: "over"
        }
      ]),
      rgba.orientation
    );
  }

  /**
   * Transparent canvas-sized RGBA layer holding the text in white, its coverage scaled by `opacity / 255`. Glyph
   * pixels falling outside the canvas are clipped.
   */
  static buildOverlay(canvas: ImageWidthHeight, mask: TextMask, offset: ImageOffset, opacity: number): Buffer {
    const overlay = Buffer.alloc(canvas.width * canvas.height * 4);
    for (let my = 0; my < mask.height; my++) {
      const y = offset.y + my;
      if (y < 0 || y >= canvas.height) {
        continue;
      }
      for (let mx = 0; mx < mask.width; mx++) {
        const x = offset.x + mx;
        if (x < 0 || x >= canvas.width) {
          continue;
        }
        const coverage = mask.data[(my * mask.width + mx) * 4 + 3];
        if (coverage === 0) {
          continue;
        }
        const dst = (y * canvas.width + x) * 4;
        overlay[dst] = 255;
        overlay[dst + 1] = 255;
        overlay[dst + 2] = 255;
        overlay[dst + 3] = Math.round((coverage * opacity) / 255);
      }
    }
    return overlay;
  }

  private async ensureRgba(image: ImageBuffer): Promise<ImageBuffer> {
    if (image.channels === 4) {
      return image;
    }
    return await ImageBuffer.fromSharp(
      ImageBuffer.toSharp(image).toColourspace("srgb").ensureAlpha(),
      image.orientation
    );
  }
}
