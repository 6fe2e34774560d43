import sharp from "sharp";

/**
 * Rasterized text cropped to its bounding box. RGBA, 4 bytes per pixel; only the alpha channel (glyph coverage) is
 * used by the compositor.
 */
export interface TextMask {
  data: Buffer;
  height: number;
  width: number;
}

export interface TextRenderer {
  render(text: string): Promise<TextMask>;
}

/**
 * Renders through libvips' Pango text input with the default sans font.
 */
export class SharpTextRenderer implements TextRenderer {
  constructor(private readonly font: string = "sans", private readonly dpi: number = 72) {}

  /**
   * Text without any visible character renders as an empty 0x0 mask; libvips refuses to render it.
   */
  async render(text: string): Promise<TextMask> {
    if (text.trim() === "") {
      return { data: Buffer.alloc(0), width: 0, height: 0 };
    }
    const { data, info } = await sharp({
      text: {
        text: SharpTextRenderer.escapeMarkup(text),
        font: this.font,
        dpi: this.dpi,
        rgba: true
      }
    })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return { data, width: info.width, height: info.height };
  }

  /**
   * sharp always parses text input as Pango markup.
   */
  static escapeMarkup(text: string): string {
    return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
  }
}
