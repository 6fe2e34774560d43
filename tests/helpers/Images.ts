import sharp from "sharp";
import { ImageBuffer } from "imagesmith/model/ImageBuffer";
import { TextMask, TextRenderer } from "imagesmith/pipeline/TextRenderer";
import { PipelineStages } from "imagesmith/pipeline/PipelineStages";

export interface Colour {
  r: number;
  g: number;
  b: number;
  alpha?: number;
}

export function solidImage(width: number, height: number, colour: Colour, channels: 3 | 4 = 3): sharp.Sharp {
  return sharp({ create: { width, height, channels, background: colour } });
}

export async function solidPng(width: number, height: number, colour: Colour, channels: 3 | 4 = 3): Promise<Buffer> {
  return await solidImage(width, height, colour, channels).png().toBuffer();
}

export function rawImage(
  width: number,
  height: number,
  channels: sharp.Raw["channels"],
  samples: number[]
): ImageBuffer {
  return { pixels: Buffer.from(samples), width, height, channels, orientation: undefined };
}

/**
 * Renders every string as a fully opaque block of a fixed size, so tests do not depend on installed fonts.
 */
export class FakeTextRenderer implements TextRenderer {
  readonly rendered: string[] = [];

  constructor(private readonly width: number, private readonly height: number) {}

  async render(text: string): Promise<TextMask> {
    this.rendered.push(text);
    return { data: Buffer.alloc(this.width * this.height * 4, 255), width: this.width, height: this.height };
  }
}

export function fakeStages(textWidth = 40, textHeight = 10): PipelineStages {
  return PipelineStages.create(new FakeTextRenderer(textWidth, textHeight));
}

export function pixelAt(image: ImageBuffer, x: number, y: number): number[] {
  const start = (y * image.width + x) * image.channels;
  return Array.from(image.pixels.subarray(start, start + image.channels));
}
