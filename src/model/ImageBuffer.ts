import sharp, { Sharp } from "sharp";

/**
 * Decoded raster: interleaved 8-bit samples, row-major.
 *
 * Stages never mutate an ImageBuffer; each returns a new one.
 */
export interface ImageBuffer {
  channels: sharp.Raw["channels"];
  height: number;

  /**
   * EXIF orientation (2-8) still to be applied to the pixel data, or undefined once the pixels are upright.
   */
  orientation: number | undefined;

  pixels: Buffer;
  width: number;
}

export namespace ImageBuffer {
  export function hasAlpha(image: ImageBuffer): boolean {
    return image.channels === 2 || image.channels === 4;
  }

  export function isGrey(image: ImageBuffer): boolean {
    return image.channels <= 2;
  }

  /**
   * Greyscale buffers are written back as greyscale; sharp would otherwise widen its output to sRGB. A later
   * `toColourspace` call overrides this.
   */
  export function toSharp(image: ImageBuffer): Sharp {
    const pipeline = sharp(image.pixels, {
      raw: {
        width: image.width,
        height: image.height,
        channels: image.channels
      }
    });
    return isGrey(image) ? pipeline.toColourspace("b-w") : pipeline;
  }

  /**
   * Runs the pipeline and captures its output as raw pixels.
   */
  export async function fromSharp(pipeline: Sharp, orientation?: number): Promise<ImageBuffer> {
    const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
    return {
      pixels: data,
      width: info.width,
      height: info.height,
      channels: info.channels,
      orientation
    };
  }
}
