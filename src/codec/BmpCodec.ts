import * as BMP from "bmp-js";
import { ImageBuffer } from "imagesmith/model/ImageBuffer";

/**
 * sharp (libvips) neither reads nor writes BMP, so BMP goes through bmp-js, which exchanges pixels as ABGR.
 */
export namespace BmpCodec {
  const signature = Buffer.from("BM", "latin1");

  export function isBmp(data: Buffer): boolean {
    return data.length >= signature.length && data.subarray(0, signature.length).equals(signature);
  }

  /**
   * Writes a 24-bit BMP. Alpha is ignored; callers drop it first.
   */
  export function encode(image: ImageBuffer): Buffer {
    const pixelCount = image.width * image.height;
    const abgr = Buffer.alloc(pixelCount * 4);
    const grey = ImageBuffer.isGrey(image);
    for (let i = 0; i < pixelCount; i++) {
      const src = i * image.channels;
      const r = image.pixels[src];
      const g = grey ? r : image.pixels[src + 1];
      const b = grey ? r : image.pixels[src + 2];
      const dst = i * 4;
      abgr[dst] = 0xff;
      abgr[dst + 1] = b;
      abgr[dst + 2] = g;
      abgr[dst + 3] = r;
    }
    return BMP.encode({ data: abgr, width: image.width, height: image.height }).data;
  }

  /**
   * Reads a BMP into opaque RGB pixels.
   */
  export function decode(data: Buffer): ImageBuffer {
    const bmp = BMP.decode(data);
    const pixelCount = bmp.width * bmp.height;
    const rgb = Buffer.alloc(pixelCount * 3);
    for (let i = 0; i < pixelCount; i++) {
      rgb[i * 3] = bmp.data[i * 4 + 3];
      rgb[i * 3 + 1] = bmp.data[i * 4 + 2];
      rgb[i * 3 + 2] = bmp.data[i * 4 + 1];
    }
    return { pixels: rgb, width: bmp.width, height: bmp.height, channels: 3, orientation: undefined };
  }
}
