import sharp from "sharp";
import { ImageBuffer } from "imagesmith/model/ImageBuffer";
import { BmpCodec } from "imagesmith/codec/BmpCodec";
import { DecodeError, errorMessage } from "imagesmith/types/Errors";

export class ImageDecoder {
  /**
   * Decodes the first frame/page. The EXIF orientation is recorded, not applied: the geometric stage normalizes it.
   */
  async decode(data: Buffer): Promise<ImageBuffer> {
    try {
      if (BmpCodec.isBmp(data)) {
        return BmpCodec.decode(data);
      }
      const image = sharp(data);
      const { channels, orientation } = await image.metadata();
      const pending = orientation === undefined || orientation === 1 ? undefined : orientation;
      const grey = channels !== undefined && channels <= 2;
      return await ImageBuffer.fromSharp(grey ? image.toColourspace("b-w") : image, pending);
    } catch (e) {
      throw new DecodeError(`Cannot identify image file: ${errorMessage(e)}`);
    }
  }
}
