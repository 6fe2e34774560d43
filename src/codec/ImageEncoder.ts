import { ImageBuffer } from "imagesmith/model/ImageBuffer";
import { OutputFormat } from "imagesmith/params/OutputFormat";
import { SaveParameters } from "imagesmith/model/SaveParameters";
import { BmpCodec } from "imagesmith/codec/BmpCodec";
import { assertUnreachable } from "imagesmith/common/TypeUtils";
import { EncodeError, errorMessage } from "imagesmith/types/Errors";

export class ImageEncoder {
  async encode(image: ImageBuffer, format: OutputFormat, params: SaveParameters): Promise<Buffer> {
    try {
      const coerced = await this.coerceForFormat(image, format);
      return await this.serialize(coerced, params);
    } catch (e) {
      if (e instanceof EncodeError) {
        throw e;
      }
      throw new EncodeError(`Cannot write image as ${format.name}: ${errorMessage(e)}`);
    }
  }

  /**
   * Formats without transparency get a plain RGB image. This drops any transparency the watermark introduced.
   */
  async coerceForFormat(image: ImageBuffer, format: OutputFormat): Promise<ImageBuffer> {
    if (OutputFormat.supportsTransparency(format) || !ImageBuffer.hasAlpha(image)) {
      return image;
    }
    return await ImageBuffer.fromSharp(
      ImageBuffer.toSharp(image).removeAlpha().toColourspace("srgb"),
      image.orientation
    );
  }

  private async serialize(image: ImageBuffer, params: SaveParameters): Promise<Buffer> {
    switch (params.format) {
      case "PNG":
        return await ImageBuffer.toSharp(image)
          .png({ compressionLevel: params.compressionLevel, adaptiveFiltering: params.optimize })
          .toBuffer();
      case "JPEG":
        return await ImageBuffer.toSharp(image).jpeg({ quality: params.quality }).toBuffer();
      case "WEBP":
        return await ImageBuffer.toSharp(image).webp({ quality: params.quality }).toBuffer();
      case "GIF":
        return await ImageBuffer.toSharp(image).gif().toBuffer();
      case "TIFF":
        return await ImageBuffer.toSharp(image).tiff().toBuffer();
      case "BMP":
        return BmpCodec.encode(image);
      default:
        return assertUnreachable(params);
    }
  }
}
