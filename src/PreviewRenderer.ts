import { Logger } from "imagesmith/common/Logger";
import { PipelineStages } from "imagesmith/pipeline/PipelineStages";
import { PreviewParams } from "imagesmith/params/ConvertParams";
import { UploadedImage } from "imagesmith/model/UploadedImage";
import { PreviewResult } from "imagesmith/model/PreviewResult";
import { ImageBuffer } from "imagesmith/model/ImageBuffer";
import { EncodeError, errorMessage } from "imagesmith/types/Errors";

export class PreviewRenderer {
  static readonly maxSidePx = 400;

  constructor(private readonly stages: PipelineStages, private readonly log: Logger) {}

  async render(file: UploadedImage, params: PreviewParams): Promise<PreviewResult> {
    const decoded = await this.stages.decoder.decode(file.data);
    const transformed = await this.stages.geometry.apply(decoded, params.transform);
    const watermarked = await this.stages.watermark.apply(transformed, params.watermark);

    let encoded: { data: Buffer; info: { width: number; height: number } };
    try {
      encoded = await ImageBuffer.toSharp(watermarked)
        .resize(PreviewRenderer.maxSidePx, PreviewRenderer.maxSidePx, {
          fit: "inside",
          withoutEnlargement: true,
          kernel: "lanczos3"
        })
        .png()
        .toBuffer({ resolveWithObject: true });
    } catch (e) {
      throw new EncodeError(`Cannot render preview: ${errorMessage(e)}`);
    }

    const { data, info } = encoded;
    this.log(`Rendered ${info.width}x${info.height} preview.`);
    return {
      dataUri: `data:image/png;base64,${data.toString("base64")}`,
      dimensions: { width: info.width, height: info.height }
    };
  }
}
