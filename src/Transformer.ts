import { Logger } from "imagesmith/common/Logger";
import { PipelineStages } from "imagesmith/pipeline/PipelineStages";
import { ArchiveBuilder } from "imagesmith/pipeline/ArchiveBuilder";
import { ConvertParams } from "imagesmith/params/ConvertParams";
import { OutputFormat } from "imagesmith/params/OutputFormat";
import { SaveParameters } from "imagesmith/model/SaveParameters";
import { UploadedImage } from "imagesmith/model/UploadedImage";
import { EncodedOutput } from "imagesmith/model/EncodedOutput";
import { ConvertResult } from "imagesmith/model/ConvertResult";
import { resolveSaveParameters } from "imagesmith/codec/SaveParameterResolver";
import { InputError } from "imagesmith/types/Errors";

export class Transformer {
  constructor(private readonly stages: PipelineStages, private readonly log: Logger) {}

  /**
   * Converts every file with the same settings, in order. A single output is returned as-is, several are zipped.
   * The first failure aborts the whole batch.
   */
  async convert(files: UploadedImage[], params: ConvertParams): Promise<ConvertResult> {
    if (files.length === 0) {
      throw new InputError("No file uploaded");
    }

    this.log(`Converting ${files.length} image(s) to ${params.format.name}...`);
    const saveParams = resolveSaveParameters(params.format, params.quality);
    const outputs: EncodedOutput[] = [];
    for (const file of files) {
      outputs.push(await this.convertFile(file, params, saveParams));
    }

    if (outputs.length === 1) {
      const [output] = outputs;
      this.log(`Converted ${output.filename} (${output.data.length} bytes).`);
      return {
        type: "file",
        filename: output.filename,
        contentType: params.format.contentType,
        data: output.data
      };
    }

    const data = await this.stages.archive.build(outputs);
    this.log(`Archived ${outputs.length} images (${data.length} bytes).`);
    return {
      type: "archive",
      filename: ArchiveBuilder.filename,
      contentType: ArchiveBuilder.contentType,
      data,
      fileCount: outputs.length
    };
  }

  private async convertFile(
    file: UploadedImage,
    params: ConvertParams,
    saveParams: SaveParameters
  ): Promise<EncodedOutput> {
    const decoded = await this.stages.decoder.decode(file.data);
    const transformed = await this.stages.geometry.apply(decoded, params.transform);
    const watermarked = await this.stages.watermark.apply(transformed, params.watermark);
    const data = await this.stages.encoder.encode(watermarked, params.format, saveParams);
    return { filename: Transformer.outputFilename(file.filename, params.format), data };
  }

  /**
   * Original stem (everything before the last dot) plus the target extension. Same-stem uploads collide.
   */
  static outputFilename(original: string | undefined, format: OutputFormat): string {
    const name = original === undefined || original === "" ? `image.${format.extension}` : original;
    const dot = name.lastIndexOf(".");
    const stem = dot === -1 ? name : name.substring(0, dot);
    return `${stem}.${format.extension}`;
  }
}
