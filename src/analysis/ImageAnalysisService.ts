import { ImageAnalysis, ImageAnalyzer } from "imagesmith/analysis/ImageAnalyzer";
import { PipelineStages } from "imagesmith/pipeline/PipelineStages";
import { UploadedImage } from "imagesmith/model/UploadedImage";
import { OutputFormat } from "imagesmith/params/OutputFormat";
import { OutputQuality } from "imagesmith/params/OutputQuality";
import { resolveSaveParameters } from "imagesmith/codec/SaveParameterResolver";
import { Logger } from "imagesmith/common/Logger";
import { UpstreamUnavailableError } from "imagesmith/types/Errors";

export class ImageAnalysisService {
  constructor(
    private readonly stages: PipelineStages,
    private readonly analyzer: ImageAnalyzer | undefined,
    private readonly log: Logger
  ) {}

  get available(): boolean {
    return this.analyzer !== undefined;
  }

  /**
   * @throws UpstreamUnavailableError when no analyzer is configured.
   */
  assertAvailable(): ImageAnalyzer {
    if (this.analyzer === undefined) {
      throw new UpstreamUnavailableError("AI analysis not available. Please configure OpenAI API key.");
    }
    return this.analyzer;
  }

  async analyze(file: UploadedImage): Promise<ImageAnalysis> {
    const analyzer = this.assertAvailable();
    const jpeg = OutputFormat.resolve("JPEG");
    const decoded = await this.stages.decoder.decode(file.data);
    const data = await this.stages.encoder.encode(
      decoded,
      jpeg,
      resolveSaveParameters(jpeg, OutputQuality.defaultValue)
    );
    this.log(`Requesting analysis of ${file.filename ?? "image"} (${data.length} bytes JPEG)...`);
    return await analyzer.analyze(`data:${jpeg.contentType};base64,${data.toString("base64")}`);
  }
}
