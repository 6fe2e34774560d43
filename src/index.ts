export { Transformer } from "imagesmith/Transformer";
export { PreviewRenderer } from "imagesmith/PreviewRenderer";
export { PipelineStages } from "imagesmith/pipeline/PipelineStages";
export { SharpTextRenderer, TextRenderer, TextMask } from "imagesmith/pipeline/TextRenderer";
export { ImageAnalysisService } from "imagesmith/analysis/ImageAnalysisService";
export { ImageAnalyzer, ImageAnalysis } from "imagesmith/analysis/ImageAnalyzer";
export { OpenAIImageAnalyzer } from "imagesmith/analysis/OpenAIImageAnalyzer";
export { ConvertParams, PreviewParams } from "imagesmith/params/ConvertParams";
export { OutputFormat, OutputFormatName } from "imagesmith/params/OutputFormat";
export { ConvertResult } from "imagesmith/model/ConvertResult";
export { PreviewResult } from "imagesmith/model/PreviewResult";
export { UploadedImage } from "imagesmith/model/UploadedImage";
export { createApp, AppDependencies } from "imagesmith/http/App";
export { Config } from "imagesmith/config/Config";
export { Logger } from "imagesmith/common/Logger";
export * from "imagesmith/types/Errors";
