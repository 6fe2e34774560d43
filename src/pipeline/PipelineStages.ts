import { ImageDecoder } from "imagesmith/codec/ImageDecoder";
import { ImageEncoder } from "imagesmith/codec/ImageEncoder";
import { GeometricTransformer } from "imagesmith/pipeline/GeometricTransformer";
import { WatermarkCompositor } from "imagesmith/pipeline/WatermarkCompositor";
import { ArchiveBuilder } from "imagesmith/pipeline/ArchiveBuilder";
import { SharpTextRenderer, TextRenderer } from "imagesmith/pipeline/TextRenderer";

export interface PipelineStages {
  archive: ArchiveBuilder;
  decoder: ImageDecoder;
  encoder: ImageEncoder;
  geometry: GeometricTransformer;
  watermark: WatermarkCompositor;
}

export namespace PipelineStages {
  export function create(textRenderer: TextRenderer = new SharpTextRenderer()): PipelineStages {
    return {
      archive: new ArchiveBuilder(),
      decoder: new ImageDecoder(),
      encoder: new ImageEncoder(),
      geometry: new GeometricTransformer(),
      watermark: new WatermarkCompositor(textRenderer)
    };
  }
}
