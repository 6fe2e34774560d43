import OpenAI from "openai";
import { serve } from "@hono/node-server";
import { Config } from "imagesmith/config/Config";
import { Logger } from "imagesmith/common/Logger";
import { PipelineStages } from "imagesmith/pipeline/PipelineStages";
import { Transformer } from "imagesmith/Transformer";
import { PreviewRenderer } from "imagesmith/PreviewRenderer";
import { ImageAnalyzer } from "imagesmith/analysis/ImageAnalyzer";
import { OpenAIImageAnalyzer } from "imagesmith/analysis/OpenAIImageAnalyzer";
import { ImageAnalysisService } from "imagesmith/analysis/ImageAnalysisService";
import { createApp } from "imagesmith/http/App";

function createAnalyzer(config: Config, log: Logger): ImageAnalyzer | undefined {
  if (config.OPENAI_API_KEY === undefined) {
    log("OPENAI_API_KEY not set: image analysis disabled.");
    return undefined;
  }
  return new OpenAIImageAnalyzer(new OpenAI({ apiKey: config.OPENAI_API_KEY }), config.OPENAI_MODEL);
}

const log = Logger.console;
const config = Config.fromEnvironment(process.env);
const stages = PipelineStages.create();

const app = createApp({
  log,
  maxUploadBytes: config.MAX_UPLOAD_BYTES,
  transformer: new Transformer(stages, log),
  previewRenderer: new PreviewRenderer(stages, log),
  analysis: new ImageAnalysisService(stages, createAnalyzer(config, log), log)
});

serve({ fetch: app.fetch, hostname: config.HOST, port: config.PORT }, info => {
  log(`Listening on http://${config.HOST}:${info.port}`);
});
