import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { HTTPException } from "hono/http-exception";
import { logger } from "hono/logger";
import { Logger } from "imagesmith/common/Logger";
import { Transformer } from "imagesmith/Transformer";
import { PreviewRenderer } from "imagesmith/PreviewRenderer";
import { ImageAnalysisService } from "imagesmith/analysis/ImageAnalysisService";
import { ConvertParams, PreviewParams } from "imagesmith/params/ConvertParams";
import { ConvertResult } from "imagesmith/model/ConvertResult";
import { readUpload } from "imagesmith/http/Upload";
import {
  DecodeError,
  EncodeError,
  InputError,
  UpstreamUnavailableError,
  errorMessage
} from "imagesmith/types/Errors";

export interface AppDependencies {
  analysis: ImageAnalysisService;
  log: Logger;
  maxUploadBytes: number;
  previewRenderer: PreviewRenderer;
  transformer: Transformer;
}

export function createApp({ analysis, log, maxUploadBytes, previewRenderer, transformer }: AppDependencies): Hono {
  const app = new Hono();

  app.use("*", logger(log));
  app.use(
    "/api/*",
    bodyLimit({
      maxSize: maxUploadBytes,
      onError: c => c.json({ error: `Request body exceeds ${maxUploadBytes} bytes` }, 413)
    })
  );

  app.get("/health", c => c.json({ status: "ok", analysis: analysis.available }));

  app.post("/api/convert", async c => {
    const { files, fields } = await readUpload(await c.req.parseBody({ all: true }));
    if (files.length === 0) {
      throw new InputError("No file uploaded");
    }
    const result = await transformer.convert(files, ConvertParams.parse(fields));
    return attachment(result);
  });

  app.post("/api/preview", async c => {
    const { files, fields } = await readUpload(await c.req.parseBody({ all: true }));
    const [file] = files;
    if (file === undefined) {
      throw new InputError("No file uploaded");
    }
    const preview = await previewRenderer.render(file, PreviewParams.parse(fields));
    return c.json({ success: true, preview: preview.dataUri, dimensions: preview.dimensions });
  });

  app.post("/api/analyze-image", async c => {
    analysis.assertAvailable();
    const { files } = await readUpload(await c.req.parseBody({ all: true }));
    const [file] = files;
    if (file === undefined) {
      throw new InputError("No file uploaded");
    }
    return c.json({ success: true, analysis: await analysis.analyze(file) });
  });

  app.onError((e, c) => {
    if (e instanceof HTTPException) {
      return e.getResponse();
    }
    if (e instanceof InputError || e instanceof UpstreamUnavailableError) {
      return c.json({ error: e.message }, e.status);
    }
    if (e instanceof DecodeError || e instanceof EncodeError) {
      log(`Processing failed: ${e.message}`);
      return c.json({ error: e.message }, e.status);
    }
    log(`Unexpected error: ${errorMessage(e)}`);
    return c.json({ error: errorMessage(e) }, 500);
  });

  return app;
}

function attachment(result: ConvertResult): Response {
  return new Response(new Uint8Array(result.data), {
    status: 200,
    headers: {
      "Content-Type": result.contentType,
      "Content-Disposition": contentDisposition(result.filename)
    }
  });
}

/**
 * Headers only carry Latin-1, so the quoted name is an ASCII fallback and `filename*` holds the real one.
 */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, "_");
  const encoded = encodeURIComponent(filename).replace(/['()*]/g, x => `%${x.charCodeAt(0).toString(16).toUpperCase()}`);
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}
