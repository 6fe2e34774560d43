import JSZip from "jszip";
import mime from "mime";
import { EncodedOutput } from "imagesmith/model/EncodedOutput";

export class ArchiveBuilder {
  static readonly filename = "images.zip";
  static readonly contentType = mime.getType(ArchiveBuilder.filename) ?? "application/zip";

  /**
   * DEFLATE-compressed ZIP of the outputs, in order. An entry whose filename repeats an earlier one replaces it.
   */
  async build(outputs: EncodedOutput[]): Promise<Buffer> {
    const zip = new JSZip();
    for (const output of outputs) {
      zip.file(output.filename, output.data);
    }
    return await zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
  }
}
