/**
 * Free-form text when the model did not reply with JSON.
 */
export type ImageAnalysis = unknown;

/**
 * Optional AI collaborator describing an image. Absent when the process has no credentials for it.
 */
export interface ImageAnalyzer {
  /**
   * @param jpegDataUri `data:image/jpeg;base64,...`
   */
  analyze(jpegDataUri: string): Promise<ImageAnalysis>;
}

export namespace ImageAnalysis {
  /**
   * Parses a JSON reply (optionally wrapped in a ```json fence); anything else is kept as text.
   */
  export function fromReply(content: string): ImageAnalysis {
    const fenced = /^\s*```(?:json)?\s*([\s\S]*?)\s*```\s*$/.exec(content);
    const candidate = fenced === null ? content : fenced[1];
    try {
      const parsed: unknown = JSON.parse(candidate);
      return parsed;
    } catch {
      return content;
    }
  }
}
