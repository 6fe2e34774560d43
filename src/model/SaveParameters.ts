/**
 * Encoder tuning values derived from the single user-facing quality number.
 */
export type SaveParameters = LossySaveParameters | PngSaveParameters | UntunedSaveParameters;

export interface LossySaveParameters {
  format: "JPEG" | "WEBP";

  /**
   * @minimum 1
   * @maximum 100
   */
  quality: number;
}

export interface PngSaveParameters {
  /**
   * zlib level: 0 is fastest/largest, 9 is slowest/smallest.
   */
  compressionLevel: number;
  format: "PNG";
  optimize: true;
}

export interface UntunedSaveParameters {
  format: "GIF" | "BMP" | "TIFF";
}
