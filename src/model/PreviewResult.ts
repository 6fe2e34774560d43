import { ImageWidthHeight } from "imagesmith/types/ImageWidthHeight";

export interface PreviewResult {
  /**
   * `data:image/png;base64,...`
   */
  dataUri: string;
  dimensions: ImageWidthHeight;
}
