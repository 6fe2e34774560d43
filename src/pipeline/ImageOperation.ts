import { ImageWidthHeight } from "imagesmith/types/ImageWidthHeight";

/**
 * A single materialized step of the geometric stage.
 */
export type ImageOperation = RotateOperation | FlipOperation | TransposeOperation | ResizeOperation;

/**
 * Clockwise, canvas expanded to fit.
 */
export interface RotateOperation {
  degrees: 90 | 180 | 270;
  type: "rotate";
}

export interface FlipOperation {
  /**
   * "horizontal" mirrors left-right, "vertical" mirrors top-bottom.
   */
  axis: "horizontal" | "vertical";
  type: "flip";
}

/**
 * Mirror across the main diagonal ("transpose") or the anti-diagonal ("transverse").
 */
export interface TransposeOperation {
  diagonal: "transpose" | "transverse";
  type: "transpose";
}

export interface ResizeOperation {
  size: ImageWidthHeight;
  type: "resize";
}
