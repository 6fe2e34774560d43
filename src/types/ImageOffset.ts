/**
 * Pixel offset from the top-left corner.
 */
export interface ImageOffset {
  x: number;
  y: number;
}
