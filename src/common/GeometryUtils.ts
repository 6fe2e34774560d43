import { ImageWidthHeight } from "imagesmith/types/ImageWidthHeight";
import { ImageOffset } from "imagesmith/types/ImageOffset";
import { WatermarkPosition } from "imagesmith/params/WatermarkPosition";

export class GeometryUtils {
  static readonly watermarkMarginPx = 20;

  static scaleByPercent(size: ImageWidthHeight, percent: number): ImageWidthHeight {
    return {
      width: Math.max(1, Math.floor((size.width * percent) / 100)),
      height: Math.max(1, Math.floor((size.height * percent) / 100))
    };
  }

  /**
   * Largest size with the image's aspect ratio that fits inside the box, touching it on one axis.
   *
   * Ratios are compared by cross-multiplication so that e.g. 1600x900 into 800x600 yields exactly 800x450.
   */
  static fitInside(size: ImageWidthHeight, box: ImageWidthHeight): ImageWidthHeight {
    const imageIsWider = size.width * box.height > box.width * size.height;
    if (imageIsWider) {
      return {
        width: box.width,
        height: Math.max(1, Math.floor((box.width * size.height) / size.width))
      };
    }
    return {
      width: Math.max(1, Math.floor((box.height * size.width) / size.height)),
      height: box.height
    };
  }

  /**
   * Top-left corner for a box of `content` size placed within `canvas`. May be negative when the content is larger
   * than the canvas.
   */
  static anchorOffset(
    position: WatermarkPosition,
    canvas: ImageWidthHeight,
    content: ImageWidthHeight,
    margin: number = GeometryUtils.watermarkMarginPx
  ): ImageOffset {
    switch (position) {
      case "bottom-right":
        return { x: canvas.width - content.width - margin, y: canvas.height - content.height - margin };
      case "bottom-left":
        return { x: margin, y: canvas.height - content.height - margin };
      case "top-right":
        return { x: canvas.width - content.width - margin, y: margin };
      case "top-left":
        return { x: margin, y: margin };
      case "center":
        return {
          x: Math.floor((canvas.width - content.width) / 2),
          y: Math.floor((canvas.height - content.height) / 2)
        };
    }
  }
}
