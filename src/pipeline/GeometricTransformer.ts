import { ImageBuffer } from "imagesmith/model/ImageBuffer";
import { TransformSpec } from "imagesmith/params/TransformSpec";
import { ResizeMode } from "imagesmith/params/ResizeMode";
import { ImageOperation } from "imagesmith/pipeline/ImageOperation";
import { ImageWidthHeight } from "imagesmith/types/ImageWidthHeight";
import { GeometryUtils } from "imagesmith/common/GeometryUtils";
import { assertUnreachable } from "imagesmith/common/TypeUtils";

export class GeometricTransformer {
  /**
   * Orientation normalization, rotation, horizontal flip, vertical flip, resize: always in that order.
   */
  async apply(image: ImageBuffer, spec: TransformSpec): Promise<ImageBuffer> {
    const upright = await this.normalizeOrientation(image);
    const turned = await this.applyOperations(upright, this.getOrientedOperations(spec));
    const resize = this.getResizeOperation(turned, spec.resize);
    return resize === undefined ? turned : await this.applyOperation(turned, resize);
  }

  /**
   * Applies any pending EXIF orientation and clears it, so running this twice equals running it once.
   */
  async normalizeOrientation(image: ImageBuffer): Promise<ImageBuffer> {
    if (image.orientation === undefined) {
      return image;
    }
    const upright = await this.applyOperations(image, this.getOrientationOperations(image.orientation));
    return { ...upright, orientation: undefined };
  }

  getOrientationOperations(orientation: number): ImageOperation[] {
    switch (orientation) {
      case 2:
        return [{ type: "flip", axis: "horizontal" }];
      case 3:
        return [{ type: "rotate", degrees: 180 }];
      case 4:
        return [{ type: "flip", axis: "vertical" }];
      case 5:
        return [{ type: "transpose", diagonal: "transpose" }];
      case 6:
        return [{ type: "rotate", degrees: 90 }];
      case 7:
        return [{ type: "transpose", diagonal: "transverse" }];
      case 8:
        return [{ type: "rotate", degrees: 270 }];
      default:
        return [];
    }
  }

  getOrientedOperations(spec: TransformSpec): ImageOperation[] {
    const steps: ImageOperation[] = [];
    if (spec.rotate !== 0) {
      steps.push({ type: "rotate", degrees: spec.rotate });
    }
    if (spec.flipHorizontal) {
      steps.push({ type: "flip", axis: "horizontal" });
    }
    if (spec.flipVertical) {
      steps.push({ type: "flip", axis: "vertical" });
    }
    return steps;
  }

  /**
   * Resolved against the current (already rotated) dimensions. Undefined when the resize is skipped.
   */
  getResizeOperation(current: ImageWidthHeight, mode: ResizeMode): ImageOperation | undefined {
    switch (mode.type) {
      case "none":
        return undefined;
      case "percent":
        return mode.percent === 100
          ? undefined
          : { type: "resize", size: GeometryUtils.scaleByPercent(current, mode.percent) };
      case "exact": {
        if (mode.width <= 0 || mode.height <= 0) {
          return undefined;
        }
        const box = { width: mode.width, height: mode.height };
        return { type: "resize", size: mode.preserveAspect ? GeometryUtils.fitInside(current, box) : box };
      }
      default:
        return assertUnreachable(mode);
    }
  }

  private async applyOperations(image: ImageBuffer, operations: ImageOperation[]): Promise<ImageBuffer> {
    let current = image;
    for (const operation of operations) {
      current = await this.applyOperation(current, operation);
    }
    return current;
  }

  private async applyOperation(image: ImageBuffer, operation: ImageOperation): Promise<ImageBuffer> {
    const img = ImageBuffer.toSharp(image);
    switch (operation.type) {
      case "rotate":
        return await ImageBuffer.fromSharp(img.rotate(operation.degrees), image.orientation);
      case "flip":
        // sharp's flip() mirrors top-bottom, flop() mirrors left-right.
        return await ImageBuffer.fromSharp(
          operation.axis === "horizontal" ? img.flop() : img.flip(),
          image.orientation
        );
      case "transpose": {
        // Both diagonals are a quarter turn followed by a mirror; rotate is materialized first so the mirror sees the
        // rotated axes.
        const turned = await this.applyOperation(image, { type: "rotate", degrees: 90 });
        const axis = operation.diagonal === "transpose" ? "horizontal" : "vertical";
        return await this.applyOperation(turned, { type: "flip", axis });
      }
      case "resize":
        return await ImageBuffer.fromSharp(
          img.resize(operation.size.width, operation.size.height, { fit: "fill", kernel: "lanczos3" }),
          image.orientation
        );
      default:
        return assertUnreachable(operation);
    }
  }
}
