import { RotateAngle } from "imagesmith/params/RotateAngle";
import { ResizeMode } from "imagesmith/params/ResizeMode";
import { FormValue } from "imagesmith/common/FormValue";
import { FormFields } from "imagesmith/types/FormFields";

/**
 * Geometric operations requested for every image of a request.
 */
export interface TransformSpec {
  flipHorizontal: boolean;
  flipVertical: boolean;
  resize: ResizeMode;
  rotate: RotateAngle;
}

export namespace TransformSpec {
  export const identity: TransformSpec = {
    flipHorizontal: false,
    flipVertical: false,
    resize: ResizeMode.defaultValue,
    rotate: RotateAngle.defaultValue
  };

  export function parse(fields: FormFields): TransformSpec {
    return {
      flipHorizontal: FormValue.flag(fields.flip_horizontal),
      flipVertical: FormValue.flag(fields.flip_vertical),
      resize: ResizeMode.parse(fields),
      rotate: RotateAngle.parse(fields.rotate)
    };
  }
}
