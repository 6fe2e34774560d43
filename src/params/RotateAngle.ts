import { FormValue } from "imagesmith/common/FormValue";

/**
 * Clockwise rotation in degrees. 0 is no rotation.
 */
export type RotateAngle = 0 | 90 | 180 | 270;

export namespace RotateAngle {
  export const defaultValue: RotateAngle = 0;

  /**
   * Any angle other than a quarter turn is treated as no rotation.
   */
  export function parse(value: string | undefined): RotateAngle {
    const degrees = FormValue.integer(value);
    switch (degrees) {
      case 90:
        return 90;
      case 180:
        return 180;
      case 270:
        return 270;
      default:
        return defaultValue;
    }
  }
}
