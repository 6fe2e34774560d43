import { FormValue } from "imagesmith/common/FormValue";
import { FormFields } from "imagesmith/types/FormFields";

/**
 * How the final resize step of the geometric stage sizes the image.
 */
export type ResizeMode = ResizeModeNone | ResizeModePercent | ResizeModeExact;

export interface ResizeModeNone {
  type: "none";
}

/**
 * Scales both sides by `percent / 100`. 100 leaves the image untouched.
 */
export interface ResizeModePercent {
  percent: number;
  type: "percent";
}

/**
 * Width and height given. With `preserveAspect` the image is fitted inside the box instead of stretched to it.
 * A side of 0 or less means the resize is skipped.
 */
export interface ResizeModeExact {
  height: number;
  preserveAspect: boolean;
  type: "exact";
  width: number;
}

export namespace ResizeMode {
  export const defaultValue: ResizeMode = { type: "none" };

  /**
   * Reads `mode`, `percent`, `width`, `height` and `preserve_aspect`. Malformed numbers never fail: an unreadable
   * percent skips the resize and an unreadable side counts as 0.
   */
  export function parse(fields: FormFields): ResizeMode {
    const mode = (FormValue.text(fields.mode) ?? "none").toLowerCase();
    switch (mode) {
      case "percent": {
        const percent = FormValue.decimal(FormValue.text(fields.percent) ?? "100");
        return percent === undefined ? defaultValue : { type: "percent", percent };
      }
      case "exact":
        return {
          type: "exact",
          width: FormValue.integer(fields.width) ?? 0,
          height: FormValue.integer(fields.height) ?? 0,
          preserveAspect: FormValue.flag(fields.preserve_aspect)
        };
      default:
        return defaultValue;
    }
  }
}
