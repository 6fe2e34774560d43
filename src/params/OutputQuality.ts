import { clamp } from "ramda";
import { FormValue } from "imagesmith/common/FormValue";

/**
 * Output Quality
 *
 * @isInt
 * @minimum 1
 * @maximum 100
 */
export type OutputQuality = number;

export namespace OutputQuality {
  export const defaultValue: OutputQuality = 85;

  export const min: OutputQuality = 1;
  export const max: OutputQuality = 100;

  /**
   * Absent and non-numeric values fall back to the default; everything else is clamped into range.
   */
  export function parse(value: string | undefined): OutputQuality {
    return clamp(min, max, FormValue.integer(value) ?? defaultValue);
  }
}
