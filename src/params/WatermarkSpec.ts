import { clamp } from "ramda";
import { WatermarkPosition } from "imagesmith/params/WatermarkPosition";
import { FormValue } from "imagesmith/common/FormValue";
import { FormFields } from "imagesmith/types/FormFields";

export interface WatermarkSpec {
  /**
   * Alpha of the white text fill.
   *
   * @isInt
   * @minimum 0
   * @maximum 255
   */
  opacity: number;

  position: WatermarkPosition;

  text: string;
}

export namespace WatermarkSpec {
  export const defaultOpacity = 128;

  /**
   * Undefined when no watermark text was given.
   */
  export function parse(fields: FormFields): WatermarkSpec | undefined {
    const text = FormValue.text(fields.watermark_text);
    if (text === undefined) {
      return undefined;
    }
    return {
      text,
      position: WatermarkPosition.parse(fields.watermark_position),
      opacity: parseOpacity(fields.watermark_opacity)
    };
  }

  export function parseOpacity(value: string | undefined): number {
    return clamp(0, 255, FormValue.integer(value) ?? defaultOpacity);
  }
}
