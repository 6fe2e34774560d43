import { OutputFormat } from "imagesmith/params/OutputFormat";
import { OutputQuality } from "imagesmith/params/OutputQuality";
import { TransformSpec } from "imagesmith/params/TransformSpec";
import { WatermarkSpec } from "imagesmith/params/WatermarkSpec";
import { FormValue } from "imagesmith/common/FormValue";
import { FormFields } from "imagesmith/types/FormFields";

/**
 * Settings shared by every file of a conversion request.
 */
export interface ConvertParams {
  format: OutputFormat;
  quality: OutputQuality;
  transform: TransformSpec;
  watermark: WatermarkSpec | undefined;
}

/**
 * Preview only honours rotation, flips and the watermark.
 */
export interface PreviewParams {
  transform: TransformSpec;
  watermark: WatermarkSpec | undefined;
}

export namespace ConvertParams {
  /**
   * @throws InputError when the format token is not supported.
   */
  export function parse(fields: FormFields): ConvertParams {
    return {
      format: OutputFormat.resolve(FormValue.text(fields.format) ?? OutputFormat.defaultValue.name),
      quality: OutputQuality.parse(fields.quality),
      transform: TransformSpec.parse(fields),
      watermark: WatermarkSpec.parse(fields)
    };
  }
}

export namespace PreviewParams {
  export function parse(fields: FormFields): PreviewParams {
    return {
      transform: { ...TransformSpec.parse(fields), resize: { type: "none" } },
      watermark: WatermarkSpec.parse(fields)
    };
  }
}
