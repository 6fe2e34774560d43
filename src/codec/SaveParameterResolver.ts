import { clamp } from "ramda";
import { OutputFormat } from "imagesmith/params/OutputFormat";
import { OutputQuality } from "imagesmith/params/OutputQuality";
import { SaveParameters } from "imagesmith/model/SaveParameters";
import { assertUnreachable } from "imagesmith/common/TypeUtils";

/**
 * Higher quality means a lower zlib level. The divisor spreads 1-100 over the 0-9 range.
 */
const pngQualityStep = 11.12;

export function pngCompressionLevel(quality: OutputQuality): number {
  return clamp(0, 9, 9 - Math.floor(quality / pngQualityStep));
}

export function resolveSaveParameters(format: OutputFormat, quality: OutputQuality): SaveParameters {
  const q = clamp(
    OutputQuality.min,
    OutputQuality.max,
    Number.isFinite(quality) ? Math.trunc(quality) : OutputQuality.defaultValue
  );
  const name = format.name;
  switch (name) {
    case "JPEG":
    case "WEBP":
      return { format: name, quality: q };
    case "PNG":
      return { format: name, compressionLevel: pngCompressionLevel(q), optimize: true };
    case "GIF":
    case "BMP":
    case "TIFF":
      return { format: name };
    default:
      return assertUnreachable(name);
  }
}
