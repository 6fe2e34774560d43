import { InputError } from "imagesmith/types/Errors";

export type OutputFormatName = "PNG" | "JPEG" | "WEBP" | "GIF" | "BMP" | "TIFF";

/**
 * Supported output image format.
 */
export interface OutputFormat {
  /**
   * Canonical encoder name.
   */
  name: OutputFormatName;

  /**
   * File extension (without the dot) given to encoded files.
   */
  extension: string;

  contentType: string;
}

export namespace OutputFormat {
  /**
   * Keyed by format, to make sure the compiler ensures we specify an extension and mime type for all supported formats.
   */
  const formats: Record<OutputFormatName, OutputFormat> = {
    PNG: { name: "PNG", extension: "png", contentType: "image/png" },
    JPEG: { name: "JPEG", extension: "jpg", contentType: "image/jpeg" },
    WEBP: { name: "WEBP", extension: "webp", contentType: "image/webp" },
    GIF: { name: "GIF", extension: "gif", contentType: "image/gif" },
    BMP: { name: "BMP", extension: "bmp", contentType: "image/bmp" },
    TIFF: { name: "TIFF", extension: "tiff", contentType: "image/tiff" }
  };

  export const defaultValue: OutputFormat = formats.PNG;

  export const all: readonly OutputFormat[] = Object.values(formats);

  export function find(token: string): OutputFormat | undefined {
    const name = token.toUpperCase();
    return all.find(x => x.name === name);
  }

  export function resolve(token: string): OutputFormat {
    const format = find(token);
    if (format === undefined) {
      throw new InputError("Unsupported format");
    }
    return format;
  }

  /**
   * Formats whose encoders reject (or silently mangle) an alpha channel.
   */
  export function supportsTransparency(format: OutputFormat): boolean {
    switch (format.name) {
      case "PNG":
      case "WEBP":
      case "GIF":
        return true;
      case "JPEG":
      case "BMP":
      case "TIFF":
        return false;
    }
  }
}
