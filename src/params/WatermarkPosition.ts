export type WatermarkPosition = "top-left" | "top-right" | "bottom-left" | "bottom-right" | "center";

export namespace WatermarkPosition {
  export const defaultValue: WatermarkPosition = "bottom-right";

  const positions: readonly WatermarkPosition[] = ["top-left", "top-right", "bottom-left", "bottom-right", "center"];

  /**
   * Absent values take the default; anything else unrecognized, the empty string included, is centered.
   */
  export function parse(value: string | undefined): WatermarkPosition {
    if (value === undefined) {
      return defaultValue;
    }
    return positions.find(x => x === value) ?? "center";
  }
}
