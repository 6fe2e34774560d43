/**
 * Parsing of the flat, string-typed form fields sent by the client. Every parser returns `undefined` for absent or
 * malformed input so callers can pick their own fallback.
 */
export namespace FormValue {
  const integerPattern = /^\s*[+-]?\d+\s*$/;

  export function integer(value: string | undefined): number | undefined {
    if (value === undefined || !integerPattern.test(value)) {
      return undefined;
    }
    return Number.parseInt(value, 10);
  }

  export function decimal(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === "") {
      return undefined;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  export function flag(value: string | undefined): boolean {
    return value === "true";
  }

  export function text(value: string | undefined): string | undefined {
    return value === undefined || value === "" ? undefined : value;
  }
}
