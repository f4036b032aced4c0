export function is_integer(obj: unknown): obj is number {
  return Number.isInteger(obj);
}

export function is_string(obj: unknown): obj is string {
  return typeof obj === "string";
}

// A plain object -- this is more constraining that typeof(obj) == 'object', e.g., it does
// NOT include Date or arrays.
export function is_object(obj: unknown): obj is { [key: string]: unknown } {
  return Object.prototype.toString.call(obj) === "[object Object]";
}

// Prices, rates and hours are never negative, NaN or infinite.
export function is_nonnegative_number(obj: unknown): obj is number {
  return typeof obj === "number" && isFinite(obj) && obj >= 0;
}

// Parse a number as it comes out of a table cell: either an actual number
// or a string such as " 8 " or "0.5".  Returns undefined if it isn't one.
export function to_number(obj: unknown): number | undefined {
  if (typeof obj === "number") {
    return isFinite(obj) ? obj : undefined;
  }
  if (typeof obj === "string") {
    const s = obj.trim();
    if (s === "") {
      return undefined;
    }
    const x = Number(s);
    return isFinite(x) ? x : undefined;
  }
  return undefined;
}

export function to_boolean(obj: unknown): boolean | undefined {
  if (typeof obj === "boolean") {
    return obj;
  }
  if (typeof obj === "string") {
    const s = obj.trim().toLowerCase();
    if (s === "true" || s === "yes") return true;
    if (s === "false" || s === "no" || s === "") return false;
  }
  return undefined;
}
