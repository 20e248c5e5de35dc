function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asObject(v: unknown): Record<string, unknown> | null {
  return isRecord(v) ? v : null;
}

/** Walk a parsed JSON body; any miss along the way yields undefined. */
export function dig(value: unknown, path: ReadonlyArray<string | number>): unknown {
  let cur: unknown = value;
  for (const key of path) {
    if (typeof key === "number") {
      if (!Array.isArray(cur)) return undefined;
      cur = cur[key];
    } else {
      const obj = asObject(cur);
      if (!obj) return undefined;
      cur = obj[key];
    }
  }
  return cur;
}

export function numberOrNull(v: unknown): number | null {
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

