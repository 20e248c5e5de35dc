import type { RecognitionResponse, RecognizedFilamentData } from "@filament/contracts";

export function padRight(s: string, n: number): string {
  if (s.length >= n) return s;
  return s + " ".repeat(n - s.length);
}

export function truncate(s: string, n: number): string {
  if (s.length <= n) return s;
  if (n <= 3) return s.slice(0, Math.max(0, n));
  return s.slice(0, Math.max(0, n - 3)) + "...";
}

type TableValue = string | number | boolean | null | undefined;

function asCell(value: TableValue): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

export function renderTable(rows: Array<Record<string, TableValue>>): string[] {
  if (rows.length === 0) return [];
  const cols = Object.keys(rows[0] ?? {});
  const widths = new Map<string, number>();
  for (const c of cols) widths.set(c, c.length);
  for (const r of rows) {
    for (const c of cols) widths.set(c, Math.max(widths.get(c) ?? 0, asCell(r[c]).length));
  }
  const lines = [
    cols.map((c) => padRight(c, widths.get(c) ?? c.length)).join("  ").trimEnd(),
    cols.map((c) => "-".repeat(widths.get(c) ?? c.length)).join("  "),
  ];
  for (const r of rows) lines.push(cols.map((c) => padRight(asCell(r[c]), widths.get(c) ?? 0)).join("  ").trimEnd());
  return lines;
}

export function printTable(rows: Array<Record<string, TableValue>>): void {
  for (const line of renderTable(rows)) console.log(line);
}

const FIELD_LABELS: Array<[keyof RecognizedFilamentData, string]> = [
  ["brand", "Brand"],
  ["material", "Material"],
  ["colorName", "Color"],
  ["colorHex", "Hex"],
  ["weight", "Weight (g)"],
  ["diameter", "Diameter (mm)"],
  ["temperatureInfo", "Temperature"],
];

/** One row per label field; unread fields show as "-". */
export function labelRows(data: RecognizedFilamentData): Array<{ field: string; value: string }> {
  return FIELD_LABELS.map(([key, label]) => {
    const value = data[key];
    return { field: label, value: value === null ? "-" : truncate(String(value), 60) };
  });
}

export function formatConfidence(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

export function summarizeRecognition(file: string, res: RecognitionResponse): string {
  if (!res.success) return `${file}: failed (${res.error})`;
  const { brand, material, colorName } = res.data;
  const name = [brand, material, colorName].filter((v): v is string => v !== null).join(" ") || "unreadable label";
  return `${file}: ${name} [confidence ${formatConfidence(res.confidence)}]`;
}
