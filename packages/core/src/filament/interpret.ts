/**
 * Turns a vision model's reply into a normalized filament record.
 *
 * Models are asked for bare JSON but routinely wrap it in a markdown fence or
 * a sentence of prose, so extraction peels those layers before giving up.
 */

import {
  FILAMENT_DIAMETERS,
  SCORED_FILAMENT_FIELDS,
  type FilamentDiameter,
  type RecognizedFilamentData,
} from "@filament/contracts";
import { InterpretationError } from "../errors";

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stripCodeFence(text: string): string {
  let s = text.trim();
  if (s.startsWith("```json")) {
    s = s.slice(7);
  } else if (s.startsWith("```")) {
    s = s.slice(3);
  }
  if (s.endsWith("```")) {
    s = s.slice(0, -3);
  }
  return s.trim();
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: unknown } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error };
  }
}

function requireObject(value: unknown): JsonObject {
  if (!isJsonObject(value)) {
    const kind = Array.isArray(value) ? "array" : value === null ? "null" : typeof value;
    throw new InterpretationError("not_an_object", `Model response JSON is a ${kind}, expected an object`);
  }
  return value;
}

/**
 * Recover the JSON object in a model reply.
 *
 * Tries the fence-stripped text as a whole first, then the span from the
 * first "{" to the last "}".
 */
export function extractJsonObject(text: string): JsonObject {
  const s = stripCodeFence(text);
  if (!s) {
    throw new InterpretationError("empty_response", "Model response is empty");
  }

  const direct = tryParse(s);
  if (direct.ok) return requireObject(direct.value);

  const start = s.indexOf("{");
  const end = s.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) {
    throw new InterpretationError("no_json_found", "No JSON object found in model response");
  }

  const candidate = tryParse(s.slice(start, end + 1));
  if (!candidate.ok) {
    throw new InterpretationError("malformed_json", "Model response contains a malformed JSON object", {
      cause: candidate.error,
    });
  }
  return requireObject(candidate.value);
}

function text(value: unknown): string | null {
  if (typeof value !== "string") return null;
  return value.trim() ? value : null;
}

function normalizeDiameter(value: unknown): FilamentDiameter | null {
  let n: number;
  if (typeof value === "number") {
    n = value;
  } else if (typeof value === "string" && value.trim()) {
    n = Number(value);
  } else {
    return null;
  }
  // Exact match only: 1.7 is not rounded up to 1.75.
  return FILAMENT_DIAMETERS.find((d) => d === n) ?? null;
}

function normalizeWeight(value: unknown): string | null {
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : null;
  if (typeof value === "boolean" || typeof value === "bigint") return String(value);
  return text(value);
}

function normalizeColorHex(value: unknown): string | null {
  const s = text(value);
  if (s === null) return null;
  return s.startsWith("#") ? s : `#${s}`;
}

/**
 * Apply the domain rules to a parsed reply. Every field is handled on its
 * own and a missing key reads as null. Running it on its own output is a no-op.
 */
export function normalizeFilamentData(raw: JsonObject): RecognizedFilamentData {
  return {
    brand: text(raw.brand),
    material: text(raw.material),
    colorName: text(raw.colorName),
    colorHex: normalizeColorHex(raw.colorHex),
    weight: normalizeWeight(raw.weight),
    diameter: normalizeDiameter(raw.diameter),
    temperatureInfo: text(raw.temperatureInfo),
  };
}

/**
 * Share of the six label fields that were filled in.
 *
 * This measures completeness only. A confidently wrong brand scores the same
 * as a correct one.
 */
export function computeConfidence(data: RecognizedFilamentData): number {
  const filled = SCORED_FILAMENT_FIELDS.filter((field) => data[field] !== null).length;
  return filled / SCORED_FILAMENT_FIELDS.length;
}

export interface InterpretedLabel {
  data: RecognizedFilamentData;
  confidence: number;
}

export function interpretModelOutput(raw: string): InterpretedLabel {
  const data = normalizeFilamentData(extractJsonObject(raw));
  return { data, confidence: computeConfidence(data) };
}
