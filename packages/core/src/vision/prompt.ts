/**
 * Instruction sent with every label image. Kept fixed so that replies stay
 * comparable across requests; only the language varies.
 */

import type { PromptLanguage } from "@filament/contracts";

const TEMPLATES: Record<PromptLanguage, string> = {
  en: [
    "Analyze this photo of a 3D-printing filament spool label and extract the following fields:",
    "",
    '1. brand: the manufacturer, e.g. "Bambu Lab", "Polymaker", "Sunlu", "eSUN", "Creality", "Prusa", "Hatchbox", "Overture"',
    '2. material: the material type, e.g. "PLA", "PETG", "ABS", "PLA+", "TPU", "ASA", "PA", "PC"',
    '3. colorName: the color as printed on the label, e.g. "Matte Charcoal", "Teal Blue", "Silk Gold", "Black"',
    '4. colorHex: the color as "#RRGGBB", inferred from the label or the filament itself, e.g. "#333333", "#008080", "#FFD700"',
    '5. weight: net weight in grams as a digit string, e.g. "1000", "500", "250"',
    "6. diameter: 1.75 or 2.85, as a number",
    "",
    "Use null for any field that cannot be read or is not shown.",
    "",
    "Respond with ONLY this JSON object (no markdown, no code fences, no extra text):",
    "{",
    '  "brand": "brand name or null",',
    '  "material": "material type or null",',
    '  "colorName": "color name or null",',
    '  "colorHex": "#RRGGBB or null",',
    '  "weight": "gram count as a string or null",',
    '  "diameter": 1.75 or 2.85 or null',
    "}",
  ].join("\n"),

  zh: [
    "请分析这张3D打印耗材标签图片，提取以下信息：",
    "",
    '1. brand（品牌）：如 "Bambu Lab"、"Polymaker"、"Sunlu"、"eSUN"、"Creality"、"Prusa"、"Hatchbox"、"Overture"',
    '2. material（材料类型）：如 "PLA"、"PETG"、"ABS"、"PLA+"、"TPU"、"ASA"、"PA"、"PC"',
    '3. colorName（颜色名称）：如 "Matte Charcoal"、"Teal Blue"、"Silk Gold"、"Black"',
    '4. colorHex（颜色十六进制）：格式为 "#RRGGBB"，根据标签或耗材颜色推断，如 "#333333"、"#008080"、"#FFD700"',
    '5. weight（重量）：以克为单位的数字字符串，如 "1000"、"500"、"250"',
    "6. diameter（直径）：1.75 或 2.85，数字类型",
    "",
    "无法识别或图片中没有的信息请返回 null。",
    "",
    "只返回以下JSON对象，不要添加markdown代码块或任何其他文字：",
    "{",
    '  "brand": "品牌名称或null",',
    '  "material": "材料类型或null",',
    '  "colorName": "颜色名称或null",',
    '  "colorHex": "#颜色代码或null",',
    '  "weight": "重量数字字符串或null",',
    '  "diameter": 1.75或2.85或null',
    "}",
  ].join("\n"),
};

export interface FilamentPromptOpts {
  /** Prompt language (default: "en") */
  language?: PromptLanguage;
}

export function buildFilamentPrompt(opts?: FilamentPromptOpts): string {
  return TEMPLATES[opts?.language ?? "en"];
}
