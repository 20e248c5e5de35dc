import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { InterpretationError } from "../src/errors";
import {
  computeConfidence,
  extractJsonObject,
  interpretModelOutput,
  normalizeFilamentData,
} from "../src/filament/interpret";

function rejectsWith(code: InterpretationError["code"]) {
  return (err: unknown) => {
    assert.ok(err instanceof InterpretationError);
    assert.equal(err.code, code);
    return true;
  };
}

const EMPTY = {
  brand: null,
  material: null,
  colorName: null,
  colorHex: null,
  weight: null,
  diameter: null,
  temperatureInfo: null,
};

describe("extractJsonObject", () => {
  it("parses a bare object", () => {
    assert.deepEqual(extractJsonObject('{"brand":"Sunlu"}'), { brand: "Sunlu" });
  });

  it("strips a json code fence", () => {
    assert.deepEqual(extractJsonObject('```json\n{"material":"PLA"}\n```'), { material: "PLA" });
  });

  it("strips an unlabeled code fence", () => {
    assert.deepEqual(extractJsonObject('```\n{"material":"ABS"}\n```'), { material: "ABS" });
  });

  it("finds the object inside surrounding prose", () => {
    assert.deepEqual(extractJsonObject('Here is what I read: {"brand": "Sunlu", "weight": 1000} hope it helps'), {
      brand: "Sunlu",
      weight: 1000,
    });
  });

  it("keeps braces that live inside string values", () => {
    assert.deepEqual(extractJsonObject('{"colorName":"Red {bright}"}'), { colorName: "Red {bright}" });
  });

  it("rejects blank replies", () => {
    assert.throws(() => extractJsonObject("   "), rejectsWith("empty_response"));
    assert.throws(() => extractJsonObject("```json\n```"), rejectsWith("empty_response"));
  });

  it("rejects replies without an object", () => {
    assert.throws(() => extractJsonObject("I could not read the label."), rejectsWith("no_json_found"));
    assert.throws(() => extractJsonObject("} backwards {"), rejectsWith("no_json_found"));
  });

  it("rejects a malformed object", () => {
    assert.throws(() => extractJsonObject("result: {brand: Bambu}"), rejectsWith("malformed_json"));
  });

  it("rejects JSON that is not an object", () => {
    assert.throws(() => extractJsonObject("[1, 2]"), rejectsWith("not_an_object"));
    assert.throws(() => extractJsonObject("null"), rejectsWith("not_an_object"));
    assert.throws(() => extractJsonObject('"text"'), rejectsWith("not_an_object"));
  });
});

describe("normalizeFilamentData", () => {
  it("reads missing keys as null", () => {
    assert.deepEqual(normalizeFilamentData({}), EMPTY);
  });

  it("accepts only the two market diameters", () => {
    assert.equal(normalizeFilamentData({ diameter: 1.75 }).diameter, 1.75);
    assert.equal(normalizeFilamentData({ diameter: "2.85" }).diameter, 2.85);
    assert.equal(normalizeFilamentData({ diameter: "1.75" }).diameter, 1.75);
    assert.equal(normalizeFilamentData({ diameter: "3.0" }).diameter, null);
    assert.equal(normalizeFilamentData({ diameter: 1.7 }).diameter, null);
    assert.equal(normalizeFilamentData({ diameter: 3 }).diameter, null);
    assert.equal(normalizeFilamentData({ diameter: "1.75mm" }).diameter, null);
    assert.equal(normalizeFilamentData({ diameter: "" }).diameter, null);
    assert.equal(normalizeFilamentData({ diameter: null }).diameter, null);
  });

  it("adds the missing hash to colorHex", () => {
    assert.equal(normalizeFilamentData({ colorHex: "FF0000" }).colorHex, "#FF0000");
    assert.equal(normalizeFilamentData({ colorHex: "#00ff00" }).colorHex, "#00ff00");
    assert.equal(normalizeFilamentData({ colorHex: "  " }).colorHex, null);
  });

  it("turns a numeric weight into text", () => {
    assert.equal(normalizeFilamentData({ weight: 1000 }).weight, "1000");
    assert.equal(normalizeFilamentData({ weight: 500.5 }).weight, "500.5");
    assert.equal(normalizeFilamentData({ weight: "1kg" }).weight, "1kg");
  });

  it("drops blank and non-text values", () => {
    const data = normalizeFilamentData({ brand: "", material: 42, colorName: ["Red"], temperatureInfo: " " });
    assert.equal(data.brand, null);
    assert.equal(data.material, null);
    assert.equal(data.colorName, null);
    assert.equal(data.temperatureInfo, null);
  });

  it("is a no-op on its own output", () => {
    const once = normalizeFilamentData({
      brand: "Polymaker",
      colorHex: "008080",
      weight: 750,
      diameter: "1.75",
      temperatureInfo: "190-220°C",
    });
    assert.deepEqual(normalizeFilamentData(once), once);
  });
});

describe("computeConfidence", () => {
  it("counts the six scored fields", () => {
    assert.equal(computeConfidence(EMPTY), 0);
    assert.equal(
      computeConfidence({
        brand: "Bambu Lab",
        material: "PLA",
        colorName: "Charcoal",
        colorHex: "#333333",
        weight: "1000",
        diameter: 1.75,
        temperatureInfo: null,
      }),
      1,
    );
  });

  it("ignores temperatureInfo", () => {
    assert.equal(computeConfidence({ ...EMPTY, temperatureInfo: "200°C" }), 0);
    assert.equal(computeConfidence({ ...EMPTY, brand: "Sunlu", temperatureInfo: "200°C" }), 1 / 6);
  });
});

describe("interpretModelOutput", () => {
  it("extracts, normalizes and scores a fenced reply", () => {
    const result = interpretModelOutput('```json\n{"brand":"Bambu Lab","material":"PLA","diameter":1.75}\n```');
    assert.deepEqual(result.data, { ...EMPTY, brand: "Bambu Lab", material: "PLA", diameter: 1.75 });
    assert.equal(result.confidence, 0.5);
  });

  it("scores an empty object as zero", () => {
    assert.deepEqual(interpretModelOutput("{}"), { data: EMPTY, confidence: 0 });
  });
});
