import { describe, expect, it } from "vitest";
import {
  DecodeError,
  InvalidCodingShapeError,
  asNumber,
  eqJsonValue,
  fromHost,
  hashJsonValue,
  isJsonObject,
  isLessThan,
  jsonArray,
  jsonBoolean,
  jsonInteger,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonString,
  kindOf,
  ordJsonValue,
  parseJson,
  stringifyJson,
  toHost,
} from "../index.js";

describe("JsonValue equality", () => {
  it("compares integers and numbers by magnitude", () => {
    expect(eqJsonValue.eqv(jsonInteger(12), jsonNumber(12.0))).toBe(true);
    expect(eqJsonValue.eqv(jsonInteger(12), jsonNumber(12.5))).toBe(false);
  });

  it("treats NaN as equal to itself", () => {
    expect(eqJsonValue.eqv(jsonNumber(Number.NaN), jsonNumber(Number.NaN))).toBe(true);
  });

  it("does not equate a number with its string spelling", () => {
    expect(eqJsonValue.eqv(jsonString("12"), jsonInteger(12))).toBe(false);
  });

  it("compares arrays in order and objects regardless of order", () => {
    const one = jsonInteger(1);
    const two = jsonInteger(2);
    expect(eqJsonValue.eqv(jsonArray([one, two]), jsonArray([two, one]))).toBe(false);
    expect(
      eqJsonValue.eqv(
        jsonObject([["a", one], ["b", two]]),
        jsonObject([["b", two], ["a", one]])
      )
    ).toBe(true);
  });

  it("distinguishes null from false", () => {
    expect(eqJsonValue.eqv(jsonNull, jsonBoolean(false))).toBe(false);
  });
});

describe("JsonValue hashing", () => {
  it("hashes equal numbers alike across tags", () => {
    expect(hashJsonValue.hash(jsonInteger(12))).toBe(hashJsonValue.hash(jsonNumber(12)));
  });

  it("ignores object member order", () => {
    const a = jsonObject({ x: jsonString("1"), y: jsonArray([jsonBoolean(true)]) });
    const b = jsonObject({ y: jsonArray([jsonBoolean(true)]), x: jsonString("1") });
    expect(hashJsonValue.hash(a)).toBe(hashJsonValue.hash(b));
  });

  it("depends on array order", () => {
    const a = jsonArray([jsonString("a"), jsonString("b")]);
    const b = jsonArray([jsonString("b"), jsonString("a")]);
    expect(hashJsonValue.hash(a)).not.toBe(hashJsonValue.hash(b));
  });
});

describe("JsonValue ordering", () => {
  it("orders strings lexicographically", () => {
    expect(isLessThan(jsonString("apple"), jsonString("banana"))).toBe(true);
    expect(isLessThan(jsonString("10"), jsonString("9"))).toBe(true);
  });

  it("orders numbers across tags", () => {
    expect(isLessThan(jsonInteger(2), jsonNumber(2.5))).toBe(true);
    expect(isLessThan(jsonNumber(2.5), jsonInteger(2))).toBe(false);
  });

  it("reads numeric strings against numbers", () => {
    expect(isLessThan(jsonInteger(9), jsonString("10"))).toBe(true);
    expect(isLessThan(jsonString("1.234,5"), jsonInteger(2000), "de-DE")).toBe(true);
  });

  it("is false when either side has no magnitude", () => {
    expect(isLessThan(jsonString("abc"), jsonBoolean(true))).toBe(false);
    expect(isLessThan(jsonInteger(1), jsonString("abc"))).toBe(false);
    expect(isLessThan(jsonNull, jsonInteger(1))).toBe(false);
    expect(ordJsonValue.partialCompare(jsonNumber(Number.NaN), jsonInteger(1))).toBeUndefined();
  });
});

describe("asNumber", () => {
  it("parses strings with the locale's separators", () => {
    expect(asNumber(jsonString("1,234.5"))).toBe(1234.5);
    expect(asNumber(jsonString("1.234,5"), "de-DE")).toBe(1234.5);
  });

  it("returns undefined for values without a magnitude", () => {
    expect(asNumber(jsonString("twelve"))).toBeUndefined();
    expect(asNumber(jsonString(""))).toBeUndefined();
    expect(asNumber(jsonBoolean(true))).toBeUndefined();
  });
});

describe("fromHost", () => {
  it("lifts plain data", () => {
    const value = fromHost({
      id: 7,
      ratio: 0.5,
      when: new Date(Date.UTC(2024, 0, 2)),
      skip: undefined,
    });
    expect(value).toEqual(
      jsonObject([
        ["id", jsonInteger(7)],
        ["ratio", jsonNumber(0.5)],
        ["when", jsonString("2024-01-02T00:00:00.000Z")],
      ])
    );
  });

  it("rejects class instances", () => {
    class Point {
      x = 1;
    }
    expect(() => fromHost({ at: new Point() })).toThrow(
      "at: cannot represent a class instance as JSON"
    );
  });

  it("rejects Maps with non-string keys", () => {
    expect(() => fromHost({ a: [new Map([[1, "x"]])] })).toThrow(InvalidCodingShapeError);
  });

  it("keeps a __proto__ member as data", () => {
    const host = toHost(parseJson('{"__proto__":{"x":1},"a":2}'));
    expect(Object.keys(host ?? {})).toEqual(["__proto__", "a"]);
    expect(Object.getPrototypeOf(host)).toBe(Object.prototype);
  });

  it("round-trips through toHost", () => {
    const host = { a: [1, "two", null, { b: false }] };
    expect(toHost(fromHost(host))).toEqual(host);
  });
});

describe("kindOf", () => {
  it("names the tag of each value", () => {
    expect([jsonNull, jsonInteger(1), jsonNumber(1.5), jsonString("a")].map(kindOf)).toEqual([
      "null",
      "integer",
      "number",
      "string",
    ]);
    expect(isJsonObject(jsonObject({}))).toBe(true);
    expect(isJsonObject(jsonArray([]))).toBe(false);
  });
});

describe("parseJson", () => {
  it("keeps integral numbers as integers", () => {
    expect(parseJson("2")).toEqual(jsonInteger(2));
    expect(parseJson("2.5")).toEqual(jsonNumber(2.5));
  });

  it("rejects integers that would lose precision", () => {
    try {
      parseJson('{"id":9007199254740993}');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DecodeError);
      if (error instanceof DecodeError) {
        expect(error.reason).toBe("integer_out_of_range");
        expect(error.message).toBe(
          "<root>: integer 9007199254740993 is outside the safe integer range"
        );
      }
    }
  });

  it("accepts the largest safe integer and large exponent literals", () => {
    expect(parseJson("[9007199254740991]")).toEqual(jsonArray([jsonInteger(9007199254740991)]));
    expect(parseJson('{"big":1e300,"text":"90071992547409930"}')).toEqual(
      jsonObject({ big: jsonNumber(1e300), text: jsonString("90071992547409930") })
    );
  });

  it("reports invalid text", () => {
    try {
      parseJson("{");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DecodeError);
      if (error instanceof DecodeError) {
        expect(error.reason).toBe("invalid_json");
        expect(error.codingPath).toEqual([]);
      }
    }
  });
});

describe("stringifyJson", () => {
  const value = jsonObject({ a: jsonInteger(1), b: jsonArray([jsonBoolean(true)]) });

  it("writes compact output by default", () => {
    expect(stringifyJson(value)).toBe('{"a":1,"b":[true]}');
  });

  it("indents nested values", () => {
    expect(stringifyJson(value, { indent: 2 })).toBe('{\n  "a": 1,\n  "b": [\n    true\n  ]\n}');
  });

  it("writes empty containers inline", () => {
    expect(stringifyJson(jsonObject({ a: jsonArray([]), b: jsonObject({}) }), { indent: 2 })).toBe(
      '{\n  "a": [],\n  "b": {}\n}'
    );
  });

  it("spells non-finite numbers as strings", () => {
    const floats = jsonArray([jsonNumber(Infinity), jsonNumber(-Infinity), jsonNumber(Number.NaN)]);
    expect(stringifyJson(floats)).toBe('["Infinity","-Infinity","NaN"]');
    expect(
      stringifyJson(floats, {
        nonConformingFloats: { positiveInfinity: "+inf", negativeInfinity: "-inf", nan: "nan" },
      })
    ).toBe('["+inf","-inf","nan"]');
  });

  it("escapes strings", () => {
    expect(stringifyJson(jsonString('say "hi"\n'))).toBe('"say \\"hi\\"\\n"');
  });
});
