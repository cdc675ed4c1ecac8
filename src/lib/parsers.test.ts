import { describe, expect, it } from "vitest";
import {
  parseCsvStrict,
  parseGramsLenient,
  parseRatingLenient,
  parseSecondsLenient,
  parseTastingRef,
  parseTemperatureLenient,
  parseTemperatureStrict,
  parseTimeLenient,
  parseTimeStrict,
  parseUtcOffset,
  parseYearLenient,
  parseYearStrict
} from "./parsers.js";

describe("lenient wizard parsers", () => {
  it("keeps only four-digit years", () => {
    expect(parseYearLenient(" 2019 ")).toBe(2019);
    expect(parseYearLenient("20")).toBeNull();
    expect(parseYearLenient("двадцатый")).toBeNull();
  });

  it("accepts a decimal comma for grams", () => {
    expect(parseGramsLenient("7,5")).toBe(7.5);
    expect(parseGramsLenient("много")).toBeNull();
  });

  it("truncates the temperature", () => {
    expect(parseTemperatureLenient("95.7")).toBe(95);
    expect(parseTemperatureLenient("кипяток")).toBeNull();
  });

  it("takes seconds only as digits", () => {
    expect(parseSecondsLenient("15")).toBe(15);
    expect(parseSecondsLenient("15с")).toBeNull();
  });

  it("zero-pads the hour", () => {
    expect(parseTimeLenient("9:05")).toBe("09:05");
    expect(parseTimeLenient("24:00")).toBeNull();
  });

  it("clamps the rating and defaults to zero", () => {
    expect(parseRatingLenient("12")).toBe(10);
    expect(parseRatingLenient("7")).toBe(7);
    expect(parseRatingLenient("отлично")).toBe(0);
  });
});

describe("strict edit parsers", () => {
  it("reports why a value was rejected", () => {
    expect(parseYearStrict("20")).toEqual({ ok: false, error: "Год должен состоять из 4 цифр." });
    expect(parseTemperatureStrict("90.5")).toEqual({ ok: false, error: "Используй целое число." });
    expect(parseTimeStrict("7.30")).toEqual({ ok: false, error: "Время должно быть в формате HH:MM." });
  });

  it("normalizes comma lists", () => {
    expect(parseCsvStrict(" Тепло,, Фокус ,")).toEqual({ ok: true, value: "Тепло, Фокус" });
    expect(parseCsvStrict(" , ")).toEqual({ ok: false, error: "Список пуст." });
  });
});

describe("parseUtcOffset", () => {
  it("converts hours to minutes", () => {
    expect(parseUtcOffset("+3")).toBe(180);
    expect(parseUtcOffset("-5.5")).toBe(-330);
    expect(parseUtcOffset("UTC+3")).toBe(180);
  });

  it("rejects garbage and out-of-range offsets", () => {
    expect(parseUtcOffset("Москва")).toBeNull();
    expect(parseUtcOffset("+20")).toBeNull();
  });
});

describe("parseTastingRef", () => {
  it("distinguishes internal ids from sequence numbers", () => {
    expect(parseTastingRef("15")).toEqual({ kind: "id", id: 15 });
    expect(parseTastingRef("#3")).toEqual({ kind: "seq", seqNo: 3 });
    expect(parseTastingRef("#x")).toBeNull();
  });
});
