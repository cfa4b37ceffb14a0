// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { describe, it, expect } from "vitest";
import { NHCX } from "../src/index.js";

describe("NHCX.parseClinicalDate", () => {
  it.each([
    ["15/08/2023", "2023-08-15"],
    ["5/8/2023", "2023-08-05"],
    ["15-08-2023", "2023-08-15"],
    ["2023-08-15", "2023-08-15"],
    ["5 Aug 2023", "2023-08-05"],
    ["5 August 2023", "2023-08-05"],
    ["August 5, 2023", "2023-08-05"],
    ["15.08.2023", "2023-08-15"],
    ["2023/08/15", "2023-08-15"],
    ["  15/08/2023  ", "2023-08-15"],
  ])("parses %s", (raw, expected) => {
    expect(NHCX.parseClinicalDate(raw)).toBe(expected);
  });

  it("reads day-first dates as day-first", () => {
    expect(NHCX.parseClinicalDate("03/04/2024")).toBe("2024-04-03");
  });

  it.each([["yesterday"], [""], ["15/08/23"]])("rejects %j", (raw) => {
    expect(NHCX.parseClinicalDate(raw)).toBeUndefined();
  });

  it("returns undefined for a missing value", () => {
    expect(NHCX.parseClinicalDate(undefined)).toBeUndefined();
  });
});

describe("NHCX.approximateBirthDate", () => {
  const now = new Date("2024-06-01T00:00:00Z");

  it("uses January 1st of the birth year", () => {
    expect(NHCX.approximateBirthDate("45", now)).toBe("1979-01-01");
    expect(NHCX.approximateBirthDate("45 Years", now)).toBe("1979-01-01");
  });

  it.each([["0"], ["-5"], ["abc"], ["forty"], [""]])("ignores %j", (age) => {
    expect(NHCX.approximateBirthDate(age, now)).toBeUndefined();
  });
});

describe("NHCX.fhirInstant", () => {
  it("drops milliseconds", () => {
    expect(NHCX.fhirInstant(new Date("2024-03-15T10:30:45.123Z"))).toBe("2024-03-15T10:30:45Z");
  });
});

describe("NHCX record readers", () => {
  it("reads scalars as text and skips structured values", () => {
    const record: NHCX.ClinicalRecord = { age: 45, name: "Asha", empty: "", nested: { a: 1 } };
    expect(NHCX.readText(record, "age")).toBe("45");
    expect(NHCX.readText(record, "name")).toBe("Asha");
    expect(NHCX.readText(record, "empty")).toBeUndefined();
    expect(NHCX.readText(record, "nested")).toBeUndefined();
    expect(NHCX.readText(record, "missing")).toBeUndefined();
  });

  it("wraps single values as lists", () => {
    expect(NHCX.readList({ tests: "ESR" }, "tests")).toEqual(["ESR"]);
    expect(NHCX.readList({ tests: [] }, "tests")).toEqual([]);
    expect(NHCX.readList({}, "tests")).toEqual([]);
  });

  it("normalizes test rows", () => {
    expect(NHCX.readTestEntry("ESR")).toEqual({ testName: "ESR" });
    expect(NHCX.readTestEntry({ result_value: 12 })).toEqual({
      testName: "Unknown test",
      resultValue: "12",
      unit: undefined,
      referenceRange: undefined,
      abnormalFlag: undefined,
      loincCoding: undefined,
    });
    expect(NHCX.readTestEntry(null)).toBeUndefined();
  });

  it("normalizes medication entries", () => {
    expect(NHCX.readMedicationEntry("Pantoprazole 40mg")).toEqual({
      name: "Pantoprazole 40mg",
      dose: "",
      frequency: "",
      duration: "",
    });
    expect(NHCX.readMedicationEntry({ name: "Amoxicillin", dose: "250mg" })).toEqual({
      name: "Amoxicillin",
      dose: "250mg",
      frequency: "",
      duration: "",
    });
  });

  it("accepts only coding results with a matched flag", () => {
    expect(NHCX.readCodingResult({ code: "A90" })).toBeUndefined();
    expect(NHCX.readCodingResult({ matched: false })).toEqual({
      matched: false,
      code: null,
      display: null,
      system: "",
      system_uri: "",
      confidence: 0,
      match_method: "none",
    });
  });
});

describe("NHCX.getHiType", () => {
  it("maps document types to ABDM HI types", () => {
    expect(NHCX.getHiType("prescription").snomedCode).toBe("440545006");
    expect(NHCX.getHiType("op_consultation").snomedCode).toBe("371530004");
    expect(NHCX.getHiType("something_else").code).toBe("DischargeSummary");
  });
});
