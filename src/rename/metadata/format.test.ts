import { describe, expect, it } from "vitest";
import { formatMetadataDate, formatMetadataValue } from "./format.js";

function expectedOffset(date: Date): string {
  const minutes = -date.getTimezoneOffset();
  const sign = minutes >= 0 ? "+" : "-";
  const abs = Math.abs(minutes);
  return `${sign}${String(Math.floor(abs / 60)).padStart(2, "0")}${String(abs % 60).padStart(2, "0")}`;
}

describe("formatMetadataDate", () => {
  it("formats local time with the UTC offset", () => {
    const date = new Date(2003, 8, 3, 12, 52, 43);
    expect(formatMetadataDate(date)).toBe(`2003-09-03 12:52:43 ${expectedOffset(date)}`);
  });

  it("zero-pads single-digit fields", () => {
    const date = new Date(2021, 0, 5, 7, 8, 9);
    expect(formatMetadataDate(date)).toBe(`2021-01-05 07:08:09 ${expectedOffset(date)}`);
  });
});

describe("formatMetadataValue", () => {
  it("passes strings through", () => {
    expect(formatMetadataValue("2003-09-03 12_52_43 -0400")).toBe("2003-09-03 12_52_43 -0400");
  });

  it("treats empty and missing values as absent", () => {
    expect(formatMetadataValue("")).toBeNull();
    expect(formatMetadataValue(null)).toBeNull();
    expect(formatMetadataValue(undefined)).toBeNull();
  });

  it("converts numbers, bigints and booleans", () => {
    expect(formatMetadataValue(0)).toBe("0");
    expect(formatMetadataValue(2.8)).toBe("2.8");
    expect(formatMetadataValue(12n)).toBe("12");
    expect(formatMetadataValue(false)).toBe("false");
    expect(formatMetadataValue(Number.NaN)).toBeNull();
  });

  it("formats valid dates and rejects invalid ones", () => {
    const date = new Date(2003, 8, 3, 12, 52, 43);
    expect(formatMetadataValue(date)).toBe(formatMetadataDate(date));
    expect(formatMetadataValue(new Date("not a date"))).toBeNull();
  });

  it("joins lists", () => {
    expect(formatMetadataValue(["Rock", "Blues"])).toBe("Rock, Blues");
    expect(formatMetadataValue([4, 3])).toBe("4, 3");
    expect(formatMetadataValue([])).toBeNull();
    expect(formatMetadataValue([""])).toBeNull();
  });

  it("has no text for binary data or objects", () => {
    expect(formatMetadataValue(new Uint8Array([1, 2]))).toBeNull();
    expect(formatMetadataValue({ latitude: 1 })).toBeNull();
  });
});
