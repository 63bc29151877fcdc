import { describe, expect, it } from "vitest";
import { formatApn, isCanonicalApn, isValidApn, normalizeNumericParcelId } from "./parcel-id";

describe("normalizeNumericParcelId", () => {
  it("strips everything except digits", () => {
    expect(normalizeNumericParcelId("177-13-420-002")).toBe("17713420002");
    expect(normalizeNumericParcelId(" 177 13 420 002 ")).toBe("17713420002");
    expect(normalizeNumericParcelId("")).toBe("");
  });
});

describe("formatApn", () => {
  it("groups eleven digits as 3-2-3-3", () => {
    expect(formatApn("17713420002")).toBe("177-13-420-002");
  });

  it("regroups already separated input", () => {
    expect(formatApn("177.13.420.002")).toBe("177-13-420-002");
    expect(formatApn("177-13-420-002")).toBe("177-13-420-002");
  });

  it("returns other input unchanged", () => {
    expect(formatApn("12345")).toBe("12345");
    expect(formatApn("177134200021")).toBe("177134200021");
    expect(formatApn("not an apn")).toBe("not an apn");
  });
});

describe("isValidApn", () => {
  it("accepts eleven digits with or without separators", () => {
    expect(isValidApn("17713420002")).toBe(true);
    expect(isValidApn(" 177-13-420-002 ")).toBe(true);
  });

  it("rejects short, long and empty input", () => {
    expect(isValidApn("1771342000")).toBe(false);
    expect(isValidApn("177134200021")).toBe(false);
    expect(isValidApn("")).toBe(false);
  });
});

describe("isCanonicalApn", () => {
  it("only matches the dashed form", () => {
    expect(isCanonicalApn("177-13-420-002")).toBe(true);
    expect(isCanonicalApn("17713420002")).toBe(false);
  });
});
