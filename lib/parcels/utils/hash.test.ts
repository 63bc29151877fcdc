import { describe, expect, it } from "vitest";
import { computeDomSignature, sha256 } from "./hash";

describe("sha256", () => {
  it("produces the hex digest", () => {
    expect(sha256("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });
});

describe("computeDomSignature", () => {
  it("does not depend on element order", () => {
    expect(computeDomSignature(["lblTown", "lblOwner1"])).toBe(
      computeDomSignature(["lblOwner1", "lblTown"])
    );
  });

  it("does not reorder the caller's array", () => {
    const ids = ["lblTown", "lblOwner1"];
    computeDomSignature(ids);
    expect(ids).toEqual(["lblTown", "lblOwner1"]);
  });

  it("hashes the sorted ids joined by a pipe", () => {
    expect(computeDomSignature(["b", "a"])).toBe(sha256("a|b"));
  });
});
