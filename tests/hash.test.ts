import { describe, it, expect } from "vitest";
import { canonicalJson, contentHash, merkleRoot, sha256Hex } from "../src/shared/hash.js";

describe("SHA-256", () => {
  it("hashes strings and bytes alike", () => {
    expect(sha256Hex("test")).toBe("9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08");
    expect(sha256Hex(Buffer.from("test"))).toBe(sha256Hex("test"));
    expect(sha256Hex("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
  });
});

describe("Canonical JSON", () => {
  it("sorts keys at every depth and keeps array order", () => {
    expect(canonicalJson({ z: { b: 2, a: 1 }, a: [{ y: 1, x: 2 }, 3] })).toBe(
      '{"a":[{"x":2,"y":1},3],"z":{"a":1,"b":2}}'
    );
  });

  it("drops undefined properties", () => {
    expect(canonicalJson({ lvef: 60, lvids: undefined })).toBe('{"lvef":60}');
  });
});

describe("Content hash", () => {
  it("hashes the canonical JSON text", () => {
    expect(contentHash({ b: [1, 2], a: "x" })).toBe(sha256Hex('{"a":"x","b":[1,2]}'));
  });

  it("does not depend on key order", () => {
    expect(contentHash({ sex: "Man", age: 40 })).toBe(contentHash({ age: 40, sex: "Man" }));
    expect(contentHash({ age: 40 })).not.toBe(contentHash({ age: 41 }));
  });
});

describe("Merkle root", () => {
  const [a, b, c] = ["a", "b", "c"].map((s) => sha256Hex(s));

  it("hashes the empty string for no leaves", () => {
    expect(merkleRoot([])).toBe(sha256Hex(""));
  });

  it("returns a single leaf unchanged", () => {
    expect(merkleRoot([a])).toBe(a);
  });

  it("pairs leaves level by level", () => {
    expect(merkleRoot([a, b])).toBe(sha256Hex(a + b));
  });

  it("pairs an odd last leaf with itself", () => {
    expect(merkleRoot([a, b, c])).toBe(sha256Hex(sha256Hex(a + b) + sha256Hex(c + c)));
  });
});
