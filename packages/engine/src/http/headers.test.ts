import { describe, expect, it } from "vitest";
import { HeaderMap } from "./headers.js";

describe("HeaderMap", () => {
  it("keeps insertion order and replaces values in place", () => {
    const headers = new HeaderMap({ "Content-Type": "text/plain" });
    headers.set("Content-Length", "3");
    headers.set("Content-Type", "application/octet-stream");

    expect([...headers]).toEqual([
      ["Content-Type", "application/octet-stream"],
      ["Content-Length", "3"],
    ]);
  });

  it("looks up keys case-sensitively", () => {
    const headers = new HeaderMap([["User-Agent", "curl/8.0"]]);
    expect(headers.get("User-Agent")).toBe("curl/8.0");
    expect(headers.get("user-agent")).toBeUndefined();
    expect(headers.has("USER-AGENT")).toBe(false);
  });

  it("rejects mutation once locked", () => {
    const headers = new HeaderMap({ A: "1" }).lock();
    expect(headers.isLocked).toBe(true);
    expect(() => headers.set("B", "2")).toThrow(TypeError);
    expect(() => headers.set("A", "2")).toThrow("HeaderMap is locked");
    expect(headers.size).toBe(1);
  });

  it("clones into an unlocked, independent map", () => {
    const original = new HeaderMap({ A: "1" }).lock();
    const copy = original.clone().set("B", "2");

    expect(copy.isLocked).toBe(false);
    expect([...copy]).toEqual([
      ["A", "1"],
      ["B", "2"],
    ]);
    expect([...original]).toEqual([["A", "1"]]);
  });
});
