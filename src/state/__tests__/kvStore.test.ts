import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import { KvStore } from "../kvStore";
import { tempDir } from "./helpers";

const open: KvStore[] = [];
function store(file = ":memory:") {
  const kv = new KvStore(file);
  open.push(kv);
  return kv;
}

afterEach(() => {
  for (const kv of open.splice(0)) kv.close();
});

describe("KvStore", () => {
  it("stores JSON values under string keys", () => {
    const kv = store();
    kv.put("-100", { a: [1, "two"], b: null });
    expect(kv.get("-100")).toEqual({ a: [1, "two"], b: null });
    expect(kv.has("-100")).toBe(true);
    expect(kv.get("missing")).toBeUndefined();
  });

  it("overwrites on put and reports whether delete removed anything", () => {
    const kv = store();
    kv.put("k", 1);
    kv.put("k", 2);
    expect(kv.get("k")).toBe(2);
    expect(kv.delete("k")).toBe(true);
    expect(kv.delete("k")).toBe(false);
  });

  it("lists keys", () => {
    const kv = store();
    kv.put("b", 1);
    kv.put("a", 2);
    expect(kv.keys().sort()).toEqual(["a", "b"]);
  });

  it("refuses values JSON cannot represent", () => {
    const kv = store();
    expect(() => kv.put("k", undefined)).toThrow(TypeError);
    expect(kv.has("k")).toBe(false);
  });

  it("rolls back everything written inside a failed exclusive block", () => {
    const kv = store();
    kv.put("keep", "old");
    expect(() =>
      kv.exclusive(() => {
        kv.put("keep", "new");
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(kv.get("keep")).toBe("old");
  });

  it("creates the parent directory and shares data between connections", () => {
    const file = path.join(tempDir(), "nested", "store.db");
    const a = store(file);
    const b = store(file);
    a.put("x", 1);
    expect(fs.existsSync(file)).toBe(true);
    expect(b.get("x")).toBe(1);
  });
});
