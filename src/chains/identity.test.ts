import { describe, expect, it } from "vitest";
import { buildCacheKey, errorKeyFor, lockKeyFor, newSeqId, seqIdFrom, withoutSeqId } from "./identity.js";

describe("buildCacheKey", () => {
  it("is stable for structurally equal identities", () => {
    const a = buildCacheKey("list_machines", ["alice", "b-1"], { region: "eu", opts: { x: 1, y: [1, 2] } });
    const b = buildCacheKey("list_machines", ["alice", "b-1"], { opts: { y: [1, 2], x: 1 }, region: "eu" });
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores the chain seq_id", () => {
    expect(buildCacheKey("ping", ["alice"], { seq_id: "abc" })).toBe(buildCacheKey("ping", ["alice"], {}));
  });

  it("differs when any component differs", () => {
    const base = buildCacheKey("ping", ["alice", "h1"], {});
    expect(buildCacheKey("probe", ["alice", "h1"], {})).not.toBe(base);
    expect(buildCacheKey("ping", ["alice", "h2"], {})).not.toBe(base);
    expect(buildCacheKey("ping", ["h1", "alice"], {})).not.toBe(base);
    expect(buildCacheKey("ping", ["alice", "h1"], { verbose: true })).not.toBe(base);
  });
});

describe("derived keys", () => {
  it("appends fixed suffixes to the cache key", () => {
    expect(errorKeyFor("k1")).toBe("k1error");
    expect(lockKeyFor("k1")).toBe("k1lock");
  });
});

describe("seq ids", () => {
  it("mints 32 hex chars", () => {
    expect(newSeqId()).toMatch(/^[0-9a-f]{32}$/);
    expect(newSeqId()).not.toBe(newSeqId());
  });

  it("reads and strips seq_id from kwargs", () => {
    expect(seqIdFrom({ seq_id: "s1", a: 1 })).toBe("s1");
    expect(seqIdFrom({ seq_id: 7 })).toBe("");
    expect(seqIdFrom({})).toBe("");
    expect(withoutSeqId({ seq_id: "s1", a: 1 })).toEqual({ a: 1 });
  });
});
