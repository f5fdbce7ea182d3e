/**
 * fallback-policy.test.ts — Unit tests for the resolution plan builder
 *
 * decide() is pure: these tests build CacheState values by hand and
 * assert the exact ordered plan for each kind of requirement.
 */
import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { decide } from "./fallback-policy.js";
import type { CacheState } from "./cache-store.js";
import type { CacheEntry } from "./types.js";

const SYSTEM = "/home/user/.steam/steam/steamapps/common/Proton 9.0";

function entry(versionId: string, lastUsedAt: number, isCurrent = false): CacheEntry {
  return {
    versionId,
    directoryPath: `/cache/versions/${versionId}`,
    installedAt: 0,
    lastUsedAt,
    isCurrent,
    activeUsers: 0,
  };
}

function cache(installed: CacheEntry[], current: string | null = null): CacheState {
  return { installed, current };
}

// ── Exact version ─────────────────────────────────────────────────────────

describe("decide — exact version", () => {
  it("cached version comes first, download stays behind it", () => {
    assert.deepEqual(decide("ge-8.26", cache([entry("ge-8.26", 10)]), null), [
      { kind: "cached", versionId: "ge-8.26" },
      { kind: "download", versionId: "ge-8.26" },
      { kind: "unavailable" },
    ]);
  });

  it("missing version: download → MRU alternate → system → unavailable", () => {
    const state = cache([entry("ge-8.30", 20), entry("ge-7.55", 10)]);
    assert.deepEqual(decide("ge-8.26", state, SYSTEM), [
      { kind: "download", versionId: "ge-8.26" },
      { kind: "alternate", versionId: "ge-8.30" },
      { kind: "system", path: SYSTEM },
      { kind: "unavailable" },
    ]);
  });

  it("the requested id is never offered as its own alternate", () => {
    const state = cache([entry("ge-8.26", 20), entry("ge-8.30", 10)]);
    const plan = decide("ge-8.26", state, null);
    assert.deepEqual(plan.find((s) => s.kind === "alternate"), { kind: "alternate", versionId: "ge-8.30" });
  });

  it("empty cache and no system runtime", () => {
    assert.deepEqual(decide("ge-8.26", cache([]), null), [
      { kind: "download", versionId: "ge-8.26" },
      { kind: "unavailable" },
    ]);
  });

  it("surrounding whitespace is ignored", () => {
    assert.deepEqual(decide("  ge-8.26 ", cache([]), null)[0], { kind: "download", versionId: "ge-8.26" });
  });
});

// ── Sentinels ─────────────────────────────────────────────────────────────

describe("decide — 'any' and empty requirement", () => {
  it("prefers the current version", () => {
    const state = cache([entry("ge-8.30", 20), entry("ge-8.26", 10, true)], "ge-8.26");
    assert.deepEqual(decide("any", state, SYSTEM), [
      { kind: "cached", versionId: "ge-8.26" },
      { kind: "system", path: SYSTEM },
      { kind: "unavailable" },
    ]);
  });

  it("falls back to the MRU version without a current pointer", () => {
    const state = cache([entry("ge-8.30", 20), entry("ge-8.26", 10)]);
    assert.deepEqual(decide("", state, null), [
      { kind: "cached", versionId: "ge-8.30" },
      { kind: "unavailable" },
    ]);
  });

  it("never downloads", () => {
    const plan = decide("ANY", cache([]), SYSTEM);
    assert.deepEqual(plan, [{ kind: "system", path: SYSTEM }, { kind: "unavailable" }]);
  });
});

describe("decide — 'system'", () => {
  it("system first, then the MRU cached version", () => {
    const state = cache([entry("ge-8.30", 20)]);
    assert.deepEqual(decide("system", state, SYSTEM), [
      { kind: "system", path: SYSTEM },
      { kind: "alternate", versionId: "ge-8.30" },
      { kind: "unavailable" },
    ]);
  });

  it("without a system runtime only the alternate remains", () => {
    assert.deepEqual(decide("system", cache([]), null), [{ kind: "unavailable" }]);
  });
});
