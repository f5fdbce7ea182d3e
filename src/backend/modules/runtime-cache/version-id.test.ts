/**
 * ============================================================
 *  version-id — Unit Tests
 * ============================================================
 *
 * Tests the pure helpers that derive runtime version ids and sort
 * keys from upstream tags and directory names, and the guard that
 * keeps ids safe to use as directory names. Filesystem-free.
 *
 * Module under test: src/backend/modules/runtime-cache/version-id.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe } from "node:test";
import assert from "node:assert/strict";
import {
  buildRuntimeId,
  releaseTagToVersionId,
  runtimeSortKey,
  isSafeVersionId,
  assertSafeVersionId,
} from "./version-id.js";
import { InvalidStateError } from "./errors.js";

// ─── buildRuntimeId ───────────────────────────────────────────────────────────

describe("buildRuntimeId — slug generation", () => {
  test("'Proton 9.0' → 'proton-9-0'", () => {
    assert.equal(buildRuntimeId("Proton 9.0"), "proton-9-0");
  });

  test("'Proton 8.0-5' → 'proton-8-0-5'", () => {
    assert.equal(buildRuntimeId("Proton 8.0-5"), "proton-8-0-5");
  });

  test("'Proton - Experimental' → 'proton-experimental'", () => {
    assert.equal(buildRuntimeId("Proton - Experimental"), "proton-experimental");
  });

  test("strips leading and trailing separators", () => {
    assert.equal(buildRuntimeId("  Proton 9.0  "), "proton-9-0");
  });
});

// ─── releaseTagToVersionId ────────────────────────────────────────────────────

describe("releaseTagToVersionId — upstream tag mapping", () => {
  /**
   * GE-Proton tags collapse to the short form games declare.
   */
  test("'GE-Proton8-26' → 'ge-8.26'", () => {
    assert.equal(releaseTagToVersionId("GE-Proton8-26"), "ge-8.26");
  });

  test("'GE-Proton10-1' → 'ge-10.1'", () => {
    assert.equal(releaseTagToVersionId("GE-Proton10-1"), "ge-10.1");
  });

  test("matching is case-insensitive", () => {
    assert.equal(releaseTagToVersionId("ge-proton9-20"), "ge-9.20");
  });

  test("other tags are slugged", () => {
    assert.equal(releaseTagToVersionId("Proton 9.0"), "proton-9-0");
    assert.equal(releaseTagToVersionId("GE-Proton9-20-rtsp"), "ge-proton9-20-rtsp");
  });
});

// ─── runtimeSortKey ───────────────────────────────────────────────────────────

describe("runtimeSortKey — newest-first ordering", () => {
  test("'Proton 9.0' → 9000", () => {
    assert.equal(runtimeSortKey("Proton 9.0"), 9000);
  });

  test("'GE-Proton9-20' → 9020", () => {
    assert.equal(runtimeSortKey("GE-Proton9-20"), 9020);
  });

  test("'ge-8.26' → 8026", () => {
    assert.equal(runtimeSortKey("ge-8.26"), 8026);
  });

  test("a single number is treated as the major version", () => {
    assert.equal(runtimeSortKey("Proton 7"), 7000);
  });

  test("names without numbers sort last", () => {
    assert.equal(runtimeSortKey("Proton - Experimental"), 0);
  });

  test("sorting by key puts newer releases first", () => {
    const names = ["GE-Proton8-26", "GE-Proton9-1", "GE-Proton8-30"];
    names.sort((a, b) => runtimeSortKey(b) - runtimeSortKey(a));
    assert.deepEqual(names, ["GE-Proton9-1", "GE-Proton8-30", "GE-Proton8-26"]);
  });
});

// ─── isSafeVersionId ──────────────────────────────────────────────────────────

describe("isSafeVersionId — directory-name guard", () => {
  test("accepts typical ids", () => {
    assert.equal(isSafeVersionId("ge-8.26"), true);
    assert.equal(isSafeVersionId("proton-9-0"), true);
    assert.equal(isSafeVersionId("experimental_2024"), true);
  });

  test("rejects path traversal and separators", () => {
    assert.equal(isSafeVersionId(".."), false);
    assert.equal(isSafeVersionId("a..b"), false);
    assert.equal(isSafeVersionId("ge/8.26"), false);
    assert.equal(isSafeVersionId(".hidden"), false);
  });

  test("rejects empty and overlong ids", () => {
    assert.equal(isSafeVersionId(""), false);
    assert.equal(isSafeVersionId("a".repeat(129)), false);
    assert.equal(isSafeVersionId("a".repeat(128)), true);
  });

  test("assertSafeVersionId throws InvalidStateError", () => {
    assert.throws(() => assertSafeVersionId("../etc"), InvalidStateError);
    assert.doesNotThrow(() => assertSafeVersionId("ge-8.26"));
  });
});
