/**
 * ============================================================
 *  cache-store — Unit Tests
 * ============================================================
 *
 * Exercises the on-disk cache against a fresh temp directory per
 * test: staged installs, verification failures, eviction, leases
 * and startup recovery. Downloads are simulated by writing the
 * archive straight into the staging handle; the copy unpacker
 * stands in for tar.
 *
 * Module under test: src/backend/modules/runtime-cache/cache-store.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { existsSync } from "fs";
import { mkdir, readdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import { CacheStore, checkIntegrity, RECORD_FILE } from "./cache-store.js";
import type { FetchedPayload, InstalledRecord, StagingHandle } from "./types.js";
import {
  AlreadyInstallingError,
  BusyError,
  DiskError,
  IntegrityError,
  InvalidStateError,
  NotFoundError,
} from "./errors.js";
import {
  makeTempRoot,
  cleanupTempRoot,
  seedInstalled,
  copyUnpacker,
  makePayload,
  sha256Hex,
} from "../../../tests/helpers/index.js";

async function stageArchive(handle: StagingHandle, data: Buffer): Promise<FetchedPayload> {
  await writeFile(handle.archivePath, data);
  return { bytes: data.length, algorithm: "sha256", digest: sha256Hex(data) };
}

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, "utf-8"));
}

async function readRecordFile(path: string): Promise<InstalledRecord> {
  return JSON.parse(await readFile(path, "utf-8"));
}

// ─── checkIntegrity ───────────────────────────────────────────────────────────

describe("checkIntegrity — declared vs downloaded", () => {
  const payload: FetchedPayload = { bytes: 1000, algorithm: "sha256", digest: "abc123" };

  test("matching digest → null", () => {
    assert.equal(checkIntegrity({ kind: "digest", algorithm: "sha256", value: "ABC123" }, payload), null);
  });

  test("digest mismatch names both values", () => {
    assert.equal(
      checkIntegrity({ kind: "digest", algorithm: "sha256", value: "ffff" }, payload),
      "sha256 mismatch: expected ffff, got abc123"
    );
  });

  test("algorithm mismatch", () => {
    assert.equal(
      checkIntegrity({ kind: "digest", algorithm: "sha512", value: "abc123" }, payload),
      "digest algorithm mismatch: expected sha512, got sha256"
    );
  });

  test("size check", () => {
    assert.equal(checkIntegrity({ kind: "size", bytes: 1000 }, payload), null);
    assert.equal(
      checkIntegrity({ kind: "size", bytes: 10 }, payload),
      "size mismatch: expected 10 bytes, got 1000"
    );
  });
});

// ─── CacheStore ───────────────────────────────────────────────────────────────

describe("CacheStore", () => {
  let root: string;
  let clock: number;
  let store: CacheStore;

  beforeEach(async () => {
    root = await makeTempRoot();
    clock = 5_000;
    store = new CacheStore({ root, unpacker: copyUnpacker, now: () => clock });
  });

  afterEach(async () => {
    await cleanupTempRoot(root);
  });

  test("init creates the layout and an empty current pointer", async () => {
    await store.init();
    assert.ok(existsSync(join(root, "versions")));
    assert.ok(existsSync(join(root, ".staging")));
    assert.deepEqual(store.list(), []);
    assert.equal(store.current(), null);
    assert.deepEqual(await readJson(join(root, "current.json")), { versionId: null });
  });

  test("beginInstall → commitInstall installs atomically", async () => {
    await store.init();
    const data = makePayload("ge-8.26");

    const handle = await store.beginInstall("ge-8.26");
    assert.equal(store.has("ge-8.26"), "staging");
    assert.ok(handle.archivePath.startsWith(join(root, ".staging")));

    const payload = await stageArchive(handle, data);
    const dir = await store.commitInstall(
      handle,
      { kind: "digest", algorithm: "sha256", value: sha256Hex(data) },
      payload
    );

    assert.equal(dir, join(root, "versions", "ge-8.26"));
    assert.equal(store.has("ge-8.26"), "installed");
    assert.equal(store.path("ge-8.26"), dir);
    assert.ok(existsSync(join(dir, "proton")));
    assert.deepEqual(await readdir(join(root, ".staging")), []);

    const record = store.record("ge-8.26");
    assert.equal(record?.bytes, data.length);
    assert.equal(record?.digest, sha256Hex(data));
    assert.equal(record?.installedAt, 5_000);
    assert.deepEqual(await readJson(join(dir, RECORD_FILE)), record);
  });

  test("integrity failure leaves nothing in versions/ or .staging/", async () => {
    await store.init();
    const handle = await store.beginInstall("ge-8.26");
    const payload = await stageArchive(handle, makePayload("ge-8.26"));

    await assert.rejects(
      store.commitInstall(handle, { kind: "digest", algorithm: "sha256", value: "0".repeat(64) }, payload),
      IntegrityError
    );

    assert.equal(store.has("ge-8.26"), "failed");
    assert.match(store.lastError("ge-8.26") ?? "", /^sha256 mismatch/);
    assert.deepEqual(await readdir(join(root, "versions")), []);
    assert.deepEqual(await readdir(join(root, ".staging")), []);
  });

  test("a failed install can be retried", async () => {
    await store.init();
    const data = makePayload("ge-8.26");
    const first = await store.beginInstall("ge-8.26");
    await store.commitInstall(first, { kind: "size", bytes: 1 }, await stageArchive(first, data)).catch(() => undefined);
    assert.equal(store.has("ge-8.26"), "failed");

    const second = await store.beginInstall("ge-8.26");
    await store.commitInstall(second, { kind: "size", bytes: data.length }, await stageArchive(second, data));
    assert.equal(store.has("ge-8.26"), "installed");
    assert.equal(store.lastError("ge-8.26"), null);
  });

  test("unpack failure surfaces as DiskError and discards staging", async () => {
    const failing = new CacheStore({
      root,
      unpacker: async () => {
        throw new Error("tar: unexpected end of archive");
      },
    });
    await failing.init();
    const data = makePayload("ge-8.26");
    const handle = await failing.beginInstall("ge-8.26");

    await assert.rejects(
      failing.commitInstall(handle, { kind: "size", bytes: data.length }, await stageArchive(handle, data)),
      DiskError
    );
    assert.equal(failing.has("ge-8.26"), "failed");
    assert.deepEqual(await readdir(join(root, ".staging")), []);
    assert.deepEqual(await readdir(join(root, "versions")), []);
  });

  test("second beginInstall for the same id → AlreadyInstallingError", async () => {
    await store.init();
    const handle = await store.beginInstall("ge-8.26");
    await assert.rejects(store.beginInstall("ge-8.26"), AlreadyInstallingError);

    await store.discardInstall(handle, "cancelled");
    assert.equal(store.has("ge-8.26"), "missing");
    assert.deepEqual(await readdir(join(root, ".staging")), []);
  });

  test("cancelling a retry keeps an earlier failure visible", async () => {
    await store.init();
    const data = makePayload("ge-8.26");
    const first = await store.beginInstall("ge-8.26");
    await assert.rejects(
      store.commitInstall(first, { kind: "size", bytes: 1 }, await stageArchive(first, data)),
      IntegrityError
    );

    const retry = await store.beginInstall("ge-8.26");
    await store.discardInstall(retry, "cancelled");
    assert.equal(store.has("ge-8.26"), "failed");
    assert.equal(store.lastError("ge-8.26"), "size mismatch: expected 1 bytes, got 1000");
  });

  test("beginInstall on an installed id → InvalidStateError", async () => {
    await seedInstalled(root, "ge-8.26");
    await store.init();
    await assert.rejects(store.beginInstall("ge-8.26"), InvalidStateError);
  });

  test("beginInstall rejects unsafe ids", async () => {
    await store.init();
    await assert.rejects(store.beginInstall("../escape"), InvalidStateError);
  });

  test("evict fails with Busy while a lease is held", async () => {
    await seedInstalled(root, "ge-8.26");
    await store.init();
    await store.setCurrent("ge-8.26");

    const lease = await store.acquire("ge-8.26");
    assert.equal(store.activeUsers("ge-8.26"), 1);
    await assert.rejects(store.evict("ge-8.26"), BusyError);
    assert.equal(store.has("ge-8.26"), "installed");

    lease.release();
    await store.evict("ge-8.26");

    assert.equal(store.has("ge-8.26"), "missing");
    assert.equal(store.current(), null);
    assert.ok(!existsSync(join(root, "versions", "ge-8.26")));
    assert.deepEqual(await readdir(join(root, ".staging")), []);
    assert.deepEqual(await readJson(join(root, "current.json")), { versionId: null });
  });

  test("evict of a missing version → NotFoundError", async () => {
    await store.init();
    await assert.rejects(store.evict("ge-8.26"), NotFoundError);
  });

  test("lease release is idempotent", async () => {
    await seedInstalled(root, "ge-8.26");
    await store.init();
    const a = await store.acquire("ge-8.26");
    const b = await store.acquire("ge-8.26");
    assert.equal(store.activeUsers("ge-8.26"), 2);
    a.release();
    a.release();
    assert.equal(store.activeUsers("ge-8.26"), 1);
    b.release();
    assert.equal(store.activeUsers("ge-8.26"), 0);
  });

  test("acquire moves a version to the front of the MRU order", async () => {
    await seedInstalled(root, "ge-8.26", { lastUsedAt: 100 });
    await seedInstalled(root, "ge-8.30", { lastUsedAt: 200 });
    await store.init();
    assert.deepEqual(store.list().map((e) => e.versionId), ["ge-8.30", "ge-8.26"]);

    clock = 300;
    const lease = await store.acquire("ge-8.26");
    lease.release();

    assert.deepEqual(store.list().map((e) => e.versionId), ["ge-8.26", "ge-8.30"]);
    assert.equal(store.mostRecentlyUsed(), "ge-8.26");
    assert.equal(store.mostRecentlyUsed("ge-8.26"), "ge-8.30");
    const persisted = await readRecordFile(join(root, "versions", "ge-8.26", RECORD_FILE));
    assert.equal(persisted.lastUsedAt, 300);
    assert.equal(store.record("ge-8.26")?.lastUsedAt, 300);
  });

  test("acquire of a missing version → NotFoundError", async () => {
    await store.init();
    await assert.rejects(store.acquire("ge-8.26"), NotFoundError);
  });

  test("setCurrent requires an installed version", async () => {
    await store.init();
    await assert.rejects(store.setCurrent("ge-8.26"), InvalidStateError);
  });

  test("current pointer survives a restart", async () => {
    await seedInstalled(root, "ge-8.26");
    await store.init();
    await store.setCurrent("ge-8.26");

    const reopened = new CacheStore({ root, unpacker: copyUnpacker });
    await reopened.init();
    assert.equal(reopened.current(), "ge-8.26");
    assert.equal(reopened.list()[0]?.isCurrent, true);
  });

  test("init removes staging leftovers, invalid versions and a dangling pointer", async () => {
    const staging = join(root, ".staging");
    await mkdir(join(staging, "ge-9.1.tok"), { recursive: true });
    await writeFile(join(staging, "ge-9.1.tok.part"), "partial");
    await mkdir(join(root, "versions", "no-record"), { recursive: true });
    await seedInstalled(root, "renamed");
    await writeFile(
      join(root, "versions", "renamed", RECORD_FILE),
      JSON.stringify({ versionId: "other", integrity: { kind: "size", bytes: 1 }, algorithm: "sha256", digest: "", bytes: 1, installedAt: 1, lastUsedAt: 1 })
    );
    await seedInstalled(root, "ge-8.26");
    await writeFile(join(root, "current.json"), JSON.stringify({ versionId: "gone" }));

    await store.init();

    assert.deepEqual(store.list().map((e) => e.versionId), ["ge-8.26"]);
    assert.deepEqual(await readdir(staging), []);
    assert.deepEqual((await readdir(join(root, "versions"))).sort(), ["ge-8.26"]);
    assert.equal(store.current(), null);
    assert.deepEqual(await readJson(join(root, "current.json")), { versionId: null });
  });
});
