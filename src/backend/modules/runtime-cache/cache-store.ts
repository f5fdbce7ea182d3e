/**
 * ============================================================
 *  Cache Store — on-disk registry of installed runtimes
 * ============================================================
 *
 * Layout under the cache root:
 *
 *   <root>/
 *   ├── versions/
 *   │   └── <versionId>/          installed payload
 *   │       └── .runtime.json     metadata record (InstalledRecord)
 *   ├── .staging/
 *   │   ├── <id>.<token>.part     archive being downloaded
 *   │   ├── <id>.<token>/         unpacked payload awaiting commit
 *   │   └── <id>.<token>.evicted  version directory being deleted
 *   └── current.json              { "versionId": string | null }
 *
 * A version directory only ever appears through a single rename of a
 * fully unpacked staging directory that already contains its metadata
 * record, so versions/<id> is either absent or complete. Anything left
 * in .staging/ without a live handle is an abandoned attempt and is
 * deleted by init().
 *
 * Mutations are serialized per version id with a KeyedMutex; the
 * current pointer file has its own key.
 * ============================================================
 */
import { mkdir, readdir, readFile, rename, rm, writeFile } from "fs/promises";
import { join } from "path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type {
  CacheEntry,
  FetchedPayload,
  InstallState,
  InstalledRecord,
  Integrity,
  RuntimeLease,
  StagingHandle,
} from "./types.js";
import {
  AlreadyInstallingError,
  BusyError,
  DiskError,
  IntegrityError,
  InvalidStateError,
  NotFoundError,
  errorMessage,
  toRuntimeError,
} from "./errors.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { assertSafeVersionId, isSafeVersionId } from "./version-id.js";
import { tarUnpacker, type Unpacker } from "./unpacker.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "cache-store" });

export const RECORD_FILE = ".runtime.json";
const CURRENT_LOCK_KEY = "\0current";

// ---------------------------------------------------------------------------
// Persisted shapes
// ---------------------------------------------------------------------------

const IntegritySchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("digest"),
    algorithm: z.enum(["sha256", "sha512"]),
    value: z.string(),
  }),
  z.object({ kind: z.literal("size"), bytes: z.number().int().nonnegative() }),
]);

const InstalledRecordSchema = z.object({
  versionId: z.string(),
  integrity: IntegritySchema,
  algorithm: z.enum(["sha256", "sha512"]),
  digest: z.string(),
  bytes: z.number().int().nonnegative(),
  installedAt: z.number(),
  lastUsedAt: z.number(),
});

const CurrentPointerSchema = z.object({ versionId: z.string().nullable() });

/** What the fallback policy needs to know about the cache. */
export interface CacheState {
  /** Installed versions, most recently used first */
  installed: CacheEntry[];
  current: string | null;
}

export interface CacheStoreOptions {
  root: string;
  unpacker?: Unpacker;
  now?: () => number;
}

type DiscardOutcome = "failed" | "cancelled";

interface VersionSlot {
  state: InstallState;
  record: InstalledRecord | null;
  staging: StagingHandle | null;
  activeUsers: number;
  lastError: string | null;
}

// ---------------------------------------------------------------------------
// Pure helpers (exported for unit testing)
// ---------------------------------------------------------------------------

/**
 * Compares what was downloaded against what the registry declared.
 * Returns null when the payload matches, otherwise a description of the mismatch.
 */
export function checkIntegrity(expected: Integrity, payload: FetchedPayload): string | null {
  if (expected.kind === "size") {
    return payload.bytes === expected.bytes
      ? null
      : `size mismatch: expected ${expected.bytes} bytes, got ${payload.bytes}`;
  }
  if (payload.algorithm !== expected.algorithm) {
    return `digest algorithm mismatch: expected ${expected.algorithm}, got ${payload.algorithm}`;
  }
  return payload.digest.toLowerCase() === expected.value.toLowerCase()
    ? null
    : `${expected.algorithm} mismatch: expected ${expected.value}, got ${payload.digest}`;
}

/** Writes JSON next to its destination first so readers never see a torn file. */
async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  const tmp = `${path}.${uuidv4()}.tmp`;
  await writeFile(tmp, JSON.stringify(value, null, 2) + "\n", "utf-8");
  await rename(tmp, path);
}

// ---------------------------------------------------------------------------
// CacheStore
// ---------------------------------------------------------------------------

export class CacheStore {
  readonly root: string;
  readonly versionsDir: string;
  readonly stagingDir: string;
  private readonly currentFile: string;
  private readonly unpack: Unpacker;
  private readonly now: () => number;
  private readonly locks = new KeyedMutex();
  private readonly slots = new Map<string, VersionSlot>();
  private currentId: string | null = null;
  private initialized = false;

  constructor(opts: CacheStoreOptions) {
    this.root = opts.root;
    this.versionsDir = join(opts.root, "versions");
    this.stagingDir = join(opts.root, ".staging");
    this.currentFile = join(opts.root, "current.json");
    this.unpack = opts.unpacker ?? tarUnpacker;
    this.now = opts.now ?? Date.now;
  }

  // ── Startup ───────────────────────────────────────────────────────────────

  /**
   * Creates the cache layout, deletes abandoned staging leftovers, loads
   * every committed version and restores the current pointer.
   * Must complete before any other operation. Subsequent calls are no-ops.
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    try {
      await mkdir(this.versionsDir, { recursive: true });
      await mkdir(this.stagingDir, { recursive: true });
    } catch (err) {
      throw new DiskError(`Cannot create cache root "${this.root}": ${errorMessage(err)}`, err);
    }

    await this.recoverStaging();
    await this.loadInstalled();
    await this.loadCurrent();

    this.initialized = true;
    log.info(
      { root: this.root, installed: this.list().length, current: this.currentId },
      "Runtime cache ready"
    );
  }

  private async recoverStaging(): Promise<void> {
    const live = new Set<string>();
    for (const slot of this.slots.values()) {
      if (slot.staging) live.add(slot.staging.token);
    }

    for (const name of await readdir(this.stagingDir)) {
      if ([...live].some((token) => name.includes(token))) continue;
      await rm(join(this.stagingDir, name), { recursive: true, force: true });
      log.info({ name }, "Removed abandoned staging entry");
    }
  }

  private async loadInstalled(): Promise<void> {
    for (const name of await readdir(this.versionsDir)) {
      const dir = join(this.versionsDir, name);

      const record = isSafeVersionId(name) ? await this.readRecord(dir) : null;
      if (!record || record.versionId !== name) {
        log.warn({ dir }, "Version directory has no valid metadata record — removing");
        await rm(dir, { recursive: true, force: true });
        continue;
      }

      this.slots.set(name, {
        state: "installed",
        record,
        staging: null,
        activeUsers: 0,
        lastError: null,
      });
    }
  }

  private async readRecord(dir: string): Promise<InstalledRecord | null> {
    try {
      const raw: unknown = JSON.parse(await readFile(join(dir, RECORD_FILE), "utf-8"));
      const parsed = InstalledRecordSchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    } catch (err) {
      log.debug({ dir, err }, "Unreadable metadata record");
      return null;
    }
  }

  private async loadCurrent(): Promise<void> {
    let pointer: string | null = null;
    try {
      const raw: unknown = JSON.parse(await readFile(this.currentFile, "utf-8"));
      const parsed = CurrentPointerSchema.safeParse(raw);
      if (parsed.success) pointer = parsed.data.versionId;
    } catch (err) {
      log.debug({ err }, "No current pointer on disk");
    }

    if (pointer !== null && this.has(pointer) !== "installed") {
      log.warn({ versionId: pointer }, "Current pointer names a missing version — clearing");
      pointer = null;
    }
    this.currentId = pointer;
    await this.persistCurrent();
  }

  // ── Queries ───────────────────────────────────────────────────────────────

  has(versionId: string): InstallState {
    return this.slots.get(versionId)?.state ?? "missing";
  }

  /** Directory of an installed version; null unless Installed. */
  path(versionId: string): string | null {
    return this.has(versionId) === "installed" ? join(this.versionsDir, versionId) : null;
  }

  current(): string | null {
    return this.currentId;
  }

  activeUsers(versionId: string): number {
    return this.slots.get(versionId)?.activeUsers ?? 0;
  }

  lastError(versionId: string): string | null {
    return this.slots.get(versionId)?.lastError ?? null;
  }

  record(versionId: string): InstalledRecord | null {
    return this.slots.get(versionId)?.record ?? null;
  }

  /** Installed versions, most recently used first. */
  list(): CacheEntry[] {
    const entries: CacheEntry[] = [];
    for (const [versionId, slot] of this.slots) {
      if (slot.state !== "installed" || !slot.record) continue;
      entries.push({
        versionId,
        directoryPath: join(this.versionsDir, versionId),
        installedAt: slot.record.installedAt,
        lastUsedAt: slot.record.lastUsedAt,
        isCurrent: this.currentId === versionId,
        activeUsers: slot.activeUsers,
      });
    }
    return entries.sort((a, b) => b.lastUsedAt - a.lastUsedAt || a.versionId.localeCompare(b.versionId));
  }

  /** Most recently used installed version other than `excludeId`. */
  mostRecentlyUsed(excludeId: string | null = null): string | null {
    return this.list().find((e) => e.versionId !== excludeId)?.versionId ?? null;
  }

  state(): CacheState {
    return { installed: this.list(), current: this.currentId };
  }

  // ── Install ───────────────────────────────────────────────────────────────

  /**
   * Allocates a fresh staging location for one install attempt.
   * Callers should go through the DownloadCoordinator, which never asks
   * twice for the same id.
   */
  async beginInstall(versionId: string): Promise<StagingHandle> {
    assertSafeVersionId(versionId);

    return this.locks.runExclusive(versionId, async () => {
      const slot = this.slot(versionId);
      if (slot.staging) throw new AlreadyInstallingError(versionId);
      if (slot.state === "installed") {
        throw new InvalidStateError(`Runtime "${versionId}" is already installed`);
      }

      const token = uuidv4();
      const handle: StagingHandle = {
        versionId,
        token,
        archivePath: join(this.stagingDir, `${versionId}.${token}.part`),
        payloadDir: join(this.stagingDir, `${versionId}.${token}`),
      };

      const previous = slot.state;
      slot.staging = handle;
      slot.state = "staging";

      try {
        await mkdir(handle.payloadDir, { recursive: true });
      } catch (err) {
        slot.staging = null;
        slot.state = previous;
        throw new DiskError(`Cannot create staging directory: ${errorMessage(err)}`, err);
      }

      log.debug({ versionId, token }, "Staging allocated");
      return handle;
    });
  }

  /** Marks the attempt as past the download phase. */
  markVerifying(handle: StagingHandle): void {
    const slot = this.slots.get(handle.versionId);
    if (slot?.staging?.token === handle.token) slot.state = "verifying";
  }

  /**
   * Verifies the downloaded archive, unpacks it and atomically moves it to
   * versions/<id>. On any failure the staging location is discarded and the
   * version ends up Failed (or Missing when the signal was aborted).
   */
  async commitInstall(
    handle: StagingHandle,
    expected: Integrity,
    payload: FetchedPayload,
    signal?: AbortSignal
  ): Promise<string> {
    const { versionId } = handle;

    return this.locks.runExclusive(versionId, async () => {
      const slot = this.liveSlot(handle);
      slot.state = "verifying";

      const mismatch = checkIntegrity(expected, payload);
      if (mismatch) {
        await this.discardLocked(handle, "failed", mismatch);
        throw new IntegrityError(`Runtime "${versionId}" failed verification: ${mismatch}`);
      }

      const finalDir = join(this.versionsDir, versionId);
      const now = this.now();
      const record: InstalledRecord = {
        versionId,
        integrity: expected,
        algorithm: payload.algorithm,
        digest: payload.digest,
        bytes: payload.bytes,
        installedAt: now,
        lastUsedAt: now,
      };

      try {
        await this.unpack(handle.archivePath, handle.payloadDir, signal);
        signal?.throwIfAborted();
        await writeFile(join(handle.payloadDir, RECORD_FILE), JSON.stringify(record, null, 2) + "\n", "utf-8");
        await rm(handle.archivePath, { force: true });
        // Not Installed, so anything here is debris from outside this process.
        await rm(finalDir, { recursive: true, force: true });
        await rename(handle.payloadDir, finalDir);
      } catch (err) {
        const failure = toRuntimeError(err);
        await this.discardLocked(handle, failure.code === "Cancelled" ? "cancelled" : "failed", failure.message);
        throw failure;
      }

      slot.staging = null;
      slot.state = "installed";
      slot.record = record;
      slot.lastError = null;

      log.info({ versionId, bytes: payload.bytes, digest: payload.digest }, "Runtime installed");
      return finalDir;
    });
  }

  /**
   * Deletes the staging location of an attempt that did not commit.
   * A no-op when the handle was already discarded.
   */
  async discardInstall(handle: StagingHandle, outcome: DiscardOutcome, error?: string): Promise<void> {
    await this.locks.runExclusive(handle.versionId, () => this.discardLocked(handle, outcome, error ?? null));
  }

  private async discardLocked(handle: StagingHandle, outcome: DiscardOutcome, error: string | null): Promise<void> {
    const slot = this.slots.get(handle.versionId);
    if (!slot || slot.staging?.token !== handle.token) return;

    slot.staging = null;
    try {
      await rm(handle.archivePath, { force: true });
      await rm(handle.payloadDir, { recursive: true, force: true });
    } catch (err) {
      // Left for the next init() to sweep.
      log.warn({ versionId: handle.versionId, err }, "Failed to remove staging files");
    }

    // A cancelled retry keeps the earlier failure visible.
    if (outcome === "failed") slot.lastError = error;
    slot.state = outcome === "failed" || slot.lastError !== null ? "failed" : "missing";
    log.debug({ versionId: handle.versionId, outcome }, "Staging discarded");
  }

  // ── Eviction & current pointer ────────────────────────────────────────────

  /**
   * Removes an installed version. Fails with Busy while any lease is held.
   * Clears the current pointer when it named this version.
   */
  async evict(versionId: string): Promise<void> {
    await this.locks.runExclusive(versionId, async () => {
      const slot = this.slots.get(versionId);
      if (!slot || slot.state !== "installed") {
        throw new NotFoundError(`Runtime "${versionId}" is not installed`);
      }
      if (slot.activeUsers > 0) {
        throw new BusyError(`Runtime "${versionId}" is in use by ${slot.activeUsers} caller(s)`);
      }

      const trash = join(this.stagingDir, `${versionId}.${uuidv4()}.evicted`);
      try {
        await rename(join(this.versionsDir, versionId), trash);
      } catch (err) {
        throw new DiskError(`Cannot evict "${versionId}": ${errorMessage(err)}`, err);
      }

      slot.state = "missing";
      slot.record = null;
      slot.lastError = null;

      if (this.currentId === versionId) {
        this.currentId = null;
        await this.persistCurrent();
      }

      try {
        await rm(trash, { recursive: true, force: true });
      } catch (err) {
        log.warn({ versionId, err }, "Evicted directory not fully removed");
      }
      log.info({ versionId }, "Runtime evicted");
    });
  }

  /** Points "current" at an installed version. */
  async setCurrent(versionId: string): Promise<void> {
    await this.locks.runExclusive(versionId, async () => {
      if (this.has(versionId) !== "installed") {
        throw new InvalidStateError(`Cannot make "${versionId}" current: not installed`);
      }
      this.currentId = versionId;
      await this.persistCurrent();
    });
  }

  private async persistCurrent(): Promise<void> {
    await this.locks.runExclusive(CURRENT_LOCK_KEY, async () => {
      try {
        await writeJsonAtomic(this.currentFile, { versionId: this.currentId });
      } catch (err) {
        throw new DiskError(`Cannot write current pointer: ${errorMessage(err)}`, err);
      }
    });
  }

  // ── Leases ────────────────────────────────────────────────────────────────

  /**
   * Takes one active-user reference on an installed version and records
   * the use for most-recently-used ordering.
   */
  async acquire(versionId: string): Promise<RuntimeLease> {
    return this.locks.runExclusive(versionId, async () => {
      const slot = this.slots.get(versionId);
      const dir = this.path(versionId);
      if (!slot?.record || !dir) {
        throw new NotFoundError(`Runtime "${versionId}" is not installed`);
      }

      slot.activeUsers++;
      slot.record = { ...slot.record, lastUsedAt: this.now() };

      try {
        await writeJsonAtomic(join(dir, RECORD_FILE), slot.record);
      } catch (err) {
        // Usage ordering is advisory; the lease itself is valid.
        log.warn({ versionId, err }, "Failed to persist last-used timestamp");
      }

      let released = false;
      return {
        versionId,
        path: dir,
        release: () => {
          if (released) return;
          released = true;
          slot.activeUsers = Math.max(0, slot.activeUsers - 1);
        },
      };
    });
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private slot(versionId: string): VersionSlot {
    let slot = this.slots.get(versionId);
    if (!slot) {
      slot = { state: "missing", record: null, staging: null, activeUsers: 0, lastError: null };
      this.slots.set(versionId, slot);
    }
    return slot;
  }

  private liveSlot(handle: StagingHandle): VersionSlot {
    const slot = this.slots.get(handle.versionId);
    if (!slot || slot.staging?.token !== handle.token) {
      throw new InvalidStateError(`Staging handle for "${handle.versionId}" is no longer active`);
    }
    return slot;
  }
}
