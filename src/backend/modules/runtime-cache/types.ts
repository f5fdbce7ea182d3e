/**
 * Shared types for the runtime-cache module.
 * Imported by every sub-module — never from index.ts — so there are no
 * circular dependencies between them.
 */

/**
 * Opaque requirement string taken from a game's metadata, e.g. "ge-8.26".
 * "any" and "system" are sentinels, see fallback-policy.ts.
 */
export type VersionRequirement = string;

export type InstallState = "missing" | "staging" | "verifying" | "installed" | "failed";

export type DigestAlgorithm = "sha256" | "sha512";

/** How a downloaded asset is checked before it may be committed. */
export type Integrity =
  | { kind: "digest"; algorithm: DigestAlgorithm; value: string }
  | { kind: "size"; bytes: number };

/** One downloadable runtime as described by a registry provider. */
export interface RegistryEntry {
  /** Stable version id, e.g. "ge-8.26" */
  id: string;
  /** Upstream tag or label, e.g. "GE-Proton8-26" */
  label: string;
  assetUrl: string;
  integrity: Integrity;
  /** Declared asset size when known — used as bytesTotal before headers arrive */
  sizeBytes?: number;
  publishedAt?: string;
}

/** What the fetcher computed while streaming the asset. */
export interface FetchedPayload {
  bytes: number;
  algorithm: DigestAlgorithm;
  digest: string;
}

/** Metadata record stored as `.runtime.json` inside each installed version directory. */
export interface InstalledRecord {
  versionId: string;
  integrity: Integrity;
  algorithm: DigestAlgorithm;
  digest: string;
  bytes: number;
  installedAt: number; // unix ms
  lastUsedAt: number;  // unix ms
}

export interface CacheEntry {
  versionId: string;
  directoryPath: string;
  installedAt: number;
  lastUsedAt: number;
  isCurrent: boolean;
  activeUsers: number;
}

/** Allocated by CacheStore.beginInstall — paths are private to one install attempt. */
export interface StagingHandle {
  versionId: string;
  token: string;
  /** Downloaded archive */
  archivePath: string;
  /** Unpacked payload, renamed into place on commit */
  payloadDir: string;
}

export interface ProgressSnapshot {
  versionId: string;
  state: InstallState;
  bytesDone: number;
  /** 0 while unknown */
  bytesTotal: number;
  subscribers: number;
  error: string | null;
}

/** Keeps one active-user reference on an installed version until released. */
export interface RuntimeLease {
  readonly versionId: string;
  readonly path: string;
  /** Idempotent. */
  release(): void;
}

export type FailureReason = "Cancelled" | "RuntimeUnavailable";

export type ResolutionResult =
  | { kind: "UsedRequested"; versionId: string; path: string; lease: RuntimeLease }
  | { kind: "UsedCachedAlternate"; versionId: string; requested: VersionRequirement; path: string; lease: RuntimeLease }
  | { kind: "UsedSystemFallback"; path: string }
  | { kind: "Failed"; reason: FailureReason; message: string };
