// Re-export all types
export type {
  VersionRequirement,
  InstallState,
  DigestAlgorithm,
  Integrity,
  RegistryEntry,
  FetchedPayload,
  InstalledRecord,
  CacheEntry,
  StagingHandle,
  ProgressSnapshot,
  RuntimeLease,
  FailureReason,
  ResolutionResult,
} from "./types.js";

export {
  RuntimeError,
  NetworkError,
  IntegrityError,
  NotFoundError,
  DiskError,
  CancelledError,
  BusyError,
  RuntimeUnavailableError,
  AlreadyInstallingError,
  InvalidStateError,
  type RuntimeErrorCode,
} from "./errors.js";

export {
  buildRuntimeId,
  releaseTagToVersionId,
  runtimeSortKey,
  isSafeVersionId,
} from "./version-id.js";

export { CacheStore, checkIntegrity, type CacheState, type CacheStoreOptions } from "./cache-store.js";
export { ReleaseFetcher, DEFAULT_RETRY_POLICY, backoffDelay, type RetryPolicy } from "./release-fetcher.js";
export { DownloadCoordinator, type Subscription, type ProgressEventListener } from "./download-coordinator.js";
export { decide, ANY_REQUIREMENT, SYSTEM_REQUIREMENT, type PlanStep } from "./fallback-policy.js";
export { VersionResolver } from "./version-resolver.js";
export {
  createRegistry,
  registerRegistryProvider,
  listRegistryProviders,
  type RuntimeRegistry,
  type RegistryProviderFactory,
} from "./registry.js";
export { detectSystemRuntimes, createSystemRuntimeProbe, type SystemRuntime, type SystemRuntimeProbe } from "./system-probe.js";
export { tarUnpacker, type Unpacker } from "./unpacker.js";
export { nodeFetchClient, type HttpClient, type HttpResponse } from "./http.js";
export { RuntimeManager, createRuntimeManager, type RuntimeManagerOptions } from "./runtime-manager.js";
