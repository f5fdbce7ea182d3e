import { readFileSync, writeFileSync, existsSync, copyFileSync, mkdirSync } from "fs";
import { resolve, join, dirname } from "path";
import { homedir } from "os";
import { z } from "zod";
import { logger } from "../../logger.js";

const log = logger.child({ module: "settings" });

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * Validates a single filesystem path: must be a non-empty absolute Unix path.
 * Rejects empty strings and Windows-style or relative paths.
 */
export const AbsolutePath = z
  .string()
  .min(1, "Path must not be empty")
  .refine((p) => p.startsWith("/"), {
    message: "Path must be an absolute path starting with /",
  });

/** An absolute path, or "" meaning "use the built-in default / auto-detect". */
const OptionalPath = z.union([z.literal(""), AbsolutePath]);

export const RegistrySettingsSchema = z.object({
  /** Name of a registered registry provider: "github" or "manifest". */
  provider: z.string().min(1).default("github"),
  /** owner/repo for the github provider. */
  repository: z
    .string()
    .regex(/^[\w.-]+\/[\w.-]+$/, "Repository must look like owner/repo")
    .default("GloriousEggroll/proton-ge-custom"),
  /** Bearer token for the API; surrounding whitespace is trimmed on load. */
  token: z.string().trim().default(""),
  /** JSON manifest read by the manifest provider. */
  manifestPath: OptionalPath.default(""),
});

export const DownloadSettingsSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  backoffBaseMs: z.number().int().min(0).default(1_000),
  backoffMaxMs: z.number().int().min(0).default(30_000),
  attemptTimeoutMs: z.number().int().min(1_000).default(10 * 60 * 1_000),
});

export const ApiSettingsSchema = z.object({
  /** Leases not released or renewed within this window are released by the server. */
  leaseTtlMs: z.number().int().min(1_000).default(4 * 60 * 60 * 1_000),
});

export const SettingsSchema = z.object({
  /** "" = ~/.local/share/runtime-depot/runtimes */
  cacheRoot: OptionalPath.default(""),
  registry: RegistrySettingsSchema.default({}),
  download: DownloadSettingsSchema.default({}),
  /** Explicit unmanaged runtime used as the last fallback tier. */
  systemRuntimePath: OptionalPath.default(""),
  autoDetectSystemRuntime: z.boolean().default(true),
  api: ApiSettingsSchema.default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type RegistrySettings = z.infer<typeof RegistrySettingsSchema>;
export type DownloadSettings = z.infer<typeof DownloadSettingsSchema>;
export type ApiSettings = z.infer<typeof ApiSettingsSchema>;

export const DEFAULT_CACHE_ROOT = join(homedir(), ".local", "share", "runtime-depot", "runtimes");

/** Returns the effective cache root for the given settings. */
export function resolveCacheRoot(settings: Pick<Settings, "cacheRoot">): string {
  return settings.cacheRoot || DEFAULT_CACHE_ROOT;
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------
const CONFIG_PATH = resolve(
  process.env.RTD_CONFIG_PATH ?? join(process.cwd(), "config", "settings.json")
);
const EXAMPLE_PATH = resolve(process.cwd(), "config.example.json");

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------
let _settings: Settings | null = null;

function ensureConfigExists(): void {
  if (existsSync(CONFIG_PATH)) return;
  mkdirSync(dirname(CONFIG_PATH), { recursive: true });
  if (existsSync(EXAMPLE_PATH)) {
    copyFileSync(EXAMPLE_PATH, CONFIG_PATH);
    log.info({ path: CONFIG_PATH }, "Created settings from example template");
  } else {
    writeFileSync(CONFIG_PATH, JSON.stringify(SettingsSchema.parse({}), null, 2) + "\n", "utf-8");
    log.info({ path: CONFIG_PATH }, "Created settings with defaults");
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Loads settings from disk, creating config/settings.json from the example
 * template if it does not exist yet. Cached in memory after first load.
 */
export async function loadSettings(): Promise<Settings> {
  if (_settings) return _settings;

  ensureConfigExists();

  const raw: unknown = JSON.parse(readFileSync(CONFIG_PATH, "utf-8"));
  _settings = SettingsSchema.parse(raw);
  return _settings;
}
