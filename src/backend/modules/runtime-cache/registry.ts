/**
 * ============================================================
 *  Runtime Registry — where downloadable versions come from
 * ============================================================
 *
 * Provider interface: any source of runtime releases implements
 * RuntimeRegistry. Providers are looked up by name through a
 * registration map so settings can pick one without the caller
 * knowing the implementation:
 *
 *   "github"   — GitHub Releases of settings.registry.repository
 *   "manifest" — a local JSON manifest (offline mirrors, testing)
 *
 * Swap candidate: registerRegistryProvider("mirror", factory)
 * adds another source without touching the resolver.
 * ============================================================
 */
import { readFile } from "fs/promises";
import { z } from "zod";
import type { RegistryEntry, Integrity } from "./types.js";
import type { HttpClient } from "./http.js";
import { nodeFetchClient } from "./http.js";
import { NetworkError, NotFoundError, DiskError, errorMessage } from "./errors.js";
import { releaseTagToVersionId, runtimeSortKey, isSafeVersionId } from "./version-id.js";
import type { RegistrySettings } from "../settings/index.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "registry" });

// ── Shared types ────────────────────────────────────────────────────────────

export interface RuntimeRegistry {
  readonly name: string;
  /** Ordered newest-first; ids are stable across calls. */
  listVersions(signal?: AbortSignal): Promise<RegistryEntry[]>;
}

export interface RegistryProviderContext {
  settings: RegistrySettings;
  http: HttpClient;
}

export type RegistryProviderFactory = (ctx: RegistryProviderContext) => RuntimeRegistry;

// ── Provider registration ───────────────────────────────────────────────────

const providers = new Map<string, RegistryProviderFactory>();

export function registerRegistryProvider(name: string, factory: RegistryProviderFactory): void {
  providers.set(name, factory);
}

export function listRegistryProviders(): string[] {
  return [...providers.keys()].sort();
}

/** Instantiates the provider named in settings. Throws on an unknown name. */
export function createRegistry(
  settings: RegistrySettings,
  http: HttpClient = nodeFetchClient
): RuntimeRegistry {
  const factory = providers.get(settings.provider);
  if (!factory) {
    throw new Error(
      `Unknown registry provider "${settings.provider}". ` +
      `Available: ${listRegistryProviders().join(", ")}`
    );
  }
  return factory({ settings, http });
}

/** Finds an exact id in a registry listing. */
export async function findRegistryEntry(
  registry: RuntimeRegistry,
  versionId: string,
  signal?: AbortSignal
): Promise<RegistryEntry | null> {
  const versions = await registry.listVersions(signal);
  return versions.find((v) => v.id === versionId) ?? null;
}

// ---------------------------------------------------------------------------
// GitHub Releases provider
// ---------------------------------------------------------------------------

const GITHUB_API = "https://api.github.com";
const RELEASES_PER_PAGE = 100;
const MAX_RELEASE_PAGES = 20;
const ARCHIVE_EXTENSIONS = [".tar.gz", ".tar.xz", ".tar.zst"];

const GitHubAsset = z.object({
  name: z.string(),
  size: z.number().int().nonnegative(),
  browser_download_url: z.string().url(),
  /** "sha256:<hex>" — only present on assets uploaded after GitHub began hashing */
  digest: z.string().nullish(),
});

const GitHubRelease = z.object({
  tag_name: z.string(),
  draft: z.boolean().default(false),
  prerelease: z.boolean().default(false),
  published_at: z.string().nullish(),
  assets: z.array(GitHubAsset),
});

const GitHubReleaseList = z.array(GitHubRelease);

type GitHubRelease = z.infer<typeof GitHubRelease>;
type GitHubAsset = z.infer<typeof GitHubAsset>;

/** Parses GitHub's "sha256:<hex>" asset digest into an Integrity, or null. */
export function parseAssetDigest(digest: string | null | undefined): Integrity | null {
  const match = digest?.match(/^(sha256|sha512):([0-9a-f]+)$/i);
  if (!match) return null;
  const algorithm = match[1].toLowerCase() === "sha512" ? "sha512" : "sha256";
  return { kind: "digest", algorithm, value: match[2].toLowerCase() };
}

function pickArchive(assets: GitHubAsset[]): GitHubAsset | undefined {
  return assets.find((a) => ARCHIVE_EXTENSIONS.some((ext) => a.name.endsWith(ext)));
}

/**
 * Maps one GitHub release to a registry entry. Drafts, prereleases and
 * releases without an archive asset are skipped (null).
 */
export function releaseToEntry(release: GitHubRelease): RegistryEntry | null {
  if (release.draft || release.prerelease) return null;

  const asset = pickArchive(release.assets);
  if (!asset) return null;

  const id = releaseTagToVersionId(release.tag_name);
  if (!isSafeVersionId(id)) return null;

  return {
    id,
    label: release.tag_name,
    assetUrl: asset.browser_download_url,
    integrity: parseAssetDigest(asset.digest) ?? { kind: "size", bytes: asset.size },
    sizeBytes: asset.size,
    publishedAt: release.published_at ?? undefined,
  };
}

/** Newest first, by the numeric part of the upstream label. */
function sortEntries(entries: RegistryEntry[]): RegistryEntry[] {
  return entries.sort((a, b) => runtimeSortKey(b.label) - runtimeSortKey(a.label));
}

export function createGitHubRegistry(ctx: RegistryProviderContext): RuntimeRegistry {
  const { repository, token } = ctx.settings;
  const headers: Record<string, string> = { Accept: "application/vnd.github+json" };
  if (token) headers["Authorization"] = `Bearer ${token}`;

  async function fetchReleasePage(page: number, signal?: AbortSignal): Promise<GitHubRelease[]> {
    let url = `${GITHUB_API}/repos/${repository}/releases?per_page=${RELEASES_PER_PAGE}`;
    if (page > 1) url += `&page=${page}`;
    const res = await ctx.http(url, { headers, signal });

    if (res.status === 404) {
      throw new NotFoundError(`Release repository "${repository}" not found`);
    }
    if (!res.ok) {
      throw new NetworkError(`Release listing failed (${res.status} ${res.statusText})`, {
        status: res.status,
        retryable: res.status >= 500 || res.status === 429,
      });
    }

    const parsed = GitHubReleaseList.safeParse(await res.json());
    if (!parsed.success) {
      throw new NetworkError(`Unexpected release listing shape: ${parsed.error.message}`, {
        retryable: false,
      });
    }
    return parsed.data;
  }

  return {
    name: "github",

    async listVersions(signal?: AbortSignal): Promise<RegistryEntry[]> {
      const releases: GitHubRelease[] = [];
      for (let page = 1; page <= MAX_RELEASE_PAGES; page++) {
        const batch = await fetchReleasePage(page, signal);
        releases.push(...batch);
        // A short page is the last one
        if (batch.length < RELEASES_PER_PAGE) break;
      }

      const entries: RegistryEntry[] = [];
      for (const release of releases) {
        const entry = releaseToEntry(release);
        if (entry) entries.push(entry);
      }
      log.debug({ repository, count: entries.length }, "Listed releases");
      return sortEntries(entries);
    },
  };
}

// ---------------------------------------------------------------------------
// Local manifest provider
// ---------------------------------------------------------------------------

const ManifestVersion = z
  .object({
    id: z.string().refine(isSafeVersionId, { message: "Unsafe version id" }),
    label: z.string().optional(),
    assetUrl: z.string().url(),
    sha256: z.string().regex(/^[0-9a-f]{64}$/i).optional(),
    sha512: z.string().regex(/^[0-9a-f]{128}$/i).optional(),
    size: z.number().int().nonnegative().optional(),
  })
  .refine((v) => v.sha256 !== undefined || v.sha512 !== undefined || v.size !== undefined, {
    message: "Each version needs sha256, sha512 or size",
  });

export const ManifestSchema = z.object({
  versions: z.array(ManifestVersion),
});

export type Manifest = z.infer<typeof ManifestSchema>;

export function manifestToEntries(manifest: Manifest): RegistryEntry[] {
  return sortEntries(
    manifest.versions.map((v): RegistryEntry => {
      let integrity: Integrity;
      if (v.sha256) integrity = { kind: "digest", algorithm: "sha256", value: v.sha256.toLowerCase() };
      else if (v.sha512) integrity = { kind: "digest", algorithm: "sha512", value: v.sha512.toLowerCase() };
      else integrity = { kind: "size", bytes: v.size ?? 0 };

      return {
        id: v.id,
        label: v.label ?? v.id,
        assetUrl: v.assetUrl,
        integrity,
        sizeBytes: v.size,
      };
    })
  );
}

export function createManifestRegistry(ctx: RegistryProviderContext): RuntimeRegistry {
  const { manifestPath } = ctx.settings;

  return {
    name: "manifest",

    async listVersions(): Promise<RegistryEntry[]> {
      if (!manifestPath) {
        throw new NotFoundError("registry.manifestPath is not configured");
      }

      let raw: string;
      try {
        raw = await readFile(manifestPath, "utf-8");
      } catch (err) {
        throw new DiskError(`Cannot read manifest "${manifestPath}": ${errorMessage(err)}`, err);
      }

      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (err) {
        throw new DiskError(`Manifest "${manifestPath}" is not valid JSON`, err);
      }

      const parsed = ManifestSchema.safeParse(json);
      if (!parsed.success) {
        throw new DiskError(`Invalid manifest "${manifestPath}": ${parsed.error.message}`);
      }
      return manifestToEntries(parsed.data);
    },
  };
}

// ── Built-in providers ──────────────────────────────────────────────────────

registerRegistryProvider("github", createGitHubRegistry);
registerRegistryProvider("manifest", createManifestRegistry);
