/**
 * ============================================================
 *  Runtime Depot — Test Suite
 * ============================================================
 *
 * This file is the single source of truth for all tests.
 * Every test file MUST be imported here to be included in the suite.
 * Tests are grouped by layer, bottom-up.
 *
 * Run:            npm test
 *
 * To add a new test file:
 *   1. Create your .test.ts file co-located with the module it tests.
 *   2. Add an import below in the matching section.
 * ============================================================
 */

// ─── Settings ─────────────────────────────────────────────────────────────────
import "../backend/modules/settings/settings.test.js";

// ─── Runtime cache: primitives ────────────────────────────────────────────────
import "../backend/modules/runtime-cache/version-id.test.js";
import "../backend/modules/runtime-cache/keyed-mutex.test.js";
import "../backend/modules/runtime-cache/fallback-policy.test.js";

// ─── Runtime cache: components ────────────────────────────────────────────────
import "../backend/modules/runtime-cache/cache-store.test.js";
import "../backend/modules/runtime-cache/release-fetcher.test.js";
import "../backend/modules/runtime-cache/download-coordinator.test.js";
import "../backend/modules/runtime-cache/registry.test.js";
import "../backend/modules/runtime-cache/system-probe.test.js";
import "../backend/modules/runtime-cache/unpacker.test.js";

// ─── Runtime cache: resolution scenarios ──────────────────────────────────────
import "../backend/modules/runtime-cache/runtime-manager.test.js";

// ─── HTTP API ─────────────────────────────────────────────────────────────────
import "../backend/api/runtimes.test.js";
