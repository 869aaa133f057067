// Property-based tests for the Tenant Store
// Tenant isolation: whatever one tenant writes, no other tenant can read or scan.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { Keys, MemoryBackend, TenantStore } from "./tenant-store.js";
import { SessionStatus } from "./types.js";
import type { Session } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const arbitraryId = fc.stringMatching(/^[a-z0-9-]{1,12}$/);

function sessionFor(tenantId: string, id: string): Session {
  return {
    id,
    tenantId,
    teamName: `Team ${id}`,
    title: "Pitch",
    status: SessionStatus.READY_TO_RECORD,
    createdAt: "2026-03-01T10:00:00.000Z",
    updatedAt: "2026-03-01T10:00:00.000Z",
    recordingStartedAt: null,
    completedAt: null,
    audioRef: null,
    transcript: null,
    error: null,
    channelId: null,
    scoringTriggeredAt: null,
  };
}

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("TenantStore isolation", () => {
  it("scans return exactly the scanning tenant's own entries", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.tuple(fc.constantFrom("acme", "globex", "initech"), arbitraryId), { maxLength: 20 }),
        async (writes) => {
          const store = new TenantStore({ backend: new MemoryBackend() });
          for (const [tenantId, id] of writes) {
            await store.put(tenantId, Keys.session(id), sessionFor(tenantId, id));
          }

          for (const tenantId of ["acme", "globex", "initech"]) {
            const expected = [...new Set(writes.filter(([t]) => t === tenantId).map(([, id]) => id))].sort();
            const seen: string[] = [];
            for await (const entry of store.scanPrefix(tenantId, "session")) {
              expect(entry.value.tenantId).toBe(tenantId);
              seen.push(entry.value.id);
            }
            expect(seen).toEqual(expected);
          }
        },
      ),
      { numRuns: 100 },
    );
  });

  it("a key written by one tenant is absent for every other tenant", async () => {
    await fc.assert(
      fc.asyncProperty(arbitraryId, arbitraryId, arbitraryId, async (owner, other, id) => {
        fc.pre(owner !== other);
        const store = new TenantStore({ backend: new MemoryBackend() });
        await store.put(owner, Keys.session(id), sessionFor(owner, id));

        await expect(store.find(other, Keys.session(id))).resolves.toBeNull();
        await expect(store.find(owner, Keys.session(id))).resolves.toEqual(sessionFor(owner, id));
      }),
      { numRuns: 100 },
    );
  });
});
