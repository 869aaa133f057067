// Property-based tests for the Session Manager
// Any sequence of operations moves a session only along legal transitions,
// and the derived transcript text always matches its segments.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileBlobStore } from "./blob-store.js";
import { SessionManager, buildTranscript, canTransition } from "./session-manager.js";
import { FakeTranscriptionGateway } from "./test-fakes.js";
import { MemoryBackend, TenantStore } from "./tenant-store.js";
import { SessionStatus } from "./types.js";
import type { TranscriptSegment } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

type Operation = "begin" | "ingestFinal" | "ingestInterim" | "complete" | "fail";

const arbitraryOperation: fc.Arbitrary<Operation> = fc.constantFrom(
  "begin",
  "ingestFinal",
  "ingestInterim",
  "complete",
  "fail",
);

const arbitrarySegment: fc.Arbitrary<TranscriptSegment> = fc
  .record({
    text: fc.constantFrom("we", " built ", "an", "agent", "", "  ", "demo"),
    startOffset: fc.integer({ min: 0, max: 100 }),
    length: fc.integer({ min: 0, max: 5 }),
    confidence: fc.double({ min: 0, max: 1, noNaN: true }),
    isFinal: fc.boolean(),
  })
  .map(({ length, ...rest }) => ({ ...rest, endOffset: rest.startOffset + length }));

const TERMINAL = new Set([SessionStatus.COMPLETED, SessionStatus.ERROR]);

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("SessionManager state machine", () => {
  it("only ever takes legal transitions and never leaves a terminal state", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbitraryOperation, { minLength: 1, maxLength: 12 }), async (operations) => {
        const manager = new SessionManager({
          store: new TenantStore({ backend: new MemoryBackend() }),
          blobs: new FileBlobStore({ baseDir: join(tmpdir(), "unused-blobs"), signingSecret: "test-secret-for-blobs" }),
          transcription: new FakeTranscriptionGateway(),
        });
        const created = await manager.create("acme", "Acme", "Demo");
        let previous = created.status;

        for (const [i, operation] of operations.entries()) {
          const id = created.id;
          const run = (): Promise<unknown> => {
            switch (operation) {
              case "begin":
                return manager.beginRecording("acme", id);
              case "ingestFinal":
                return manager.ingestSegment("acme", id, { text: `w${i}`, startOffset: i, endOffset: i + 1, confidence: 1, isFinal: true });
              case "ingestInterim":
                return manager.ingestSegment("acme", id, { text: `i${i}`, startOffset: i, endOffset: i + 1, confidence: 1, isFinal: false });
              case "complete":
                return manager.complete("acme", id);
              case "fail":
                return manager.fail("acme", id, "stopped");
            }
          };
          await run().catch(() => undefined);

          const current = (await manager.getSession("acme", id)).status;
          expect(current === previous || canTransition(previous, current)).toBe(true);
          if (TERMINAL.has(previous)) {
            expect(current).toBe(previous);
          }
          previous = current;
        }
      }),
      { numRuns: 100 },
    );
  });
});

describe("buildTranscript", () => {
  it("joins the trimmed non-empty texts of final segments (or interim when none is final)", () => {
    fc.assert(
      fc.property(fc.array(arbitrarySegment, { maxLength: 15 }), (segments) => {
        const transcript = buildTranscript(segments);
        const finals = segments.filter((s) => s.isFinal);
        const source = finals.length > 0 ? finals : segments;
        const expected = source
          .map((s) => s.text.trim())
          .filter((t) => t.length > 0)
          .join(" ");

        expect(transcript.totalText).toBe(expected);
        expect(transcript.segments).toEqual(segments);
        expect(transcript.totalText).not.toMatch(/^\s|\s$|\s{2}/);
      }),
      { numRuns: 200 },
    );
  });
});
