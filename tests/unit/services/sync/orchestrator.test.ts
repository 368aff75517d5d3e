import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { ProductRepository } from "../../../../src/services/products/repository.js";
import {
  AlreadyRunningError,
  StoreError,
} from "../../../../src/services/sync/errors.js";
import { SyncOrchestrator } from "../../../../src/services/sync/orchestrator.js";
import { Reconciler } from "../../../../src/services/sync/reconciler.js";
import { DatabaseSyncRunStore } from "../../../../src/services/sync/run-store.js";
import { createTestDatabase } from "../../../helpers/db.js";
import {
  ScriptedProvider,
  hangingPage,
  makePage,
  makeRecord,
} from "../../../helpers/providers.js";

import type { DatabaseHandle } from "../../../../src/db/connection.js";
import type { ProductProvider } from "../../../../src/providers/types.js";
import type { SyncOrchestratorOptions } from "../../../../src/services/sync/orchestrator.js";

const STARTED = new Date("2026-05-01T10:00:00.000Z");

describe("services/sync/orchestrator", () => {
  let handle: DatabaseHandle;
  let products: ProductRepository;

  beforeEach(async () => {
    handle = await createTestDatabase();
    products = new ProductRepository(handle.db);
  });

  afterEach(async () => {
    await handle.db.destroy();
  });

  function createOrchestrator(
    provider: ProductProvider,
    overrides: Partial<SyncOrchestratorOptions> = {}
  ): SyncOrchestrator {
    let sequence = 0;
    return new SyncOrchestrator({
      provider,
      reconciler: new Reconciler(handle.db),
      runTimeoutMs: 5000,
      maxErrors: 100,
      now: () => STARTED,
      generateId: () => {
        sequence++;
        return `run-${String(sequence)}`;
      },
      ...overrides,
    });
  }

  async function runOnce(orchestrator: SyncOrchestrator) {
    const { runId } = orchestrator.trigger();
    await orchestrator.whenIdle();
    const run = orchestrator.getSnapshot().lastCompleted;
    expect(run?.runId).toBe(runId);
    return run;
  }

  describe("trigger", () => {
    it("should publish a running run synchronously", async () => {
      const orchestrator = createOrchestrator(
        new ScriptedProvider([makePage([makeRecord("a1")], null)])
      );

      const { runId } = orchestrator.trigger();
      const current = orchestrator.getSnapshot().current;

      expect(runId).toBe("run-1");
      expect(current).toMatchObject({
        runId: "run-1",
        trigger: "manual",
        provider: "fake",
        status: "running",
        startedAt: STARTED.toISOString(),
        finishedAt: null,
        recordsFetched: 0,
      });
      await orchestrator.whenIdle();
    });

    it("should admit exactly one of two concurrent triggers", async () => {
      const orchestrator = createOrchestrator(
        new ScriptedProvider([makePage([makeRecord("a1")], null)])
      );

      const outcomes = ["manual", "schedule"].map((source) => {
        try {
          return orchestrator.trigger(source === "manual" ? "manual" : "schedule");
        } catch (error) {
          return error;
        }
      });

      expect(outcomes[0]).toEqual({ runId: "run-1" });
      expect(outcomes[1]).toBeInstanceOf(AlreadyRunningError);
      expect(outcomes[1]).toHaveProperty("runId", "run-1");
      await orchestrator.whenIdle();
    });

    it("should accept a new trigger once the run completed", async () => {
      const orchestrator = createOrchestrator(new ScriptedProvider([]));

      await runOnce(orchestrator);
      const second = orchestrator.trigger("schedule");

      expect(second).toEqual({ runId: "run-2" });
      await orchestrator.whenIdle();
      expect(orchestrator.getSnapshot().lastCompleted).toMatchObject({
        runId: "run-2",
        trigger: "schedule",
      });
    });
  });

  describe("runs", () => {
    it("should create products on a first sync", async () => {
      const orchestrator = createOrchestrator(
        new ScriptedProvider([
          makePage(
            [makeRecord("a1", { price: 10 }), makeRecord("a2", { price: 20 })],
            null
          ),
        ])
      );

      const run = await runOnce(orchestrator);

      expect(run).toEqual({
        runId: "run-1",
        trigger: "manual",
        provider: "fake",
        status: "succeeded",
        startedAt: STARTED.toISOString(),
        finishedAt: STARTED.toISOString(),
        recordsFetched: 2,
        recordsCreated: 2,
        recordsUpdated: 0,
        recordsFailed: 0,
        recordsSkipped: 0,
        pagesFetched: 1,
        errors: [],
      });
      expect(orchestrator.getSnapshot().current).toBeNull();
      expect((await products.findByExternalId("a1"))?.price).toBe(10);
      expect((await products.findByExternalId("a2"))?.price).toBe(20);
    });

    it("should update products on a second sync", async () => {
      await runOnce(
        createOrchestrator(
          new ScriptedProvider([
            makePage(
              [makeRecord("a1", { price: 10 }), makeRecord("a2", { price: 20 })],
              null
            ),
          ])
        )
      );

      const run = await runOnce(
        createOrchestrator(
          new ScriptedProvider([makePage([makeRecord("a1", { price: 15 })], null)])
        )
      );

      expect(run).toMatchObject({
        status: "succeeded",
        recordsCreated: 0,
        recordsUpdated: 1,
        recordsFailed: 0,
      });
      expect((await products.findByExternalId("a1"))?.price).toBe(15);
    });

    it("should accumulate counts across pages", async () => {
      const orchestrator = createOrchestrator(
        new ScriptedProvider([
          {
            records: [makeRecord("a1"), makeRecord("a2")],
            skipped: [{ externalId: "x", reason: "invalid price" }],
            nextCursor: 3,
          },
          makePage([makeRecord("a3"), makeRecord("bad", { price: -1 })], null),
        ])
      );

      const run = await runOnce(orchestrator);

      expect(run).toMatchObject({
        status: "succeeded",
        recordsFetched: 4,
        recordsCreated: 3,
        recordsUpdated: 0,
        recordsFailed: 1,
        recordsSkipped: 1,
        pagesFetched: 2,
      });
      expect(run?.errors).toHaveLength(1);
      expect(run?.errors[0]).toMatchObject({ externalId: "bad", kind: "record" });
    });

    it("should keep the counts consistent after every page", async () => {
      const observed: number[] = [];
      let orchestrator: SyncOrchestrator | null = null;
      const check = () => {
        const current = orchestrator?.getSnapshot().current;
        if (current !== null && current !== undefined) {
          observed.push(
            current.recordsFetched -
              (current.recordsCreated + current.recordsUpdated + current.recordsFailed)
          );
        }
      };

      orchestrator = createOrchestrator(
        new ScriptedProvider([
          makePage([makeRecord("a1"), makeRecord("bad", { price: -1 })], 2),
          () => {
            check();
            return Promise.resolve(makePage([makeRecord("a2")], 3));
          },
          () => {
            check();
            return Promise.resolve(makePage([], null));
          },
        ])
      );

      await runOnce(orchestrator);

      expect(observed).toEqual([0, 0]);
    });

    it("should fail with page-one counts when page two cannot be fetched", async () => {
      const orchestrator = createOrchestrator(
        new ScriptedProvider([
          makePage([makeRecord("a1"), makeRecord("a2")], 2),
          new Error("connection reset"),
        ])
      );

      const run = await runOnce(orchestrator);

      expect(run).toMatchObject({
        status: "failed",
        recordsFetched: 2,
        recordsCreated: 2,
        pagesFetched: 1,
        finishedAt: STARTED.toISOString(),
      });
      expect(run?.errors).toEqual([
        {
          externalId: null,
          reason: "fake page at cursor 2: connection reset",
          kind: "provider",
        },
      ]);
      expect(await products.findByExternalId("a2")).toBeDefined();
    });

    it("should fail with a store error when a batch cannot be committed", async () => {
      const orchestrator = createOrchestrator(
        new ScriptedProvider([makePage([makeRecord("a1")], null)]),
        {
          reconciler: {
            reconcile: vi
              .fn()
              .mockRejectedValue(new StoreError("batch transaction failed: disk full")),
          },
        }
      );

      const run = await runOnce(orchestrator);

      expect(run?.status).toBe("failed");
      expect(run?.errors).toEqual([
        {
          externalId: null,
          reason: "batch transaction failed: disk full",
          kind: "store",
        },
      ]);
    });

    it("should fail a run that exceeds its timeout and release the gate", async () => {
      const orchestrator = createOrchestrator(
        new ScriptedProvider([
          makePage([makeRecord("a1")], 1),
          (signal) => hangingPage(signal),
        ]),
        { runTimeoutMs: 200 }
      );

      const run = await runOnce(orchestrator);

      expect(run).toMatchObject({
        status: "failed",
        recordsFetched: 1,
        pagesFetched: 1,
      });
      expect(run?.errors).toEqual([
        { externalId: null, reason: "Sync run exceeded 200ms", kind: "timeout" },
      ]);
      expect(orchestrator.getSnapshot().current).toBeNull();
      expect(orchestrator.trigger()).toEqual({ runId: "run-2" });
      await orchestrator.whenIdle();
    });

    it("should cap the error list but not the counts", async () => {
      const orchestrator = createOrchestrator(
        new ScriptedProvider([
          makePage(
            [
              makeRecord("b1", { price: -1 }),
              makeRecord("b2", { price: -1 }),
              makeRecord("b3", { price: -1 }),
            ],
            null
          ),
        ]),
        { maxErrors: 2 }
      );

      const run = await runOnce(orchestrator);

      expect(run?.recordsFailed).toBe(3);
      expect(run?.errors.map((error) => error.externalId)).toEqual(["b1", "b2"]);
    });

    it("should publish frozen snapshots", async () => {
      const orchestrator = createOrchestrator(new ScriptedProvider([]));

      const run = await runOnce(orchestrator);

      expect(Object.isFrozen(orchestrator.getSnapshot())).toBe(true);
      expect(Object.isFrozen(run)).toBe(true);
      expect(Object.isFrozen(run?.errors)).toBe(true);
    });
  });

  describe("cancel", () => {
    it("should end the run in flight as failed and keep its counts", async () => {
      const orchestrator = createOrchestrator(
        new ScriptedProvider([
          makePage([makeRecord("a1")], 1),
          (signal) => hangingPage(signal),
        ]),
        { runTimeoutMs: 60_000 }
      );

      const { runId } = orchestrator.trigger();
      await vi.waitFor(() => {
        expect(orchestrator.getSnapshot().current?.pagesFetched).toBe(1);
      });
      const cancelled = orchestrator.cancel("operator request", runId);
      await orchestrator.whenIdle();
      const run = orchestrator.getSnapshot().lastCompleted;

      expect(cancelled).toBe(runId);
      expect(run).toMatchObject({
        runId,
        status: "failed",
        recordsFetched: 1,
        recordsCreated: 1,
        pagesFetched: 1,
      });
      expect(run?.errors).toEqual([
        {
          externalId: null,
          reason: "Sync run cancelled: operator request",
          kind: "cancelled",
        },
      ]);
      expect(orchestrator.getSnapshot().current).toBeNull();
      expect(await products.findByExternalId("a1")).toBeDefined();
    });

    it("should cancel whichever run is in flight when no id is given", async () => {
      const orchestrator = createOrchestrator(
        new ScriptedProvider([(signal) => hangingPage(signal)]),
        { runTimeoutMs: 60_000 }
      );

      orchestrator.trigger();
      const cancelled = orchestrator.cancel("shutting down");
      await orchestrator.whenIdle();

      expect(cancelled).toBe("run-1");
      expect(orchestrator.getSnapshot().lastCompleted?.errors).toEqual([
        {
          externalId: null,
          reason: "Sync run cancelled: shutting down",
          kind: "cancelled",
        },
      ]);
    });

    it("should return null when nothing is running", () => {
      const orchestrator = createOrchestrator(new ScriptedProvider([]));

      expect(orchestrator.cancel("nothing to do")).toBeNull();
    });

    it("should leave a run alone when the id does not match", async () => {
      const orchestrator = createOrchestrator(
        new ScriptedProvider([(signal) => hangingPage(signal)]),
        { runTimeoutMs: 60_000 }
      );

      orchestrator.trigger();
      const cancelled = orchestrator.cancel("wrong run", "run-9");

      expect(cancelled).toBeNull();
      expect(orchestrator.getSnapshot().current?.status).toBe("running");
      expect(orchestrator.cancel("cleanup", "run-1")).toBe("run-1");
      await orchestrator.whenIdle();
    });
  });

  describe("persistence", () => {
    it("should store the completed run and restore it in a new process", async () => {
      const store = new DatabaseSyncRunStore(handle.db);
      const first = createOrchestrator(
        new ScriptedProvider([makePage([makeRecord("a1")], null)]),
        { store }
      );
      const run = await runOnce(first);

      const restarted = createOrchestrator(new ScriptedProvider([]), { store });
      const restored = await restarted.restore();

      expect(restored).toEqual(run);
      expect(restarted.getSnapshot()).toEqual({ current: null, lastCompleted: run });
    });

    it("should restore nothing without a store", async () => {
      const orchestrator = createOrchestrator(new ScriptedProvider([]));

      expect(await orchestrator.restore()).toBeNull();
    });

    it("should complete the run even if it cannot be stored", async () => {
      const orchestrator = createOrchestrator(new ScriptedProvider([]), {
        store: {
          loadLastCompleted: vi.fn().mockResolvedValue(null),
          saveLastCompleted: vi.fn().mockRejectedValue(new Error("read-only")),
        },
      });

      const run = await runOnce(orchestrator);

      expect(run?.status).toBe("succeeded");
    });
  });
});
