// Region failover facade tests

import { describe, it, expect, vi } from "vitest";
import {
  RegionFailover,
  collectContent,
  createRegionFailover,
  streamContent,
  withRegionFailover,
} from "../src/runtime/failover";
import { InMemoryEndpointStore } from "../src/runtime/endpoint-store";
import type { EndpointSnapshot, EndpointStore } from "../src/types/endpoint";
import type { FailoverSuccess } from "../src/types/failover";
import type { FailoverEvent } from "../src/types/observability";
import type {
  FailoverTransport,
  InvocationTarget,
} from "../src/types/transport";
import { CallShapes } from "../src/types/transport";
import { FailoverError, FailoverErrorCodes } from "../src/utils/errors";

const NOW = 1_700_000_000;
const clock = (): Date => new Date(NOW * 1000);
const PATH = "endpoints.json";

const fileContent = JSON.stringify([
  { region: "A", primary: true, next_available_time: 0, region_profile_prefix: "us" },
  { region: "B", primary: false, next_available_time: 0 },
  { region: "C", primary: false, next_available_time: NOW + 10 },
]);

const okResponse = {
  output: { message: { content: [{ text: "Hello" }] } },
};

const messages = { messages: [{ role: "user", content: [{ text: "hi" }] }] };

function seededStore(content = fileContent): InMemoryEndpointStore {
  const store = new InMemoryEndpointStore();
  store.write(PATH, content);
  return store;
}

function transportFailing(regions: string[]): {
  transport: FailoverTransport;
  targets: InvocationTarget[];
} {
  const targets: InvocationTarget[] = [];
  const handle = async (target: InvocationTarget): Promise<unknown> => {
    targets.push(target);
    if (regions.includes(target.region)) {
      throw new Error(`${target.region} unavailable`);
    }
    return okResponse;
  };
  return {
    transport: { converse: vi.fn(handle), invokeModel: vi.fn(handle) },
    targets,
  };
}

class GatedStore extends InMemoryEndpointStore {
  private release: (() => void) | undefined;

  override async persist(
    path: string,
    records: EndpointSnapshot,
  ): Promise<boolean> {
    await new Promise<void>((resolve) => {
      this.release = resolve;
    });
    return super.persist(path, records);
  }

  open(): void {
    this.release?.();
  }
}

async function flushEvents(): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, 0));
}

describe("createRegionFailover", () => {
  it("should load the endpoint file", async () => {
    const { transport } = transportFailing([]);
    const failover = await createRegionFailover({
      transport,
      modelId: "model-x",
      configPath: PATH,
      store: seededStore(),
      clock,
    });

    expect(failover.getSnapshot().map((r) => r.region)).toEqual([
      "A",
      "B",
      "C",
    ]);
    expect(failover.getCandidates()).toEqual(["A", "B"]);
    expect(failover.getConfigPath()).toBe(PATH);
  });

  it("should start empty when the load fails", async () => {
    const { transport, targets } = transportFailing([]);
    const failover = await createRegionFailover({
      transport,
      modelId: "model-x",
      configPath: PATH,
      store: seededStore("{not json"),
      clock,
    });

    expect(failover.getSnapshot()).toEqual([]);
    expect(failover.getErrorLog()).toHaveLength(1);
    expect(failover.getErrorLog()[0]).toMatch(
      /^Load configuration file failed! /,
    );

    const result = await failover.converse(messages);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(FailoverErrorCodes.NO_ENDPOINT);
    }
    expect(targets).toHaveLength(0);
  });

  it("should skip loading when autoLoad is false", async () => {
    const store = seededStore();
    const load = vi.spyOn(store, "load");
    const { transport } = transportFailing([]);
    const failover = await createRegionFailover({
      transport,
      modelId: "model-x",
      configPath: PATH,
      autoLoad: false,
      store,
    });

    expect(load).not.toHaveBeenCalled();
    expect(failover.getSnapshot()).toEqual([]);
  });

  it("should reject an invalid config", async () => {
    const { transport } = transportFailing([]);
    await expect(
      createRegionFailover({
        transport,
        modelId: "model-x",
        config: { maxRetryTime: 1, maxRetryTimesForEachRegion: 2 },
      }),
    ).rejects.toThrow(FailoverError);
  });
});

describe("RegionFailover", () => {
  async function create(failing: string[] = [], store = seededStore()) {
    const { transport, targets } = transportFailing(failing);
    const events: FailoverEvent[] = [];
    const failover = await createRegionFailover({
      transport,
      modelId: "model-x",
      configPath: PATH,
      store,
      clock,
      random: () => 0,
      onEvent: (event) => events.push(event),
    });
    return { failover, targets, events, store };
  }

  describe("reload", () => {
    it("should keep the previous snapshot when a reload fails", async () => {
      const { failover, store } = await create();
      store.write(PATH, "[]x");

      expect(await failover.reload()).toBe(false);
      expect(failover.getSnapshot()).toHaveLength(3);
    });

    it("should replace the snapshot from another path", async () => {
      const { failover, store } = await create();
      store.write(
        "other.json",
        JSON.stringify([{ region: "Z", primary: true, next_available_time: 0 }]),
      );

      expect(await failover.reload("other.json")).toBe(true);
      expect(failover.getCandidates()).toEqual(["Z"]);
      expect(failover.getConfigPath()).toBe("other.json");
    });

    it("should fail without any path", async () => {
      const { transport } = transportFailing([]);
      const failover = new RegionFailover({ transport, modelId: "m" });
      expect(await failover.reload()).toBe(false);
      expect(failover.getErrorLog()).toEqual([
        "Load configuration file failed! No path configured",
      ]);
    });

    it("should emit load events", async () => {
      const { failover, events, store } = await create();
      store.write(PATH, "oops");
      await failover.reload();
      await flushEvents();

      expect(events.map((e) => e.type)).toEqual([
        "CONFIG_LOADED",
        "CONFIG_LOAD_FAILED",
      ]);
      const failed = events[1];
      if (failed?.type === "CONFIG_LOAD_FAILED") {
        expect(failed.retainedEndpointCount).toBe(3);
      }
    });
  });

  describe("invocation", () => {
    it("should fail over and extract content", async () => {
      const { failover, targets } = await create(["A"]);
      const result = await failover.converse(messages, {
        extractContent: true,
      });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.region).toBe("B");
        expect(result.content).toBe("Hello");
      }
      expect(targets.map((t) => t.region)).toEqual(["A", "B"]);
      expect(failover.getFailedRegions()).toEqual(["A"]);
      expect(failover.getErrorLog()).toEqual(["[A] A unavailable"]);
    });

    it("should route invokeModel to the raw body shape", async () => {
      const { failover } = await create();
      const result = await failover.invokeModel(
        { body: '{"prompt":"hi"}' },
        { stream: true },
      );
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.shape).toBe(CallShapes.RAW_BODY);
        expect(result.stream).toBe(true);
      }
    });

    it("should use the per-call model id", async () => {
      const { failover, targets } = await create();
      await failover.converse(messages, { modelId: "model-y" });
      expect(targets[0]?.modelId).toBe("model-y");
    });

    it("should use the model id set later", async () => {
      const { failover, targets } = await create();
      failover.setModelId("model-z");
      await failover.converse(messages);
      expect(failover.getModelId()).toBe("model-z");
      expect(targets[0]?.modelId).toBe("model-z");
    });

    it("should apply cross-region inference when enabled", async () => {
      const { failover, targets } = await create();
      failover.setCrossRegionInferenceEnabled(true);
      await failover.converse(messages);

      expect(failover.getConfig().crossRegionInference).toBe(true);
      expect(targets[0]).toEqual({ region: "A", modelId: "us.model-x" });
    });

    it("should accumulate failed regions across calls", async () => {
      const { failover } = await create(["A", "B"]);
      await failover.converse(messages);
      await failover.converse(messages);
      expect(failover.getFailedRegions()).toEqual(["A", "B"]);
    });

    it("should log the exhaustion message", async () => {
      const { failover } = await create(["A", "B"]);
      const result = await failover.converse(messages);

      expect(result.ok).toBe(false);
      expect(failover.getErrorLog()).toEqual([
        "[A] A unavailable",
        "[B] B unavailable",
        "All regions failed after 2 attempts: B unavailable",
      ]);
    });

    it("should bound the error log", async () => {
      const { transport } = transportFailing(["A", "B"]);
      const failover = await createRegionFailover({
        transport,
        modelId: "m",
        configPath: PATH,
        store: seededStore(),
        clock,
        config: { maxErrorLog: 2 },
      });
      await failover.converse(messages);

      expect(failover.getErrorLog()).toEqual([
        "[B] B unavailable",
        "All regions failed after 2 attempts: B unavailable",
      ]);
    });
  });

  describe("recordAndPersistFailures", () => {
    it("should skip when nothing failed", async () => {
      const { failover, events, store } = await create();
      const persist = vi.spyOn(store, "persist");

      expect(await failover.recordAndPersistFailures()).toBe(false);
      await flushEvents();
      expect(persist).not.toHaveBeenCalled();
      expect(events.at(-1)).toMatchObject({
        type: "PERSIST_SKIPPED",
        reason: "no_failures",
      });
    });

    it("should write cooldowns for failed regions", async () => {
      const { failover, store } = await create(["A"]);
      await failover.converse(messages);

      expect(await failover.recordAndPersistFailures()).toBe(true);
      expect(JSON.parse(store.read(PATH) ?? "")).toEqual([
        {
          region: "A",
          primary: true,
          next_available_time: NOW + 3600,
          region_profile_prefix: "us",
        },
        { region: "B", primary: false, next_available_time: 0 },
        { region: "C", primary: false, next_available_time: NOW + 10 },
      ]);
      expect(failover.getFailedRegions()).toEqual([]);
      expect(failover.getCandidates()).toEqual(["B"]);
    });

    it("should report persist events", async () => {
      const { failover, events } = await create(["A"]);
      await failover.converse(messages);
      await failover.recordAndPersistFailures();
      await flushEvents();

      const start = events.find((e) => e.type === "PERSIST_START");
      const end = events.find((e) => e.type === "PERSIST_END");
      expect(start).toMatchObject({
        path: PATH,
        regions: ["A"],
        nextAvailableTime: NOW + 3600,
      });
      expect(end).toMatchObject({ path: PATH, ok: true, regions: ["A"] });
    });

    it("should keep failures when the write fails", async () => {
      const store: EndpointStore = {
        load: async (): Promise<EndpointSnapshot> => [
          { region: "A", primary: true, nextAvailableTime: 0 },
        ],
        persist: async () => false,
      };
      const { transport } = transportFailing(["A"]);
      const failover = await createRegionFailover({
        transport,
        modelId: "m",
        configPath: PATH,
        store,
        clock,
      });
      await failover.converse(messages);

      expect(await failover.recordAndPersistFailures()).toBe(false);
      expect(failover.getFailedRegions()).toEqual(["A"]);
      expect(failover.getSnapshot()[0]?.nextAvailableTime).toBe(0);
      expect(failover.getErrorLog().at(-1)).toBe(
        `Error writing to file: ${PATH}`,
      );
    });

    it("should keep regions that fail while a write is pending", async () => {
      const store = new GatedStore();
      store.write(PATH, fileContent);
      const failing = ["A"];
      const { transport } = transportFailing(failing);
      const failover = await createRegionFailover({
        transport,
        modelId: "m",
        configPath: PATH,
        store,
        clock,
        random: () => 0,
      });

      await failover.converse(messages);
      const pending = failover.recordAndPersistFailures();

      failing.push("B");
      await failover.converse(messages);
      expect(failover.getFailedRegions()).toEqual(["A", "B"]);

      store.open();
      expect(await pending).toBe(true);
      expect(failover.getFailedRegions()).toEqual(["B"]);
      expect(
        failover.getSnapshot().map((r) => [r.region, r.nextAvailableTime]),
      ).toEqual([
        ["A", NOW + 3600],
        ["B", 0],
        ["C", NOW + 10],
      ]);
    });

    it("should apply written cooldowns to a snapshot reloaded meanwhile", async () => {
      const store = new GatedStore();
      store.write(PATH, fileContent);
      const { transport } = transportFailing(["A"]);
      const failover = await createRegionFailover({
        transport,
        modelId: "m",
        configPath: PATH,
        store,
        clock,
        random: () => 0,
      });

      await failover.converse(messages);
      const pending = failover.recordAndPersistFailures();

      store.write(
        "other.json",
        JSON.stringify([
          { region: "A", primary: true, next_available_time: 0 },
          { region: "D", primary: false, next_available_time: 0 },
        ]),
      );
      expect(await failover.reload("other.json")).toBe(true);

      store.open();
      expect(await pending).toBe(true);
      expect(
        failover.getSnapshot().map((r) => [r.region, r.nextAvailableTime]),
      ).toEqual([
        ["A", NOW + 3600],
        ["D", 0],
      ]);
    });

    it("should report a rejecting store as a failed write", async () => {
      const store: EndpointStore = {
        load: async (): Promise<EndpointSnapshot> => [
          { region: "A", primary: true, nextAvailableTime: 0 },
        ],
        persist: async () => {
          throw new Error("disk unavailable");
        },
      };
      const events: FailoverEvent[] = [];
      const { transport } = transportFailing(["A"]);
      const failover = await createRegionFailover({
        transport,
        modelId: "m",
        configPath: PATH,
        store,
        clock,
        onEvent: (event) => events.push(event),
      });
      await failover.converse(messages);

      expect(await failover.recordAndPersistFailures()).toBe(false);
      await flushEvents();
      expect(failover.getFailedRegions()).toEqual(["A"]);
      expect(failover.getErrorLog().at(-1)).toBe("disk unavailable");
      expect(events.at(-1)).toMatchObject({
        type: "PERSIST_END",
        ok: false,
        regions: ["A"],
        error: "disk unavailable",
      });
    });

    it("should forget failures on reset", async () => {
      const { failover } = await create(["A"]);
      await failover.converse(messages);
      failover.resetFailures();
      expect(await failover.recordAndPersistFailures()).toBe(false);
    });
  });

  describe("debug", () => {
    it("should log events through console.debug", async () => {
      const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});
      const { transport } = transportFailing([]);
      await createRegionFailover({
        transport,
        modelId: "m",
        configPath: PATH,
        store: seededStore(),
        clock,
        debug: true,
      });
      await flushEvents();

      expect(debugSpy).toHaveBeenCalledWith(
        `[region-failover] CONFIG_LOADED loaded 3 endpoints from ${PATH}`,
      );
    });
  });

  describe("events", () => {
    it("should attach the instance context", async () => {
      const events: FailoverEvent[] = [];
      const { transport } = transportFailing([]);
      const failover = await createRegionFailover({
        transport,
        modelId: "m",
        configPath: PATH,
        store: seededStore(),
        context: { tenant: "t1" },
        onEvent: (event) => events.push(event),
      });
      await flushEvents();

      expect(events[0]?.context).toEqual({ tenant: "t1" });
      expect(events[0]?.instanceId).toBe(failover.getInstanceId());
    });

    it("should stop delivering to removed handlers", async () => {
      const handler = vi.fn();
      const { failover } = await create();
      failover.onEvent(handler);
      failover.offEvent(handler);
      await failover.recordAndPersistFailures();
      await flushEvents();
      expect(handler).not.toHaveBeenCalled();
    });

    it("should report state changes", async () => {
      const states: string[] = [];
      const { transport } = transportFailing([]);
      const failover = await createRegionFailover({
        transport,
        modelId: "m",
        configPath: PATH,
        store: seededStore(),
        clock,
        onStateChange: (state) => states.push(state),
      });
      await failover.converse(messages);
      expect(states).toEqual(["invoking", "evaluating", "success"]);
    });
  });
});

describe("withRegionFailover", () => {
  it("should persist failures after the callback", async () => {
    const store = seededStore();
    const { transport } = transportFailing(["A"]);

    const { value, persisted } = await withRegionFailover(
      { transport, modelId: "m", configPath: PATH, store, clock },
      async (failover) => {
        const result = await failover.converse(messages);
        return result.ok ? result.region : "none";
      },
    );

    expect(value).toBe("B");
    expect(persisted).toBe(true);
    expect(store.read(PATH)).toContain(`"next_available_time": ${NOW + 3600}`);
  });

  it("should persist failures when the callback throws", async () => {
    const store = seededStore();
    const { transport } = transportFailing(["A"]);

    await expect(
      withRegionFailover(
        { transport, modelId: "m", configPath: PATH, store, clock },
        async (failover) => {
          await failover.converse(messages);
          throw new Error("caller failure");
        },
      ),
    ).rejects.toThrow("caller failure");

    const persisted = await store.load(PATH);
    expect(persisted[0]?.nextAvailableTime).toBe(NOW + 3600);
  });

  it("should surface the callback error when the store rejects", async () => {
    const store: EndpointStore = {
      load: async (): Promise<EndpointSnapshot> => [
        { region: "A", primary: true, nextAvailableTime: 0 },
      ],
      persist: async () => {
        throw new Error("disk unavailable");
      },
    };
    const { transport } = transportFailing(["A"]);

    await expect(
      withRegionFailover(
        { transport, modelId: "m", configPath: PATH, store, clock },
        async (failover) => {
          await failover.converse(messages);
          throw new Error("caller failure");
        },
      ),
    ).rejects.toThrow("caller failure");
  });

  it("should report nothing persisted without failures", async () => {
    const { transport } = transportFailing([]);
    const { persisted } = await withRegionFailover(
      { transport, modelId: "m", configPath: PATH, store: seededStore(), clock },
      async () => undefined,
    );
    expect(persisted).toBe(false);
  });
});

describe("streamContent / collectContent", () => {
  async function* events(): AsyncGenerator<unknown> {
    yield { contentBlockDelta: { delta: { text: "Hel" } } };
    yield { metadata: { usage: {} } };
    yield { contentBlockDelta: { delta: { text: "lo" } } };
  }

  function success(overrides: Partial<FailoverSuccess>): FailoverSuccess {
    return {
      ok: true,
      sessionId: "s",
      shape: CallShapes.MESSAGES,
      stream: false,
      region: "A",
      modelId: "m",
      invocations: 1,
      response: okResponse,
      attempts: [],
      failedRegions: [],
      transitions: [],
      ...overrides,
    };
  }

  it("should read a streamed success", async () => {
    const result = success({ stream: true, response: { stream: events() } });
    expect(await collectContent(result)).toBe("Hello");
  });

  it("should yield event chunks on request", async () => {
    const result = success({ stream: true, response: { stream: events() } });
    const types: string[] = [];
    for await (const chunk of streamContent(result, { contentOnly: false })) {
      types.push(chunk.type);
    }
    expect(types).toEqual(["text", "event", "text"]);
  });

  it("should refuse to stream a non-streamed result", () => {
    expect(() => streamContent(success({}))).toThrow("Result was not streamed");
  });

  it("should collect non-streamed content", async () => {
    expect(await collectContent(success({}))).toBe("Hello");
    expect(await collectContent(success({ content: "cached" }))).toBe(
      "cached",
    );
    expect(await collectContent(success({ response: {} }))).toBe("");
  });
});
