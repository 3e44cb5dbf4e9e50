import { describe, expect, it } from "vitest";
import type { WheelEvent } from "@prize-wheel/core-types";
import { createDbClient } from "@prize-wheel/test-utils";
import { DbWheelEventLog, IWheelEventLog, InMemoryWheelEventLog, parseEventLogImpl, toEventPayload } from "../src";

const events: WheelEvent[] = [
  { type: "WHEEL_CREATED", wheelId: "wheel-1", organizer: "org" },
  { type: "POOL_DONATED", wheelId: "wheel-1", amount: 1500n },
  { type: "WHEEL_DRAWN", wheelId: "wheel-1", winner: "alice", prizeIndex: 0 },
  { type: "WHEEL_CREATED", wheelId: "wheel-2", organizer: "org" },
];

describe("toEventPayload", () => {
  it("turns amounts into decimal strings", () => {
    expect(toEventPayload({ type: "PRIZE_CLAIMED", wheelId: "w", winner: "alice", amount: 1000n })).toEqual({
      winner: "alice",
      amount: "1000",
    });
    expect(toEventPayload({ type: "WHEEL_CANCELLED", wheelId: "w" })).toEqual({});
  });
});

describe("parseEventLogImpl", () => {
  it("defaults to memory", () => {
    expect(parseEventLogImpl(undefined)).toBe("memory");
    expect(parseEventLogImpl("db")).toBe("db");
    expect(() => parseEventLogImpl("kafka")).toThrow("Unsupported EVENT_LOG_IMPL: kafka. Supported: memory, db");
  });
});

const implementations: Array<[string, () => Promise<IWheelEventLog>]> = [
  ["InMemoryWheelEventLog", async () => new InMemoryWheelEventLog()],
  ["DbWheelEventLog", async () => new DbWheelEventLog(await createDbClient())],
];

describe.each(implementations)("%s", (_name, createLog) => {
  it("lists a wheel's events in append order", async () => {
    const log = await createLog();
    const recorded = await log.append(events);
    expect(recorded).toHaveLength(4);

    const listed = await log.listForWheel("wheel-1");
    expect(listed.map((event) => event.type)).toEqual(["WHEEL_CREATED", "POOL_DONATED", "WHEEL_DRAWN"]);
    expect(listed[1].payload).toEqual({ amount: "1500" });
    expect(listed[2].payload).toEqual({ winner: "alice", prizeIndex: 0 });
    expect(listed[0].createdAt).toBeInstanceOf(Date);
  });

  it("pages with limit and offset", async () => {
    const log = await createLog();
    await log.append(events);
    await log.append([{ type: "WHEEL_CANCELLED", wheelId: "wheel-1" }]);

    const page = await log.listForWheel("wheel-1", 2, 2);
    expect(page.map((event) => event.type)).toEqual(["WHEEL_DRAWN", "WHEEL_CANCELLED"]);
    expect(await log.listForWheel("unknown")).toEqual([]);
  });

  it("ignores an empty batch", async () => {
    const log = await createLog();
    expect(await log.append([])).toEqual([]);
  });
});
