import { randomUUID } from "crypto";
import { IDbClient } from "@prize-wheel/core-db";
import { RecordedWheelEvent, WheelEvent, WheelEventType } from "@prize-wheel/core-types";

/** Append-only record of committed wheel notifications. */
export interface IWheelEventLog {
  append(events: WheelEvent[]): Promise<RecordedWheelEvent[]>;
  listForWheel(wheelId: string, limit?: number, offset?: number): Promise<RecordedWheelEvent[]>;
}

export const WHEEL_EVENT_LOG = Symbol("WHEEL_EVENT_LOG");

/** Flattens an event into a JSON-safe payload; amounts travel as decimal strings. */
export function toEventPayload(event: WheelEvent): Record<string, unknown> {
  switch (event.type) {
    case "WHEEL_CREATED":
      return { organizer: event.organizer };
    case "POOL_DONATED":
      return { amount: event.amount.toString() };
    case "WHEEL_DRAWN":
      return { winner: event.winner, prizeIndex: event.prizeIndex };
    case "PRIZE_CLAIMED":
      return { winner: event.winner, amount: event.amount.toString() };
    case "POOL_RECLAIMED":
      return { amount: event.amount.toString() };
    case "WHEEL_CANCELLED":
      return {};
  }
}

export class InMemoryWheelEventLog implements IWheelEventLog {
  private readonly events: RecordedWheelEvent[] = [];

  async append(events: WheelEvent[]): Promise<RecordedWheelEvent[]> {
    const recorded = events.map((event) => ({
      id: randomUUID(),
      wheelId: event.wheelId,
      type: event.type,
      payload: toEventPayload(event),
      createdAt: new Date(),
    }));
    this.events.push(...recorded);
    return recorded;
  }

  async listForWheel(wheelId: string, limit = 100, offset = 0): Promise<RecordedWheelEvent[]> {
    return this.events.filter((event) => event.wheelId === wheelId).slice(offset, offset + limit);
  }
}

export class DbWheelEventLog implements IWheelEventLog {
  constructor(private readonly db: IDbClient) {}

  async append(events: WheelEvent[]): Promise<RecordedWheelEvent[]> {
    if (!events.length) {
      return [];
    }
    return this.db.transaction(async (tx) => {
      const recorded: RecordedWheelEvent[] = [];
      for (const event of events) {
        const last = await tx.query<SeqRow>(
          `SELECT seq FROM wheel_events WHERE wheel_id = $1 ORDER BY seq DESC LIMIT 1`,
          [event.wheelId]
        );
        const seq = last.length ? Number(last[0].seq) + 1 : 1;
        const rows = await tx.query<Row>(
          `INSERT INTO wheel_events (id, wheel_id, seq, type, payload)
           VALUES ($1,$2,$3,$4,$5)
           RETURNING *`,
          [randomUUID(), event.wheelId, seq, event.type, JSON.stringify(toEventPayload(event))]
        );
        recorded.push(mapRow(rows[0]));
      }
      return recorded;
    });
  }

  async listForWheel(wheelId: string, limit = 100, offset = 0): Promise<RecordedWheelEvent[]> {
    const rows = await this.db.query<Row>(
      `SELECT * FROM wheel_events WHERE wheel_id = $1 ORDER BY seq ASC LIMIT $2 OFFSET $3`,
      [wheelId, limit, offset]
    );
    return rows.map(mapRow);
  }
}

type SeqRow = {
  seq: number | string;
};

type Row = {
  id: string;
  wheel_id: string;
  seq: number;
  type: WheelEventType;
  payload: string | Record<string, unknown>;
  created_at: string | Date;
};

function mapRow(row: Row): RecordedWheelEvent {
  return {
    id: row.id,
    wheelId: row.wheel_id,
    type: row.type,
    payload: typeof row.payload === "string" ? parsePayload(row.payload) : row.payload,
    createdAt: new Date(row.created_at),
  };
}

function parsePayload(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return {};
}

export type EventLogImpl = "memory" | "db";

export function parseEventLogImpl(input: string | undefined): EventLogImpl {
  const value = (input ?? "memory").trim().toLowerCase();
  if (value !== "memory" && value !== "db") {
    throw new Error(`Unsupported EVENT_LOG_IMPL: ${input}. Supported: memory, db`);
  }
  return value;
}
