import { IKeyValueStore } from "@prize-wheel/core-redis";
import { WheelState } from "@prize-wheel/core-types";

export interface IWheelRepository {
  findById(id: string): Promise<WheelState | null>;
  save(state: WheelState): Promise<void>;
  remove(id: string): Promise<void>;
}

export const WHEEL_REPOSITORY = Symbol("WHEEL_REPOSITORY");

const WHEEL_KEY = (id: string) => `wheel:${id}`;

/** Stores each wheel as one serialized record; bigints survive via the store's encoding. */
export class RedisWheelRepository implements IWheelRepository {
  constructor(private readonly kv: IKeyValueStore) {}

  async findById(id: string): Promise<WheelState | null> {
    return this.kv.get<WheelState>(WHEEL_KEY(id));
  }

  async save(state: WheelState): Promise<void> {
    await this.kv.set(WHEEL_KEY(state.id), state);
  }

  async remove(id: string): Promise<void> {
    await this.kv.del(WHEEL_KEY(id));
  }
}
