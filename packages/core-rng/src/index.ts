import {
  FairnessProof,
  IProvablyFairService,
  IProvablyFairStateStore,
  ProvablyFairContext,
} from "@prize-wheel/core-provably-fair";

/** Source of unbiased integers, consumed at most once per engine operation. */
export interface IRandomOracle {
  randomBelow(bound: number): number;
}

export interface SingleUseOracle extends IRandomOracle {
  readonly consumed: boolean;
}

export interface PreparedOracle {
  oracle: SingleUseOracle;
  proof: FairnessProof;
}

export interface IRandomOracleFactory {
  prepare(wheelId: string): Promise<PreparedOracle>;
}

export const RANDOM_ORACLE_FACTORY = Symbol("RANDOM_ORACLE_FACTORY");

/**
 * Oracle bound to one (seed pair, nonce). A second read would reuse the nonce,
 * so it is rejected.
 */
export class ProvablyFairRandomOracle implements SingleUseOracle {
  private used = false;

  constructor(
    private readonly service: IProvablyFairService,
    private readonly ctx: ProvablyFairContext,
    private readonly nonce: number,
  ) {}

  randomBelow(bound: number): number {
    if (this.used) {
      throw new Error("Random oracle already consumed for this operation");
    }
    this.used = true;
    return this.service.rollIntBelow(this.ctx, this.nonce, bound);
  }

  get consumed(): boolean {
    return this.used;
  }
}

export class ProvablyFairOracleFactory implements IRandomOracleFactory {
  constructor(private readonly service: IProvablyFairService, private readonly store: IProvablyFairStateStore) {}

  async prepare(wheelId: string): Promise<PreparedOracle> {
    const ctx = await this.store.getOrInitContext({ wheelId });
    const nonce = await this.store.nextNonce({ wheelId });
    return {
      oracle: new ProvablyFairRandomOracle(this.service, ctx, nonce),
      proof: { serverSeedHash: ctx.serverSeedHash, clientSeed: ctx.clientSeed, nonce },
    };
  }
}
