import { DynamicModule, Module } from "@nestjs/common";
import { APP_FILTER, APP_INTERCEPTOR } from "@nestjs/core";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { AuthModule } from "@prize-wheel/core-auth";
import { WHEEL_ENGINE_CONFIG, WheelConfigModule, WheelEngineConfig } from "@prize-wheel/core-config";
import { DB_CLIENT, DbModule, DbModuleOptions, IDbClient } from "@prize-wheel/core-db";
import {
  DbWheelEventLog,
  InMemoryWheelEventLog,
  IWheelEventLog,
  WHEEL_EVENT_LOG,
  parseEventLogImpl,
} from "@prize-wheel/core-event-log";
import { CorrelationIdInterceptor, LoggingModule } from "@prize-wheel/core-logging";
import { MetricsModule } from "@prize-wheel/core-metrics";
import {
  IProvablyFairStateStore,
  PROVABLY_FAIR_SERVICE,
  PROVABLY_FAIR_STATE_STORE,
  ProvablyFairService,
  RedisProvablyFairStateStore,
} from "@prize-wheel/core-provably-fair";
import {
  IKeyValueStore,
  ILockManager,
  KEY_VALUE_STORE,
  LOCK_MANAGER,
  RedisModule,
  RedisModuleOptions,
} from "@prize-wheel/core-redis";
import { ProvablyFairOracleFactory, RANDOM_ORACLE_FACTORY } from "@prize-wheel/core-rng";
import { CLOCK, SystemClock } from "@prize-wheel/core-types";
import { DbWalletService, DemoWalletService, IWalletPort, WALLET, parseWalletImpl } from "@prize-wheel/core-wallet";
import { FixedVersionGate, WheelStateMachine } from "@prize-wheel/game-math-wheel";
import { HealthController } from "./health.controller";
import { MetricsController } from "./metrics.controller";
import { WheelController } from "./wheel.controller";
import { WheelErrorFilter } from "./wheel-error.filter";
import { RedisWheelRepository, WHEEL_REPOSITORY } from "./wheel.repository";
import { WheelService } from "./wheel.service";
import { WHEEL_STATE_MACHINE } from "./wheel.tokens";

export interface AppModuleOptions {
  db?: DbModuleOptions;
  redis?: RedisModuleOptions;
}

function requireDb(db: IDbClient | undefined, key: string): IDbClient {
  if (!db) {
    throw new Error(`${key}=db needs DATABASE_URL; the database module is not loaded`);
  }
  return db;
}

@Module({})
export class AppModule {
  static register(options: AppModuleOptions = {}): DynamicModule {
    // Postgres is only wired when something is configured to live there.
    const needsDb =
      parseWalletImpl(process.env.WALLET_IMPL) === "db" || parseEventLogImpl(process.env.EVENT_LOG_IMPL) === "db";

    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({ isGlobal: true }),
        WheelConfigModule,
        RedisModule.forRoot(options.redis),
        ...(needsDb ? [DbModule.forRoot(options.db)] : []),
        AuthModule,
        LoggingModule,
        MetricsModule,
      ],
      controllers: [HealthController, MetricsController, WheelController],
      providers: [
        WheelService,
        { provide: APP_INTERCEPTOR, useClass: CorrelationIdInterceptor },
        { provide: APP_FILTER, useClass: WheelErrorFilter },
        { provide: CLOCK, useClass: SystemClock },
        {
          provide: WHEEL_STATE_MACHINE,
          inject: [WHEEL_ENGINE_CONFIG],
          useFactory: (config: WheelEngineConfig) =>
            new WheelStateMachine({
              limits: config.limits,
              engineVersion: config.engineVersion,
              versionGate: new FixedVersionGate(config.engineVersion),
            }),
        },
        {
          provide: WHEEL_REPOSITORY,
          inject: [KEY_VALUE_STORE],
          useFactory: (kv: IKeyValueStore) => new RedisWheelRepository(kv),
        },
        { provide: PROVABLY_FAIR_SERVICE, useClass: ProvablyFairService },
        {
          provide: PROVABLY_FAIR_STATE_STORE,
          inject: [KEY_VALUE_STORE, PROVABLY_FAIR_SERVICE],
          useFactory: (kv: IKeyValueStore, pf: ProvablyFairService) => new RedisProvablyFairStateStore(kv, pf),
        },
        {
          provide: RANDOM_ORACLE_FACTORY,
          inject: [PROVABLY_FAIR_SERVICE, PROVABLY_FAIR_STATE_STORE],
          useFactory: (pf: ProvablyFairService, store: IProvablyFairStateStore) => new ProvablyFairOracleFactory(pf, store),
        },
        {
          provide: WALLET,
          inject: [ConfigService, KEY_VALUE_STORE, LOCK_MANAGER, { token: DB_CLIENT, optional: true }],
          useFactory: (config: ConfigService, kv: IKeyValueStore, lock: ILockManager, db?: IDbClient): IWalletPort => {
            if (parseWalletImpl(config.get<string>("WALLET_IMPL")) === "db") {
              return new DbWalletService(requireDb(db, "WALLET_IMPL"), lock);
            }
            return new DemoWalletService(kv, lock);
          },
        },
        {
          provide: WHEEL_EVENT_LOG,
          inject: [ConfigService, { token: DB_CLIENT, optional: true }],
          useFactory: (config: ConfigService, db?: IDbClient): IWheelEventLog => {
            if (parseEventLogImpl(config.get<string>("EVENT_LOG_IMPL")) === "db") {
              return new DbWheelEventLog(requireDb(db, "EVENT_LOG_IMPL"));
            }
            return new InMemoryWheelEventLog();
          },
        },
      ],
    };
  }
}
