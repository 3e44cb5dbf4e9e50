import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { readFileSync } from "fs";
import { join } from "path";
import { Pool, QueryResultRow } from "pg";

export type DbRow = QueryResultRow;

export interface IDbClient {
  query<T extends DbRow = DbRow>(sql: string, params?: unknown[]): Promise<T[]>;
  transaction<T>(fn: (tx: IDbClient) => Promise<T>): Promise<T>;
}

export const DB_CLIENT = Symbol("DB_CLIENT");

export class PgDbClient implements IDbClient {
  constructor(private readonly pool: Pool) {}

  async query<T extends DbRow = DbRow>(sql: string, params: unknown[] = []): Promise<T[]> {
    const result = await this.pool.query<T>(sql, params);
    return result.rows;
  }

  async transaction<T>(fn: (tx: IDbClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const txClient: IDbClient = {
        query: async <T extends DbRow = DbRow>(sql: string, params: unknown[] = []) => {
          const result = await client.query<T>(sql, params);
          return result.rows;
        },
        transaction: async () => {
          throw new Error("Nested transactions are not supported in PgDbClient");
        },
      };
      const result = await fn(txClient);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }
}

export const SCHEMA_PATH = join(__dirname, "..", "sql", "schema.sql");

export function readSchemaSql(path: string = SCHEMA_PATH): string {
  return readFileSync(path, "utf8");
}

/** Applies the idempotent table definitions used by the wallet and the event log. */
export async function applySchema(db: IDbClient, path: string = SCHEMA_PATH): Promise<void> {
  const statements = readSchemaSql(path)
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
  for (const statement of statements) {
    await db.query(statement);
  }
}

export interface DbModuleOptions {
  connectionString?: string;
  maxConnections?: number;
  autoMigrate?: boolean;
}

export const dbModuleOptionsToken = Symbol("DB_MODULE_OPTIONS");

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: DB_CLIENT,
      inject: [ConfigService, dbModuleOptionsToken],
      useFactory: async (config: ConfigService, options?: DbModuleOptions) => {
        const connectionString = options?.connectionString ?? config.get<string>("DATABASE_URL");
        if (!connectionString) {
          throw new Error("DATABASE_URL is not configured");
        }
        const pool = new Pool({
          connectionString,
          max: options?.maxConnections ?? (Number(config.get("DB_MAX_CONNECTIONS")) || 10),
        });
        const client = new PgDbClient(pool);
        if (options?.autoMigrate ?? config.get<string>("DB_AUTO_MIGRATE") === "true") {
          await applySchema(client);
        }
        return client;
      },
    },
  ],
  exports: [DB_CLIENT],
})
export class DbModule {
  static forRoot(options?: DbModuleOptions) {
    return {
      module: DbModule,
      providers: [
        {
          provide: dbModuleOptionsToken,
          useValue: options ?? {},
        },
      ],
    };
  }
}
