import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import Database from "better-sqlite3";
import { drizzle, BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { APP_CONFIG, AppConfig } from "../common/config";
import { SCHEMA_DDL } from "./migrations";
import * as schema from "./schema";

export type Db = BetterSQLite3Database<typeof schema>;

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly sqlite: Database.Database;
  readonly db: Db;

  constructor(@Inject(APP_CONFIG) config: Pick<AppConfig, "databasePath">) {
    this.sqlite = new Database(config.databasePath);
    this.sqlite.pragma("journal_mode = WAL");
    this.sqlite.pragma("foreign_keys = ON");
    this.sqlite.exec(SCHEMA_DDL);
    this.db = drizzle(this.sqlite, { schema });
    this.logger.log(`SQLite database ready at ${config.databasePath}`);
  }

  /** Runs `fn` inside a single SQLite transaction. */
  transaction<T>(fn: () => T): T {
    return this.sqlite.transaction(fn)();
  }

  onModuleDestroy() {
    this.sqlite.close();
  }
}
