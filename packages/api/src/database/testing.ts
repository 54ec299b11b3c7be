import { DatabaseService } from "./database.service";
import { users } from "./schema";

/** Fresh in-memory database with the full schema applied. */
export function createTestDatabase(): DatabaseService {
  return new DatabaseService({ databasePath: ":memory:" });
}

export function insertTestUser(
  database: DatabaseService,
  overrides: Partial<typeof users.$inferInsert> = {},
) {
  return database.db
    .insert(users)
    .values({
      email: `user-${Math.random().toString(36).slice(2)}@example.com`,
      password: "hashed-password",
      timezone: "UTC",
      ...overrides,
    })
    .returning()
    .get();
}
