import { expect, test } from "vitest";
import { isMapDatabase, MapDatabase, MapProvider } from "./map_database.ts";
import {
  DatabaseNotOpenError,
  InvalidConfigurationError,
  NoActiveTransactionError,
  TableNotManagedError,
  TransactionAlreadyActiveError,
} from "../errors.ts";
import { createHost, Logs, makeUsers, Orders, Users } from "../../test/test_helpers.ts";

// =====================
// Queries
// =====================

test("MapDatabase stores and returns records", async () => {
  const db = new MapDatabase({ tables: [Users, Logs] });
  const [first, second] = makeUsers(2);

  await db.query(Users).insert(first);
  await db.query(Users).insert(second);

  expect(await db.query(Users).select()).toEqual([first, second]);
  expect(await db.query(Users).count()).toBe(2);
  expect(await db.query(Logs).count()).toBe(0);
});

test("MapDatabase returns copies of stored records", async () => {
  const db = new MapDatabase({ tables: [Users] });
  const user = { id: 1, email: "a@example.com", active: true };
  await db.query(Users).insert(user);

  user.email = "changed@example.com";
  const [selected] = await db.query(Users).select();
  selected.active = false;

  expect(await db.query(Users).select()).toEqual([
    { id: 1, email: "a@example.com", active: true },
  ]);
});

test("MapDatabase keeps dates and json values", async () => {
  const db = new MapDatabase({ tables: [Logs] });
  const log = {
    id: 1,
    message: "started",
    createdAt: new Date("2024-01-02T03:04:05.000Z"),
    meta: { level: "info", tags: ["boot"] },
  };

  await db.query(Logs).insert(log);

  expect(await db.query(Logs).select()).toEqual([log]);
});

test("MapDatabase.deleteAll empties a table", async () => {
  const db = new MapDatabase({ tables: [Users] });
  for (const user of makeUsers(3)) {
    await db.query(Users).insert(user);
  }

  await db.query(Users).deleteAll();

  expect(await db.query(Users).count()).toBe(0);
});

test("MapDatabase rejects tables it does not manage", () => {
  const db = new MapDatabase({ tables: [Users] });

  expect(() => db.query(Orders)).toThrow(TableNotManagedError);
  expect(() => db.query(Orders)).toThrow(
    "Table 'app.orders' is not managed by this map database",
  );
});

test("MapDatabase without tables adopts tables on first use", async () => {
  const db = new MapDatabase();
  expect(db.tables()).toEqual([]);

  await db.query(Orders).insert({ id: 1, total: 9.5 });

  expect(db.tables()).toEqual([Orders]);
  expect(await db.query(Orders).select()).toEqual([{ id: 1, total: 9.5 }]);
});

// =====================
// Transactions
// =====================

test("MapDatabase.rollbackTransaction restores the state at begin", async () => {
  const db = new MapDatabase({ tables: [Users] });
  const [first, second] = makeUsers(2);
  await db.query(Users).insert(first);

  await db.beginTransaction();
  await db.query(Users).insert(second);
  await db.query(Users).deleteAll();
  expect(await db.query(Users).count()).toBe(0);
  await db.rollbackTransaction();

  expect(db.inTransaction).toBe(false);
  expect(await db.query(Users).select()).toEqual([first]);
});

test("MapDatabase.commitTransaction keeps the changes", async () => {
  const db = new MapDatabase({ tables: [Users] });

  await db.beginTransaction();
  expect(db.inTransaction).toBe(true);
  await db.query(Users).insert(makeUsers(1)[0]);
  await db.commitTransaction();

  expect(db.inTransaction).toBe(false);
  expect(await db.query(Users).count()).toBe(1);
});

test("MapDatabase rejects nested transactions", async () => {
  const db = new MapDatabase({ tables: [Users] });
  await db.beginTransaction();

  await expect(db.beginTransaction()).rejects.toThrow(TransactionAlreadyActiveError);
});

test("MapDatabase rejects commit and rollback outside a transaction", async () => {
  const db = new MapDatabase({ tables: [Users] });

  await expect(db.commitTransaction()).rejects.toThrow("Cannot commit: no active transaction");
  await expect(db.rollbackTransaction()).rejects.toThrow(NoActiveTransactionError);
});

// =====================
// Lifecycle
// =====================

test("MapDatabase.close is idempotent and ends use of the handle", async () => {
  const db = new MapDatabase({ tables: [Users] });

  await db.close();
  await db.close();

  expect(db.isOpen).toBe(false);
  expect(() => db.query(Users)).toThrow(DatabaseNotOpenError);
  await expect(db.beginTransaction()).rejects.toThrow(DatabaseNotOpenError);
});

// =====================
// Provider
// =====================

test("MapProvider without connection settings builds a schema-less database", async () => {
  const db = await new MapProvider().get(null, null);

  expect(isMapDatabase(db)).toBe(true);
  expect(db.tables()).toEqual([]);
});

test("MapProvider discovers the configured tables", async () => {
  const db = await new MapProvider().get(createHost(), { tables: ["app.users", "app.logs"] });

  expect(db.tables()).toEqual([Users, Logs]);
  expect(() => db.query(Orders)).toThrow(TableNotManagedError);
});

test("MapProvider needs a host for table discovery", async () => {
  await expect(new MapProvider().get(null, { tables: ["app.users"] })).rejects.toThrow(
    InvalidConfigurationError,
  );
});

test("MapProvider requires tables unless autoscan is on", async () => {
  await expect(new MapProvider().get(createHost(), {})).rejects.toThrow(
    "Invalid map connection configuration: tables: 'tables' is required when 'autoscan' is false",
  );
});
