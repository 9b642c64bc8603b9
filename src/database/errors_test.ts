import { afterEach, expect, test, vi } from "vitest";
import {
  DatabaseError,
  DumpTableError,
  IncompatibleSchemasError,
  MissingProviderKeyError,
  QueryError,
  TransactionStartFailedError,
} from "./errors.ts";

afterEach(() => {
  vi.unstubAllEnvs();
});

test("QueryError includes truncated SQL outside production", () => {
  vi.stubEnv("NODE_ENV", "test");
  const sql = `SELECT ${"x, ".repeat(60)}y FROM users`;

  const error = new QueryError(sql, new Error("no such column"));

  expect(error.message).toBe(`Query execution failed: ${sql.substring(0, 100)}...`);
  expect(error.sql).toBe(sql);
});

test("QueryError hides SQL in production", () => {
  vi.stubEnv("NODE_ENV", "production");

  const error = new QueryError("SELECT secret FROM vault", new Error("denied"));

  expect(error.message).toBe("Query execution failed");
  expect(error.sql).toBe("SELECT secret FROM vault");
});

test("database errors share a base class and carry their names", () => {
  const error = new IncompatibleSchemasError(["app.orders", "app.audit"]);

  expect(error).toBeInstanceOf(DatabaseError);
  expect(error).toBeInstanceOf(Error);
  expect(error.name).toBe("IncompatibleSchemasError");
  expect(error.message).toBe(
    "Destination database does not contain all tables to be dumped. Missing: app.orders, app.audit",
  );
});

test("TransactionStartFailedError names the side and keeps the cause", () => {
  const cause = new Error("busy");
  const error = new TransactionStartFailedError("source", cause);

  expect(error.message).toBe("Failed to begin transaction on source database");
  expect(error.side).toBe("source");
  expect(error.cause).toBe(cause);
});

test("DumpTableError describes where the dump failed", () => {
  expect(new DumpTableError("app.users", 4, new Error("full")).message).toBe(
    "Dump failed while inserting row 4 of table 'app.users': full",
  );
  expect(new DumpTableError("app.logs", null, "unknown").message).toBe(
    "Dump failed while reading table 'app.logs'",
  );
});

test("MissingProviderKeyError lists available providers", () => {
  expect(new MissingProviderKeyError("database", ["map", "sqlite"]).message).toBe(
    "Please add a 'provider' value in the 'database' section. Available: map, sqlite",
  );
});
