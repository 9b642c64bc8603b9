import { expect, test } from "vitest";
import {
  DatabaseSectionSchema,
  MapConnectionSchema,
  parseConfig,
  SqliteConnectionSchema,
  SurrealConnectionSchema,
} from "./config_schemas.ts";
import { InvalidConfigurationError } from "./errors.ts";

test("DatabaseSectionSchema allows a missing or null connection", () => {
  expect(parseConfig(DatabaseSectionSchema, { provider: "map" }, "section")).toEqual({
    provider: "map",
  });
  expect(
    parseConfig(DatabaseSectionSchema, { provider: "map", connection: null }, "section"),
  ).toEqual({ provider: "map", connection: null });
});

test("table settings accept boolean strings for autoscan", () => {
  expect(parseConfig(MapConnectionSchema, { autoscan: "true" }, "map connection")).toEqual({
    autoscan: true,
  });
});

test("table settings require tables when autoscan is off", () => {
  let caught: unknown;
  try {
    parseConfig(MapConnectionSchema, { autoscan: "false" }, "map connection");
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(InvalidConfigurationError);
  expect(caught).toMatchObject({
    issues: ["tables: 'tables' is required when 'autoscan' is false"],
  });
});

test("SqliteConnectionSchema enables WAL by default", () => {
  const config = parseConfig(SqliteConnectionSchema, { file: "app.db", tables: ["app.users"] }, "sqlite");

  expect(config).toEqual({ file: "app.db", wal: true, autoscan: false, tables: ["app.users"] });
});

test("SurrealConnectionSchema fills namespace and database", () => {
  const config = parseConfig(
    SurrealConnectionSchema,
    { url: "http://127.0.0.1:8000", autoscan: true, username: "root", password: "test-secret" },
    "surreal",
  );

  expect(config).toEqual({
    url: "http://127.0.0.1:8000",
    namespace: "main",
    database: "main",
    autoscan: true,
    username: "root",
    password: "test-secret",
  });
});

test("parseConfig names the failing keys", () => {
  expect(() => parseConfig(SqliteConnectionSchema, { file: "", autoscan: 3 }, "sqlite connection"))
    .toThrow(
      "Invalid sqlite connection configuration: autoscan: Invalid input; file: String must contain at least 1 character(s)",
    );
});
