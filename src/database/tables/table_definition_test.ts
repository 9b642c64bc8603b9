import { expect, test } from "vitest";
import { z } from "zod";
import { defineTable, isTable } from "./table_definition.ts";
import { InvalidTableDefinitionError } from "../errors.ts";
import { Audit, Users } from "../../test/test_helpers.ts";

const noteSchema = z.object({ id: z.number().int(), note: z.string().optional() });

// =====================
// defineTable
// =====================

test("defineTable qualifies the name with its namespace", () => {
  expect(Users.name).toBe("users");
  expect(Users.namespace).toBe("app");
  expect(Users.qualifiedName).toBe("app.users");
  expect(Users.primaryKey).toBe("id");
});

test("defineTable without namespace uses the bare name", () => {
  const Notes = defineTable({ name: "notes", columns: { id: "integer" }, schema: noteSchema });

  expect(Notes.namespace).toBeNull();
  expect(Notes.qualifiedName).toBe("notes");
  expect(Notes.primaryKey).toBeNull();
});

test("defineTable returns a frozen definition", () => {
  expect(Object.isFrozen(Users)).toBe(true);
  expect(Object.isFrozen(Users.columns)).toBe(true);
});

test("defineTable rejects a name that is not an identifier", () => {
  expect(() =>
    defineTable({ name: "bad-name", columns: { id: "integer" }, schema: noteSchema })
  ).toThrow(InvalidTableDefinitionError);
});

test("defineTable rejects a malformed namespace", () => {
  expect(() =>
    defineTable({ name: "notes", namespace: "shop..x", columns: { id: "integer" }, schema: noteSchema })
  ).toThrow("Invalid table definition 'notes': namespace 'shop..x' is not a dotted identifier");
});

test("defineTable requires at least one column", () => {
  expect(() => defineTable({ name: "notes", columns: {}, schema: noteSchema })).toThrow(
    "Invalid table definition 'notes': at least one column is required",
  );
});

test("defineTable rejects a primary key that is not a column", () => {
  expect(() =>
    defineTable({ name: "notes", columns: { id: "integer" }, primaryKey: "uuid", schema: noteSchema })
  ).toThrow("Invalid table definition 'notes': primary key 'uuid' is not a column");
});

// =====================
// Row conversion
// =====================

test("toRow keeps declared columns and fills absent values with null", () => {
  const Notes = defineTable({
    name: "notes",
    columns: { id: "integer", note: "text" },
    schema: noteSchema,
  });

  expect(Notes.toRow({ id: 1 })).toEqual({ id: 1, note: null });
  expect(Notes.toRow({ id: 2, note: "hello" })).toEqual({ id: 2, note: "hello" });
});

test("toRow rejects a record that fails validation", () => {
  expect(() => Users.toRow({ id: 1.5, email: "a@example.com", active: true })).toThrow(z.ZodError);
});

test("fromRow validates and builds the record", () => {
  expect(Audit.fromRow({ entry: "login" })).toEqual({ entry: "login" });
  expect(() => Audit.fromRow({ entry: 42 })).toThrow(z.ZodError);
});

// =====================
// isTable
// =====================

test("isTable recognizes definitions only", () => {
  expect(isTable(Users)).toBe(true);
  expect(isTable({ name: "users", qualifiedName: "app.users" })).toBe(false);
  expect(isTable("app.users")).toBe(false);
  expect(isTable(null)).toBe(false);
});
