import { z } from "zod";
import { defineTable } from "../../../../database/tables/table_definition.ts";

export const Users = defineTable({
  namespace: "shop",
  name: "users",
  columns: { id: "integer", email: "text" },
  primaryKey: "id",
  schema: z.object({ id: z.number().int(), email: z.string() }),
});

export const Orders = defineTable({
  namespace: "shop",
  name: "orders",
  columns: { id: "integer", userId: "integer", total: "real" },
  primaryKey: "id",
  schema: z.object({ id: z.number().int(), userId: z.number().int(), total: z.number() }),
});

export const CURRENCY = "EUR";
