import { z } from "zod";
import { defineTable } from "../../../../database/tables/table_definition.ts";

export const AuditLog = defineTable({
  namespace: "audit",
  name: "entries",
  columns: { action: "text", at: "datetime" },
  schema: z.object({ action: z.string(), at: z.date() }),
});
