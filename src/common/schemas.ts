import { z } from "zod";

// Ids are INTEGER (SERIAL) columns
export const MAX_ID = 2_147_483_647;

export const idSchema = z.number().int().positive().max(MAX_ID);

export const idParamsSchema = z.object({
  id: z.coerce.number().int().positive().max(MAX_ID)
});

export type IdParams = z.infer<typeof idParamsSchema>;

export const idParamsJsonSchema = {
  type: "object",
  properties: { id: { type: "string" } },
  required: ["id"]
} as const;
