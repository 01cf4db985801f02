import { z } from "zod";
import { personBodySchema } from "../persons/schemas";

const passwordSchema = z.string().min(4).max(128);

export const createClientBodySchema = personBodySchema.extend({
  password: passwordSchema
});

export const updateClientBodySchema = personBodySchema.extend({
  password: passwordSchema,
  status: z.boolean()
});

export type CreateClientBody = z.infer<typeof createClientBodySchema>;
export type UpdateClientBody = z.infer<typeof updateClientBodySchema>;
