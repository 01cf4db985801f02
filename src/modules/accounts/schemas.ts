import { z } from "zod";
import { idSchema } from "../../common/schemas";

const MAX_CENTS = Number.MAX_SAFE_INTEGER;

export const createAccountBodySchema = z.object({
  clientId: idSchema,
  accountNumber: z
    .string()
    .trim()
    .min(1)
    .max(34)
    .regex(/^[A-Za-z0-9-]+$/, "Account number must contain only letters, numbers and hyphens"),
  accountTypeId: idSchema,
  initialBalanceCents: z
    .number()
    .int()
    .nonnegative()
    .max(MAX_CENTS),
  status: z.boolean().default(true)
});

export const accountStatusBodySchema = z.object({
  status: z.boolean()
});

export type CreateAccountBody = z.infer<typeof createAccountBodySchema>;
export type AccountStatusBody = z.infer<typeof accountStatusBodySchema>;
