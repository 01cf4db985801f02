import { z } from "zod";
import { MAX_ID, idSchema } from "../../common/schemas";

const MAX_CENTS = Number.MAX_SAFE_INTEGER;

const centsSchema = z
  .number()
  .int()
  .min(-MAX_CENTS)
  .max(MAX_CENTS);

const dateTimeSchema = z.string().datetime({ offset: true });

export const createMovementBodySchema = z.object({
  accountId: idSchema,
  valueCents: centsSchema.refine((value) => value !== 0, {
    message: "Movement value must be non-zero"
  })
});

export const updateMovementBodySchema = z.object({
  movementDate: dateTimeSchema,
  accountId: idSchema,
  valueCents: centsSchema,
  balanceCents: centsSchema
});

// Every field is optional here: absence is reported by the service as MISSING_PARAMETER.
export const accountStatusQuerySchema = z
  .object({
    startDate: dateTimeSchema.optional(),
    endDate: dateTimeSchema.optional(),
    clientId: z.coerce.number().int().positive().max(MAX_ID).optional()
  })
  .refine(
    (data) =>
      !data.startDate || !data.endDate || Date.parse(data.startDate) <= Date.parse(data.endDate),
    {
      message: "startDate must not be after endDate",
      path: ["startDate"]
    }
  );

export type CreateMovementBody = z.infer<typeof createMovementBodySchema>;
export type UpdateMovementBody = z.infer<typeof updateMovementBodySchema>;
export type AccountStatusQuery = z.infer<typeof accountStatusQuerySchema>;
