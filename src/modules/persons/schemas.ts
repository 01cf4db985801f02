import { z } from "zod";

export const personBodySchema = z.object({
  name: z.string().trim().min(1).max(120),
  gender: z.string().trim().min(1).max(20),
  age: z.number().int().nonnegative().max(150),
  identification: z.string().trim().min(1).max(40),
  address: z.string().trim().min(1).max(200),
  phone: z.string().trim().min(1).max(30)
});

export type PersonBody = z.infer<typeof personBodySchema>;
