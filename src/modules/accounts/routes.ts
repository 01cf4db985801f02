import { FastifyInstance } from "fastify";
import { idParamsJsonSchema, idParamsSchema } from "../../common/schemas";
import { AccountsController } from "./controller";
import { accountStatusBodySchema, createAccountBodySchema } from "./schemas";

export const accountJsonSchema = {
  type: "object",
  properties: {
    accountId: { type: "integer" },
    clientId: { type: "integer" },
    accountNumber: { type: "string" },
    accountTypeId: { type: "integer" },
    initialBalanceCents: { type: "integer" },
    status: { type: "boolean" }
  },
  required: [
    "accountId",
    "clientId",
    "accountNumber",
    "accountTypeId",
    "initialBalanceCents",
    "status"
  ]
} as const;

export function registerAccountsRoutes(
  app: FastifyInstance,
  controller: AccountsController
) {
  app.post(
    "/accounts",
    {
      schema: {
        tags: ["accounts"],
        summary: "Create account",
        response: { 201: accountJsonSchema }
      }
    },
    async (request, reply) => {
      const body = createAccountBodySchema.parse(request.body);
      const account = await controller.createAccount(body);
      return reply.status(201).send(account);
    }
  );

  app.get(
    "/accounts",
    {
      schema: {
        tags: ["accounts"],
        summary: "List accounts",
        response: { 200: { type: "array", items: accountJsonSchema } }
      }
    },
    async () => controller.listAccounts()
  );

  app.get(
    "/accounts/:id",
    {
      schema: {
        tags: ["accounts"],
        summary: "Get account",
        params: idParamsJsonSchema,
        response: { 200: accountJsonSchema }
      }
    },
    async (request) => {
      const params = idParamsSchema.parse(request.params);
      return controller.getAccount(params.id);
    }
  );

  app.patch(
    "/accounts/:id/status",
    {
      schema: {
        tags: ["accounts"],
        summary: "Update account status",
        params: idParamsJsonSchema,
        response: { 200: accountJsonSchema }
      }
    },
    async (request) => {
      const params = idParamsSchema.parse(request.params);
      const body = accountStatusBodySchema.parse(request.body);
      return controller.updateStatus(params.id, body.status);
    }
  );

  app.delete(
    "/accounts/:id",
    {
      schema: {
        tags: ["accounts"],
        summary: "Delete account",
        params: idParamsJsonSchema
      }
    },
    async (request, reply) => {
      const params = idParamsSchema.parse(request.params);
      await controller.deleteAccount(params.id);
      return reply.status(204).send();
    }
  );
}
