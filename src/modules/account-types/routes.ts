import { FastifyInstance } from "fastify";
import { idParamsJsonSchema, idParamsSchema } from "../../common/schemas";
import { AccountTypesService } from "./service";

const accountTypeJsonSchema = {
  type: "object",
  properties: {
    accountTypeId: { type: "integer" },
    description: { type: "string" }
  },
  required: ["accountTypeId", "description"]
} as const;

// Read-only lookup table, so the routes talk to the service directly.
export function registerAccountTypesRoutes(
  app: FastifyInstance,
  service: AccountTypesService
) {
  app.get(
    "/account-types",
    {
      schema: {
        tags: ["account-types"],
        summary: "List account types",
        response: { 200: { type: "array", items: accountTypeJsonSchema } }
      }
    },
    async () => service.listAccountTypes()
  );

  app.get(
    "/account-types/:id",
    {
      schema: {
        tags: ["account-types"],
        summary: "Get account type",
        params: idParamsJsonSchema,
        response: { 200: accountTypeJsonSchema }
      }
    },
    async (request) => {
      const params = idParamsSchema.parse(request.params);
      return service.getAccountType(params.id);
    }
  );
}
