import { FastifyInstance } from "fastify";
import { idParamsJsonSchema, idParamsSchema } from "../../common/schemas";
import { MovementsController } from "./controller";
import {
  accountStatusQuerySchema,
  createMovementBodySchema,
  updateMovementBodySchema
} from "./schemas";

export const movementJsonSchema = {
  type: "object",
  properties: {
    movementId: { type: "integer" },
    accountId: { type: "integer" },
    movementDate: { type: "string" },
    valueCents: { type: "integer" },
    balanceCents: { type: "integer" }
  },
  required: ["movementId", "accountId", "movementDate", "valueCents", "balanceCents"]
} as const;

const statementRowJsonSchema = {
  type: "object",
  properties: {
    date: { type: "string" },
    clientName: { type: "string" },
    accountNumber: { type: "string" },
    accountType: { type: "string" },
    initialBalance: { type: "integer" },
    movement: { type: "integer" },
    status: { type: "boolean" },
    finalBalance: { type: "integer" }
  },
  required: [
    "date",
    "clientName",
    "accountNumber",
    "accountType",
    "initialBalance",
    "movement",
    "status",
    "finalBalance"
  ]
} as const;

export function registerMovementsRoutes(
  app: FastifyInstance,
  controller: MovementsController
) {
  app.post(
    "/movements",
    {
      schema: {
        tags: ["movements"],
        summary: "Create movement with running balance",
        response: { 201: movementJsonSchema }
      }
    },
    async (request, reply) => {
      const body = createMovementBodySchema.parse(request.body);
      const movement = await controller.createMovement(body);
      return reply.status(201).send(movement);
    }
  );

  app.get(
    "/movements",
    {
      schema: {
        tags: ["movements"],
        summary: "List movements",
        response: { 200: { type: "array", items: movementJsonSchema } }
      }
    },
    async () => controller.listMovements()
  );

  app.get(
    "/movements/account-status",
    {
      schema: {
        tags: ["movements"],
        summary: "Account statement for a client and date range",
        querystring: {
          type: "object",
          properties: {
            startDate: { type: "string" },
            endDate: { type: "string" },
            clientId: { type: "string" }
          }
        },
        response: { 200: { type: "array", items: statementRowJsonSchema } }
      }
    },
    async (request) => {
      const query = accountStatusQuerySchema.parse(request.query);
      return controller.accountStatus(query);
    }
  );

  app.get(
    "/movements/:id",
    {
      schema: {
        tags: ["movements"],
        summary: "Get movement",
        params: idParamsJsonSchema,
        response: { 200: movementJsonSchema }
      }
    },
    async (request) => {
      const params = idParamsSchema.parse(request.params);
      return controller.getMovement(params.id);
    }
  );

  app.put(
    "/movements/:id",
    {
      schema: {
        tags: ["movements"],
        summary: "Overwrite movement fields",
        params: idParamsJsonSchema,
        response: { 200: movementJsonSchema }
      }
    },
    async (request) => {
      const params = idParamsSchema.parse(request.params);
      const body = updateMovementBodySchema.parse(request.body);
      return controller.updateMovement(params.id, body);
    }
  );

  app.delete(
    "/movements/:id",
    {
      schema: {
        tags: ["movements"],
        summary: "Delete movement",
        params: idParamsJsonSchema
      }
    },
    async (request, reply) => {
      const params = idParamsSchema.parse(request.params);
      await controller.deleteMovement(params.id);
      return reply.status(204).send();
    }
  );
}
