import { FastifyInstance } from "fastify";
import { idParamsJsonSchema, idParamsSchema } from "../../common/schemas";
import { ClientsController } from "./controller";
import { createClientBodySchema, updateClientBodySchema } from "./schemas";

export const clientJsonSchema = {
  type: "object",
  properties: {
    clientId: { type: "integer" },
    personId: { type: "integer" },
    name: { type: "string" },
    gender: { type: "string" },
    age: { type: "integer" },
    identification: { type: "string" },
    address: { type: "string" },
    phone: { type: "string" },
    status: { type: "boolean" }
  },
  required: [
    "clientId",
    "personId",
    "name",
    "gender",
    "age",
    "identification",
    "address",
    "phone",
    "status"
  ]
} as const;

export function registerClientsRoutes(
  app: FastifyInstance,
  controller: ClientsController
) {
  app.post(
    "/clients",
    {
      schema: {
        tags: ["clients"],
        summary: "Create client with its person",
        response: { 201: clientJsonSchema }
      }
    },
    async (request, reply) => {
      const body = createClientBodySchema.parse(request.body);
      const client = await controller.createClient(body);
      return reply.status(201).send(client);
    }
  );

  app.get(
    "/clients",
    {
      schema: {
        tags: ["clients"],
        summary: "List clients",
        response: { 200: { type: "array", items: clientJsonSchema } }
      }
    },
    async () => controller.listClients()
  );

  app.get(
    "/clients/:id",
    {
      schema: {
        tags: ["clients"],
        summary: "Get client",
        params: idParamsJsonSchema,
        response: { 200: clientJsonSchema }
      }
    },
    async (request) => {
      const params = idParamsSchema.parse(request.params);
      return controller.getClient(params.id);
    }
  );

  app.put(
    "/clients/:id",
    {
      schema: {
        tags: ["clients"],
        summary: "Update client and its person",
        params: idParamsJsonSchema,
        response: { 200: clientJsonSchema }
      }
    },
    async (request) => {
      const params = idParamsSchema.parse(request.params);
      const body = updateClientBodySchema.parse(request.body);
      return controller.updateClient(params.id, body);
    }
  );

  app.delete(
    "/clients/:id",
    {
      schema: {
        tags: ["clients"],
        summary: "Delete client and its person",
        params: idParamsJsonSchema
      }
    },
    async (request, reply) => {
      const params = idParamsSchema.parse(request.params);
      await controller.deleteClient(params.id);
      return reply.status(204).send();
    }
  );
}
