import { FastifyInstance } from "fastify";
import { idParamsJsonSchema, idParamsSchema } from "../../common/schemas";
import { PersonsController } from "./controller";
import { personBodySchema } from "./schemas";

export const personJsonSchema = {
  type: "object",
  properties: {
    personId: { type: "integer" },
    name: { type: "string" },
    gender: { type: "string" },
    age: { type: "integer" },
    identification: { type: "string" },
    address: { type: "string" },
    phone: { type: "string" }
  },
  required: ["personId", "name", "gender", "age", "identification", "address", "phone"]
} as const;

export function registerPersonsRoutes(
  app: FastifyInstance,
  controller: PersonsController
) {
  app.post(
    "/persons",
    {
      schema: {
        tags: ["persons"],
        summary: "Create person",
        response: { 201: personJsonSchema }
      }
    },
    async (request, reply) => {
      const body = personBodySchema.parse(request.body);
      const person = await controller.createPerson(body);
      return reply.status(201).send(person);
    }
  );

  app.get(
    "/persons",
    {
      schema: {
        tags: ["persons"],
        summary: "List persons",
        response: { 200: { type: "array", items: personJsonSchema } }
      }
    },
    async () => controller.listPersons()
  );

  app.get(
    "/persons/:id",
    {
      schema: {
        tags: ["persons"],
        summary: "Get person",
        params: idParamsJsonSchema,
        response: { 200: personJsonSchema }
      }
    },
    async (request) => {
      const params = idParamsSchema.parse(request.params);
      return controller.getPerson(params.id);
    }
  );

  app.put(
    "/persons/:id",
    {
      schema: {
        tags: ["persons"],
        summary: "Update person",
        params: idParamsJsonSchema,
        response: { 200: personJsonSchema }
      }
    },
    async (request) => {
      const params = idParamsSchema.parse(request.params);
      const body = personBodySchema.parse(request.body);
      return controller.updatePerson(params.id, body);
    }
  );

  app.delete(
    "/persons/:id",
    {
      schema: {
        tags: ["persons"],
        summary: "Delete person",
        params: idParamsJsonSchema
      }
    },
    async (request, reply) => {
      const params = idParamsSchema.parse(request.params);
      await controller.deletePerson(params.id);
      return reply.status(204).send();
    }
  );
}
