import type { OpenAPIV3 } from "openapi-types";

const json = (ref: string) => ({
  "application/json": {
    schema: { $ref: `#/components/schemas/${ref}` }
  }
});

const jsonArray = (ref: string) => ({
  "application/json": {
    schema: {
      type: "array" as const,
      items: { $ref: `#/components/schemas/${ref}` }
    }
  }
});

const errorResponses = {
  "400": { description: "Invalid request", content: json("Error") },
  "404": { description: "Not found", content: json("Error") }
};

const idParameter = [{ $ref: "#/components/parameters/Id" }];

export const openapiDocument = {
  openapi: "3.0.3",
  info: {
    title: "Account Movements API",
    description:
      "Persons, clients, accounts and movements with running balances and account statements. Amounts are integer cents.",
    version: "1.0.0"
  },
  paths: {
    "/health": {
      get: {
        summary: "Health check",
        responses: {
          "200": { description: "OK", content: json("Health") }
        }
      }
    },
    "/persons": {
      get: {
        tags: ["persons"],
        summary: "List persons",
        responses: { "200": { description: "OK", content: jsonArray("Person") } }
      },
      post: {
        tags: ["persons"],
        summary: "Create person",
        requestBody: { required: true, content: json("PersonBody") },
        responses: {
          "201": { description: "Created", content: json("Person") },
          "400": errorResponses["400"]
        }
      }
    },
    "/persons/{id}": {
      get: {
        tags: ["persons"],
        summary: "Get person",
        parameters: idParameter,
        responses: { "200": { description: "OK", content: json("Person") }, ...errorResponses }
      },
      put: {
        tags: ["persons"],
        summary: "Update person",
        parameters: idParameter,
        requestBody: { required: true, content: json("PersonBody") },
        responses: { "200": { description: "OK", content: json("Person") }, ...errorResponses }
      },
      delete: {
        tags: ["persons"],
        summary: "Delete person (its client, if any, is left untouched)",
        parameters: idParameter,
        responses: { "204": { description: "Deleted" }, "404": errorResponses["404"] }
      }
    },
    "/clients": {
      get: {
        tags: ["clients"],
        summary: "List clients",
        responses: { "200": { description: "OK", content: jsonArray("Client") } }
      },
      post: {
        tags: ["clients"],
        summary: "Create client with its person",
        requestBody: { required: true, content: json("CreateClientBody") },
        responses: {
          "201": { description: "Created", content: json("Client") },
          "400": errorResponses["400"]
        }
      }
    },
    "/clients/{id}": {
      get: {
        tags: ["clients"],
        summary: "Get client",
        parameters: idParameter,
        responses: { "200": { description: "OK", content: json("Client") }, ...errorResponses }
      },
      put: {
        tags: ["clients"],
        summary: "Update client password/status and its person",
        parameters: idParameter,
        requestBody: { required: true, content: json("UpdateClientBody") },
        responses: { "200": { description: "OK", content: json("Client") }, ...errorResponses }
      },
      delete: {
        tags: ["clients"],
        summary: "Delete client and its person",
        parameters: idParameter,
        responses: { "204": { description: "Deleted" }, "404": errorResponses["404"] }
      }
    },
    "/accounts": {
      get: {
        tags: ["accounts"],
        summary: "List accounts",
        responses: { "200": { description: "OK", content: jsonArray("Account") } }
      },
      post: {
        tags: ["accounts"],
        summary: "Create account",
        requestBody: { required: true, content: json("CreateAccountBody") },
        responses: { "201": { description: "Created", content: json("Account") }, ...errorResponses }
      }
    },
    "/accounts/{id}": {
      get: {
        tags: ["accounts"],
        summary: "Get account",
        parameters: idParameter,
        responses: { "200": { description: "OK", content: json("Account") }, ...errorResponses }
      },
      delete: {
        tags: ["accounts"],
        summary: "Delete account (movements are kept)",
        parameters: idParameter,
        responses: { "204": { description: "Deleted" }, "404": errorResponses["404"] }
      }
    },
    "/accounts/{id}/status": {
      patch: {
        tags: ["accounts"],
        summary: "Update account status",
        parameters: idParameter,
        requestBody: { required: true, content: json("AccountStatusBody") },
        responses: { "200": { description: "OK", content: json("Account") }, ...errorResponses }
      }
    },
    "/account-types": {
      get: {
        tags: ["account-types"],
        summary: "List account types",
        responses: { "200": { description: "OK", content: jsonArray("AccountType") } }
      }
    },
    "/account-types/{id}": {
      get: {
        tags: ["account-types"],
        summary: "Get account type",
        parameters: idParameter,
        responses: { "200": { description: "OK", content: json("AccountType") }, ...errorResponses }
      }
    },
    "/movements": {
      get: {
        tags: ["movements"],
        summary: "List movements",
        responses: { "200": { description: "OK", content: jsonArray("Movement") } }
      },
      post: {
        tags: ["movements"],
        summary: "Create movement; the balance is computed from the account's latest movement",
        requestBody: { required: true, content: json("CreateMovementBody") },
        responses: { "201": { description: "Created", content: json("Movement") }, ...errorResponses }
      }
    },
    "/movements/account-status": {
      get: {
        tags: ["movements"],
        summary: "Account statement of a client between two instants (inclusive)",
        parameters: [
          { $ref: "#/components/parameters/StartDate" },
          { $ref: "#/components/parameters/EndDate" },
          { $ref: "#/components/parameters/ClientId" }
        ],
        responses: {
          "200": { description: "OK", content: jsonArray("StatementRow") },
          ...errorResponses
        }
      }
    },
    "/movements/{id}": {
      get: {
        tags: ["movements"],
        summary: "Get movement",
        parameters: idParameter,
        responses: { "200": { description: "OK", content: json("Movement") }, ...errorResponses }
      },
      put: {
        tags: ["movements"],
        summary: "Overwrite movement fields (no balance recomputation)",
        parameters: idParameter,
        requestBody: { required: true, content: json("UpdateMovementBody") },
        responses: { "200": { description: "OK", content: json("Movement") }, ...errorResponses }
      },
      delete: {
        tags: ["movements"],
        summary: "Delete movement",
        parameters: idParameter,
        responses: { "204": { description: "Deleted" }, "404": errorResponses["404"] }
      }
    }
  },
  components: {
    parameters: {
      Id: {
        name: "id",
        in: "path",
        required: true,
        schema: { type: "integer", minimum: 1 }
      },
      StartDate: {
        name: "startDate",
        in: "query",
        required: true,
        schema: { type: "string", format: "date-time" }
      },
      EndDate: {
        name: "endDate",
        in: "query",
        required: true,
        schema: { type: "string", format: "date-time" }
      },
      ClientId: {
        name: "clientId",
        in: "query",
        required: true,
        schema: { type: "integer", minimum: 1 }
      }
    },
    schemas: {
      Health: {
        type: "object",
        properties: { status: { type: "string", enum: ["ok"] } },
        required: ["status"]
      },
      Error: {
        type: "object",
        properties: {
          error: { type: "string" },
          message: { type: "string" }
        },
        required: ["error", "message"]
      },
      PersonBody: {
        type: "object",
        properties: {
          name: { type: "string" },
          gender: { type: "string" },
          age: { type: "integer", minimum: 0 },
          identification: { type: "string" },
          address: { type: "string" },
          phone: { type: "string" }
        },
        required: ["name", "gender", "age", "identification", "address", "phone"]
      },
      Person: {
        allOf: [
          { $ref: "#/components/schemas/PersonBody" },
          {
            type: "object",
            properties: { personId: { type: "integer" } },
            required: ["personId"]
          }
        ]
      },
      CreateClientBody: {
        allOf: [
          { $ref: "#/components/schemas/PersonBody" },
          {
            type: "object",
            properties: { password: { type: "string", minLength: 4 } },
            required: ["password"]
          }
        ]
      },
      UpdateClientBody: {
        allOf: [
          { $ref: "#/components/schemas/CreateClientBody" },
          {
            type: "object",
            properties: { status: { type: "boolean" } },
            required: ["status"]
          }
        ]
      },
      Client: {
        allOf: [
          { $ref: "#/components/schemas/Person" },
          {
            type: "object",
            properties: {
              clientId: { type: "integer" },
              status: { type: "boolean" }
            },
            required: ["clientId", "status"]
          }
        ]
      },
      CreateAccountBody: {
        type: "object",
        properties: {
          clientId: { type: "integer" },
          accountNumber: { type: "string" },
          accountTypeId: { type: "integer" },
          initialBalanceCents: { type: "integer", minimum: 0 },
          status: { type: "boolean", default: true }
        },
        required: ["clientId", "accountNumber", "accountTypeId", "initialBalanceCents"]
      },
      AccountStatusBody: {
        type: "object",
        properties: { status: { type: "boolean" } },
        required: ["status"]
      },
      Account: {
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
      },
      AccountType: {
        type: "object",
        properties: {
          accountTypeId: { type: "integer" },
          description: { type: "string" }
        },
        required: ["accountTypeId", "description"]
      },
      CreateMovementBody: {
        type: "object",
        properties: {
          accountId: { type: "integer" },
          valueCents: { type: "integer", description: "Signed: positive credit, negative debit" }
        },
        required: ["accountId", "valueCents"]
      },
      UpdateMovementBody: {
        type: "object",
        properties: {
          movementDate: { type: "string", format: "date-time" },
          accountId: { type: "integer" },
          valueCents: { type: "integer" },
          balanceCents: { type: "integer" }
        },
        required: ["movementDate", "accountId", "valueCents", "balanceCents"]
      },
      Movement: {
        type: "object",
        properties: {
          movementId: { type: "integer" },
          accountId: { type: "integer" },
          movementDate: { type: "string", format: "date-time" },
          valueCents: { type: "integer" },
          balanceCents: { type: "integer" }
        },
        required: ["movementId", "accountId", "movementDate", "valueCents", "balanceCents"]
      },
      StatementRow: {
        type: "object",
        properties: {
          date: { type: "string", format: "date-time" },
          clientName: { type: "string" },
          accountNumber: { type: "string" },
          accountType: { type: "string" },
          initialBalance: { type: "integer", description: "Balance before the movement" },
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
      }
    }
  }
} as const satisfies OpenAPIV3.Document;
