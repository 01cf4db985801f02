export type Client = {
  clientId: number;
  personId: number;
  passwordHash: string;
  status: boolean;
};

export type CreateClientInput = Omit<Client, "clientId">;

export type ClientCredentials = Pick<Client, "passwordHash" | "status">;

export interface ClientsRepository {
  create(input: CreateClientInput): Promise<Client>;
  getById(clientId: number): Promise<Client | null>;
  list(): Promise<Client[]>;
  updateCredentials(clientId: number, fields: ClientCredentials): Promise<Client | null>;
  delete(clientId: number): Promise<boolean>;
}
