import { ClientsService } from "./service";
import { CreateClientBody, UpdateClientBody } from "./schemas";

export class ClientsController {
  constructor(private readonly service: ClientsService) {}

  createClient(input: CreateClientBody) {
    return this.service.createClient(input);
  }

  getClient(clientId: number) {
    return this.service.getClient(clientId);
  }

  listClients() {
    return this.service.listClients();
  }

  updateClient(clientId: number, input: UpdateClientBody) {
    return this.service.updateClient(clientId, input);
  }

  deleteClient(clientId: number) {
    return this.service.deleteClient(clientId);
  }
}
