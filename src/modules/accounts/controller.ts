import { AccountsService } from "./service";
import { CreateAccountBody } from "./schemas";

export class AccountsController {
  constructor(private readonly service: AccountsService) {}

  createAccount(input: CreateAccountBody) {
    return this.service.createAccount(input);
  }

  getAccount(accountId: number) {
    return this.service.getAccount(accountId);
  }

  listAccounts() {
    return this.service.listAccounts();
  }

  updateStatus(accountId: number, status: boolean) {
    return this.service.updateStatus(accountId, status);
  }

  deleteAccount(accountId: number) {
    return this.service.deleteAccount(accountId);
  }
}
