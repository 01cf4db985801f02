import {
  Account,
  AccountsRepository,
  CreateAccountInput
} from "../../modules/accounts/repository";
import { AccountTypesRepository } from "../../modules/account-types/repository";
import { NotFoundError } from "../../common/errors";

export class MemoryAccountsRepository implements AccountsRepository {
  private nextId = 1;

  constructor(
    private readonly accountTypesRepo?: AccountTypesRepository,
    private readonly accounts: Map<number, Account> = new Map()
  ) {}

  async create(input: CreateAccountInput): Promise<Account> {
    // Stands in for the account_type foreign key of the postgres schema
    if (this.accountTypesRepo && !(await this.accountTypesRepo.getById(input.accountTypeId))) {
      throw new NotFoundError(`Account type not found: ${input.accountTypeId}`);
    }
    const account: Account = { ...input, accountId: this.nextId++ };
    this.accounts.set(account.accountId, account);
    return { ...account };
  }

  async getById(accountId: number): Promise<Account | null> {
    const account = this.accounts.get(accountId);
    return account ? { ...account } : null;
  }

  async list(): Promise<Account[]> {
    return [...this.accounts.values()].map((account) => ({ ...account }));
  }

  async setStatus(accountId: number, status: boolean): Promise<Account | null> {
    const account = this.accounts.get(accountId);
    if (!account) {
      return null;
    }
    const updated: Account = { ...account, status };
    this.accounts.set(accountId, updated);
    return { ...updated };
  }

  async delete(accountId: number): Promise<boolean> {
    return this.accounts.delete(accountId);
  }
}
