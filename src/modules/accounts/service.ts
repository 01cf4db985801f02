import { NotFoundError, isForeignKeyViolation } from "../../common/errors";
import type { Logger } from "../../common/logger";
import { Account, AccountsRepository, CreateAccountInput } from "./repository";

/** What other services need from accounts: a lookup that may come back empty. */
export interface AccountLookup {
  findAccount(accountId: number): Promise<Account | null>;
}

export class AccountsService implements AccountLookup {
  constructor(
    private readonly accountsRepo: AccountsRepository,
    private readonly logger?: Logger
  ) {}

  async createAccount(input: CreateAccountInput): Promise<Account> {
    try {
      const account = await this.accountsRepo.create(input);
      this.logger?.info(
        { accountId: account.accountId, clientId: account.clientId },
        "Account created"
      );
      return account;
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new NotFoundError(`Account type not found: ${input.accountTypeId}`);
      }
      throw error;
    }
  }

  findAccount(accountId: number): Promise<Account | null> {
    return this.accountsRepo.getById(accountId);
  }

  async getAccount(accountId: number): Promise<Account> {
    const account = await this.accountsRepo.getById(accountId);
    if (!account) {
      throw new NotFoundError(`Account not found: ${accountId}`);
    }
    return account;
  }

  listAccounts(): Promise<Account[]> {
    return this.accountsRepo.list();
  }

  // Only the status is ever changed after creation
  async updateStatus(accountId: number, status: boolean): Promise<Account> {
    const updated = await this.accountsRepo.setStatus(accountId, status);
    if (!updated) {
      throw new NotFoundError(`Account not found: ${accountId}`);
    }
    this.logger?.info({ accountId, status }, "Account status updated");
    return updated;
  }

  async deleteAccount(accountId: number): Promise<void> {
    const deleted = await this.accountsRepo.delete(accountId);
    if (!deleted) {
      throw new NotFoundError(`Account not found: ${accountId}`);
    }
    this.logger?.info({ accountId }, "Account deleted");
  }
}
