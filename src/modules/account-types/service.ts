import { NotFoundError } from "../../common/errors";
import { AccountType, AccountTypesRepository } from "./repository";

export interface AccountTypeLookup {
  findAccountType(accountTypeId: number): Promise<AccountType | null>;
}

export class AccountTypesService implements AccountTypeLookup {
  constructor(private readonly accountTypesRepo: AccountTypesRepository) {}

  findAccountType(accountTypeId: number): Promise<AccountType | null> {
    return this.accountTypesRepo.getById(accountTypeId);
  }

  async getAccountType(accountTypeId: number): Promise<AccountType> {
    const accountType = await this.accountTypesRepo.getById(accountTypeId);
    if (!accountType) {
      throw new NotFoundError(`Account type not found: ${accountTypeId}`);
    }
    return accountType;
  }

  listAccountTypes(): Promise<AccountType[]> {
    return this.accountTypesRepo.list();
  }
}
