import { AccountType, AccountTypesRepository } from "../../modules/account-types/repository";

export const DEFAULT_ACCOUNT_TYPES: readonly AccountType[] = [
  { accountTypeId: 1, description: "Savings" },
  { accountTypeId: 2, description: "Checking" }
];

export class MemoryAccountTypesRepository implements AccountTypesRepository {
  private readonly accountTypes: Map<number, AccountType>;

  constructor(seed: readonly AccountType[] = DEFAULT_ACCOUNT_TYPES) {
    this.accountTypes = new Map(seed.map((type) => [type.accountTypeId, { ...type }]));
  }

  async getById(accountTypeId: number): Promise<AccountType | null> {
    const accountType = this.accountTypes.get(accountTypeId);
    return accountType ? { ...accountType } : null;
  }

  async list(): Promise<AccountType[]> {
    return [...this.accountTypes.values()].map((type) => ({ ...type }));
  }
}
