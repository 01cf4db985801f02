export type AccountType = {
  accountTypeId: number;
  description: string;
};

export interface AccountTypesRepository {
  getById(accountTypeId: number): Promise<AccountType | null>;
  list(): Promise<AccountType[]>;
}
