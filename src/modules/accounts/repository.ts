export type Account = {
  accountId: number;
  clientId: number;
  accountNumber: string;
  accountTypeId: number;
  initialBalanceCents: number;
  status: boolean;
};

export type CreateAccountInput = Omit<Account, "accountId">;

export interface AccountsRepository {
  create(input: CreateAccountInput): Promise<Account>;
  getById(accountId: number): Promise<Account | null>;
  list(): Promise<Account[]>;
  setStatus(accountId: number, status: boolean): Promise<Account | null>;
  delete(accountId: number): Promise<boolean>;
}
