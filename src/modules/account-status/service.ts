import { mapOrdered } from "../../common/concurrency";
import { NotFoundError } from "../../common/errors";
import type { Logger } from "../../common/logger";
import type { Account } from "../accounts/repository";
import type { AccountLookup } from "../accounts/service";
import type { AccountTypeLookup } from "../account-types/service";
import type { ClientDirectory } from "../clients/directory";
import type { Movement } from "../movements/repository";

/** One line of an account statement; amounts in cents. */
export type StatementRow = {
  date: string;
  clientName: string;
  accountNumber: string;
  accountType: string;
  /** Balance before the movement. */
  initialBalance: number;
  movement: number;
  status: boolean;
  finalBalance: number;
};

export interface AccountStatusReporter {
  getAccountStatus(movements: Movement[], clientId: number): Promise<StatementRow[]>;
}

export class AccountStatusService implements AccountStatusReporter {
  constructor(
    private readonly clients: ClientDirectory,
    private readonly accounts: AccountLookup,
    private readonly accountTypes: AccountTypeLookup,
    private readonly concurrency = 4,
    private readonly logger?: Logger
  ) {}

  /**
   * Builds the statement for `clientId` out of an already filtered movement list.
   *
   * Account and account type lookups run per group with bounded concurrency;
   * rows come back grouped in first-appearance order of each account, oldest
   * movement first inside a group. Groups whose account or account type cannot
   * be found are left out.
   */
  async getAccountStatus(movements: Movement[], clientId: number): Promise<StatementRow[]> {
    const client = await this.clients.getClientById(clientId);
    if (!client) {
      throw new NotFoundError(`Client not found: ${clientId}`);
    }

    const groups = [...groupMovementsByAccount(movements)];
    const rowsByGroup = await mapOrdered(groups, this.concurrency, ([accountId, group]) =>
      this.buildGroupRows(client.name, accountId, group)
    );

    return rowsByGroup.flat();
  }

  private async buildGroupRows(
    clientName: string,
    accountId: number,
    movements: Movement[]
  ): Promise<StatementRow[]> {
    const account = await this.accounts.findAccount(accountId);
    if (!account) {
      this.logger?.warn({ accountId }, "Skipping statement group: account not found");
      return [];
    }

    const accountType = await this.accountTypes.findAccountType(account.accountTypeId);
    if (!accountType) {
      this.logger?.warn(
        { accountId, accountTypeId: account.accountTypeId },
        "Skipping statement group: account type not found"
      );
      return [];
    }

    return buildStatementRows(clientName, account, accountType.description, movements);
  }
}

/**
 * Splits movements by account, keeping the order in which accounts first show
 * up, and sorts each group chronologically (id breaks ties).
 */
export function groupMovementsByAccount(movements: readonly Movement[]): Map<number, Movement[]> {
  const groups = new Map<number, Movement[]>();
  for (const movement of movements) {
    const group = groups.get(movement.accountId);
    if (group) {
      group.push(movement);
    } else {
      groups.set(movement.accountId, [movement]);
    }
  }

  for (const group of groups.values()) {
    group.sort(compareChronologically);
  }
  return groups;
}

export function buildStatementRows(
  clientName: string,
  account: Account,
  accountTypeDescription: string,
  movements: readonly Movement[]
): StatementRow[] {
  return movements.map((movement, index) => ({
    date: movement.movementDate,
    clientName,
    accountNumber: account.accountNumber,
    accountType: accountTypeDescription,
    initialBalance: index === 0 ? account.initialBalanceCents : movements[index - 1].balanceCents,
    movement: movement.valueCents,
    status: account.status,
    finalBalance: movement.balanceCents
  }));
}

function compareChronologically(a: Movement, b: Movement): number {
  const byDate = Date.parse(a.movementDate) - Date.parse(b.movementDate);
  return byDate !== 0 ? byDate : a.movementId - b.movementId;
}
