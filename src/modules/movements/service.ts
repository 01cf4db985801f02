import {
  InsufficientFundsError,
  InvalidAmountError,
  MissingParameterError,
  NotFoundError
} from "../../common/errors";
import type { Logger } from "../../common/logger";
import { MutexMap } from "../../infra/memory/mutex";
import type { AccountLookup } from "../accounts/service";
import type { AccountStatusReporter, StatementRow } from "../account-status/service";
import { Movement, MovementFields, MovementsRepository } from "./repository";

export type CreateMovementRequest = {
  accountId: number;
  valueCents: number;
};

export type UpdateMovementRequest = MovementFields;

export class MovementsService {
  constructor(
    private readonly movementsRepo: MovementsRepository,
    private readonly accounts: AccountLookup,
    private readonly accountStatus: AccountStatusReporter,
    private readonly mutexMap: MutexMap<number>,
    private readonly now: () => Date = () => new Date(),
    private readonly logger?: Logger
  ) {}

  /**
   * Appends a movement to its account group with the running balance computed
   * from the latest movement, or from the account's initial balance for the
   * first one. Creations on the same group run one at a time.
   */
  async createMovement(input: CreateMovementRequest): Promise<Movement> {
    return this.mutexMap.get(input.accountId).runExclusive(async () => {
      const previousBalanceCents = await this.getPreviousBalance(input.accountId);
      const balanceCents = previousBalanceCents + input.valueCents;

      if (!Number.isSafeInteger(balanceCents)) {
        throw new InvalidAmountError("Resulting balance out of range");
      }

      if (balanceCents < 0) {
        this.logger?.info(
          { accountId: input.accountId, valueCents: input.valueCents, previousBalanceCents },
          "Movement rejected: insufficient balance"
        );
        throw new InsufficientFundsError();
      }

      const movement = await this.movementsRepo.create({
        accountId: input.accountId,
        movementDate: this.now().toISOString(),
        valueCents: input.valueCents,
        balanceCents
      });

      this.logger?.info(
        { movementId: movement.movementId, accountId: movement.accountId, balanceCents },
        "Movement created"
      );
      return movement;
    });
  }

  /**
   * Overwrites date, account, value and balance as given. Neighbouring
   * balances are not recomputed: the caller owns the consistency of the
   * running balance.
   */
  async updateMovement(movementId: number, input: UpdateMovementRequest): Promise<Movement> {
    const existing = await this.movementsRepo.getById(movementId);
    if (!existing) {
      throw new NotFoundError(`Movement not found: ${movementId}`);
    }

    const updated = await this.movementsRepo.update(movementId, {
      movementDate: input.movementDate,
      accountId: input.accountId,
      valueCents: input.valueCents,
      balanceCents: input.balanceCents
    });
    if (!updated) {
      throw new NotFoundError(`Movement not found: ${movementId}`);
    }
    return updated;
  }

  async getMovement(movementId: number): Promise<Movement> {
    const movement = await this.movementsRepo.getById(movementId);
    if (!movement) {
      throw new NotFoundError(`Movement not found: ${movementId}`);
    }
    return movement;
  }

  listMovements(): Promise<Movement[]> {
    return this.movementsRepo.list();
  }

  async deleteMovement(movementId: number): Promise<void> {
    const deleted = await this.movementsRepo.delete(movementId);
    if (!deleted) {
      throw new NotFoundError(`Movement not found: ${movementId}`);
    }
    this.logger?.info({ movementId }, "Movement deleted");
  }

  async getAccountStatus(
    startDate?: string,
    endDate?: string,
    clientId?: number
  ): Promise<StatementRow[]> {
    if (startDate === undefined || endDate === undefined || clientId === undefined) {
      throw new MissingParameterError();
    }

    const movements = await this.movementsRepo.listByClientInRange(clientId, startDate, endDate);
    return this.accountStatus.getAccountStatus(movements, clientId);
  }

  private async getPreviousBalance(accountId: number): Promise<number> {
    const latest = await this.movementsRepo.findLatestByAccount(accountId);
    if (latest) {
      return latest.balanceCents;
    }

    const account = await this.accounts.findAccount(accountId);
    if (!account) {
      throw new NotFoundError(`Account not found: ${accountId}`);
    }
    return account.initialBalanceCents;
  }
}
