import {
  Movement,
  MovementFields,
  MovementsRepository
} from "../../modules/movements/repository";
import { AccountsRepository } from "../../modules/accounts/repository";

export class MemoryMovementsRepository implements MovementsRepository {
  private nextId = 1;
  private readonly movements = new Map<number, Movement>();

  constructor(private readonly accountsRepo: AccountsRepository) {}

  async create(input: MovementFields): Promise<Movement> {
    const movement: Movement = { ...input, movementId: this.nextId++ };
    this.movements.set(movement.movementId, movement);
    return { ...movement };
  }

  async getById(movementId: number): Promise<Movement | null> {
    const movement = this.movements.get(movementId);
    return movement ? { ...movement } : null;
  }

  async list(): Promise<Movement[]> {
    return [...this.movements.values()].map((movement) => ({ ...movement }));
  }

  async update(movementId: number, fields: MovementFields): Promise<Movement | null> {
    if (!this.movements.has(movementId)) {
      return null;
    }
    const updated: Movement = { ...fields, movementId };
    this.movements.set(movementId, updated);
    return { ...updated };
  }

  async delete(movementId: number): Promise<boolean> {
    return this.movements.delete(movementId);
  }

  async findLatestByAccount(accountId: number): Promise<Movement | null> {
    let latest: Movement | null = null;
    for (const movement of this.movements.values()) {
      if (movement.accountId !== accountId) {
        continue;
      }
      if (!latest || compareByDate(movement, latest) > 0) {
        latest = movement;
      }
    }
    return latest ? { ...latest } : null;
  }

  async listByClientInRange(
    clientId: number,
    startDate: string,
    endDate: string
  ): Promise<Movement[]> {
    const accounts = await this.accountsRepo.list();
    const accountIds = new Set(
      accounts.filter((account) => account.clientId === clientId).map((account) => account.accountId)
    );
    const start = Date.parse(startDate);
    const end = Date.parse(endDate);

    return [...this.movements.values()]
      .filter((movement) => accountIds.has(movement.accountId))
      .filter((movement) => {
        const at = Date.parse(movement.movementDate);
        return at >= start && at <= end;
      })
      .sort(compareByDate)
      .map((movement) => ({ ...movement }));
  }
}

function compareByDate(a: Movement, b: Movement): number {
  const byDate = Date.parse(a.movementDate) - Date.parse(b.movementDate);
  return byDate !== 0 ? byDate : a.movementId - b.movementId;
}
