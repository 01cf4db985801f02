export type Movement = {
  movementId: number;
  /** Account group: the id of the account the movement belongs to. */
  accountId: number;
  movementDate: string;
  valueCents: number;
  /** Running balance right after this movement, fixed at creation. */
  balanceCents: number;
};

export type MovementFields = Omit<Movement, "movementId">;

export interface MovementsRepository {
  create(input: MovementFields): Promise<Movement>;
  getById(movementId: number): Promise<Movement | null>;
  list(): Promise<Movement[]>;
  update(movementId: number, fields: MovementFields): Promise<Movement | null>;
  delete(movementId: number): Promise<boolean>;
  /** Latest movement of the group by date, newest id first on ties. */
  findLatestByAccount(accountId: number): Promise<Movement | null>;
  /** Movements of every account the client owns, startDate <= date <= endDate, oldest first. */
  listByClientInRange(
    clientId: number,
    startDate: string,
    endDate: string
  ): Promise<Movement[]>;
}
