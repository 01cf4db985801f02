import { MovementsService } from "./service";
import { AccountStatusQuery, CreateMovementBody, UpdateMovementBody } from "./schemas";

export class MovementsController {
  constructor(private readonly service: MovementsService) {}

  createMovement(input: CreateMovementBody) {
    return this.service.createMovement(input);
  }

  getMovement(movementId: number) {
    return this.service.getMovement(movementId);
  }

  listMovements() {
    return this.service.listMovements();
  }

  updateMovement(movementId: number, input: UpdateMovementBody) {
    return this.service.updateMovement(movementId, input);
  }

  deleteMovement(movementId: number) {
    return this.service.deleteMovement(movementId);
  }

  accountStatus(query: AccountStatusQuery) {
    return this.service.getAccountStatus(query.startDate, query.endDate, query.clientId);
  }
}
