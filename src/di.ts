import { AccountsController } from "./modules/accounts/controller";
import { AccountsService } from "./modules/accounts/service";
import { AccountTypesService } from "./modules/account-types/service";
import { AccountStatusService } from "./modules/account-status/service";
import { ClientsController } from "./modules/clients/controller";
import { ClientDirectory, LocalClientDirectory } from "./modules/clients/directory";
import { ClientsService, PasswordHasher } from "./modules/clients/service";
import { MovementsController } from "./modules/movements/controller";
import { MovementsService } from "./modules/movements/service";
import { PersonsController } from "./modules/persons/controller";
import { PersonsService } from "./modules/persons/service";
import { MemoryAccountTypesRepository } from "./infra/memory/memoryAccountTypesRepo";
import { MemoryAccountsRepository } from "./infra/memory/memoryAccountsRepo";
import { MemoryClientsRepository } from "./infra/memory/memoryClientsRepo";
import { MemoryMovementsRepository } from "./infra/memory/memoryMovementsRepo";
import { MemoryPersonsRepository } from "./infra/memory/memoryPersonsRepo";
import { MutexMap } from "./infra/memory/mutex";
import { PostgresAccountTypesRepository } from "./infra/postgres/postgresAccountTypesRepo";
import { PostgresAccountsRepository } from "./infra/postgres/postgresAccountsRepo";
import { PostgresClientsRepository } from "./infra/postgres/postgresClientsRepo";
import { PostgresMovementsRepository } from "./infra/postgres/postgresMovementsRepo";
import { PostgresPersonsRepository } from "./infra/postgres/postgresPersonsRepo";
import { HttpClientDirectory } from "./infra/http/httpClientDirectory";
import { Argon2PasswordHasher } from "./infra/security/argon2Hasher";
import type { Logger } from "./common/logger";
import { config } from "./config";

export type ContainerOptions = {
  now?: () => Date;
  logger?: Logger;
  /** Replaces the local/HTTP client directory picked from config. */
  clientDirectory?: ClientDirectory;
  passwordHasher?: PasswordHasher;
};

export function createContainer(options: ContainerOptions = {}) {
  const usePostgres = config.REPO_PROVIDER === "postgres";
  const logger = options.logger;

  // Memory mode keeps everything in process and loses it on restart
  const personsRepo = usePostgres
    ? new PostgresPersonsRepository()
    : new MemoryPersonsRepository();

  const clientsRepo = usePostgres
    ? new PostgresClientsRepository()
    : new MemoryClientsRepository();

  const accountTypesRepo = usePostgres
    ? new PostgresAccountTypesRepository()
    : new MemoryAccountTypesRepository();

  const accountsRepo = usePostgres
    ? new PostgresAccountsRepository(logger)
    : new MemoryAccountsRepository(accountTypesRepo);

  const movementsRepo = usePostgres
    ? new PostgresMovementsRepository(logger)
    : new MemoryMovementsRepository(accountsRepo);

  const personsService = new PersonsService(personsRepo, logger);
  const clientsService = new ClientsService(
    clientsRepo,
    personsService,
    options.passwordHasher ?? new Argon2PasswordHasher(),
    logger
  );

  const clientDirectory =
    options.clientDirectory ??
    (config.CLIENTS_API_URL
      ? new HttpClientDirectory(config.CLIENTS_API_URL, config.REQUEST_TIMEOUT_MS, logger)
      : new LocalClientDirectory(clientsService));

  const accountsService = new AccountsService(accountsRepo, logger);
  const accountTypesService = new AccountTypesService(accountTypesRepo);
  const accountStatusService = new AccountStatusService(
    clientDirectory,
    accountsService,
    accountTypesService,
    config.STATEMENT_CONCURRENCY,
    logger
  );

  const mutexMap = new MutexMap<number>();
  const movementsService = new MovementsService(
    movementsRepo,
    accountsService,
    accountStatusService,
    mutexMap,
    options.now,
    logger
  );

  return {
    personsService,
    clientsService,
    accountsService,
    accountTypesService,
    accountStatusService,
    movementsService,
    personsController: new PersonsController(personsService),
    clientsController: new ClientsController(clientsService),
    accountsController: new AccountsController(accountsService),
    movementsController: new MovementsController(movementsService),
    mutexMap
  };
}

export type Container = ReturnType<typeof createContainer>;
