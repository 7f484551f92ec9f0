/**
 * RepositoryModule — dynamic module that provides the autogroup store and
 * mutation ports.
 *
 * Selects the persistence backend via the PERSISTENCE_BACKEND environment variable:
 *   - "postgres" (default) → PgAutogroupRepository
 *   - "inmemory"           → InMemoryAutogroupRepository
 *
 * Both ports resolve to the same repository instance.
 *
 * Usage:
 *   imports: [RepositoryModule.register()]
 */
import { Module, type DynamicModule, type Type } from '@nestjs/common';
import { AUTOGROUP_STORE, GROUP_MUTATIONS } from '../../domain/repositories/repository.tokens';
import type { IAutogroupStore } from '../../domain/repositories/autogroup-store.interface';
import type { IGroupMutations } from '../../domain/repositories/group-mutations.interface';
import { PgAutogroupRepository } from './postgres/pg-autogroup.repository';
import { InMemoryAutogroupRepository } from './inmemory/inmemory-autogroup.repository';
import { DatabaseModule } from '../../modules/database/database.module';
import { LoggingModule } from '../../modules/logging/logging.module';
import { parsePersistenceBackend } from '../../modules/config/autogroup-config';

@Module({})
export class RepositoryModule {
  static register(): DynamicModule {
    const backend = parsePersistenceBackend(process.env.PERSISTENCE_BACKEND);

    if (backend === 'inmemory') {
      return RepositoryModule.provide(InMemoryAutogroupRepository, [LoggingModule]);
    }

    return RepositoryModule.provide(PgAutogroupRepository, [LoggingModule, DatabaseModule]);
  }

  private static provide(
    repository: Type<IAutogroupStore & IGroupMutations>,
    imports: DynamicModule['imports'],
  ): DynamicModule {
    return {
      module: RepositoryModule,
      global: true,
      imports,
      providers: [
        repository,
        { provide: AUTOGROUP_STORE, useExisting: repository },
        { provide: GROUP_MUTATIONS, useExisting: repository },
      ],
      exports: [AUTOGROUP_STORE, GROUP_MUTATIONS, repository],
    };
  }
}
