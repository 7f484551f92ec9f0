export { createAutogroupContext } from './main';

export { Autogroup, GROUP_FIELDS, DEFAULT_GROUP_ATTRIBUTES } from './domain/entities/autogroup.entity';
export type { AutogroupInput, AutogroupPorts } from './domain/entities/autogroup.entity';
export { InvalidGroupArgumentError } from './domain/errors/invalid-group-argument.error';
export {
  AUTOGROUP_MARKER,
  formatAutogroupIdNumber,
  hasAutogroupMarker,
  parseGroupSetId,
} from './domain/models/autogroup-id';
export { AUTOGROUP_COMPONENT } from './domain/models/autogroup.model';
export type {
  AutogroupSettings,
  ExistenceFilter,
  ExistenceTable,
  GroupAttributes,
  GroupSetRecord,
  ManualAssignmentRecord,
  MembershipMap,
  MembershipRecord,
  RawGroupRecord,
} from './domain/models/autogroup.model';
export { hydrateFields, serializeFields, intField, stringField } from './domain/models/record-fields';
export type { FieldDecoder, FieldList } from './domain/models/record-fields';
export type { IAutogroupStore } from './domain/repositories/autogroup-store.interface';
export type { IGroupMutations } from './domain/repositories/group-mutations.interface';
export { AUTOGROUP_SETTINGS, AUTOGROUP_STORE, GROUP_MUTATIONS } from './domain/repositories/repository.tokens';

export { InMemoryAutogroupRepository } from './infrastructure/repositories/inmemory/inmemory-autogroup.repository';
export { PgAutogroupRepository } from './infrastructure/repositories/postgres/pg-autogroup.repository';
export { RepositoryModule } from './infrastructure/repositories/repository.module';

export { AppModule } from './modules/app/app.module';
export { AutogroupModule } from './modules/autogroup/autogroup.module';
export { AutogroupService } from './modules/autogroup/autogroup.service';
export type { CreateAutogroupInput, ReconcileResult } from './modules/autogroup/autogroup.service';
export { AUTOGROUP_CONFIG_KEYS, buildAutogroupSettings, parseBooleanFlag } from './modules/config/autogroup-config';
export { DatabaseModule } from './modules/database/database.module';
export { PgPoolService } from './modules/database/pg-pool.service';
export { AutogroupLogger } from './modules/logging/autogroup-logger.service';
export { LogCategory, LogLevel } from './modules/logging/log-levels';
export { LoggingModule } from './modules/logging/logging.module';
