/**
 * IAutogroupStore — read port over the external group store.
 *
 * Implementations:
 *   - PgAutogroupRepository       (PostgreSQL via node-postgres)
 *   - InMemoryAutogroupRepository (testing / lightweight deployments)
 */
import type {
  ExistenceFilter,
  ExistenceTable,
  MembershipMap,
  RawGroupRecord,
} from '../models/autogroup.model';

export interface IAutogroupStore {
  /** Fetch the raw group row, or null when no such group exists. */
  fetchGroupRecord(id: number): Promise<RawGroupRecord | null>;

  /** Membership id → user id for a group, ordered by membership id ascending. */
  fetchMembershipMap(groupId: number): Promise<MembershipMap>;

  /**
   * Existence check used for group-set and manual-assignment lookups.
   *
   * @param table  Which supporting table to query.
   * @param filter Column → value equality filter (camelCase column names).
   */
  recordExists(table: ExistenceTable, filter: ExistenceFilter): Promise<boolean>;
}
