/**
 * PgAutogroupRepository — IAutogroupStore + IGroupMutations backed by PostgreSQL.
 *
 * Columns are the lowercase names in sql/schema.sql; rows are mapped to the
 * camelCase domain shapes at this boundary. BIGINT columns arrive as strings
 * from node-postgres and are decoded by the entity's field list.
 */
import { Injectable } from '@nestjs/common';
import { PgPoolService } from '../../../modules/database/pg-pool.service';
import type { IAutogroupStore } from '../../../domain/repositories/autogroup-store.interface';
import type { IGroupMutations } from '../../../domain/repositories/group-mutations.interface';
import type {
  ExistenceFilter,
  ExistenceTable,
  GroupAttributes,
  MembershipMap,
  RawGroupRecord,
} from '../../../domain/models/autogroup.model';
import { AutogroupLogger } from '../../../modules/logging/autogroup-logger.service';
import { LogCategory } from '../../../modules/logging/log-levels';

/** Domain field → `groups` column. */
export const GROUP_COLUMNS: Readonly<Record<keyof GroupAttributes, string>> = {
  id: 'id',
  courseId: 'courseid',
  idNumber: 'idnumber',
  name: 'name',
  description: 'description',
  descriptionFormat: 'descriptionformat',
  enrolmentKey: 'enrolmentkey',
  picture: 'picture',
  timeCreated: 'timecreated',
  timeModified: 'timemodified',
  visibility: 'visibility',
  participation: 'participation',
};

/** Columns `recordExists` may filter on, per table. */
const EXISTENCE_COLUMNS: Readonly<Record<ExistenceTable, Readonly<Record<string, string>>>> = {
  autogroup_set: { id: 'id', courseId: 'courseid' },
  autogroup_manual: { userId: 'userid', groupId: 'groupid' },
};

type GroupRow = Record<string, unknown>;

type MembershipRow = {
  id: string | number;
  userid: string | number;
};

type IdRow = {
  id: string | number;
};

const GROUP_FIELD_NAMES = Object.keys(GROUP_COLUMNS).filter(
  (field): field is keyof GroupAttributes => field in GROUP_COLUMNS,
);
const WRITABLE_FIELD_NAMES = GROUP_FIELD_NAMES.filter((field) => field !== 'id');

/** Maps a `groups` row to the raw camelCase record the entity validates. */
function toRawGroupRecord(row: GroupRow): RawGroupRecord {
  const record: RawGroupRecord = {};
  for (const field of GROUP_FIELD_NAMES) {
    const column = GROUP_COLUMNS[field];
    if (column in row) {
      record[field] = row[column];
    }
  }
  return record;
}

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

@Injectable()
export class PgAutogroupRepository implements IAutogroupStore, IGroupMutations {
  constructor(
    private readonly db: PgPoolService,
    private readonly logger: AutogroupLogger,
  ) {}

  // ─── IAutogroupStore ───────────────────────────────────────────────

  async fetchGroupRecord(id: number): Promise<RawGroupRecord | null> {
    const columns = GROUP_FIELD_NAMES.map((field) => GROUP_COLUMNS[field]).join(', ');
    const result = await this.db.query<GroupRow>(`SELECT ${columns} FROM groups WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toRawGroupRecord(row) : null;
  }

  async fetchMembershipMap(groupId: number): Promise<MembershipMap> {
    const result = await this.db.query<MembershipRow>(
      'SELECT id, userid FROM groups_members WHERE groupid = $1 ORDER BY id ASC',
      [groupId],
    );
    return new Map(result.rows.map((row) => [Number(row.id), Number(row.userid)]));
  }

  async recordExists(table: ExistenceTable, filter: ExistenceFilter): Promise<boolean> {
    if (!Object.prototype.hasOwnProperty.call(EXISTENCE_COLUMNS, table)) {
      throw new Error(`recordExists: table '${String(table)}' is not queryable.`);
    }
    const allowed = EXISTENCE_COLUMNS[table];

    const conditions: string[] = [];
    const params: number[] = [];
    for (const [field, value] of Object.entries(filter)) {
      if (!Object.prototype.hasOwnProperty.call(allowed, field)) {
        throw new Error(`recordExists: column '${field}' is not queryable on '${table}'.`);
      }
      params.push(value);
      conditions.push(`${allowed[field]} = $${params.length}`);
    }

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    const sql = `SELECT 1 FROM ${table}${where} LIMIT 1`;
    this.logger.trace(LogCategory.DATABASE, 'recordExists', { sql, params });
    const result = await this.db.query(sql, params);
    return result.rows.length > 0;
  }

  // ─── IGroupMutations ───────────────────────────────────────────────

  async createGroup(attributes: GroupAttributes): Promise<number> {
    const columns = WRITABLE_FIELD_NAMES.map((field) => GROUP_COLUMNS[field]);
    const placeholders = columns.map((_, i) => `$${i + 1}`);
    const params = WRITABLE_FIELD_NAMES.map((field) => attributes[field]);

    const result = await this.db.query<IdRow>(
      `INSERT INTO groups (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING id`,
      params,
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('createGroup: INSERT returned no id.');
    }

    const id = Number(row.id);
    this.logger.info(LogCategory.EVENT, 'group_created', { groupId: id, courseId: attributes.courseId });
    return id;
  }

  async updateGroup(attributes: GroupAttributes): Promise<boolean> {
    const values: GroupAttributes = { ...attributes, timeModified: unixNow() };
    const assignments = WRITABLE_FIELD_NAMES.map((field, i) => `${GROUP_COLUMNS[field]} = $${i + 1}`);
    const params: Array<string | number> = WRITABLE_FIELD_NAMES.map((field) => values[field]);
    params.push(values.id);

    const result = await this.db.query(
      `UPDATE groups SET ${assignments.join(', ')} WHERE id = $${params.length}`,
      params,
    );
    const updated = (result.rowCount ?? 0) > 0;
    if (updated) {
      this.logger.info(LogCategory.EVENT, 'group_updated', { groupId: attributes.id });
    }
    return updated;
  }

  async deleteGroup(id: number): Promise<boolean> {
    const deleted = await this.db.transaction(async (client) => {
      await client.query('DELETE FROM groups_members WHERE groupid = $1', [id]);
      await client.query('DELETE FROM autogroup_manual WHERE groupid = $1', [id]);
      const result = await client.query('DELETE FROM groups WHERE id = $1', [id]);
      return (result.rowCount ?? 0) > 0;
    });
    if (deleted) {
      this.logger.info(LogCategory.EVENT, 'group_deleted', { groupId: id });
    }
    return deleted;
  }

  async addMember(groupId: number, userId: number, component: string): Promise<void> {
    const result = await this.db.query(
      'INSERT INTO groups_members (groupid, userid, timeadded, component) VALUES ($1, $2, $3, $4) '
        + 'ON CONFLICT (groupid, userid) DO NOTHING',
      [groupId, userId, unixNow(), component],
    );
    if ((result.rowCount ?? 0) > 0) {
      this.logger.info(LogCategory.EVENT, 'group_member_added', { groupId, userId, component });
    }
  }

  async removeMember(groupId: number, userId: number): Promise<void> {
    const result = await this.db.query(
      'DELETE FROM groups_members WHERE groupid = $1 AND userid = $2',
      [groupId, userId],
    );
    if ((result.rowCount ?? 0) > 0) {
      this.logger.info(LogCategory.EVENT, 'group_member_removed', { groupId, userId });
    }
  }
}
