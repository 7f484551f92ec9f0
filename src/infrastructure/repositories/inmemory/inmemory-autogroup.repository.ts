/**
 * InMemoryAutogroupRepository — IAutogroupStore + IGroupMutations backed by Maps.
 *
 * Suitable for testing and lightweight deployments. Ids are sequential per
 * table, starting at 1, like the database sequences they stand in for.
 */
import { Injectable } from '@nestjs/common';
import type { IAutogroupStore } from '../../../domain/repositories/autogroup-store.interface';
import type { IGroupMutations } from '../../../domain/repositories/group-mutations.interface';
import type {
  ExistenceFilter,
  ExistenceTable,
  GroupAttributes,
  GroupSetRecord,
  ManualAssignmentRecord,
  MembershipMap,
  MembershipRecord,
  RawGroupRecord,
} from '../../../domain/models/autogroup.model';
import { serializeFields } from '../../../domain/models/record-fields';
import { GROUP_FIELDS } from '../../../domain/entities/autogroup.entity';
import { AutogroupLogger } from '../../../modules/logging/autogroup-logger.service';
import { LogCategory } from '../../../modules/logging/log-levels';

@Injectable()
export class InMemoryAutogroupRepository implements IAutogroupStore, IGroupMutations {
  private readonly groups: Map<number, GroupAttributes> = new Map();
  private readonly memberships: Map<number, MembershipRecord> = new Map();
  private readonly groupSets: Map<number, GroupSetRecord> = new Map();
  private readonly manualAssignments: ManualAssignmentRecord[] = [];

  private nextGroupId = 1;
  private nextMembershipId = 1;

  constructor(private readonly logger: AutogroupLogger) {}

  // ─── IAutogroupStore ───────────────────────────────────────────────

  async fetchGroupRecord(id: number): Promise<RawGroupRecord | null> {
    const group = this.groups.get(id);
    return group ? serializeFields(group, GROUP_FIELDS) : null;
  }

  async fetchMembershipMap(groupId: number): Promise<MembershipMap> {
    const rows = [...this.memberships.values()]
      .filter((m) => m.groupId === groupId)
      .sort((a, b) => a.id - b.id);
    return new Map(rows.map((m) => [m.id, m.userId]));
  }

  async recordExists(table: ExistenceTable, filter: ExistenceFilter): Promise<boolean> {
    const rows: ReadonlyArray<object> = table === 'autogroup_set'
      ? [...this.groupSets.values()]
      : this.manualAssignments;
    return rows.some((row) => matchesFilter(row, filter));
  }

  // ─── IGroupMutations ───────────────────────────────────────────────

  async createGroup(attributes: GroupAttributes): Promise<number> {
    const id = this.nextGroupId++;
    this.groups.set(id, { ...attributes, id });
    this.logger.info(LogCategory.EVENT, 'group_created', { groupId: id, courseId: attributes.courseId });
    return id;
  }

  async updateGroup(attributes: GroupAttributes): Promise<boolean> {
    if (!this.groups.has(attributes.id)) return false;
    this.groups.set(attributes.id, { ...attributes, timeModified: Math.floor(Date.now() / 1000) });
    this.logger.info(LogCategory.EVENT, 'group_updated', { groupId: attributes.id });
    return true;
  }

  async deleteGroup(id: number): Promise<boolean> {
    if (!this.groups.delete(id)) return false;
    // Cascade: memberships and manual markers
    for (const [membershipId, membership] of this.memberships) {
      if (membership.groupId === id) {
        this.memberships.delete(membershipId);
      }
    }
    for (let i = this.manualAssignments.length - 1; i >= 0; i--) {
      if (this.manualAssignments[i].groupId === id) {
        this.manualAssignments.splice(i, 1);
      }
    }
    this.logger.info(LogCategory.EVENT, 'group_deleted', { groupId: id });
    return true;
  }

  async addMember(groupId: number, userId: number, component: string): Promise<void> {
    if (this.findMembership(groupId, userId)) return;
    const record: MembershipRecord = {
      id: this.nextMembershipId++,
      groupId,
      userId,
      component,
      timeAdded: Math.floor(Date.now() / 1000),
    };
    this.memberships.set(record.id, record);
    this.logger.info(LogCategory.EVENT, 'group_member_added', { groupId, userId, component });
  }

  async removeMember(groupId: number, userId: number): Promise<void> {
    const membership = this.findMembership(groupId, userId);
    if (!membership) return;
    this.memberships.delete(membership.id);
    this.logger.info(LogCategory.EVENT, 'group_member_removed', { groupId, userId });
  }

  // ─── Seeding (tests / fixtures) ────────────────────────────────────

  /** Insert a group row as-is. Ids must be unique; later creates continue after the highest id. */
  seedGroup(attributes: GroupAttributes): void {
    this.groups.set(attributes.id, { ...attributes });
    this.nextGroupId = Math.max(this.nextGroupId, attributes.id + 1);
  }

  seedGroupSet(record: GroupSetRecord): void {
    this.groupSets.set(record.id, { ...record });
  }

  seedManualAssignment(record: ManualAssignmentRecord): void {
    this.manualAssignments.push({ ...record });
  }

  /** Add a membership directly, bypassing events. Returns its membership id. */
  seedMembership(groupId: number, userId: number, component = ''): number {
    const id = this.nextMembershipId++;
    this.memberships.set(id, { id, groupId, userId, component, timeAdded: 0 });
    return id;
  }

  listMemberships(groupId: number): MembershipRecord[] {
    return [...this.memberships.values()]
      .filter((m) => m.groupId === groupId)
      .map((m) => ({ ...m }));
  }

  clear(): void {
    this.groups.clear();
    this.memberships.clear();
    this.groupSets.clear();
    this.manualAssignments.length = 0;
    this.nextGroupId = 1;
    this.nextMembershipId = 1;
  }

  private findMembership(groupId: number, userId: number): MembershipRecord | undefined {
    for (const membership of this.memberships.values()) {
      if (membership.groupId === groupId && membership.userId === userId) {
        return membership;
      }
    }
    return undefined;
  }
}

function matchesFilter(row: object, filter: ExistenceFilter): boolean {
  const values = new Map(Object.entries(row));
  return Object.entries(filter).every(([key, value]) => values.get(key) === value);
}
