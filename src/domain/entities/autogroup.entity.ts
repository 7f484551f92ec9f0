/**
 * Autogroup — a course group whose membership is driven by a group-set.
 *
 * It behaves like any other group row but only exists in this form when its
 * idNumber carries the `autogroup|<groupSetId>` marker. Construction loads a
 * point-in-time membership snapshot; the reconciliation calls decide against
 * that snapshot and delegate the actual change to the mutation primitives.
 *
 * The snapshot is NOT refreshed after ensureMember / ensureNotMember. An
 * instance is meant for one short reconciliation pass; callers that need an
 * accurate snapshot after a mutation load a fresh instance.
 */
import type { IAutogroupStore } from '../repositories/autogroup-store.interface';
import type { IGroupMutations } from '../repositories/group-mutations.interface';
import {
  AUTOGROUP_COMPONENT,
  type AutogroupSettings,
  type GroupAttributes,
  type MembershipMap,
  type RawGroupRecord,
} from '../models/autogroup.model';
import { hasAutogroupMarker, parseGroupSetId } from '../models/autogroup-id';
import {
  hydrateFields,
  intField,
  serializeFields,
  stringField,
  type FieldList,
} from '../models/record-fields';
import { InvalidGroupArgumentError } from '../errors/invalid-group-argument.error';
import type { AutogroupLogger } from '../../modules/logging/autogroup-logger.service';
import { LogCategory } from '../../modules/logging/log-levels';

export interface AutogroupPorts {
  store: IAutogroupStore;
  mutations: IGroupMutations;
  settings: AutogroupSettings;
  logger: AutogroupLogger;
}

/** A positive group id to load, or a raw row to hydrate directly. */
export type AutogroupInput = number | RawGroupRecord;

export const GROUP_FIELDS: FieldList<GroupAttributes> = {
  id: intField,
  courseId: intField,
  idNumber: stringField,
  name: stringField,
  description: stringField,
  descriptionFormat: intField,
  enrolmentKey: stringField,
  picture: intField,
  timeCreated: intField,
  timeModified: intField,
  visibility: intField,
  participation: intField,
};

export const DEFAULT_GROUP_ATTRIBUTES: Readonly<GroupAttributes> = Object.freeze({
  id: 0,
  courseId: 0,
  idNumber: '',
  name: '',
  description: '',
  descriptionFormat: 1,
  enrolmentKey: '',
  picture: 0,
  timeCreated: 0,
  timeModified: 0,
  visibility: 0,
  participation: 1,
});

function isRecordLike(value: unknown): value is RawGroupRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

export class Autogroup {
  private readonly attributes: GroupAttributes;
  private readonly members: MembershipMap;

  private constructor(
    attributes: GroupAttributes,
    members: MembershipMap,
    private readonly ports: AutogroupPorts,
  ) {
    this.attributes = attributes;
    this.members = new Map([...members].sort(([a], [b]) => a - b));
  }

  /**
   * Build an autogroup from a group id or a raw row, then load its members.
   *
   * A positive id whose row is missing or invalid yields an unpersisted,
   * default-valued instance rather than an error.
   *
   * @throws InvalidGroupArgumentError when a non-id input fails validation
   */
  static async load(input: AutogroupInput, ports: AutogroupPorts): Promise<Autogroup> {
    const { store, logger } = ports;
    let attributes: GroupAttributes = { ...DEFAULT_GROUP_ATTRIBUTES };

    if (typeof input === 'number' && Number.isInteger(input) && input > 0) {
      const row = await store.fetchGroupRecord(input);
      const validated = Autogroup.validate(row);
      if (validated) {
        attributes = hydrateFields(attributes, GROUP_FIELDS, validated);
      } else {
        logger.debug(LogCategory.ENTITY, 'Group id did not resolve to an autogroup', { groupId: input, found: row !== null });
      }
    } else {
      const validated = Autogroup.validate(input);
      if (!validated) {
        logger.warn(LogCategory.ENTITY, 'Rejected autogroup argument', { argument: input });
        throw new InvalidGroupArgumentError(input);
      }
      attributes = hydrateFields(attributes, GROUP_FIELDS, validated);
    }

    const members = await store.fetchMembershipMap(attributes.id);
    logger.trace(LogCategory.ENTITY, 'Autogroup loaded', { attributes, memberCount: members.size });
    return new Autogroup(attributes, members, ports);
  }

  /**
   * Check that a raw value is a usable autogroup row.
   *
   * Returns a normalized copy (timeCreated defaults to now, timeModified to 0)
   * or null. The input object is never modified.
   */
  static validate(input: unknown): RawGroupRecord | null {
    if (!isRecordLike(input)) return null;

    const record: RawGroupRecord = { ...input };
    if (record.timeCreated === undefined || record.timeCreated === null) {
      record.timeCreated = unixNow();
    }
    if (record.timeModified === undefined || record.timeModified === null) {
      record.timeModified = 0;
    }

    const id = intField(record.id);
    const valid = id !== undefined
      && id >= 0
      && typeof record.name === 'string'
      && record.name.length > 0
      && hasAutogroupMarker(record.idNumber);
    return valid ? record : null;
  }

  get id(): number {
    return this.attributes.id;
  }

  get courseId(): number {
    return this.attributes.courseId;
  }

  get idNumber(): string {
    return this.attributes.idNumber;
  }

  get name(): string {
    return this.attributes.name;
  }

  exists(): boolean {
    return this.attributes.id !== 0;
  }

  membershipCount(): number {
    return this.members.size;
  }

  /** User ids of the snapshot, in membership-id order. */
  memberUserIds(): number[] {
    return [...this.members.values()];
  }

  toAttributes(): GroupAttributes {
    return { ...this.attributes };
  }

  toRecord(): RawGroupRecord {
    return serializeFields(this.attributes, GROUP_FIELDS);
  }

  /**
   * Add the user unless the snapshot already lists them.
   * @returns true if an add was issued
   */
  async ensureMember(userId: number): Promise<boolean> {
    for (const member of this.members.values()) {
      if (member === userId) {
        this.ports.logger.debug(LogCategory.MEMBERSHIP, 'Already a member', { groupId: this.id, userId });
        return false;
      }
    }

    await this.ports.mutations.addMember(this.id, userId, AUTOGROUP_COMPONENT);
    this.ports.logger.info(LogCategory.MEMBERSHIP, 'Member added', { groupId: this.id, userId });
    return true;
  }

  /**
   * Remove the user if the snapshot lists them, unless they were assigned by
   * hand and manual assignments are preserved.
   * @returns true if a remove was issued
   */
  async ensureNotMember(userId: number): Promise<boolean> {
    const { settings, store, mutations, logger } = this.ports;

    if (settings.preserveManuallyAssignedMembers) {
      const manual = await store.recordExists('autogroup_manual', { userId, groupId: this.id });
      if (manual) {
        logger.debug(LogCategory.MEMBERSHIP, 'Keeping manually assigned member', { groupId: this.id, userId });
        return false;
      }
    }

    for (const member of this.members.values()) {
      if (member === userId) {
        await mutations.removeMember(this.id, userId);
        logger.info(LogCategory.MEMBERSHIP, 'Member removed', { groupId: this.id, userId });
        return true;
      }
    }
    return false;
  }

  /** Persist an unsaved group and adopt its new id. No-op once persisted. */
  async create(): Promise<void> {
    if (this.attributes.id !== 0) {
      this.ports.logger.debug(LogCategory.LIFECYCLE, 'Create skipped, group already persisted', { groupId: this.id });
      return;
    }
    this.attributes.id = await this.ports.mutations.createGroup(this.toAttributes());
    this.ports.logger.info(LogCategory.LIFECYCLE, 'Group created', { groupId: this.id, idNumber: this.idNumber });
  }

  /**
   * True when the idNumber names a group-set (id ≥ 1) that exists in this
   * group's course.
   */
  async isValidAutogroup(): Promise<boolean> {
    if (!hasAutogroupMarker(this.idNumber)) return false;

    const groupSetId = parseGroupSetId(this.idNumber);
    if (groupSetId < 1) {
      this.ports.logger.debug(LogCategory.ENTITY, 'Malformed group-set reference', { groupId: this.id, idNumber: this.idNumber });
      return false;
    }

    return this.ports.store.recordExists('autogroup_set', { id: groupSetId, courseId: this.courseId });
  }

  /** Delete the group; refused for groups without the autogroup marker. */
  async remove(): Promise<boolean> {
    if (!hasAutogroupMarker(this.idNumber)) {
      this.ports.logger.debug(LogCategory.LIFECYCLE, 'Remove refused, not an autogroup', { groupId: this.id, idNumber: this.idNumber });
      return false;
    }
    const removed = await this.ports.mutations.deleteGroup(this.id);
    this.ports.logger.info(LogCategory.LIFECYCLE, 'Group removed', { groupId: this.id, removed });
    return removed;
  }

  async update(): Promise<boolean> {
    if (!this.exists()) {
      this.ports.logger.debug(LogCategory.LIFECYCLE, 'Update refused, group not persisted');
      return false;
    }
    return this.ports.mutations.updateGroup(this.toAttributes());
  }
}
