import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';

import { Autogroup, type AutogroupInput, type AutogroupPorts } from '../../domain/entities/autogroup.entity';
import { formatAutogroupIdNumber } from '../../domain/models/autogroup-id';
import type { AutogroupSettings } from '../../domain/models/autogroup.model';
import type { IAutogroupStore } from '../../domain/repositories/autogroup-store.interface';
import type { IGroupMutations } from '../../domain/repositories/group-mutations.interface';
import {
  AUTOGROUP_SETTINGS,
  AUTOGROUP_STORE,
  GROUP_MUTATIONS,
} from '../../domain/repositories/repository.tokens';
import { AutogroupLogger } from '../logging/autogroup-logger.service';
import { LogCategory } from '../logging/log-levels';

export interface ReconcileResult {
  added: number[];
  removed: number[];
}

export interface CreateAutogroupInput {
  courseId: number;
  groupSetId: number;
  name: string;
  description?: string;
  visibility?: number;
  participation?: number;
}

/**
 * Entry point for the surrounding orchestration layer.
 *
 * Every call loads a fresh Autogroup, works on it and drops it, so no
 * membership snapshot outlives the call that loaded it.
 */
@Injectable()
export class AutogroupService {
  constructor(
    @Inject(AUTOGROUP_STORE) private readonly store: IAutogroupStore,
    @Inject(GROUP_MUTATIONS) private readonly mutations: IGroupMutations,
    @Inject(AUTOGROUP_SETTINGS) private readonly settings: AutogroupSettings,
    private readonly logger: AutogroupLogger,
  ) {}

  load(input: AutogroupInput): Promise<Autogroup> {
    const groupId = typeof input === 'number' ? input : undefined;
    return this.withContext(LogCategory.ENTITY, groupId, () => this.loadEntity(input));
  }

  /**
   * Bring a group's members in line with `desiredUserIds`. Members that are
   * not desired are removed unless protected as manual assignments.
   */
  async reconcileMembership(groupId: number, desiredUserIds: Iterable<number>): Promise<ReconcileResult> {
    return this.withContext(LogCategory.MEMBERSHIP, groupId, async () => {
      const group = await this.loadEntity(groupId);
      if (!group.exists()) {
        this.logger.warn(LogCategory.MEMBERSHIP, 'Reconcile skipped, group is not a persisted autogroup', { groupId });
        return { added: [], removed: [] };
      }
      this.logger.enrichContext({ courseId: group.courseId });

      const desired = new Set(desiredUserIds);
      const added: number[] = [];
      const removed: number[] = [];

      for (const userId of desired) {
        if (await group.ensureMember(userId)) {
          added.push(userId);
        }
      }
      for (const userId of group.memberUserIds()) {
        if (!desired.has(userId) && await group.ensureNotMember(userId)) {
          removed.push(userId);
        }
      }

      this.logger.info(LogCategory.MEMBERSHIP, 'Membership reconciled', {
        groupId,
        added: added.length,
        removed: removed.length,
        before: group.membershipCount(),
      });
      return { added, removed };
    });
  }

  /** Create the group a group-set expects in its course. */
  async createAutogroup(input: CreateAutogroupInput): Promise<Autogroup> {
    return this.withContext(LogCategory.LIFECYCLE, undefined, async () => {
      this.logger.enrichContext({ courseId: input.courseId });
      const group = await this.loadEntity({
        id: 0,
        courseId: input.courseId,
        idNumber: formatAutogroupIdNumber(input.groupSetId),
        name: input.name,
        description: input.description ?? '',
        visibility: input.visibility,
        participation: input.participation,
      });
      await group.create();
      return group;
    });
  }

  /**
   * Delete an autogroup whose group-set no longer exists in its course.
   * @returns true if the group was removed
   */
  async retireIfOrphaned(groupId: number): Promise<boolean> {
    return this.withContext(LogCategory.LIFECYCLE, groupId, async () => {
      const group = await this.loadEntity(groupId);
      if (!group.exists()) return false;
      this.logger.enrichContext({ courseId: group.courseId });
      if (await group.isValidAutogroup()) return false;

      this.logger.info(LogCategory.LIFECYCLE, 'Retiring orphaned autogroup', { groupId, idNumber: group.idNumber, courseId: group.courseId });
      return group.remove();
    });
  }

  private ports(): AutogroupPorts {
    return {
      store: this.store,
      mutations: this.mutations,
      settings: this.settings,
      logger: this.logger,
    };
  }

  private loadEntity(input: AutogroupInput): Promise<Autogroup> {
    return Autogroup.load(input, this.ports());
  }

  /** Run `fn` under a fresh operation id; failures are logged once and rethrown. */
  private withContext<T>(category: LogCategory, groupId: number | undefined, fn: () => Promise<T>): Promise<T> {
    return this.logger.runWithContext({ operationId: randomUUID(), groupId, startTime: Date.now() }, async () => {
      try {
        return await fn();
      } catch (err) {
        this.logger.error(category, 'Autogroup operation failed', err);
        throw err;
      }
    });
  }
}
