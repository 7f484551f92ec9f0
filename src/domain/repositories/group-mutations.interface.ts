/**
 * IGroupMutations — primitives that physically change groups and memberships.
 *
 * Each primitive is responsible for emitting its own system event; the entity
 * only decides whether to call it.
 */
import type { GroupAttributes } from '../models/autogroup.model';

export interface IGroupMutations {
  /** Insert a group row and return its new id. */
  createGroup(attributes: GroupAttributes): Promise<number>;

  /** Overwrite the group row identified by `attributes.id`. */
  updateGroup(attributes: GroupAttributes): Promise<boolean>;

  /** Delete a group together with its memberships. */
  deleteGroup(id: number): Promise<boolean>;

  /** Add a user to a group, tagging the membership with its origin component. */
  addMember(groupId: number, userId: number, component: string): Promise<void>;

  removeMember(groupId: number, userId: number): Promise<void>;
}
