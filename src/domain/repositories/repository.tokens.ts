/**
 * NestJS injection tokens for the autogroup ports.
 *
 * Usage:
 *   @Inject(AUTOGROUP_STORE) private readonly store: IAutogroupStore
 */
export const AUTOGROUP_STORE = 'AUTOGROUP_STORE';
export const GROUP_MUTATIONS = 'GROUP_MUTATIONS';
export const AUTOGROUP_SETTINGS = 'AUTOGROUP_SETTINGS';
