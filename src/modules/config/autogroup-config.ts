/**
 * Autogroup configuration keys
 *
 * Central location for the environment keys this service reads through
 * ConfigService. Use these constants instead of string literals.
 */
import type { ConfigService } from '@nestjs/config';
import type { AutogroupSettings } from '../../domain/models/autogroup.model';

export const AUTOGROUP_CONFIG_KEYS = {
  /**
   * When true, members carrying a manual-assignment marker are never removed
   * by ensureNotMember. Default false.
   *
   * Example: AUTOGROUP_PRESERVE_MANUAL=true
   */
  PRESERVE_MANUAL: 'AUTOGROUP_PRESERVE_MANUAL',

  /**
   * Storage backend: "postgres" (default) or "inmemory".
   */
  PERSISTENCE_BACKEND: 'PERSISTENCE_BACKEND',

  /**
   * PostgreSQL connection string used by the postgres backend.
   */
  DATABASE_URL: 'DATABASE_URL',
} as const;

export const PERSISTENCE_BACKENDS = ['postgres', 'inmemory'] as const;

export type PersistenceBackend = typeof PERSISTENCE_BACKENDS[number];

const VALID_BOOLEAN_VALUES = ['true', 'false', '1', '0'];

/**
 * Parse a boolean flag. Accepts booleans and "true"/"false"/"1"/"0"
 * (case-insensitive); absent or empty values fall back to `defaultValue`.
 *
 * @throws Error for any other value
 */
export function parseBooleanFlag(key: string, value: unknown, defaultValue = false): boolean {
  if (value === undefined || value === null) return defaultValue;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') return defaultValue;
    if (VALID_BOOLEAN_VALUES.includes(normalized)) {
      return normalized === 'true' || normalized === '1';
    }
    throw new Error(
      `Invalid value "${value}" for config flag "${key}". ` +
      `Allowed values: "True", "False", true, false, "1", "0".`
    );
  }
  throw new Error(
    `Invalid type for config flag "${key}". ` +
    `Expected boolean or string ("True"/"False"), got ${typeof value}.`
  );
}

export function parsePersistenceBackend(value: string | undefined): PersistenceBackend {
  const normalized = (value ?? 'postgres').trim().toLowerCase();
  const backend = PERSISTENCE_BACKENDS.find((candidate) => candidate === normalized);
  if (!backend) {
    throw new Error(
      `Invalid value "${value}" for "${AUTOGROUP_CONFIG_KEYS.PERSISTENCE_BACKEND}". ` +
      `Allowed values: ${PERSISTENCE_BACKENDS.map((b) => `"${b}"`).join(', ')}.`
    );
  }
  return backend;
}

/** Resolve the settings object the entity consults. */
export function buildAutogroupSettings(config: ConfigService): AutogroupSettings {
  return {
    preserveManuallyAssignedMembers: parseBooleanFlag(
      AUTOGROUP_CONFIG_KEYS.PRESERVE_MANUAL,
      config.get<unknown>(AUTOGROUP_CONFIG_KEYS.PRESERVE_MANUAL),
    ),
  };
}
