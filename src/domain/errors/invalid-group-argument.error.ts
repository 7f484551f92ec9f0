/**
 * Raised when an autogroup cannot be constructed: the input was neither a
 * positive group id nor a record that passes autogroup validation.
 *
 * This is the only exception the entity throws; every other failure is a
 * boolean outcome.
 */
export class InvalidGroupArgumentError extends Error {
  readonly argument: unknown;

  constructor(argument: unknown) {
    super(`Invalid autogroup argument: ${describeArgument(argument)}`);
    this.name = 'InvalidGroupArgumentError';
    this.argument = argument;
  }
}

function describeArgument(argument: unknown): string {
  if (argument === undefined) return 'undefined';
  try {
    return JSON.stringify(argument) ?? String(argument);
  } catch {
    return String(argument);
  }
}
