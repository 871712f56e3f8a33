/**
 * Raised when a command receives fewer positional arguments than it needs,
 * or an argument that cannot be read at all (e.g. a non-numeric page size).
 */
export class UsageException extends Error {
  constructor(
    readonly usage: string,
    reason = 'Not enough arguments',
  ) {
    super(`${reason}. Usage: ${usage}`);
    this.name = 'UsageException';
  }
}
