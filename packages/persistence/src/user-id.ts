/**
 * User ids become file names, so only a conservative character set is allowed.
 */

const USER_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export class InvalidUserIdError extends Error {
  readonly code = 'invalid_user_id';

  constructor(public readonly userId: string) {
    super(`Invalid user id: ${JSON.stringify(userId)}`);
    this.name = 'InvalidUserIdError';
  }
}

export function isValidUserId(userId: string): boolean {
  return USER_ID_PATTERN.test(userId);
}

export function assertValidUserId(userId: string): void {
  if (!isValidUserId(userId)) {
    throw new InvalidUserIdError(userId);
  }
}
