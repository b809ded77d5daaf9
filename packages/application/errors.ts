/**
 * アプリケーション層エラー
 */

export class ProfileNotFoundError extends Error {
  constructor(public readonly userId: string) {
    super(`Profile for user ${userId} not found`);
    this.name = 'ProfileNotFoundError';
  }
}

export class ProfileAlreadyExistsError extends Error {
  constructor(public readonly userId: string) {
    super(`Profile for user ${userId} already exists`);
    this.name = 'ProfileAlreadyExistsError';
  }
}
