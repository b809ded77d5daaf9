/**
 * ドメインエラー基底クラス
 */
export abstract class DomainError extends Error {
  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 不変条件違反
 *
 * 空の識別子、範囲外のレーティング、ジャンル上限超過、重複ジャンル、
 * ブロック済みの本への評価、評価済みの本のブロックなど
 */
export class ValidationError extends DomainError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
