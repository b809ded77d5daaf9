import { ValueObject } from '../../shared/value-object';
import { ValidationError } from '../../shared/errors';

/**
 * ユーザーID値オブジェクト
 */
export class UserId extends ValueObject<{ value: string }> {
  private constructor(value: string) {
    super({ value });
  }

  get value(): string {
    return this.props.value;
  }

  /**
   * 文字列からユーザーIDを作成
   */
  static fromString(value: string): UserId {
    if (!value || value.trim() === '') {
      throw new ValidationError('UserId cannot be empty');
    }
    return new UserId(value);
  }

  toString(): string {
    return this.props.value;
  }
}
