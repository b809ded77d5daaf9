import { ValueObject } from '../../shared/value-object';
import { ValidationError } from '../../shared/errors';

/**
 * 書籍ID値オブジェクト
 */
export class BookId extends ValueObject<{ value: string }> {
  private constructor(value: string) {
    super({ value });
  }

  get value(): string {
    return this.props.value;
  }

  static fromString(value: string): BookId {
    if (!BookId.isValid(value)) {
      throw new ValidationError('book_id cannot be empty');
    }
    return new BookId(value);
  }

  static isValid(value: string): boolean {
    return Boolean(value) && value.trim() !== '';
  }

  toString(): string {
    return this.props.value;
  }
}
