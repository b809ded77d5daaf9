import { ValueObject } from '../../shared/value-object';
import { ValidationError } from '../../shared/errors';

/**
 * レーティング値オブジェクト（1〜5の整数）
 */
export class Rating extends ValueObject<{ value: number }> {
  static readonly MIN = 1;
  static readonly MAX = 5;

  private constructor(value: number) {
    super({ value });
  }

  get value(): number {
    return this.props.value;
  }

  static create(value: number): Rating {
    if (!Number.isInteger(value)) {
      throw new ValidationError('Rating must be an integer');
    }
    if (value < Rating.MIN || value > Rating.MAX) {
      throw new ValidationError(`Rating must be between ${Rating.MIN} and ${Rating.MAX}`);
    }
    return new Rating(value);
  }

  toString(): string {
    return String(this.props.value);
  }
}
