import { ValueObject } from '../../shared/value-object';
import { ValidationError } from '../../shared/errors';

/**
 * お気に入りジャンル値オブジェクト
 *
 * 名前は前後の空白を除去してタイトルケースに正規化して保持する。
 * "science fiction" と "  Science Fiction " は等価。
 */
export class Genre extends ValueObject<{ name: string }> {
  private constructor(name: string) {
    super({ name });
  }

  get name(): string {
    return this.props.name;
  }

  static create(name: string): Genre {
    if (!name || name.trim() === '') {
      throw new ValidationError('Genre name cannot be empty');
    }
    return new Genre(Genre.normalize(name));
  }

  /**
   * 正規化（冪等）
   *
   * 文字以外の直後にある文字を大文字、それ以外の文字を小文字にする
   */
  static normalize(name: string): string {
    return name
      .trim()
      .toLowerCase()
      .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
  }

  toString(): string {
    return this.props.name;
  }
}
