import { ValueObject } from '../../shared/value-object';
import { ValidationError } from '../../shared/errors';
import { Genre } from './genre';

/**
 * 明示的な嗜好（お気に入りジャンル）値オブジェクト
 *
 * 不変条件:
 * - 最大5ジャンル
 * - 正規化後の名前で重複なし
 */
export class ExplicitPreferences extends ValueObject<{ genres: readonly Genre[] }> {
  static readonly MAX_GENRES = 5;

  private constructor(genres: readonly Genre[]) {
    super({ genres: Object.freeze([...genres]) });
  }

  static empty(): ExplicitPreferences {
    return new ExplicitPreferences([]);
  }

  static of(genres: readonly Genre[]): ExplicitPreferences {
    if (genres.length > ExplicitPreferences.MAX_GENRES) {
      throw new ValidationError(`Maximum ${ExplicitPreferences.MAX_GENRES} favorite genres allowed`);
    }
    return genres.reduce((preferences, genre) => preferences.addGenre(genre), ExplicitPreferences.empty());
  }

  get genres(): readonly Genre[] {
    return this.props.genres;
  }

  get size(): number {
    return this.props.genres.length;
  }

  addGenre(genre: Genre): ExplicitPreferences {
    if (this.props.genres.length >= ExplicitPreferences.MAX_GENRES) {
      throw new ValidationError(`Cannot add more than ${ExplicitPreferences.MAX_GENRES} favorite genres`);
    }
    if (this.hasGenre(genre.name)) {
      throw new ValidationError(`Genre '${genre.name}' already exists`);
    }
    return new ExplicitPreferences([...this.props.genres, genre]);
  }

  /**
   * 名前で削除（存在しなければ同等のインスタンスを返す）
   */
  removeGenre(name: string): ExplicitPreferences {
    const normalized = Genre.normalize(name);
    return new ExplicitPreferences(this.props.genres.filter((genre) => genre.name !== normalized));
  }

  hasGenre(name: string): boolean {
    const normalized = Genre.normalize(name);
    return this.props.genres.some((genre) => genre.name === normalized);
  }

  names(): string[] {
    return this.props.genres.map((genre) => genre.name);
  }
}
