import { AggregateRoot } from '../../shared/aggregate-root';
import { ValidationError } from '../../shared/errors';
import { UserId } from '../value-objects/user-id';
import { BookId } from '../value-objects/book-id';
import { Genre } from '../value-objects/genre';
import { Rating } from '../value-objects/rating';
import { BlockList } from '../value-objects/block-list';
import { ExplicitPreferences } from '../value-objects/explicit-preferences';
import { ReadingHistoryEntry, ReadingHistoryItem } from '../entities/reading-history-entry';
import { RatingGiven } from '../events/rating-given';
import { FavoriteGenreChanged } from '../events/favorite-genre-changed';
import { ItemBlocked } from '../events/item-blocked';
import { DomainEventMetadata } from '../../shared/domain-event';

export interface ReadingProfileState {
  userId: UserId;
  preferences: ExplicitPreferences;
  blockList: BlockList;
  history: readonly ReadingHistoryEntry[];
  version: number;
}

/**
 * 読書嗜好プロファイル集約
 *
 * 境界:
 * - お気に入りジャンル（ExplicitPreferences）
 * - ブロックリスト
 * - 読書履歴（書籍IDごとに1件）
 *
 * 不変条件:
 * - お気に入りジャンルは最大5件、重複なし
 * - 評価済みの本はブロックできない / ブロック済みの本は評価できない
 *
 * 各操作はすべて適用されるか、すべて拒否される。
 * 読書履歴は追加順で返す。
 * 変更操作の metadata は記録するイベントにそのまま引き継ぐ。
 */
export class ReadingProfile extends AggregateRoot<UserId> {
  private _preferences: ExplicitPreferences;
  private _blockList: BlockList;
  private readonly _history: Map<string, ReadingHistoryEntry>;

  private constructor(state: ReadingProfileState, persistedVersion: number | null) {
    super(state.userId, persistedVersion);
    this._preferences = state.preferences;
    this._blockList = state.blockList;
    this._history = new Map(state.history.map((entry) => [entry.bookId, entry]));
  }

  /**
   * 新しいプロファイルを作成
   */
  static create(userId: UserId): ReadingProfile {
    const state: ReadingProfileState = {
      userId,
      preferences: ExplicitPreferences.empty(),
      blockList: BlockList.empty(),
      history: [],
      version: 0,
    };
    return new ReadingProfile(state, null);
  }

  /**
   * 永続化された状態から再構築（イベントは発行しない）
   */
  static reconstitute(state: ReadingProfileState): ReadingProfile {
    const seen = new Set<string>();
    for (const entry of state.history) {
      if (seen.has(entry.bookId)) {
        throw new ValidationError(`Duplicate reading history entry: ${entry.bookId}`);
      }
      seen.add(entry.bookId);
      if (entry.isRated && state.blockList.contains(entry.bookId)) {
        throw new ValidationError(`Rated book cannot be blocked: ${entry.bookId}`);
      }
    }
    return new ReadingProfile(state, state.version);
  }

  get userId(): UserId {
    return this._id;
  }

  // === Commands ===

  addFavoriteGenre(genre: Genre, metadata?: DomainEventMetadata): void {
    let preferences: ExplicitPreferences;
    try {
      preferences = this._preferences.addGenre(genre);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ValidationError(`Cannot add genre: ${error.message}`, { cause: error });
      }
      throw error;
    }

    this._preferences = preferences;
    this.record(
      new FavoriteGenreChanged({ userId: this._id.value, genre: genre.name, action: 'added' }, metadata)
    );
  }

  /**
   * 冪等。ジャンルが存在しなくても removed イベントを記録する。
   *
   * @returns 実際に削除されたかどうか
   */
  removeFavoriteGenre(name: string, metadata?: DomainEventMetadata): boolean {
    const removed = this._preferences.hasGenre(name);
    this._preferences = this._preferences.removeGenre(name);
    this.record(
      new FavoriteGenreChanged({ userId: this._id.value, genre: name, action: 'removed' }, metadata)
    );
    return removed;
  }

  addOrUpdateRating(bookId: string, rating: Rating, metadata?: DomainEventMetadata): void {
    this.ensureBookId(bookId);
    if (this._blockList.contains(bookId)) {
      throw new ValidationError(`Cannot rate blocked book: ${bookId}`);
    }

    const existing = this._history.get(bookId);
    if (existing) {
      existing.updateRating(rating);
    } else {
      this._history.set(bookId, ReadingHistoryEntry.create(bookId, rating));
    }

    this.record(new RatingGiven({ userId: this._id.value, bookId, rating: rating.value }, metadata));
  }

  blockItem(bookId: string, metadata?: DomainEventMetadata): void {
    this.ensureBookId(bookId);
    if (this._history.get(bookId)?.isRated) {
      throw new ValidationError(`Cannot block active book: ${bookId}`);
    }

    this._blockList = this._blockList.add(bookId);
    this.record(new ItemBlocked({ userId: this._id.value, bookId }, metadata));
  }

  /**
   * 冪等。イベントは記録しない。
   *
   * @returns ブロックが解除されたかどうか
   */
  unblockItem(bookId: string): boolean {
    const unblocked = this._blockList.contains(bookId);
    this._blockList = this._blockList.remove(bookId);
    this.touch();
    return unblocked;
  }

  // === Queries ===

  hasGenre(name: string): boolean {
    return this._preferences.hasGenre(name);
  }

  favoriteGenreNames(): string[] {
    return this._preferences.names();
  }

  readingHistoryList(): ReadingHistoryItem[] {
    return [...this._history.values()].map((entry) => entry.toView());
  }

  blockedItemIds(): string[] {
    return this._blockList.toArray();
  }

  private ensureBookId(bookId: string): void {
    if (!BookId.isValid(bookId)) {
      throw new ValidationError('book_id cannot be empty');
    }
  }
}
