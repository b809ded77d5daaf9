import { Entity } from '../../shared/entity';
import { BookId } from '../value-objects/book-id';
import { Rating } from '../value-objects/rating';

export interface ReadingHistoryItem {
  bookId: string;
  rating: number | null;
  readAt: string;
}

/**
 * 読書履歴エンティティ
 *
 * 書籍IDで識別される。集約が所有する可変状態で、外部から直接参照されない。
 */
export class ReadingHistoryEntry extends Entity<BookId> {
  private _rating: Rating | null;
  private readonly _readAt: Date;

  private constructor(bookId: BookId, rating: Rating | null, readAt: Date) {
    super(bookId);
    this._rating = rating;
    this._readAt = new Date(readAt.getTime());
  }

  static create(bookId: string, rating: Rating | null = null, readAt: Date = new Date()): ReadingHistoryEntry {
    return new ReadingHistoryEntry(BookId.fromString(bookId), rating, readAt);
  }

  get bookId(): string {
    return this._id.value;
  }

  get rating(): Rating | null {
    return this._rating;
  }

  get readAt(): Date {
    return new Date(this._readAt.getTime());
  }

  get isRated(): boolean {
    return this._rating !== null;
  }

  updateRating(rating: Rating): void {
    this._rating = rating;
  }

  toView(): ReadingHistoryItem {
    return {
      bookId: this.bookId,
      rating: this._rating?.value ?? null,
      readAt: this._readAt.toISOString(),
    };
  }
}
