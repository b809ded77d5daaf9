import { ValueObject } from '../../shared/value-object';
import { ValidationError } from '../../shared/errors';

/**
 * ブロックリスト値オブジェクト
 *
 * ブロック済み書籍IDの集合（追加順を保持、重複なし）
 */
export class BlockList extends ValueObject<{ bookIds: readonly string[] }> {
  private constructor(bookIds: readonly string[]) {
    super({ bookIds: Object.freeze([...bookIds]) });
  }

  static empty(): BlockList {
    return new BlockList([]);
  }

  /**
   * Set または配列から作成（重複は除去）
   */
  static from(bookIds: ReadonlySet<string> | readonly string[]): BlockList {
    const input: unknown = bookIds;
    if (!(input instanceof Set) && !Array.isArray(input)) {
      throw new ValidationError('book_ids must be a set or an array');
    }
    const unique = new Set<string>();
    for (const id of bookIds) {
      if (typeof id !== 'string' || id.trim() === '') {
        throw new ValidationError('Blocked book ids must be non-empty strings');
      }
      unique.add(id);
    }
    return new BlockList([...unique]);
  }

  get size(): number {
    return this.props.bookIds.length;
  }

  contains(bookId: string): boolean {
    return this.props.bookIds.includes(bookId);
  }

  add(bookId: string): BlockList {
    if (this.contains(bookId)) {
      return new BlockList(this.props.bookIds);
    }
    return new BlockList([...this.props.bookIds, bookId]);
  }

  remove(bookId: string): BlockList {
    return new BlockList(this.props.bookIds.filter((id) => id !== bookId));
  }

  toArray(): string[] {
    return [...this.props.bookIds];
  }

  /**
   * 集合としての等価性（順序は無視）
   */
  protected override equalityKey(): string {
    return JSON.stringify([...this.props.bookIds].sort());
  }
}
