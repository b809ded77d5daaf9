/**
 * エンティティの識別子
 *
 * UserId / BookId のように文字列値を持つ値オブジェクト
 */
export interface EntityId {
  readonly value: string;
}

/**
 * エンティティ基底クラス
 *
 * 同一性は識別子の値だけで判定し、属性の違いは問わない。
 */
export abstract class Entity<TId extends EntityId> {
  protected readonly _id: TId;

  protected constructor(id: TId) {
    this._id = id;
  }

  get id(): TId {
    return this._id;
  }

  equals(other: Entity<TId> | null | undefined): boolean {
    if (other === null || other === undefined || other.constructor !== this.constructor) {
      return false;
    }
    return other._id.value === this._id.value;
  }
}
