import { Entity, EntityId } from './entity';
import { DomainEvent } from './domain-event';

/**
 * 集約ルート基底クラス
 *
 * - 未処理イベントの記録（呼び出し側が drainEvents で取り出す）
 * - バージョン管理（リポジトリの楽観的ロック用）
 *
 * 一度も保存されていない集約の persistedVersion は null。
 * リポジトリは null なら「未作成であること」、数値なら「保存済みバージョンが一致すること」を
 * 保存の条件にする。
 */
export abstract class AggregateRoot<TId extends EntityId> extends Entity<TId> {
  private _version: number;
  private _persistedVersion: number | null;
  private _pendingEvents: DomainEvent[] = [];

  protected constructor(id: TId, persistedVersion: number | null) {
    super(id);
    this._version = persistedVersion ?? 0;
    this._persistedVersion = persistedVersion;
  }

  /**
   * 現在のバージョン（適用済みの変更数）
   */
  get version(): number {
    return this._version;
  }

  /**
   * 最後に永続化されたバージョン
   */
  get persistedVersion(): number | null {
    return this._persistedVersion;
  }

  get isNew(): boolean {
    return this._persistedVersion === null;
  }

  /**
   * 未処理のイベント一覧（クリアしない）
   */
  get pendingEvents(): readonly DomainEvent[] {
    return [...this._pendingEvents];
  }

  /**
   * 未処理イベントを記録順に返してクリア
   */
  drainEvents(): DomainEvent[] {
    const events = this._pendingEvents;
    this._pendingEvents = [];
    return events;
  }

  /**
   * リポジトリで保存後に呼び出し
   */
  markPersisted(): void {
    this._persistedVersion = this._version;
  }

  /**
   * 変更を確定してイベントを記録
   */
  protected record(event: DomainEvent): void {
    this._pendingEvents.push(event);
    this._version++;
  }

  /**
   * イベントを伴わない変更
   */
  protected touch(): void {
    this._version++;
  }
}
