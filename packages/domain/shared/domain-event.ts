import { randomUUID } from 'crypto';

/**
 * イベントの由来
 *
 * - correlationId: 同じリクエストから派生した処理をまとめる ID
 * - causationId: イベントを引き起こしたコマンドの ID
 * - userId: 操作したユーザー
 */
export interface DomainEventMetadata {
  correlationId?: string;
  causationId?: string;
  userId?: string;
}

/**
 * ドメインイベント基底クラス
 *
 * 集約の変更が成功した結果として記録される不変の事実。
 * 共通のエンベロープ（ID・時刻・種別・由来）は基底で組み立て、
 * 各イベントは payload() で固有のフィールドだけを返す。
 */
export abstract class DomainEvent {
  readonly eventId: string;
  readonly occurredAt: Date;
  readonly metadata: Readonly<DomainEventMetadata>;

  protected constructor(metadata: DomainEventMetadata = {}) {
    this.eventId = randomUUID();
    this.occurredAt = new Date();
    this.metadata = Object.freeze({ ...metadata });
  }

  get eventType(): string {
    return this.constructor.name;
  }

  protected abstract payload(): Record<string, unknown>;

  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventType: this.eventType,
      occurredAt: this.occurredAt.toISOString(),
      ...this.payload(),
      metadata: { ...this.metadata },
    };
  }
}
