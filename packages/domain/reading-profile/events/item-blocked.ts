import { DomainEvent, DomainEventMetadata } from '../../shared/domain-event';

export interface ItemBlockedPayload {
  userId: string;
  bookId: string;
}

/**
 * アイテムブロックイベント
 */
export class ItemBlocked extends DomainEvent {
  readonly userId: string;
  readonly bookId: string;

  constructor(payload: ItemBlockedPayload, metadata?: DomainEventMetadata) {
    super(metadata);
    this.userId = payload.userId;
    this.bookId = payload.bookId;
  }

  protected payload(): Record<string, unknown> {
    return {
      userId: this.userId,
      bookId: this.bookId,
    };
  }
}
