import { DomainEvent, DomainEventMetadata } from '../../shared/domain-event';

export interface RatingGivenPayload {
  userId: string;
  bookId: string;
  rating: number;
}

/**
 * レーティング付与イベント
 */
export class RatingGiven extends DomainEvent {
  readonly userId: string;
  readonly bookId: string;
  readonly rating: number;

  constructor(payload: RatingGivenPayload, metadata?: DomainEventMetadata) {
    super(metadata);
    this.userId = payload.userId;
    this.bookId = payload.bookId;
    this.rating = payload.rating;
  }

  protected payload(): Record<string, unknown> {
    return {
      userId: this.userId,
      bookId: this.bookId,
      rating: this.rating,
    };
  }
}
