import { DomainEvent, DomainEventMetadata } from '../../shared/domain-event';

export type FavoriteGenreAction = 'added' | 'removed';

export interface FavoriteGenreChangedPayload {
  userId: string;
  genre: string;
  action: FavoriteGenreAction;
}

/**
 * お気に入りジャンル変更イベント
 */
export class FavoriteGenreChanged extends DomainEvent {
  readonly userId: string;
  readonly genre: string;
  readonly action: FavoriteGenreAction;

  constructor(payload: FavoriteGenreChangedPayload, metadata?: DomainEventMetadata) {
    super(metadata);
    this.userId = payload.userId;
    this.genre = payload.genre;
    this.action = payload.action;
  }

  protected payload(): Record<string, unknown> {
    return {
      userId: this.userId,
      genre: this.genre,
      action: this.action,
    };
  }
}
