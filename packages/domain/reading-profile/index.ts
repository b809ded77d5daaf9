/**
 * Reading Profile Domain Module
 */
export { UserId } from './value-objects/user-id';
export { BookId } from './value-objects/book-id';
export { Genre } from './value-objects/genre';
export { Rating } from './value-objects/rating';
export { BlockList } from './value-objects/block-list';
export { ExplicitPreferences } from './value-objects/explicit-preferences';
export { ReadingHistoryEntry } from './entities/reading-history-entry';
export type { ReadingHistoryItem } from './entities/reading-history-entry';
export { ReadingProfile } from './aggregates/reading-profile';
export type { ReadingProfileState } from './aggregates/reading-profile';
export { RatingGiven } from './events/rating-given';
export { FavoriteGenreChanged } from './events/favorite-genre-changed';
export type { FavoriteGenreAction } from './events/favorite-genre-changed';
export { ItemBlocked } from './events/item-blocked';
export { ProfileSnapshot } from './read-models/profile-snapshot';
export type { ProfileSnapshotData } from './read-models/profile-snapshot';
export { ValidationError, DomainError } from '../shared/errors';
export { DomainEvent } from '../shared/domain-event';
export type { DomainEventMetadata } from '../shared/domain-event';
