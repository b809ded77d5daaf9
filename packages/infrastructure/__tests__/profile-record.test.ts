import { describe, it, expect } from 'vitest';
import {
  toProfileRecord,
  fromProfileRecord,
  parseProfileRecord,
  ProfileRecordError,
} from '../repositories/profile-record';
import { ReadingProfile } from '../../domain/reading-profile/aggregates/reading-profile';
import { UserId } from '../../domain/reading-profile/value-objects/user-id';
import { Genre } from '../../domain/reading-profile/value-objects/genre';
import { ValidationError } from '../../domain/shared/errors';

describe('ProfileRecord mapping', () => {
  it('should map an aggregate to a plain record', () => {
    const profile = ReadingProfile.create(UserId.fromString('u1'));
    profile.addFavoriteGenre(Genre.create('mystery'));
    profile.blockItem('b2');

    expect(toProfileRecord(profile)).toEqual({
      userId: 'u1',
      favoriteGenres: ['Mystery'],
      blockedItemIds: ['b2'],
      history: [],
      version: 2,
    });
  });

  it('should rebuild an aggregate from a record', () => {
    const profile = fromProfileRecord({
      userId: 'u1',
      favoriteGenres: ['Mystery', 'Horror'],
      blockedItemIds: ['b2'],
      history: [{ bookId: 'b1', rating: 3, readAt: '2026-04-10T12:00:00.000Z' }],
      version: 4,
    });

    expect(profile.favoriteGenreNames()).toEqual(['Mystery', 'Horror']);
    expect(profile.blockedItemIds()).toEqual(['b2']);
    expect(profile.readingHistoryList()).toEqual([
      { bookId: 'b1', rating: 3, readAt: '2026-04-10T12:00:00.000Z' },
    ]);
    expect(profile.persistedVersion).toBe(4);
  });

  it('should reject a record that breaks an aggregate invariant', () => {
    expect(() =>
      fromProfileRecord({
        userId: 'u1',
        favoriteGenres: ['Horror', 'horror'],
        blockedItemIds: [],
        history: [],
        version: 1,
      })
    ).toThrow(ValidationError);
  });

  it('should reject malformed stored data', () => {
    expect(() =>
      parseProfileRecord({
        userId: 'u1',
        favoriteGenres: [],
        blockedItemIds: [],
        history: [{ bookId: 'b1', rating: 9, readAt: '2026-04-10T12:00:00.000Z' }],
        version: 1,
      })
    ).toThrow(ProfileRecordError);
  });
});
