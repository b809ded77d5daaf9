/**
 * ProfileRecord
 *
 * 集約 ⇔ 永続化用プレーンオブジェクトの変換
 */
import { z } from 'zod';
import { ReadingProfile } from '../../domain/reading-profile/aggregates/reading-profile';
import { ReadingHistoryEntry } from '../../domain/reading-profile/entities/reading-history-entry';
import { UserId } from '../../domain/reading-profile/value-objects/user-id';
import { Genre } from '../../domain/reading-profile/value-objects/genre';
import { Rating } from '../../domain/reading-profile/value-objects/rating';
import { BlockList } from '../../domain/reading-profile/value-objects/block-list';
import { ExplicitPreferences } from '../../domain/reading-profile/value-objects/explicit-preferences';

export const profileRecordSchema = z.object({
  userId: z.string().min(1),
  favoriteGenres: z.array(z.string()),
  blockedItemIds: z.array(z.string()),
  history: z.array(
    z.object({
      bookId: z.string().min(1),
      rating: z.number().int().min(Rating.MIN).max(Rating.MAX).nullable(),
      readAt: z.string().datetime(),
    })
  ),
  version: z.number().int().nonnegative(),
});

export type ProfileRecord = z.infer<typeof profileRecordSchema>;

/**
 * スキーマに合致しない保存済みレコード
 */
export class ProfileRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProfileRecordError';
  }
}

export function toProfileRecord(profile: ReadingProfile): ProfileRecord {
  return {
    userId: profile.userId.value,
    favoriteGenres: profile.favoriteGenreNames(),
    blockedItemIds: profile.blockedItemIds(),
    history: profile.readingHistoryList(),
    version: profile.version,
  };
}

export function parseProfileRecord(data: unknown): ProfileRecord {
  const result = profileRecordSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ProfileRecordError(`Invalid profile record: ${issues}`);
  }
  return result.data;
}

export function fromProfileRecord(record: ProfileRecord): ReadingProfile {
  return ReadingProfile.reconstitute({
    userId: UserId.fromString(record.userId),
    preferences: ExplicitPreferences.of(record.favoriteGenres.map((name) => Genre.create(name))),
    blockList: BlockList.from(record.blockedItemIds),
    history: record.history.map((item) =>
      ReadingHistoryEntry.create(
        item.bookId,
        item.rating === null ? null : Rating.create(item.rating),
        new Date(item.readAt)
      )
    ),
    version: record.version,
  });
}
