/**
 * GetProfile Query
 *
 * CQRS: プロファイル取得クエリ
 */
import { Query, QueryHandler } from '../query';
import { ReadingHistoryItem } from '../../../domain/reading-profile/entities/reading-history-entry';
import { ProfileRepository } from '../../../infrastructure/repositories/profile-repository';

export interface ProfileView {
  userId: string;
  favoriteGenres: string[];
  blockedItemIds: string[];
  history: ReadingHistoryItem[];
}

/**
 * GetProfile Query
 */
export class GetProfileQuery extends Query<ProfileView | null> {
  constructor(public readonly userId: string) {
    super();
  }
}

/**
 * GetProfile Handler
 */
export class GetProfileHandler implements QueryHandler<GetProfileQuery, ProfileView | null> {
  constructor(private readonly repository: ProfileRepository) {}

  async execute(query: GetProfileQuery): Promise<ProfileView | null> {
    const profile = await this.repository.findByUserId(query.userId);
    if (!profile) {
      return null;
    }

    return {
      userId: profile.userId.value,
      favoriteGenres: profile.favoriteGenreNames(),
      blockedItemIds: profile.blockedItemIds(),
      history: profile.readingHistoryList(),
    };
  }
}
