/**
 * GetSnapshot Query
 *
 * CQRS: スナップショット取得クエリ（Read Model は都度計算）
 */
import { Query, QueryHandler } from '../query';
import { ProfileSnapshot } from '../../../domain/reading-profile/read-models/profile-snapshot';
import { ProfileRepository } from '../../../infrastructure/repositories/profile-repository';

export class GetSnapshotQuery extends Query<ProfileSnapshot | null> {
  constructor(public readonly userId: string) {
    super();
  }
}

/**
 * GetSnapshot Handler
 */
export class GetSnapshotHandler implements QueryHandler<GetSnapshotQuery, ProfileSnapshot | null> {
  constructor(private readonly repository: ProfileRepository) {}

  async execute(query: GetSnapshotQuery): Promise<ProfileSnapshot | null> {
    const profile = await this.repository.findByUserId(query.userId);
    return profile ? ProfileSnapshot.fromAggregate(profile) : null;
  }
}
