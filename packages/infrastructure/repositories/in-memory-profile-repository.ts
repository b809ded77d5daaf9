/**
 * In-Memory Profile Repository
 *
 * テスト・ローカル開発用。レコードをコピーして保持するため、
 * 読み込んだ集約と保存済み状態が参照を共有しない。
 */
import { ReadingProfile } from '../../domain/reading-profile/aggregates/reading-profile';
import { ProfileRepository, ConcurrencyError } from './profile-repository';
import { ProfileRecord, toProfileRecord, fromProfileRecord } from './profile-record';

export class InMemoryProfileRepository implements ProfileRepository {
  private readonly storage = new Map<string, ProfileRecord>();

  async save(profile: ReadingProfile): Promise<void> {
    const userId = profile.userId.value;
    const storedVersion = this.storage.get(userId)?.version ?? null;

    if (storedVersion !== profile.persistedVersion) {
      throw new ConcurrencyError(userId, profile.persistedVersion, storedVersion);
    }

    this.storage.set(userId, toProfileRecord(profile));
    profile.markPersisted();
  }

  async findByUserId(userId: string): Promise<ReadingProfile | null> {
    const record = this.storage.get(userId);
    return record ? fromProfileRecord(record) : null;
  }

  async delete(userId: string): Promise<void> {
    this.storage.delete(userId);
  }

  get size(): number {
    return this.storage.size;
  }

  clear(): void {
    this.storage.clear();
  }
}
