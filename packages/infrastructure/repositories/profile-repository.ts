/**
 * Profile Repository インターフェース
 *
 * 読書嗜好プロファイル集約の永続化ポート。
 * 同一ユーザーへの同時更新は楽観的ロック（バージョン）で検出する。
 */
import { ReadingProfile } from '../../domain/reading-profile/aggregates/reading-profile';

/**
 * Profile Repository ポート（インターフェース）
 */
export interface ProfileRepository {
  /**
   * ユーザーIDをキーに保存（上書き、マージなし）
   *
   * - 新規集約（persistedVersion が null）: レコードが既にあれば ConcurrencyError
   * - 保存済み集約: レコードが無いか、バージョンが persistedVersion と異なれば ConcurrencyError
   */
  save(profile: ReadingProfile): Promise<void>;

  /**
   * 見つからない場合は null
   */
  findByUserId(userId: string): Promise<ReadingProfile | null>;

  /**
   * 冪等（存在しないIDの削除はエラーにしない）
   */
  delete(userId: string): Promise<void>;
}

/**
 * 楽観的ロック違反エラー
 *
 * バージョンの null は「レコードなし」を表す
 */
export class ConcurrencyError extends Error {
  constructor(
    public readonly aggregateId: string,
    public readonly expectedVersion: number | null,
    public readonly actualVersion: number | null
  ) {
    super(
      `Concurrency conflict for profile ${aggregateId}: ` +
      `expected ${describeVersion(expectedVersion)}, actual ${describeVersion(actualVersion)}`
    );
    this.name = 'ConcurrencyError';
  }
}

function describeVersion(version: number | null): string {
  return version === null ? 'no record' : `version ${version}`;
}
