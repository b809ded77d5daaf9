/**
 * Profile Service
 *
 * 読書嗜好プロファイル マイクロサービス
 *
 * 責務:
 * - プロファイルのライフサイクル管理
 * - ジャンル・レーティング・ブロックの変更
 * - スナップショット（Read Model）の提供
 *
 * Factor準拠:
 * - #3 Config: 環境変数で設定
 * - #6 Processes: ステートレス（状態はリポジトリ）
 * - #11 Logs: 構造化ログ出力
 */

import { ProfileRepository } from '../../infrastructure/repositories/profile-repository';
import { InMemoryProfileRepository } from '../../infrastructure/repositories/in-memory-profile-repository';
import { DynamoDBProfileRepository } from '../../infrastructure/repositories/dynamodb-profile-repository';
import { AppConfig, loadConfig } from '../../infrastructure/config';
import { Logger, createLogger } from '../../infrastructure/logging/logger';
import { CommandMetadata } from '../../application/commands/command';
import { CreateProfileCommand, CreateProfileHandler } from '../../application/commands/profile/create-profile.command';
import { AddFavoriteGenreCommand, AddFavoriteGenreHandler } from '../../application/commands/profile/add-favorite-genre.command';
import { RemoveFavoriteGenreCommand, RemoveFavoriteGenreHandler } from '../../application/commands/profile/remove-favorite-genre.command';
import { RateBookCommand, RateBookHandler } from '../../application/commands/profile/rate-book.command';
import { BlockItemCommand, BlockItemHandler } from '../../application/commands/profile/block-item.command';
import { UnblockItemCommand, UnblockItemHandler } from '../../application/commands/profile/unblock-item.command';
import { DeleteProfileCommand, DeleteProfileHandler } from '../../application/commands/profile/delete-profile.command';
import { GetProfileQuery, GetProfileHandler } from '../../application/queries/profile/get-profile.query';
import { GetSnapshotQuery, GetSnapshotHandler } from '../../application/queries/profile/get-snapshot.query';

export interface ProfileServiceConfig {
  repository: ProfileRepository;
  logger?: Logger;
}

type RequestMetadata = Partial<Pick<CommandMetadata, 'correlationId' | 'traceId'>>;

/**
 * Profile Service Facade
 *
 * CQRS Command/Query を統合
 */
export class ProfileService {
  private readonly createProfileHandler: CreateProfileHandler;
  private readonly addFavoriteGenreHandler: AddFavoriteGenreHandler;
  private readonly removeFavoriteGenreHandler: RemoveFavoriteGenreHandler;
  private readonly rateBookHandler: RateBookHandler;
  private readonly blockItemHandler: BlockItemHandler;
  private readonly unblockItemHandler: UnblockItemHandler;
  private readonly deleteProfileHandler: DeleteProfileHandler;
  private readonly getProfileHandler: GetProfileHandler;
  private readonly getSnapshotHandler: GetSnapshotHandler;

  constructor(config: ProfileServiceConfig) {
    const { repository } = config;
    const logger = config.logger ?? createLogger('ProfileService');

    // Command Handlers
    this.createProfileHandler = new CreateProfileHandler(repository, logger);
    this.addFavoriteGenreHandler = new AddFavoriteGenreHandler(repository, logger);
    this.removeFavoriteGenreHandler = new RemoveFavoriteGenreHandler(repository, logger);
    this.rateBookHandler = new RateBookHandler(repository, logger);
    this.blockItemHandler = new BlockItemHandler(repository, logger);
    this.unblockItemHandler = new UnblockItemHandler(repository, logger);
    this.deleteProfileHandler = new DeleteProfileHandler(repository, logger);

    // Query Handlers
    this.getProfileHandler = new GetProfileHandler(repository);
    this.getSnapshotHandler = new GetSnapshotHandler(repository);
  }

  // === Commands ===

  async createProfile(userId: string, metadata?: RequestMetadata) {
    return this.createProfileHandler.execute(new CreateProfileCommand({ userId }, { ...metadata, userId }));
  }

  async addFavoriteGenre(userId: string, genre: string, metadata?: RequestMetadata) {
    return this.addFavoriteGenreHandler.execute(
      new AddFavoriteGenreCommand({ userId, genre }, { ...metadata, userId })
    );
  }

  async removeFavoriteGenre(userId: string, genre: string, metadata?: RequestMetadata) {
    return this.removeFavoriteGenreHandler.execute(
      new RemoveFavoriteGenreCommand({ userId, genre }, { ...metadata, userId })
    );
  }

  async rateBook(userId: string, bookId: string, rating: number, metadata?: RequestMetadata) {
    return this.rateBookHandler.execute(
      new RateBookCommand({ userId, bookId, rating }, { ...metadata, userId })
    );
  }

  async blockItem(userId: string, bookId: string, metadata?: RequestMetadata) {
    return this.blockItemHandler.execute(new BlockItemCommand({ userId, bookId }, { ...metadata, userId }));
  }

  async unblockItem(userId: string, bookId: string, metadata?: RequestMetadata) {
    return this.unblockItemHandler.execute(new UnblockItemCommand({ userId, bookId }, { ...metadata, userId }));
  }

  async deleteProfile(userId: string, metadata?: RequestMetadata) {
    return this.deleteProfileHandler.execute(new DeleteProfileCommand({ userId }, { ...metadata, userId }));
  }

  // === Queries ===

  async getProfile(userId: string) {
    return this.getProfileHandler.execute(new GetProfileQuery(userId));
  }

  async getSnapshot(userId: string) {
    return this.getSnapshotHandler.execute(new GetSnapshotQuery(userId));
  }
}

/**
 * 設定からリポジトリを選択してサービスを構築
 */
export function createProfileService(config: AppConfig = loadConfig()): ProfileService {
  const logger = createLogger('ProfileService', config.logLevel);
  const repository: ProfileRepository =
    config.repository === 'dynamodb'
      ? new DynamoDBProfileRepository({
          ...config.dynamodb,
          logger: createLogger('DynamoDBProfileRepository', config.logLevel),
        })
      : new InMemoryProfileRepository();

  logger.info('Profile service initialized', { repository: config.repository });
  return new ProfileService({ repository, logger });
}

export * from '../../application/errors';
export * from '../../application/commands/profile/create-profile.command';
export * from '../../application/commands/profile/add-favorite-genre.command';
export * from '../../application/commands/profile/remove-favorite-genre.command';
export * from '../../application/commands/profile/rate-book.command';
export * from '../../application/commands/profile/block-item.command';
export * from '../../application/commands/profile/unblock-item.command';
export * from '../../application/commands/profile/delete-profile.command';
export * from '../../application/queries/profile/get-profile.query';
export * from '../../application/queries/profile/get-snapshot.query';
export { ConcurrencyError } from '../../infrastructure/repositories/profile-repository';
export type { ProfileRepository } from '../../infrastructure/repositories/profile-repository';
export { InMemoryProfileRepository } from '../../infrastructure/repositories/in-memory-profile-repository';
export { DynamoDBProfileRepository } from '../../infrastructure/repositories/dynamodb-profile-repository';
export * from '../../domain/reading-profile';
