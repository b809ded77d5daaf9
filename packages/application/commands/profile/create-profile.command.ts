/**
 * CreateProfile Command
 *
 * CQRS: プロファイル作成コマンド
 */
import { Command, CommandHandler, CommandMetadata } from '../command';
import { ReadingProfile } from '../../../domain/reading-profile/aggregates/reading-profile';
import { UserId } from '../../../domain/reading-profile/value-objects/user-id';
import { ConcurrencyError, ProfileRepository } from '../../../infrastructure/repositories/profile-repository';
import { Logger } from '../../../infrastructure/logging/logger';
import { ProfileAlreadyExistsError } from '../../errors';
import { commit } from './profile-command-support';

export interface CreateProfilePayload {
  userId: string;
}

export class CreateProfileCommand extends Command<CreateProfilePayload> {
  constructor(payload: CreateProfilePayload, metadata?: Partial<CommandMetadata>) {
    super(payload, metadata);
  }
}

export interface CreateProfileResult {
  userId: string;
}

/**
 * CreateProfile Handler
 *
 * 事前チェックをすり抜けた同時作成は、新規集約の保存条件（未作成であること）で
 * ConcurrencyError になるため ProfileAlreadyExistsError に読み替える。
 */
export class CreateProfileHandler implements CommandHandler<CreateProfileCommand, CreateProfileResult> {
  constructor(
    private readonly repository: ProfileRepository,
    private readonly logger: Logger
  ) {}

  async execute(command: CreateProfileCommand): Promise<CreateProfileResult> {
    const userId = UserId.fromString(command.payload.userId);

    const existing = await this.repository.findByUserId(userId.value);
    if (existing) {
      throw new ProfileAlreadyExistsError(userId.value);
    }

    const profile = ReadingProfile.create(userId);
    try {
      await commit(this.repository, profile, command, this.logger);
    } catch (error: unknown) {
      if (error instanceof ConcurrencyError) {
        throw new ProfileAlreadyExistsError(userId.value);
      }
      throw error;
    }

    return { userId: userId.value };
  }
}
