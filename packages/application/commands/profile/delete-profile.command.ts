/**
 * DeleteProfile Command
 *
 * CQRS: プロファイル削除コマンド（冪等）
 */
import { Command, CommandHandler, CommandMetadata } from '../command';
import { ProfileRepository } from '../../../infrastructure/repositories/profile-repository';
import { Logger } from '../../../infrastructure/logging/logger';

export interface DeleteProfilePayload {
  userId: string;
}

export class DeleteProfileCommand extends Command<DeleteProfilePayload> {
  constructor(payload: DeleteProfilePayload, metadata?: Partial<CommandMetadata>) {
    super(payload, metadata);
  }
}

export interface DeleteProfileResult {
  deleted: boolean;
}

/**
 * DeleteProfile Handler
 */
export class DeleteProfileHandler implements CommandHandler<DeleteProfileCommand, DeleteProfileResult> {
  constructor(
    private readonly repository: ProfileRepository,
    private readonly logger: Logger
  ) {}

  async execute(command: DeleteProfileCommand): Promise<DeleteProfileResult> {
    const existing = await this.repository.findByUserId(command.payload.userId);
    await this.repository.delete(command.payload.userId);

    this.logger.info(`${command.commandType} committed`, {
      userId: command.payload.userId,
      deleted: existing !== null,
      correlationId: command.metadata.correlationId,
    });

    return { deleted: existing !== null };
  }
}
