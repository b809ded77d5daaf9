/**
 * BlockItem Command
 *
 * CQRS: 書籍ブロックコマンド
 */
import { Command, CommandHandler, CommandMetadata } from '../command';
import { DomainEvent } from '../../../domain/shared/domain-event';
import { ProfileRepository } from '../../../infrastructure/repositories/profile-repository';
import { Logger } from '../../../infrastructure/logging/logger';
import { loadProfile, commit } from './profile-command-support';

export interface BlockItemPayload {
  userId: string;
  bookId: string;
}

export class BlockItemCommand extends Command<BlockItemPayload> {
  constructor(payload: BlockItemPayload, metadata?: Partial<CommandMetadata>) {
    super(payload, metadata);
  }
}

export interface BlockItemResult {
  blockedItemIds: string[];
  events: DomainEvent[];
}

/**
 * BlockItem Handler
 */
export class BlockItemHandler implements CommandHandler<BlockItemCommand, BlockItemResult> {
  constructor(
    private readonly repository: ProfileRepository,
    private readonly logger: Logger
  ) {}

  async execute(command: BlockItemCommand): Promise<BlockItemResult> {
    const profile = await loadProfile(this.repository, command.payload.userId);

    profile.blockItem(command.payload.bookId, command.eventMetadata());
    const events = await commit(this.repository, profile, command, this.logger);

    return { blockedItemIds: profile.blockedItemIds(), events };
  }
}
