/**
 * UnblockItem Command
 *
 * CQRS: ブロック解除コマンド（冪等、イベントなし）
 */
import { Command, CommandHandler, CommandMetadata } from '../command';
import { ProfileRepository } from '../../../infrastructure/repositories/profile-repository';
import { Logger } from '../../../infrastructure/logging/logger';
import { loadProfile, commit } from './profile-command-support';

export interface UnblockItemPayload {
  userId: string;
  bookId: string;
}

export class UnblockItemCommand extends Command<UnblockItemPayload> {
  constructor(payload: UnblockItemPayload, metadata?: Partial<CommandMetadata>) {
    super(payload, metadata);
  }
}

export interface UnblockItemResult {
  unblocked: boolean;
  blockedItemIds: string[];
}

/**
 * UnblockItem Handler
 */
export class UnblockItemHandler implements CommandHandler<UnblockItemCommand, UnblockItemResult> {
  constructor(
    private readonly repository: ProfileRepository,
    private readonly logger: Logger
  ) {}

  async execute(command: UnblockItemCommand): Promise<UnblockItemResult> {
    const profile = await loadProfile(this.repository, command.payload.userId);

    const unblocked = profile.unblockItem(command.payload.bookId);
    await commit(this.repository, profile, command, this.logger);

    return { unblocked, blockedItemIds: profile.blockedItemIds() };
  }
}
