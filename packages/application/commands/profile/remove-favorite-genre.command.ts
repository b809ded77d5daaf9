/**
 * RemoveFavoriteGenre Command
 *
 * CQRS: お気に入りジャンル削除コマンド（冪等）
 */
import { Command, CommandHandler, CommandMetadata } from '../command';
import { DomainEvent } from '../../../domain/shared/domain-event';
import { ProfileRepository } from '../../../infrastructure/repositories/profile-repository';
import { Logger } from '../../../infrastructure/logging/logger';
import { loadProfile, commit } from './profile-command-support';

export interface RemoveFavoriteGenrePayload {
  userId: string;
  genre: string;
}

export class RemoveFavoriteGenreCommand extends Command<RemoveFavoriteGenrePayload> {
  constructor(payload: RemoveFavoriteGenrePayload, metadata?: Partial<CommandMetadata>) {
    super(payload, metadata);
  }
}

export interface RemoveFavoriteGenreResult {
  removed: boolean;
  favoriteGenres: string[];
  events: DomainEvent[];
}

/**
 * RemoveFavoriteGenre Handler
 */
export class RemoveFavoriteGenreHandler implements CommandHandler<RemoveFavoriteGenreCommand, RemoveFavoriteGenreResult> {
  constructor(
    private readonly repository: ProfileRepository,
    private readonly logger: Logger
  ) {}

  async execute(command: RemoveFavoriteGenreCommand): Promise<RemoveFavoriteGenreResult> {
    const profile = await loadProfile(this.repository, command.payload.userId);

    const removed = profile.removeFavoriteGenre(command.payload.genre, command.eventMetadata());
    const events = await commit(this.repository, profile, command, this.logger);

    return { removed, favoriteGenres: profile.favoriteGenreNames(), events };
  }
}
