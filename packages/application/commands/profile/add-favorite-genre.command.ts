/**
 * AddFavoriteGenre Command
 *
 * CQRS: お気に入りジャンル追加コマンド
 */
import { Command, CommandHandler, CommandMetadata } from '../command';
import { Genre } from '../../../domain/reading-profile/value-objects/genre';
import { DomainEvent } from '../../../domain/shared/domain-event';
import { ProfileRepository } from '../../../infrastructure/repositories/profile-repository';
import { Logger } from '../../../infrastructure/logging/logger';
import { loadProfile, commit } from './profile-command-support';

export interface AddFavoriteGenrePayload {
  userId: string;
  genre: string;
}

export class AddFavoriteGenreCommand extends Command<AddFavoriteGenrePayload> {
  constructor(payload: AddFavoriteGenrePayload, metadata?: Partial<CommandMetadata>) {
    super(payload, metadata);
  }
}

export interface AddFavoriteGenreResult {
  favoriteGenres: string[];
  events: DomainEvent[];
}

/**
 * AddFavoriteGenre Handler
 */
export class AddFavoriteGenreHandler implements CommandHandler<AddFavoriteGenreCommand, AddFavoriteGenreResult> {
  constructor(
    private readonly repository: ProfileRepository,
    private readonly logger: Logger
  ) {}

  async execute(command: AddFavoriteGenreCommand): Promise<AddFavoriteGenreResult> {
    const genre = Genre.create(command.payload.genre);
    const profile = await loadProfile(this.repository, command.payload.userId);

    profile.addFavoriteGenre(genre, command.eventMetadata());
    const events = await commit(this.repository, profile, command, this.logger);

    return { favoriteGenres: profile.favoriteGenreNames(), events };
  }
}
