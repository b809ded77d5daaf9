/**
 * RateBook Command
 *
 * CQRS: レーティング追加・更新コマンド
 */
import { Command, CommandHandler, CommandMetadata } from '../command';
import { Rating } from '../../../domain/reading-profile/value-objects/rating';
import { DomainEvent } from '../../../domain/shared/domain-event';
import { ProfileRepository } from '../../../infrastructure/repositories/profile-repository';
import { Logger } from '../../../infrastructure/logging/logger';
import { loadProfile, commit } from './profile-command-support';

export interface RateBookPayload {
  userId: string;
  bookId: string;
  rating: number;
}

export class RateBookCommand extends Command<RateBookPayload> {
  constructor(payload: RateBookPayload, metadata?: Partial<CommandMetadata>) {
    super(payload, metadata);
  }
}

export interface RateBookResult {
  bookId: string;
  rating: number;
  events: DomainEvent[];
}

/**
 * RateBook Handler
 */
export class RateBookHandler implements CommandHandler<RateBookCommand, RateBookResult> {
  constructor(
    private readonly repository: ProfileRepository,
    private readonly logger: Logger
  ) {}

  async execute(command: RateBookCommand): Promise<RateBookResult> {
    const rating = Rating.create(command.payload.rating);
    const profile = await loadProfile(this.repository, command.payload.userId);

    profile.addOrUpdateRating(command.payload.bookId, rating, command.eventMetadata());
    const events = await commit(this.repository, profile, command, this.logger);

    return { bookId: command.payload.bookId, rating: rating.value, events };
  }
}
