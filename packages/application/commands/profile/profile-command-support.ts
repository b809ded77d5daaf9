import { ReadingProfile } from '../../../domain/reading-profile/aggregates/reading-profile';
import { DomainEvent } from '../../../domain/shared/domain-event';
import { ProfileRepository } from '../../../infrastructure/repositories/profile-repository';
import { Logger } from '../../../infrastructure/logging/logger';
import { ProfileNotFoundError } from '../../errors';
import { Command } from '../command';

/**
 * 集約を読み込む（存在しなければ ProfileNotFoundError）
 */
export async function loadProfile(repository: ProfileRepository, userId: string): Promise<ReadingProfile> {
  const profile = await repository.findByUserId(userId);
  if (!profile) {
    throw new ProfileNotFoundError(userId);
  }
  return profile;
}

/**
 * 保存して未処理イベントを取り出す
 */
export async function commit(
  repository: ProfileRepository,
  profile: ReadingProfile,
  command: Command,
  logger: Logger
): Promise<DomainEvent[]> {
  await repository.save(profile);
  const events = profile.drainEvents();

  logger.info(`${command.commandType} committed`, {
    userId: profile.userId.value,
    version: profile.version,
    correlationId: command.metadata.correlationId,
    traceId: command.metadata.traceId,
    events: events.map((event) => event.eventType),
  });

  return events;
}
