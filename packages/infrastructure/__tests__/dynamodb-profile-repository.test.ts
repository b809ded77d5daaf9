/**
 * DynamoDBProfileRepository ユニットテスト
 *
 * DynamoDB クライアントはプロセス内のフェイクに差し替え
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  DynamoDBClient,
  PutItemCommand,
  GetItemCommand,
  DeleteItemCommand,
  AttributeValue,
} from '@aws-sdk/client-dynamodb';
import { DynamoDBProfileRepository } from '../repositories/dynamodb-profile-repository';
import { ConcurrencyError } from '../repositories/profile-repository';
import { ProfileRecordError } from '../repositories/profile-record';
import { createLogger } from '../logging/logger';
import { ReadingProfile } from '../../domain/reading-profile/aggregates/reading-profile';
import { UserId } from '../../domain/reading-profile/value-objects/user-id';
import { Genre } from '../../domain/reading-profile/value-objects/genre';
import { Rating } from '../../domain/reading-profile/value-objects/rating';

type Item = Record<string, AttributeValue>;

function createFakeDynamoDB() {
  const items = new Map<string, Item>();

  const send = vi.fn(async (command: unknown) => {
    if (command instanceof PutItemCommand) {
      const item = command.input.Item ?? {};
      const key = item.PK?.S ?? '';
      const existing = items.get(key);
      const passes =
        command.input.ConditionExpression === 'attribute_not_exists(PK)'
          ? existing === undefined
          : existing?.version?.N === command.input.ExpressionAttributeValues?.[':expected']?.N;
      if (!passes) {
        const error = new Error('The conditional request failed');
        error.name = 'ConditionalCheckFailedException';
        throw error;
      }
      items.set(key, item);
      return {};
    }
    if (command instanceof GetItemCommand) {
      return { Item: items.get(command.input.Key?.PK?.S ?? '') };
    }
    if (command instanceof DeleteItemCommand) {
      items.delete(command.input.Key?.PK?.S ?? '');
      return {};
    }
    throw new Error('Unexpected command');
  });

  const client = { send } as unknown as DynamoDBClient;
  return { client, send, items };
}

describe('DynamoDBProfileRepository', () => {
  let fake: ReturnType<typeof createFakeDynamoDB>;
  let repository: DynamoDBProfileRepository;

  beforeEach(() => {
    fake = createFakeDynamoDB();
    repository = new DynamoDBProfileRepository({
      tableName: 'reading-profiles-test',
      client: fake.client,
      logger: createLogger('test', 'silent'),
    });
  });

  it('should write a new profile only when no item exists yet', async () => {
    const profile = ReadingProfile.create(UserId.fromString('u1'));
    profile.addFavoriteGenre(Genre.create('fantasy'));

    await repository.save(profile);

    const [command] = fake.send.mock.calls[0];
    expect(command).toBeInstanceOf(PutItemCommand);
    if (!(command instanceof PutItemCommand)) return;
    expect(command.input.TableName).toBe('reading-profiles-test');
    expect(command.input.ConditionExpression).toBe('attribute_not_exists(PK)');
    expect(command.input.ExpressionAttributeValues).toBeUndefined();
    expect(command.input.Item?.PK).toEqual({ S: 'u1' });
    expect(command.input.Item?.version).toEqual({ N: '1' });
    expect(profile.persistedVersion).toBe(1);
  });

  it('should condition a stored profile on its persisted version', async () => {
    await repository.save(ReadingProfile.create(UserId.fromString('u1')));
    const loaded = await repository.findByUserId('u1');
    if (!loaded) throw new Error('profile missing');
    loaded.blockItem('b1');
    fake.send.mockClear();

    await repository.save(loaded);

    const [command] = fake.send.mock.calls[0];
    if (!(command instanceof PutItemCommand)) throw new Error('expected a put');
    expect(command.input.ConditionExpression).toBe('#version = :expected');
    expect(command.input.ExpressionAttributeNames).toEqual({ '#version': 'version' });
    expect(command.input.ExpressionAttributeValues).toEqual({ ':expected': { N: '0' } });
  });

  it('should reject a second new profile for the same user', async () => {
    await repository.save(ReadingProfile.create(UserId.fromString('u1')));
    const duplicate = ReadingProfile.create(UserId.fromString('u1'));
    duplicate.addFavoriteGenre(Genre.create('Horror'));

    const error = await repository.save(duplicate).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConcurrencyError);
    expect(error).toMatchObject({ aggregateId: 'u1', expectedVersion: null, actualVersion: 0 });
    expect(duplicate.isNew).toBe(true);
    expect((await repository.findByUserId('u1'))?.favoriteGenreNames()).toEqual([]);
  });

  it('should load a saved profile', async () => {
    const profile = ReadingProfile.create(UserId.fromString('u1'));
    profile.addOrUpdateRating('b1', Rating.create(5));
    profile.blockItem('b2');
    await repository.save(profile);

    const loaded = await repository.findByUserId('u1');

    expect(loaded?.readingHistoryList()).toEqual(profile.readingHistoryList());
    expect(loaded?.blockedItemIds()).toEqual(['b2']);
    expect(loaded?.version).toBe(2);
  });

  it('should return null when the item does not exist', async () => {
    await expect(repository.findByUserId('missing')).resolves.toBeNull();
  });

  it('should translate a failed condition into ConcurrencyError', async () => {
    await repository.save(ReadingProfile.create(UserId.fromString('u1')));
    const first = await repository.findByUserId('u1');
    const second = await repository.findByUserId('u1');
    if (!first || !second) throw new Error('profile missing');

    first.blockItem('b1');
    await repository.save(first);
    second.blockItem('b2');

    await expect(repository.save(second)).rejects.toThrow(ConcurrencyError);
    await expect(repository.save(second)).rejects.toMatchObject({ expectedVersion: 0, actualVersion: 1 });
    expect(second.persistedVersion).toBe(0);
  });

  it('should report the stored version even when the stored item is malformed', async () => {
    await repository.save(ReadingProfile.create(UserId.fromString('u1')));
    const loaded = await repository.findByUserId('u1');
    if (!loaded) throw new Error('profile missing');
    fake.items.set('u1', { PK: { S: 'u1' }, userId: { S: 'u1' }, favoriteGenres: { S: 'broken' }, version: { N: '3' } });
    loaded.blockItem('b1');

    const error = await repository.save(loaded).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConcurrencyError);
    expect(error).toMatchObject({ expectedVersion: 0, actualVersion: 3 });
  });

  it('should reject saving a stored profile after it was deleted', async () => {
    await repository.save(ReadingProfile.create(UserId.fromString('u1')));
    const loaded = await repository.findByUserId('u1');
    if (!loaded) throw new Error('profile missing');
    await repository.delete('u1');
    loaded.blockItem('b1');

    await expect(repository.save(loaded)).rejects.toMatchObject({ expectedVersion: 0, actualVersion: null });
    await expect(repository.findByUserId('u1')).resolves.toBeNull();
  });

  it('should rethrow other client errors', async () => {
    fake.send.mockRejectedValueOnce(new Error('ProvisionedThroughputExceeded'));

    await expect(repository.save(ReadingProfile.create(UserId.fromString('u1')))).rejects.toThrow(
      'ProvisionedThroughputExceeded'
    );
  });

  it('should reject a malformed stored item', async () => {
    fake.items.set('u1', { PK: { S: 'u1' }, userId: { S: 'u1' }, version: { S: 'one' } });

    await expect(repository.findByUserId('u1')).rejects.toThrow(ProfileRecordError);
  });

  it('should delete idempotently', async () => {
    await repository.save(ReadingProfile.create(UserId.fromString('u1')));

    await repository.delete('u1');
    await repository.delete('u1');

    await expect(repository.findByUserId('u1')).resolves.toBeNull();
    expect(fake.send.mock.calls.filter(([command]) => command instanceof DeleteItemCommand)).toHaveLength(2);
  });
});
