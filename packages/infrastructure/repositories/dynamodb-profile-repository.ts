/**
 * DynamoDB Profile Repository アダプター
 *
 * テーブル設計:
 * - PK: userId
 * - 属性: ProfileRecord（version で楽観的ロック）
 */
import {
  DynamoDBClient,
  PutItemCommand,
  GetItemCommand,
  DeleteItemCommand,
} from '@aws-sdk/client-dynamodb';
import { marshall, unmarshall } from '@aws-sdk/util-dynamodb';
import { ReadingProfile } from '../../domain/reading-profile/aggregates/reading-profile';
import { ProfileRepository, ConcurrencyError } from './profile-repository';
import { toProfileRecord, fromProfileRecord, parseProfileRecord } from './profile-record';
import { Logger, createLogger } from '../logging/logger';

export interface DynamoDBProfileRepositoryConfig {
  tableName: string;
  region?: string;
  endpoint?: string;  // ローカル開発用
  client?: DynamoDBClient;
  logger?: Logger;
}

export class DynamoDBProfileRepository implements ProfileRepository {
  private readonly client: DynamoDBClient;
  private readonly tableName: string;
  private readonly logger: Logger;

  constructor(config: DynamoDBProfileRepositoryConfig) {
    this.tableName = config.tableName;
    this.logger = config.logger ?? createLogger('DynamoDBProfileRepository');
    this.client = config.client ?? new DynamoDBClient({
      region: config.region ?? process.env.AWS_REGION ?? 'ap-northeast-1',
      ...(config.endpoint ? { endpoint: config.endpoint } : {}),
    });
  }

  async save(profile: ReadingProfile): Promise<void> {
    const record = toProfileRecord(profile);
    const expectedVersion = profile.persistedVersion;

    try {
      await this.client.send(
        new PutItemCommand({
          TableName: this.tableName,
          Item: marshall({ PK: record.userId, ...record }),
          // 楽観的ロック: 新規なら未作成、保存済みならバージョン一致
          ...(expectedVersion === null
            ? { ConditionExpression: 'attribute_not_exists(PK)' }
            : {
                ConditionExpression: '#version = :expected',
                ExpressionAttributeNames: { '#version': 'version' },
                ExpressionAttributeValues: marshall({ ':expected': expectedVersion }),
              }),
        })
      );
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'ConditionalCheckFailedException') {
        const actualVersion = await this.readStoredVersion(record.userId);
        this.logger.warn('Concurrent update rejected', {
          userId: record.userId,
          expectedVersion,
          actualVersion,
        });
        throw new ConcurrencyError(record.userId, expectedVersion, actualVersion);
      }
      throw error;
    }

    profile.markPersisted();
  }

  async findByUserId(userId: string): Promise<ReadingProfile | null> {
    const response = await this.client.send(
      new GetItemCommand({
        TableName: this.tableName,
        Key: marshall({ PK: userId }),
        ConsistentRead: true,
      })
    );

    if (!response.Item) {
      return null;
    }

    const { PK: _pk, ...data } = unmarshall(response.Item);
    return fromProfileRecord(parseProfileRecord(data));
  }

  async delete(userId: string): Promise<void> {
    await this.client.send(
      new DeleteItemCommand({
        TableName: this.tableName,
        Key: marshall({ PK: userId }),
      })
    );
  }

  /**
   * 保存済みの version 属性だけを読む（レコード全体は検証しない）
   */
  private async readStoredVersion(userId: string): Promise<number | null> {
    const response = await this.client.send(
      new GetItemCommand({
        TableName: this.tableName,
        Key: marshall({ PK: userId }),
        ProjectionExpression: '#version',
        ExpressionAttributeNames: { '#version': 'version' },
        ConsistentRead: true,
      })
    );
    if (!response.Item) {
      return null;
    }
    const item: Record<string, unknown> = unmarshall(response.Item);
    return typeof item.version === 'number' ? item.version : null;
  }
}
