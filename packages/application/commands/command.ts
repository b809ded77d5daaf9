/**
 * Command 基底クラス
 *
 * CQRS: 書き込み操作の抽象化
 */
import { randomUUID } from 'crypto';
import { DomainEventMetadata } from '../../domain/shared/domain-event';

export interface CommandMetadata {
  correlationId: string;
  userId?: string;
  traceId?: string;
}

export abstract class Command<TPayload = unknown> {
  public readonly commandId: string;
  public readonly commandType: string;
  public readonly payload: TPayload;
  public readonly metadata: CommandMetadata;

  constructor(
    payload: TPayload,
    metadata?: Partial<CommandMetadata>
  ) {
    this.commandId = randomUUID();
    this.commandType = this.constructor.name;
    this.payload = payload;
    this.metadata = {
      correlationId: metadata?.correlationId ?? this.commandId,
      userId: metadata?.userId,
      traceId: metadata?.traceId,
    };
  }

  /**
   * このコマンドが記録させるイベントの由来
   */
  eventMetadata(): DomainEventMetadata {
    return {
      correlationId: this.metadata.correlationId,
      causationId: this.commandId,
      userId: this.metadata.userId,
    };
  }
}

/**
 * Command Handler インターフェース
 */
export interface CommandHandler<TCommand extends Command, TResult = void> {
  execute(command: TCommand): Promise<TResult>;
}
