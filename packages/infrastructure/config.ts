/**
 * Runtime Configuration
 *
 * 環境変数から設定を取得して検証する。
 *
 * 設定取得の優先順位:
 * 1. 環境変数
 * 2. デフォルト値
 */
import { z } from 'zod';
import { LOG_LEVELS, LogLevel } from './logging/logger';

const envSchema = z.object({
  PROFILE_REPOSITORY: z.enum(['memory', 'dynamodb']).default('memory'),
  PROFILE_TABLE_NAME: z.string().min(1).default('reading-profiles'),
  AWS_REGION: z.string().min(1).default('ap-northeast-1'),
  DYNAMODB_ENDPOINT: z.string().url().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface AppConfig {
  repository: 'memory' | 'dynamodb';
  dynamodb: {
    tableName: string;
    region: string;
    endpoint?: string;
  };
  logLevel: LogLevel;
}

// キャッシュ
let cachedConfig: AppConfig | null = null;

/**
 * 環境変数を検証して設定を構築
 * @throws Error 検証に失敗した場合
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  const parsed = result.data;
  return {
    repository: parsed.PROFILE_REPOSITORY,
    dynamodb: {
      tableName: parsed.PROFILE_TABLE_NAME,
      region: parsed.AWS_REGION,
      ...(parsed.DYNAMODB_ENDPOINT ? { endpoint: parsed.DYNAMODB_ENDPOINT } : {}),
    },
    logLevel: parsed.LOG_LEVEL,
  };
}

/**
 * process.env から設定を取得（初回のみ検証してキャッシュ）
 */
export function loadConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = parseConfig(process.env);
  }
  return cachedConfig;
}

/**
 * キャッシュをクリア（テスト用）
 */
export function resetConfigCache(): void {
  cachedConfig = null;
}
