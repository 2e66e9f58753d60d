/**
 * CLI / ライブラリ共通ロガー
 *
 * consola をバックエンドに、構造化されたログパラメータを受け付ける。
 *
 * ## 使用例
 * ```ts
 * import { logger } from '../../lib/logger.js';
 *
 * logger.debug('Layout selected');
 * logger.info({ message: 'Thumbnail written', details: { destPath } });
 * logger.warn({ message: 'Image skipped', error });
 * ```
 *
 * ## ログレベル
 * `LOG_LEVEL` 環境変数 (silent | error | warn | info | debug) で上書き可能。
 * 未指定時は開発環境で debug、それ以外は info。
 */

import { createConsola, LogLevels } from 'consola';
import { match, P } from 'ts-pattern';
import { z } from 'zod';
import { isDevelopment } from './environment.js';

interface LogParams {
  message: string;
  error?: unknown;
  details?: Record<string, unknown>;
}

const LogLevelNameSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);
type LogLevelName = z.infer<typeof LogLevelNameSchema>;

/**
 * 環境変数からログレベルを解決する
 *
 * 不正な値は無視してデフォルトにフォールバックする。
 */
export const resolveLogLevel = (
  raw: string | undefined,
  development: boolean,
): number => {
  const parsed = LogLevelNameSchema.safeParse(raw?.toLowerCase());
  const name: LogLevelName = parsed.success
    ? parsed.data
    : development
      ? 'debug'
      : 'info';

  return match(name)
    .with('silent', () => LogLevels.silent)
    .with('error', () => LogLevels.error)
    .with('warn', () => LogLevels.warn)
    .with('info', () => LogLevels.info)
    .with('debug', () => LogLevels.debug)
    .exhaustive();
};

const consola = createConsola({
  level: resolveLogLevel(process.env.LOG_LEVEL, isDevelopment()),
  defaults: { tag: 'album-thumbnail' },
});

/**
 * エラーオブジェクトを正規化
 */
const normalizeError = (error: unknown): Error => {
  return match(error)
    .with(P.instanceOf(Error), (e) => e)
    .with(P.string, (s) => new Error(s))
    .otherwise((e) => new Error(String(e)));
};

/**
 * consola に渡す引数列を組み立てる
 */
const toArgs = (params: LogParams | string): [string, ...unknown[]] => {
  if (typeof params === 'string') {
    return [params];
  }

  const extras: unknown[] = [];

  if (params.error) {
    extras.push(normalizeError(params.error));
  }

  if (params.details && Object.keys(params.details).length > 0) {
    extras.push(params.details);
  }

  return [params.message, ...extras];
};

const debug = (params: LogParams | string): void => {
  consola.debug(...toArgs(params));
};

const info = (params: LogParams | string): void => {
  consola.info(...toArgs(params));
};

const warn = (params: LogParams | string): void => {
  consola.warn(...toArgs(params));
};

const error = (params: LogParams | string): void => {
  consola.error(...toArgs(params));
};

export const logger = {
  debug,
  info,
  warn,
  error,
};
