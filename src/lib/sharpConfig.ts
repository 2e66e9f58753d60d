/**
 * Sharp (libvips) の設定管理
 *
 * サムネイル生成時のデコード・リサンプル・エンコードはすべて sharp が担う。
 * libvips のスレッド数とキャッシュはプロセス全体で共有されるため、
 * 設定はこのモジュールに集約する。
 *
 * ## 参考
 * - https://sharp.pixelplumbing.com/api-utility#concurrency
 * - https://sharp.pixelplumbing.com/api-utility#cache
 */

import sharp from 'sharp';
import { logger } from './logger.js';

/**
 * Sharp設定オプション
 */
export interface SharpConfigOptions {
  /**
   * libvipsのスレッド数
   * - 0: CPUコア数
   * - 1: シングルスレッド（メモリ使用量最小）
   */
  concurrency: number;

  /**
   * キャッシュ設定
   * - false: キャッシュ無効
   * - { memory, files, items }: 詳細設定
   */
  cache:
    | false
    | {
        /** メモリキャッシュ上限 (MB) */
        memory: number;
        /** ファイルキャッシュ数 */
        files: number;
        /** アイテムキャッシュ数 */
        items: number;
      };
}

/**
 * デフォルト設定
 *
 * 1回のビルドで扱う画像は高々数枚なので、キャッシュは小さく保つ。
 */
const DEFAULT_CONFIG: SharpConfigOptions = {
  concurrency: 2,
  cache: {
    memory: 50,
    files: 10,
    items: 50,
  },
};

/**
 * 低メモリ設定
 *
 * 大きな画像を扱う環境向け。CLI の `--low-memory` で使用する。
 */
export const LOW_MEMORY_CONFIG: SharpConfigOptions = {
  concurrency: 1,
  cache: false,
};

let isInitialized = false;
let currentConfig: SharpConfigOptions = DEFAULT_CONFIG;

const applyConfig = (config: SharpConfigOptions): void => {
  sharp.concurrency(config.concurrency);

  if (config.cache === false) {
    sharp.cache(false);
  } else {
    sharp.cache(config.cache);
  }

  currentConfig = config;
};

/**
 * Sharpを初期化する
 *
 * @param options 設定オプション（省略時はデフォルト設定）
 */
export const initializeSharp = (
  options: Partial<SharpConfigOptions> = {},
): void => {
  const config: SharpConfigOptions = {
    ...DEFAULT_CONFIG,
    ...options,
  };

  applyConfig(config);
  isInitialized = true;

  logger.debug({
    message: 'Sharp initialized',
    details: {
      concurrency: sharp.concurrency(),
      cache: config.cache,
    },
  });
};

/**
 * 未初期化の場合のみデフォルト設定で初期化する
 *
 * ビルダー生成時に呼ばれる。明示的な initializeSharp() の設定は上書きしない。
 */
export const ensureSharpInitialized = (): void => {
  if (!isInitialized) {
    initializeSharp();
  }
};

/**
 * 現在の設定を取得
 */
export const getCurrentConfig = (): SharpConfigOptions => {
  return { ...currentConfig };
};

/**
 * 初期化済みかどうかを確認
 */
export const isSharpInitialized = (): boolean => {
  return isInitialized;
};
