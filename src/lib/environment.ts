/**
 * 環境判定ユーティリティ
 */

/**
 * 開発環境かどうかを判定
 *
 * @returns NODE_ENV が 'development' の場合 true
 */
export const isDevelopment = (): boolean => {
  return process.env.NODE_ENV === 'development';
};
