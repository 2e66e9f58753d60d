import * as fs from 'node:fs';
import { isNativeError } from 'node:util/types';
import { ResultAsync } from 'neverthrow';
import { match } from 'ts-pattern';

/**
 * ファイル読み込みエラー型
 */
export type ReadFileError =
  | { type: 'ENOENT'; message: string }
  | { type: 'EACCES'; message: string }
  | { type: 'EISDIR'; message: string }
  | { type: 'IO_ERROR'; message: string; code?: string };

/**
 * ファイル書き込みエラー型
 */
export type WriteFileError =
  | { type: 'ENOENT'; message: string }
  | { type: 'EACCES'; message: string }
  | { type: 'ENOSPC'; message: string }
  | { type: 'IO_ERROR'; message: string; code?: string };

/**
 * Node.js のエラーオブジェクトかどうかを判定するユーティリティ。
 */
function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return isNativeError(error);
}

/**
 * Node.js 以外の例外は想定外なので re-throw する
 */
const toNodeError = (e: unknown): NodeJS.ErrnoException => {
  if (!isNodeError(e)) {
    throw e;
  }
  return e;
};

/**
 * ファイル全体をバッファとして読み込む。
 * 画像デコーダーがパス指定の入力を読む際に使用される。
 */
export const readFileAsync = (
  filePath: string,
): ResultAsync<Buffer, ReadFileError> =>
  ResultAsync.fromPromise(fs.promises.readFile(filePath), (e): ReadFileError =>
    match(toNodeError(e))
      .with({ code: 'ENOENT' }, (ee) => ({
        type: 'ENOENT' as const,
        message: ee.message,
      }))
      .with({ code: 'EACCES' }, (ee) => ({
        type: 'EACCES' as const,
        message: ee.message,
      }))
      .with({ code: 'EISDIR' }, (ee) => ({
        type: 'EISDIR' as const,
        message: ee.message,
      }))
      .otherwise((ee) => ({
        type: 'IO_ERROR' as const,
        message: ee.message,
        code: ee.code,
      })),
  );

/**
 * ファイルを書き込む。既存ファイルは上書きされる。
 * 生成したサムネイルの保存処理で使用される。
 */
export const writeFileAsync = (
  filePath: string,
  data: string | Uint8Array,
): ResultAsync<void, WriteFileError> =>
  ResultAsync.fromPromise(
    fs.promises.writeFile(filePath, data),
    (e): WriteFileError =>
      match(toNodeError(e))
        .with({ code: 'ENOENT' }, (ee) => ({
          type: 'ENOENT' as const,
          message: ee.message,
        }))
        .with({ code: 'EACCES' }, (ee) => ({
          type: 'EACCES' as const,
          message: ee.message,
        }))
        .with({ code: 'ENOSPC' }, (ee) => ({
          type: 'ENOSPC' as const,
          message: ee.message,
        }))
        .otherwise((ee) => ({
          type: 'IO_ERROR' as const,
          message: ee.message,
          code: ee.code,
        })),
  );
