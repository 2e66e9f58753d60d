import { P, match } from 'ts-pattern';

export type AlbumThumbnailErrorCode =
  | 'INVALID_IMAGE'
  | 'UNSUPPORTED_FORMAT'
  | 'INSUFFICIENT_IMAGES'
  | 'FILE_READ_FAILED'
  | 'FILE_WRITE_FAILED'
  | 'INVALID_DESTINATION'
  | 'ENCODE_FAILED'
  | 'UNKNOWN';

type Code = AlbumThumbnailErrorCode;

/**
 * アルバムサムネイル生成に関するエラークラス。
 *
 * - INVALID_IMAGE: 幅・高さが 0 または破損した画像（アスペクト比が定義できない）
 * - UNSUPPORTED_FORMAT: 登録済みデコーダーのいずれにも該当しない入力
 * - INSUFFICIENT_IMAGES: ビルド時点で画像が4枚未満
 * - INVALID_DESTINATION: 出力先パスが空
 * - ENCODE_FAILED: 合成または JPEG エンコードに失敗
 */
export class AlbumThumbnailError extends Error {
  code: Code;

  constructor(
    codeOrError:
      | Code
      | (Error & { code: Code })
      | { code: Code; message?: string },
  ) {
    const result = match(codeOrError)
      .with(P.string, (code) => ({
        message: code,
        code: code as Code,
        stack: undefined,
      }))
      .with(P.instanceOf(Error), (error) => ({
        message: error.message,
        code: error.code,
        stack: error.stack,
      }))
      .with({ code: P.string }, (obj) => ({
        message: obj.message || obj.code,
        code: obj.code as Code,
        stack: undefined,
      }))
      .otherwise(() => ({
        message: 'UNKNOWN',
        code: 'UNKNOWN' as Code,
        stack: undefined,
      }));

    super(result.message);
    this.code = result.code;
    if (result.stack) {
      this.stack = result.stack;
    }
    this.name = this.constructor.name;
  }
}
