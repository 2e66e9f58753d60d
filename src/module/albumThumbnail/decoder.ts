import { errAsync, okAsync, ResultAsync } from 'neverthrow';
import * as path from 'pathe';
import sharp from 'sharp';
import { readFileAsync } from '../../lib/wrappedFs.js';
import { AlbumThumbnailError } from './error.js';
import { createSourceImage, type SourceImage } from './model/sourceImage.js';
import type { ImageFormat } from './valueObjects.js';

/**
 * フォーマットごとのデコーダー
 *
 * `matchesSignature` は先頭バイト列（マジックナンバー）で判定する。
 * `extensions` は内容から判定できない場合のヒントとしてのみ使う。
 */
export interface ImageDecoder {
  readonly format: ImageFormat;
  readonly extensions: readonly string[];
  matchesSignature(bytes: Uint8Array): boolean;
  decode(
    bytes: Buffer,
    label: string,
  ): ResultAsync<SourceImage, AlbumThumbnailError>;
}

export interface DecodeOptions {
  /** 呼び出し側が明示するフォーマット。シグネチャ判定より優先される */
  format?: ImageFormat;
}

const startsWith = (bytes: Uint8Array, signature: readonly number[]): boolean =>
  bytes.length >= signature.length &&
  signature.every((byte, i) => bytes[i] === byte);

const toInvalidImage =
  (label: string) =>
  (e: unknown): AlbumThumbnailError =>
    new AlbumThumbnailError({
      code: 'INVALID_IMAGE',
      message: `Failed to decode ${label}: ${e instanceof Error ? e.message : String(e)}`,
    });

/**
 * sharp で画像全体をデコードして検証するデコーダーを生成する
 *
 * ヘッダーだけでなく全ピクセルを展開するため、途中で切れたファイルや
 * 破損したデータはここで INVALID_IMAGE になる。
 * 展開したピクセルは保持せず、合成時に元のバイト列から再度読む。
 */
export const createSharpDecoder = (
  format: ImageFormat,
  extensions: readonly string[],
  signatures: readonly (readonly number[])[],
): ImageDecoder => ({
  format,
  extensions,
  matchesSignature: (bytes) => signatures.some((sig) => startsWith(bytes, sig)),
  decode: (bytes, label) =>
    ResultAsync.fromPromise(sharp(bytes).metadata(), toInvalidImage(label))
      .andThen((metadata) => {
        if (metadata.format !== format) {
          return errAsync(
            new AlbumThumbnailError({
              code: 'UNSUPPORTED_FORMAT',
              message: `Expected ${format} but ${label} is ${metadata.format}`,
            }),
          );
        }
        return ResultAsync.fromPromise(
          sharp(bytes).raw().toBuffer({ resolveWithObject: true }),
          toInvalidImage(label),
        );
      })
      .andThen(({ info }) =>
        createSourceImage({
          data: bytes,
          format,
          width: info.width,
          height: info.height,
          label,
        }),
      ),
});

export const jpegDecoder = createSharpDecoder(
  'jpeg',
  ['.jpg', '.jpeg', '.jpe'],
  [[0xff, 0xd8, 0xff]],
);

export const pngDecoder = createSharpDecoder(
  'png',
  ['.png'],
  [[0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]],
);

export const gifDecoder = createSharpDecoder(
  'gif',
  ['.gif'],
  [
    [0x47, 0x49, 0x46, 0x38, 0x37, 0x61], // GIF87a
    [0x47, 0x49, 0x46, 0x38, 0x39, 0x61], // GIF89a
  ],
);

/**
 * フォーマットからデコーダーを引くレジストリ
 *
 * 判定順: 明示されたフォーマット → 内容のシグネチャ → 拡張子
 */
export class DecoderRegistry {
  private readonly decoders = new Map<ImageFormat, ImageDecoder>();

  constructor(decoders: readonly ImageDecoder[] = []) {
    for (const decoder of decoders) {
      this.register(decoder);
    }
  }

  register(decoder: ImageDecoder): this {
    this.decoders.set(decoder.format, decoder);
    return this;
  }

  get formats(): ImageFormat[] {
    return [...this.decoders.keys()];
  }

  /**
   * 入力に対応するデコーダーを決定する
   */
  resolve(
    bytes: Uint8Array,
    hints: { format?: ImageFormat; fileName?: string } = {},
  ): ImageDecoder | null {
    if (hints.format !== undefined) {
      return this.decoders.get(hints.format) ?? null;
    }

    for (const decoder of this.decoders.values()) {
      if (decoder.matchesSignature(bytes)) {
        return decoder;
      }
    }

    if (hints.fileName === undefined) {
      return null;
    }
    const ext = path.extname(hints.fileName).toLowerCase();
    for (const decoder of this.decoders.values()) {
      if (decoder.extensions.includes(ext)) {
        return decoder;
      }
    }
    return null;
  }

  /**
   * ファイルパスまたはバッファをデコードする
   */
  decode(
    input: string | Buffer,
    options: DecodeOptions = {},
  ): ResultAsync<SourceImage, AlbumThumbnailError> {
    return readInput(input).andThen(({ bytes, label, fileName }) => {
      const decoder = this.resolve(bytes, {
        format: options.format,
        fileName,
      });
      if (decoder === null) {
        return errAsync(
          new AlbumThumbnailError({
            code: 'UNSUPPORTED_FORMAT',
            message: `Unsupported image format: ${label}`,
          }),
        );
      }
      return decoder.decode(bytes, label);
    });
  }
}

interface ReadInput {
  bytes: Buffer;
  label: string;
  fileName?: string;
}

const readInput = (
  input: string | Buffer,
): ResultAsync<ReadInput, AlbumThumbnailError> => {
  if (typeof input !== 'string') {
    return okAsync({ bytes: input, label: '<buffer>' });
  }

  return readFileAsync(input)
    .map((bytes) => ({ bytes, label: input, fileName: input }))
    .mapErr(
      (error) =>
        new AlbumThumbnailError({
          code: 'FILE_READ_FAILED',
          message: `${error.type}: ${error.message}`,
        }),
    );
};

/**
 * JPEG / PNG / GIF を扱う標準レジストリを生成する
 */
export const createDefaultDecoderRegistry = (): DecoderRegistry =>
  new DecoderRegistry([jpegDecoder, pngDecoder, gifDecoder]);
