import { err, ok, type Result } from 'neverthrow';
import { AlbumThumbnailError } from '../error.js';
import {
  type AspectRatio,
  AspectRatioSchema,
  type ImageFormat,
  PixelDimensionSchema,
} from '../valueObjects.js';

/**
 * デコード済みのソース画像
 *
 * `data` はエンコード済みバイト列のままで保持し、
 * 合成時に sharp がリサンプルする（ピクセルには直接触れない）。
 * 生成後は変更されない。
 */
export interface SourceImage {
  readonly data: Buffer;
  readonly format: ImageFormat;
  readonly width: number;
  readonly height: number;
  readonly ratio: AspectRatio;
  /** ログ表示用のラベル（ファイルパスまたは `<buffer>`） */
  readonly label: string;
}

/**
 * 寸法を検証して SourceImage を生成する
 *
 * 幅・高さが正の整数でない場合や、比が有限にならない場合は INVALID_IMAGE。
 */
export const createSourceImage = (params: {
  data: Buffer;
  format: ImageFormat;
  width: number | undefined;
  height: number | undefined;
  label: string;
}): Result<SourceImage, AlbumThumbnailError> => {
  const width = PixelDimensionSchema.safeParse(params.width);
  const height = PixelDimensionSchema.safeParse(params.height);
  if (!width.success || !height.success) {
    return err(
      new AlbumThumbnailError({
        code: 'INVALID_IMAGE',
        message: `Invalid image dimensions for ${params.label}: ${params.width}x${params.height}`,
      }),
    );
  }

  const ratio = AspectRatioSchema.safeParse(width.data / height.data);
  if (!ratio.success) {
    return err(
      new AlbumThumbnailError({
        code: 'INVALID_IMAGE',
        message: `Aspect ratio is undefined for ${params.label}`,
      }),
    );
  }

  return ok(
    Object.freeze({
      data: params.data,
      format: params.format,
      width: width.data,
      height: height.data,
      ratio: ratio.data,
      label: params.label,
    }),
  );
};
