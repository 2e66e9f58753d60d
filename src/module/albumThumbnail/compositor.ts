import type { ResultAsync } from 'neverthrow';
import { logger } from '../../lib/logger.js';
import { writeFileAsync } from '../../lib/wrappedFs.js';
import type { CanvasFactory } from './canvas.js';
import type { LayoutParameters, ThumbnailConfig } from './config.js';
import { AlbumThumbnailError } from './error.js';
import type { LayoutPlan, Rect } from './layoutEngine.js';
import type { SourceImage } from './model/sourceImage.js';
import type { ThumbnailDestPath } from './valueObjects.js';

/**
 * 画像と描画先矩形の組
 */
export interface Placement {
  image: SourceImage;
  rect: Rect;
}

export type RenderParameters = Pick<
  ThumbnailConfig,
  | 'totalWidth'
  | 'padding'
  | 'borderWidth'
  | 'backgroundColor'
  | 'borderColor'
  | 'jpegQuality'
>;

export interface ComposedThumbnail {
  bytes: Buffer;
  width: number;
  height: number;
}

/**
 * 並べ替え済みの画像とレイアウト結果を index で対応付ける
 *
 * 枚数が一致しないのは呼び出し側のバグなので例外とする。
 */
export const toPlacements = (
  images: readonly SourceImage[],
  plan: LayoutPlan,
): Placement[] => {
  if (images.length !== plan.length) {
    throw new Error(
      `Image count (${images.length}) does not match layout plan (${plan.length})`,
    );
  }
  return plan.map((rect, i) => ({ image: images[i], rect }));
};

/**
 * キャンバスの高さ: 最も下にある矩形の下端 + 余白 + 枠線
 */
export const canvasHeightFor = (
  rects: readonly Rect[],
  params: Pick<LayoutParameters, 'padding' | 'borderWidth'>,
): number =>
  Math.max(...rects.map((rect) => rect.y + rect.h)) +
  params.padding +
  params.borderWidth;

/**
 * 枠線の矩形: 画像の矩形を borderWidth だけ外側に広げたもの
 */
export const borderRectFor = (rect: Rect, borderWidth: number): Rect => ({
  x: rect.x - borderWidth,
  y: rect.y - borderWidth,
  w: rect.w + 2 * borderWidth,
  h: rect.h + 2 * borderWidth,
});

/**
 * 背景で塗ったキャンバスに、枠線とリサンプルした画像を順に描画して JPEG にする
 */
export const composeThumbnail = async (
  placements: readonly Placement[],
  params: RenderParameters,
  createCanvas: CanvasFactory,
): Promise<ComposedThumbnail> => {
  const width = params.totalWidth;
  const height = canvasHeightFor(
    placements.map((p) => p.rect),
    params,
  );
  const canvas = createCanvas(width, height, params.backgroundColor);

  for (const { image, rect } of placements) {
    if (params.borderWidth > 0) {
      canvas.fillRect(
        borderRectFor(rect, params.borderWidth),
        params.borderColor,
      );
    }
    canvas.drawResampled(image, rect);
  }

  const bytes = await canvas.encodeJpeg(params.jpegQuality);
  return { bytes, width, height };
};

/**
 * JPEG を書き出す。既存ファイルは上書きする
 */
export const writeThumbnail = (
  destPath: ThumbnailDestPath,
  bytes: Buffer,
): ResultAsync<void, AlbumThumbnailError> =>
  writeFileAsync(destPath, bytes).mapErr((error) => {
    logger.warn({
      message: `Failed to write thumbnail: ${destPath}`,
      details: { ...error },
    });
    return new AlbumThumbnailError({
      code: 'FILE_WRITE_FAILED',
      message: error.message,
    });
  });
