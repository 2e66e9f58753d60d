import { z } from 'zod';

/**
 * アスペクト比（幅 / 高さ）の Branded Type
 *
 * 0 以下・非有限の値は型レベルで排除される。
 * レイアウト計算での 0 除算を防ぐため、画像登録時にのみ生成する。
 */
export const AspectRatioSchema = z
  .number()
  .positive('Aspect ratio must be greater than 0')
  .finite('Aspect ratio must be finite')
  .brand<'AspectRatio'>();

export type AspectRatio = z.infer<typeof AspectRatioSchema>;

/**
 * 画像のピクセル寸法（正の整数）
 */
export const PixelDimensionSchema = z
  .number()
  .int('Pixel dimension must be an integer')
  .positive('Pixel dimension must be greater than 0');

/**
 * サムネイル出力先パス
 */
export const ThumbnailDestPathSchema = z
  .string()
  .min(1, 'Destination path cannot be empty')
  .brand<'ThumbnailDestPath'>();

export type ThumbnailDestPath = z.infer<typeof ThumbnailDestPathSchema>;

/**
 * 対応画像フォーマット
 */
export const ImageFormatSchema = z.enum(['jpeg', 'png', 'gif']);

export type ImageFormat = z.infer<typeof ImageFormatSchema>;
