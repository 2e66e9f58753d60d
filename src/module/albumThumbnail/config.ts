import { z } from 'zod';

/**
 * RGB カラー
 */
export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

const ChannelSchema = z.number().int().min(0).max(255);

const HEX_COLOR_REGEX = /^#?([0-9a-f]{6})$/i;

const numberToRgb = (value: number): RgbColor => ({
  r: (value >> 16) & 0xff,
  g: (value >> 8) & 0xff,
  b: value & 0xff,
});

/**
 * 色指定スキーマ
 *
 * `0xRRGGBB` 形式の数値、`#rrggbb` 形式の文字列、または RgbColor を受け付け、
 * RgbColor に正規化する。
 */
export const ColorSchema = z
  .union([
    z.number().int().min(0).max(0xffffff),
    z.string().regex(HEX_COLOR_REGEX, 'Expected a #rrggbb color'),
    z.object({ r: ChannelSchema, g: ChannelSchema, b: ChannelSchema }),
  ])
  .transform((value): RgbColor => {
    if (typeof value === 'number') {
      return numberToRgb(value);
    }
    if (typeof value === 'string') {
      return numberToRgb(Number.parseInt(value.replace('#', ''), 16));
    }
    return { r: value.r, g: value.g, b: value.b };
  });

/**
 * サムネイル生成設定
 *
 * デフォルト値は 196px 幅・余白 2px・枠線 1px・白背景・灰色枠線・JPEG 品質 75。
 */
export const ThumbnailConfigSchema = z.object({
  /** 出力画像の全幅 (px)。余白と枠線を含む */
  totalWidth: z.number().int().positive().default(196),
  /** 画像間、および画像とキャンバス端との間隔 (px)。枠線を含まない */
  padding: z.number().int().nonnegative().default(2),
  /** 各画像の周囲に描画する枠線の太さ (px)。キャンバス全体には描画しない */
  borderWidth: z.number().int().nonnegative().default(1),
  backgroundColor: ColorSchema.default(0xffffff),
  borderColor: ColorSchema.default(0x808080),
  jpegQuality: z.number().int().min(1).max(100).default(75),
  /**
   * 画像が4枚未満のときの挙動
   * - error: INSUFFICIENT_IMAGES を返す
   * - skip: 何も出力せず ok(null) を返す（互換モード）
   */
  insufficientImages: z.enum(['error', 'skip']).default('error'),
});

export type ThumbnailConfigInput = z.input<typeof ThumbnailConfigSchema>;
export type ThumbnailConfig = z.output<typeof ThumbnailConfigSchema>;

/**
 * レイアウト計算に必要なパラメータのみを抜き出した型
 */
export type LayoutParameters = Pick<
  ThumbnailConfig,
  'totalWidth' | 'padding' | 'borderWidth'
>;
