import sharp from 'sharp';
import { match } from 'ts-pattern';
import type { RgbColor } from '../module/albumThumbnail/config.js';

/**
 * テスト用の単色画像をメモリ上に生成する
 */
export const createTestImage = async (
  width: number,
  height: number,
  format: 'jpeg' | 'png' | 'gif' | 'webp',
  color: RgbColor = { r: 200, g: 40, b: 40 },
): Promise<Buffer> => {
  const image = sharp({
    create: { width, height, channels: 3, background: color },
  });

  return match(format)
    .with('jpeg', () => image.jpeg({ quality: 90 }).toBuffer())
    .with('png', () => image.png({ compressionLevel: 1 }).toBuffer())
    .with('gif', () => image.gif().toBuffer())
    .with('webp', () => image.webp().toBuffer())
    .exhaustive();
};

/**
 * ガウスノイズの JPEG を生成する
 */
export const createNoisyJpeg = async (
  width: number,
  height: number,
  quality: number,
): Promise<Buffer> =>
  sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 128, g: 128, b: 128 },
      noise: { type: 'gaussian', mean: 128, sigma: 40 },
    },
  })
    .jpeg({ quality })
    .toBuffer();

/**
 * 同じ寸法の2枚の画像の、RGB チャンネルごとの平均絶対誤差
 */
export const meanAbsoluteDifference = async (
  a: Buffer,
  b: Buffer,
): Promise<number> => {
  const [left, right] = await Promise.all(
    [a, b].map((input) =>
      sharp(input).removeAlpha().raw().toBuffer({ resolveWithObject: true }),
    ),
  );
  if (
    left.info.width !== right.info.width ||
    left.info.height !== right.info.height
  ) {
    throw new Error('Image dimensions differ');
  }

  let total = 0;
  for (let i = 0; i < left.data.length; i++) {
    total += Math.abs(left.data[i] - right.data[i]);
  }
  return total / left.data.length;
};

/**
 * 画像の指定座標のピクセル値を読む
 */
export const readPixel = async (
  input: string | Buffer,
  x: number,
  y: number,
): Promise<RgbColor> => {
  const { data, info } = await sharp(input)
    .raw()
    .toBuffer({ resolveWithObject: true });
  const offset = (y * info.width + x) * info.channels;
  return { r: data[offset], g: data[offset + 1], b: data[offset + 2] };
};

/**
 * 各チャンネルの差が許容範囲内か（JPEG の劣化を考慮）
 */
export const isCloseColor = (
  actual: RgbColor,
  expected: RgbColor,
  tolerance = 12,
): boolean =>
  Math.abs(actual.r - expected.r) <= tolerance &&
  Math.abs(actual.g - expected.g) <= tolerance &&
  Math.abs(actual.b - expected.b) <= tolerance;
