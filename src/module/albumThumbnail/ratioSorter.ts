import { err, ok, type Result } from 'neverthrow';
import { AlbumThumbnailError } from './error.js';
import type { SourceImage } from './model/sourceImage.js';

/**
 * アスペクト比で昇順に並んだ画像セット（index 0 が最も縦長）
 */
export type SortedImageQuad = readonly [
  SourceImage,
  SourceImage,
  SourceImage,
  SourceImage,
];
export type SortedImageTriple = readonly [SourceImage, SourceImage, SourceImage];
export type SortedImageSet = SortedImageQuad | SortedImageTriple;

/**
 * アスペクト比の比較関数
 */
export const compareByRatio = (
  a: Pick<SourceImage, 'ratio'>,
  b: Pick<SourceImage, 'ratio'>,
): number => a.ratio - b.ratio;

/**
 * アスペクト比の昇順に並べ替えた新しい配列を返す
 *
 * 同じ比を持つ画像同士の順序は保証しない。
 */
export const sortByRatio = <T extends Pick<SourceImage, 'ratio'>>(
  images: readonly T[],
): T[] => [...images].sort(compareByRatio);

/**
 * 並べ替えた上で最も縦長な4枚を取り出す
 *
 * 5枚以上ある場合、横長側の余剰分は使われない。
 */
export const selectSortedQuad = (
  images: readonly SourceImage[],
): Result<SortedImageQuad, AlbumThumbnailError> => {
  if (images.length < 4) {
    return err(
      new AlbumThumbnailError({
        code: 'INSUFFICIENT_IMAGES',
        message: `At least 4 images are required, got ${images.length}`,
      }),
    );
  }

  const [first, second, third, fourth] = sortByRatio(images);
  return ok([first, second, third, fourth]);
};
