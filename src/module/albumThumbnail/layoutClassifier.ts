import { match } from 'ts-pattern';
import type { AspectRatio } from './valueObjects.js';

/**
 * アスペクト比の昇順に並んだ4枚分の比
 */
export type RatioQuad = readonly [
  AspectRatio,
  AspectRatio,
  AspectRatio,
  AspectRatio,
];
export type RatioTriple = readonly [AspectRatio, AspectRatio, AspectRatio];

/**
 * 採用するレイアウト
 *
 * 3A のみ、レイアウト計算前に最も横長な画像 (index 3) を除外する。
 */
export type LayoutChoice =
  | { kind: '4A' }
  | { kind: '4B' }
  | { kind: '4C' }
  | { kind: '4D' }
  | { kind: '3A'; dropIndex: 3 };

export type LayoutKind = LayoutChoice['kind'];

/**
 * レイアウト判定の閾値
 */
export const LAYOUT_THRESHOLDS = {
  /** r0 がこれを超えると全画像が十分に横長とみなす (4D) */
  ALL_WIDE_MIN_RATIO: 2.0,
  /** r2 がこれ未満だと4枚中3枚が縦長とみなす (3A) */
  THREE_TALL_MAX_RATIO: 0.8,
  /** 4C: r0 がこれ以下 */
  ONE_TALL_MAX_RATIO: 1.0,
  /** 4C: r1 がこれを超える */
  ONE_TALL_REST_MIN_RATIO: 1.2,
  /** 4B: r1 がこれ以下 */
  TWO_TALL_MAX_RATIO: 1.0,
  /** 4B: r2 がこれを超える */
  TWO_TALL_REST_MIN_RATIO: 1.3,
} as const;

/**
 * 並べ替え済みの比とコイントスの結果からレイアウトを決定する
 *
 * 上から順に評価し、最初に一致したものを採用する。
 * 1. r0 > 2.0 → 4D
 * 2. r2 < 0.8 → 3A（最も横長な1枚を除外）
 * 3. r0 ≤ 1.0 かつ r1 > 1.2 → 4C
 * 4. r1 ≤ 1.0 かつ r2 > 1.3 かつ coinFlip → 4B
 * 5. それ以外 → 4A
 *
 * 4B は条件を満たす入力の半分でのみ選ばれ、見た目に変化をつける。
 */
export const classifyLayout = (
  ratios: RatioQuad,
  coinFlip: boolean,
): LayoutChoice => {
  const [r0, r1, r2] = ratios;
  const t = LAYOUT_THRESHOLDS;

  return match({ r0, r1, r2, coinFlip })
    .returnType<LayoutChoice>()
    .when(
      (r) => r.r0 > t.ALL_WIDE_MIN_RATIO,
      () => ({ kind: '4D' }),
    )
    .when(
      (r) => r.r2 < t.THREE_TALL_MAX_RATIO,
      () => ({ kind: '3A', dropIndex: 3 }),
    )
    .when(
      (r) =>
        r.r0 <= t.ONE_TALL_MAX_RATIO && r.r1 > t.ONE_TALL_REST_MIN_RATIO,
      () => ({ kind: '4C' }),
    )
    .when(
      (r) =>
        r.r1 <= t.TWO_TALL_MAX_RATIO &&
        r.r2 > t.TWO_TALL_REST_MIN_RATIO &&
        r.coinFlip,
      () => ({ kind: '4B' }),
    )
    .otherwise(() => ({ kind: '4A' }));
};
