/**
 * 4枚（または3枚）の画像をアスペクト比に応じて配置する矩形を計算する。
 *
 * ```
 * 4A: 標準的な比率向け     4B: 縦長2枚 + 標準2枚     4C: 1枚だけ縦長
 * +---+-------+           +---+-----+---+           +---+-----------+
 * | 1 |   2   |           |   |  3  |   |           | 1 |           |
 * +---+-----+-+           | 1 +-----+ 0 |           +---+           |
 * |    3    |0|           |   |  2  |   |           | 3 |     0     |
 * +---------+-+           +---+-----+---+           +---+           |
 *                                                   | 2 |           |
 * 4D: 全て横長             3A: 縦長3枚               +---+-----------+
 * +--------------+        +---+-----+-+
 * |      1       |        |   |     | |
 * +--------------+        | 1 |  2  |0|
 * |      3       |        |   |     | |
 * +--------------+        +---+-----+-+
 * |      2       |
 * +--------------+
 * |      0       |
 * +--------------+
 * ```
 *
 * 番号は比の昇順での index（0 が最も縦長）。
 *
 * ## 丸めの規則
 * - 行（列）内の共有寸法は丸める前の値から各画像の幅（高さ）を求め、それぞれ Math.round する
 * - 行（列）の最後の画像は全幅から他の画像と余白を差し引いて求める。丸め誤差はここで吸収され、
 *   全幅 `totalWidth` にぴったり収まる
 * - 次の画像の位置は丸めた後の矩形から求める
 */

import { match } from 'ts-pattern';
import type { LayoutParameters } from './config.js';
import type {
  LayoutChoice,
  RatioQuad,
  RatioTriple,
} from './layoutClassifier.js';

/**
 * 画像を描画する矩形（枠線の内側, px）
 */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
}

/**
 * 並べ替え後の index ごとの矩形
 */
export type QuadPlan = readonly [Rect, Rect, Rect, Rect];
export type TriplePlan = readonly [Rect, Rect, Rect];
export type LayoutPlan = QuadPlan | TriplePlan;

/**
 * 隣接する画像間の距離（余白 + 両側の枠線）と、キャンバス端から最初の画像までの距離
 */
const spacing = ({ padding, borderWidth }: LayoutParameters) => ({
  gap: padding + 2 * borderWidth,
  edge: padding + borderWidth,
});

const rightOf = (rect: Rect, gap: number): number => rect.x + rect.w + gap;
const below = (rect: Rect, gap: number): number => rect.y + rect.h + gap;

/**
 * 4A: 1行目に {1, 2}、2行目に {3, 0} を並べる
 */
export const layout4A = (
  ratios: RatioQuad,
  params: LayoutParameters,
): QuadPlan => {
  const [r0, r1, r2, r3] = ratios;
  const { totalWidth, padding, borderWidth } = params;
  const { gap, edge } = spacing(params);
  const rowSpan = totalWidth - 3 * padding - 4 * borderWidth;

  const h1 = rowSpan / (r1 + r2);
  const h2 = rowSpan / (r3 + r0);

  const rect1: Rect = {
    x: edge,
    y: edge,
    w: Math.round(r1 * h1),
    h: Math.round(h1),
  };
  const rect2: Rect = {
    x: rightOf(rect1, gap),
    y: rect1.y,
    w: rowSpan - rect1.w,
    h: rect1.h,
  };
  const rect3: Rect = {
    x: rect1.x,
    y: below(rect1, gap),
    w: Math.round(r3 * h2),
    h: Math.round(h2),
  };
  const rect0: Rect = {
    x: rightOf(rect3, gap),
    y: rect3.y,
    w: rowSpan - rect3.w,
    h: rect3.h,
  };

  return [rect0, rect1, rect2, rect3];
};

/**
 * 4B: 左列に 1、中央列に {3, 2} を縦に積み、右列に 0 を置く
 *
 * 中央列の幅 w は `w / r3 + w / r2 + gap = h1` を満たすので、
 * 高さ h1 に対する実効的な比は調和的に `1 / (1 / r3 + 1 / r2)` となる。
 */
export const layout4B = (
  ratios: RatioQuad,
  params: LayoutParameters,
): QuadPlan => {
  const [r0, r1, r2, r3] = ratios;
  const { totalWidth, padding, borderWidth } = params;
  const { gap, edge } = spacing(params);

  const middleRatio = 1 / (1 / r3 + 1 / r2);
  const h1 =
    (totalWidth - 2 * padding - 2 * borderWidth + gap * (middleRatio - 2)) /
    (r1 + r0 + middleRatio);
  const h3 = (h1 - gap) / (1 + r3 / r2);

  const rect1: Rect = {
    x: edge,
    y: edge,
    w: Math.round(r1 * h1),
    h: Math.round(h1),
  };
  const rect3: Rect = {
    x: rightOf(rect1, gap),
    y: rect1.y,
    w: Math.round(r3 * h3),
    h: Math.round(h3),
  };
  const rect2: Rect = {
    x: rect3.x,
    y: below(rect3, gap),
    w: rect3.w,
    h: rect1.h - rect3.h - gap,
  };
  const rect0: Rect = {
    x: rightOf(rect2, gap),
    y: rect1.y,
    w: totalWidth - rect1.w - rect3.w - 4 * padding - 6 * borderWidth,
    h: rect1.h,
  };

  return [rect0, rect1, rect2, rect3];
};

/**
 * 4C: 左列に {1, 3, 2} を同じ幅で積み、右列に縦長の 0 を置く
 *
 * 3 と 2 は 1 の幅をそのまま使うため、比は厳密には保たれない。
 * 先に右列の高さ h0 を求め、左列を上から順に決める。
 */
export const layout4C = (
  ratios: RatioQuad,
  params: LayoutParameters,
): QuadPlan => {
  const [r0, r1, r2, r3] = ratios;
  const { totalWidth, padding, borderWidth } = params;
  const { gap, edge } = spacing(params);

  const inverseSum = 1 / r3 + 1 / r2 + 1 / r1;
  const h0 =
    (totalWidth - 2 * padding - 2 * borderWidth - gap * (1 - 2 / inverseSum)) /
    (r0 + 1 / inverseSum);
  const h1 = (h0 - 2 * gap) / (r1 * (1 / r3 + 1 / r2) + 1);
  const h3 = (h1 * r1) / r3;
  const h2 = h0 - h1 - h3 - 2 * gap;

  const rect1: Rect = {
    x: edge,
    y: edge,
    w: Math.round(r1 * h1),
    h: Math.round(h1),
  };
  const rect3: Rect = {
    x: rect1.x,
    y: below(rect1, gap),
    w: rect1.w,
    h: Math.round(h3),
  };
  const rect2: Rect = {
    x: rect1.x,
    y: below(rect3, gap),
    w: rect1.w,
    h: Math.round(h2),
  };
  const rect0: Rect = {
    x: rightOf(rect1, gap),
    y: rect1.y,
    w: totalWidth - rect1.w - 3 * padding - 4 * borderWidth,
    h: rect1.h + rect3.h + rect2.h + 2 * gap,
  };

  return [rect0, rect1, rect2, rect3];
};

/**
 * 4D: 全幅の4行を {1, 3, 2, 0} の順に積む
 */
export const layout4D = (
  ratios: RatioQuad,
  params: LayoutParameters,
): QuadPlan => {
  const [r0, r1, r2, r3] = ratios;
  const { totalWidth, padding, borderWidth } = params;
  const { gap, edge } = spacing(params);
  const rowWidth = totalWidth - 2 * padding - 2 * borderWidth;

  const rect1: Rect = {
    x: edge,
    y: edge,
    w: rowWidth,
    h: Math.round(rowWidth / r1),
  };
  const rect3: Rect = {
    x: edge,
    y: below(rect1, gap),
    w: rowWidth,
    h: Math.round(rowWidth / r3),
  };
  const rect2: Rect = {
    x: edge,
    y: below(rect3, gap),
    w: rowWidth,
    h: Math.round(rowWidth / r2),
  };
  const rect0: Rect = {
    x: edge,
    y: below(rect2, gap),
    w: rowWidth,
    h: Math.round(rowWidth / r0),
  };

  return [rect0, rect1, rect2, rect3];
};

/**
 * 3A: {1, 2, 0} を1行に並べる
 */
export const layout3A = (
  ratios: RatioTriple,
  params: LayoutParameters,
): TriplePlan => {
  const [r0, r1, r2] = ratios;
  const { totalWidth, padding, borderWidth } = params;
  const { gap, edge } = spacing(params);

  const h1 = (totalWidth - 4 * padding - 6 * borderWidth) / (r0 + r1 + r2);

  const rect1: Rect = {
    x: edge,
    y: edge,
    w: Math.round(r1 * h1),
    h: Math.round(h1),
  };
  const rect2: Rect = {
    x: rightOf(rect1, gap),
    y: rect1.y,
    w: Math.round(r2 * h1),
    h: rect1.h,
  };
  const rect0: Rect = {
    x: rightOf(rect2, gap),
    y: rect1.y,
    w: totalWidth - rect1.w - rect2.w - 4 * padding - 6 * borderWidth,
    h: rect1.h,
  };

  return [rect0, rect1, rect2];
};

/**
 * 選択されたレイアウトの矩形を計算する
 *
 * 3A の場合は最も横長な比 (index 3) を除いた3枚で計算する。
 */
export const computeLayoutPlan = (
  choice: LayoutChoice,
  ratios: RatioQuad,
  params: LayoutParameters,
): LayoutPlan =>
  match(choice)
    .returnType<LayoutPlan>()
    .with({ kind: '4A' }, () => layout4A(ratios, params))
    .with({ kind: '4B' }, () => layout4B(ratios, params))
    .with({ kind: '4C' }, () => layout4C(ratios, params))
    .with({ kind: '4D' }, () => layout4D(ratios, params))
    .with({ kind: '3A' }, () => {
      const [r0, r1, r2] = ratios;
      return layout3A([r0, r1, r2], params);
    })
    .exhaustive();
