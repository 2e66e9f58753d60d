import sharp, { type OverlayOptions } from 'sharp';
import type { RgbColor } from './config.js';
import type { Rect } from './layoutEngine.js';
import type { SourceImage } from './model/sourceImage.js';

/**
 * 合成先キャンバスの描画プリミティブ
 *
 * 描画命令は呼び出し順に重ねられ、encodeJpeg() の時点で確定する。
 */
export interface ThumbnailCanvas {
  readonly width: number;
  readonly height: number;
  /** 単色で矩形を塗りつぶす */
  fillRect(rect: Rect, color: RgbColor): void;
  /** 画像全体を矩形に合わせてリサンプルして描画する（縦横比は矩形に従う） */
  drawResampled(image: SourceImage, rect: Rect): void;
  encodeJpeg(quality: number): Promise<Buffer>;
}

export type CanvasFactory = (
  width: number,
  height: number,
  background: RgbColor,
) => ThumbnailCanvas;

type DrawOperation =
  | { type: 'fill'; rect: Rect; color: RgbColor }
  | { type: 'image'; image: SourceImage; rect: Rect };

/**
 * sharp (libvips) による ThumbnailCanvas 実装
 *
 * 塗りつぶしは `create` 入力、画像は lanczos3 でリサンプルした生ピクセルを
 * composite で重ねる。
 */
export class SharpCanvas implements ThumbnailCanvas {
  private readonly operations: DrawOperation[] = [];

  constructor(
    readonly width: number,
    readonly height: number,
    private readonly background: RgbColor,
  ) {}

  fillRect(rect: Rect, color: RgbColor): void {
    if (rect.w <= 0 || rect.h <= 0) {
      return;
    }
    this.operations.push({ type: 'fill', rect, color });
  }

  drawResampled(image: SourceImage, rect: Rect): void {
    if (rect.w <= 0 || rect.h <= 0) {
      return;
    }
    this.operations.push({ type: 'image', image, rect });
  }

  async encodeJpeg(quality: number): Promise<Buffer> {
    const overlays = await Promise.all(
      this.operations.map((op) => this.toOverlay(op)),
    );

    return sharp({
      create: {
        width: this.width,
        height: this.height,
        channels: 3,
        background: this.background,
      },
    })
      .composite(overlays)
      .jpeg({ quality })
      .toBuffer();
  }

  private async toOverlay(op: DrawOperation): Promise<OverlayOptions> {
    if (op.type === 'fill') {
      return {
        input: {
          create: {
            width: op.rect.w,
            height: op.rect.h,
            channels: 3,
            background: op.color,
          },
        },
        left: op.rect.x,
        top: op.rect.y,
      };
    }

    // 非圧縮のまま重ねる。エンコードは encodeJpeg() の1回だけ
    const { data, info } = await sharp(op.image.data)
      .resize(op.rect.w, op.rect.h, { fit: 'fill', kernel: 'lanczos3' })
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      input: data,
      raw: { width: info.width, height: info.height, channels: info.channels },
      left: op.rect.x,
      top: op.rect.y,
    };
  }
}

export const createSharpCanvas: CanvasFactory = (width, height, background) =>
  new SharpCanvas(width, height, background);
