import { err, ok, type Result, ResultAsync } from 'neverthrow';
import { match } from 'ts-pattern';
import { logger } from '../../lib/logger.js';
import { ensureSharpInitialized } from '../../lib/sharpConfig.js';
import { type CanvasFactory, createSharpCanvas } from './canvas.js';
import { composeThumbnail, toPlacements, writeThumbnail } from './compositor.js';
import {
  type ThumbnailConfig,
  type ThumbnailConfigInput,
  ThumbnailConfigSchema,
} from './config.js';
import {
  createDefaultDecoderRegistry,
  type DecodeOptions,
  type DecoderRegistry,
} from './decoder.js';
import { AlbumThumbnailError } from './error.js';
import { classifyLayout, type LayoutKind } from './layoutClassifier.js';
import { computeLayoutPlan, type LayoutPlan } from './layoutEngine.js';
import type { SourceImage } from './model/sourceImage.js';
import { type SortedImageSet, selectSortedQuad } from './ratioSorter.js';
import { type ThumbnailDestPath, ThumbnailDestPathSchema } from './valueObjects.js';

/**
 * 4B を採用するかどうかのコイントス
 */
export type CoinFlip = () => boolean;

const defaultCoinFlip: CoinFlip = () => Math.random() < 0.5;

export interface AlbumThumbnailDependencies {
  coinFlip: CoinFlip;
  createCanvas: CanvasFactory;
  decoders: DecoderRegistry;
}

/**
 * サムネイル生成結果
 */
export interface ThumbnailResult {
  layout: LayoutKind;
  /** 並べ替え後の index ごとの矩形 */
  plan: LayoutPlan;
  /** 描画に使った画像（並べ替え後、3A では3枚） */
  images: SortedImageSet;
  width: number;
  height: number;
  destPath: ThumbnailDestPath;
  byteLength: number;
}

/**
 * 4枚の画像からアルバム用のコラージュサムネイルを生成する
 *
 * @example
 * ```ts
 * const builder = new AlbumThumbnailBuilder({ totalWidth: 196 });
 * await builder.addImage('/images/001.jpg');
 * await builder.addImage('/images/002.jpg');
 * await builder.addImage('/images/003.jpg');
 * await builder.addImage('/images/004.jpg');
 * const result = await builder.makeThumbnail('/images/thumb.jpg');
 * ```
 *
 * ビルダーは1バッチにつき1回限り使用する。
 * makeThumbnail() は成功・失敗に関わらず最後に保持している画像を解放する。
 */
export class AlbumThumbnailBuilder {
  readonly config: ThumbnailConfig;
  private readonly deps: AlbumThumbnailDependencies;
  private images: SourceImage[] = [];

  constructor(
    config: ThumbnailConfigInput = {},
    deps: Partial<AlbumThumbnailDependencies> = {},
  ) {
    this.config = ThumbnailConfigSchema.parse(config);
    this.deps = {
      coinFlip: deps.coinFlip ?? defaultCoinFlip,
      createCanvas: deps.createCanvas ?? createSharpCanvas,
      decoders: deps.decoders ?? createDefaultDecoderRegistry(),
    };
    ensureSharpInitialized();
  }

  get imageCount(): number {
    return this.images.length;
  }

  /**
   * 画像を追加する
   *
   * デコードできない入力は追加せずに警告を出すだけで、バッチ全体は止めない。
   * 結果は必要な場合のみ呼び出し側で確認する。
   */
  async addImage(
    input: string | Buffer,
    options: DecodeOptions = {},
  ): Promise<Result<SourceImage, AlbumThumbnailError>> {
    const result = await this.deps.decoders.decode(input, options);

    return result
      .map((image) => {
        this.images.push(image);
        logger.debug({
          message: `Image added: ${image.label}`,
          details: {
            format: image.format,
            width: image.width,
            height: image.height,
            ratio: image.ratio,
          },
        });
        return image;
      })
      .mapErr((error) => {
        logger.warn({
          message: `Image skipped (${error.code})`,
          error,
        });
        return error;
      });
  }

  /**
   * レイアウトを決定してサムネイルを書き出す
   *
   * 画像が4枚未満の場合、設定 `insufficientImages` に従い
   * INSUFFICIENT_IMAGES を返すか、何もせず ok(null) を返す。
   * いずれの場合も出力先には触れない。
   */
  async makeThumbnail(
    destPath: string,
  ): Promise<Result<ThumbnailResult | null, AlbumThumbnailError>> {
    try {
      return await this.build(destPath);
    } finally {
      this.release();
    }
  }

  /**
   * 保持している画像をすべて解放する。何度呼んでもよい
   */
  release(): void {
    if (this.images.length === 0) {
      return;
    }
    logger.debug(`Releasing ${this.images.length} image(s)`);
    this.images = [];
  }

  private async build(
    rawDestPath: string,
  ): Promise<Result<ThumbnailResult | null, AlbumThumbnailError>> {
    const parsedDest = ThumbnailDestPathSchema.safeParse(rawDestPath);
    if (!parsedDest.success) {
      return err(
        new AlbumThumbnailError({
          code: 'INVALID_DESTINATION',
          message: `Invalid destination path: "${rawDestPath}"`,
        }),
      );
    }
    const destPath = parsedDest.data;

    const quadResult = selectSortedQuad(this.images);
    if (quadResult.isErr()) {
      const error = quadResult.error;
      return match(this.config.insufficientImages)
        .with('skip', () => {
          logger.info({
            message: 'Not enough images, thumbnail skipped',
            details: { imageCount: this.images.length, destPath },
          });
          return ok(null);
        })
        .with('error', () => err(error))
        .exhaustive();
    }

    const sorted = quadResult.value;
    const ratios = [
      sorted[0].ratio,
      sorted[1].ratio,
      sorted[2].ratio,
      sorted[3].ratio,
    ] as const;
    const choice = classifyLayout(ratios, this.deps.coinFlip());

    const images: SortedImageSet = match(choice)
      .returnType<SortedImageSet>()
      .with({ kind: '3A' }, () => [sorted[0], sorted[1], sorted[2]])
      .otherwise(() => sorted);

    const plan = computeLayoutPlan(choice, ratios, this.config);
    logger.debug({
      message: `Layout ${choice.kind} selected`,
      details: { ratios, plan },
    });

    const composedResult = await ResultAsync.fromPromise(
      composeThumbnail(
        toPlacements(images, plan),
        this.config,
        this.deps.createCanvas,
      ),
      (e) =>
        new AlbumThumbnailError({
          code: 'ENCODE_FAILED',
          message: e instanceof Error ? e.message : String(e),
        }),
    );
    if (composedResult.isErr()) {
      logger.error({
        message: `Failed to compose thumbnail: ${destPath}`,
        error: composedResult.error,
      });
      return err(composedResult.error);
    }
    const composed = composedResult.value;

    const written = await writeThumbnail(destPath, composed.bytes);
    if (written.isErr()) {
      return err(written.error);
    }

    logger.info({
      message: `Thumbnail written: ${destPath}`,
      details: {
        layout: choice.kind,
        width: composed.width,
        height: composed.height,
      },
    });

    return ok({
      layout: choice.kind,
      plan,
      images,
      width: composed.width,
      height: composed.height,
      destPath,
      byteLength: composed.bytes.length,
    });
  }
}
