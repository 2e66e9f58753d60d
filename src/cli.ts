#!/usr/bin/env node

/**
 * album-thumbnail CLI
 *
 * Usage:
 *   album-thumbnail <dest.jpg> <image> <image> <image> <image> [options]
 *
 * Options:
 *   --width <px>          Total width including padding and borders (196)
 *   --padding <px>        Gap between photos and around the edge (2)
 *   --border <px>         Border width around each photo (1)
 *   --background <color>  Background color, #rrggbb (#ffffff)
 *   --border-color <color>  Border color, #rrggbb (#808080)
 *   --quality <1-100>     JPEG quality (75)
 *   --lenient             Exit quietly when fewer than four images load
 *   --low-memory          Run libvips single-threaded without its cache
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import consola from 'consola';
import { z } from 'zod';
import { initializeSharp, LOW_MEMORY_CONFIG } from './lib/sharpConfig.js';
import { AlbumThumbnailBuilder } from './module/albumThumbnail/albumThumbnail.service.js';
import {
  type ThumbnailConfigInput,
  ThumbnailConfigSchema,
} from './module/albumThumbnail/config.js';

const USAGE =
  'Usage: album-thumbnail <dest.jpg> <image> <image> <image> <image> [--width px] [--padding px] [--border px] [--background #rrggbb] [--border-color #rrggbb] [--quality n] [--lenient] [--low-memory]';

const CliValuesSchema = z.object({
  width: z.coerce.number().optional(),
  padding: z.coerce.number().optional(),
  border: z.coerce.number().optional(),
  background: z.string().optional(),
  'border-color': z.string().optional(),
  quality: z.coerce.number().optional(),
  lenient: z.boolean().optional(),
  'low-memory': z.boolean().optional(),
});

/**
 * CLI 引数をサムネイル設定に変換する
 */
export const toConfigInput = (
  values: z.infer<typeof CliValuesSchema>,
): ThumbnailConfigInput => ({
  totalWidth: values.width,
  padding: values.padding,
  borderWidth: values.border,
  backgroundColor: values.background,
  borderColor: values['border-color'],
  jpegQuality: values.quality,
  insufficientImages: values.lenient ? 'skip' : 'error',
});

/**
 * @returns プロセスの終了コード
 */
export const runCli = async (argv: string[]): Promise<number> => {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    consola.error(error instanceof Error ? error.message : String(error));
    consola.info(USAGE);
    return 1;
  }

  const [destPath, ...imagePaths] = parsed.positionals;
  if (destPath === undefined || imagePaths.length === 0) {
    consola.info(USAGE);
    return 1;
  }

  const values = CliValuesSchema.safeParse(parsed.values);
  if (!values.success) {
    consola.error(values.error.message);
    return 1;
  }

  const configInput = toConfigInput(values.data);
  const config = ThumbnailConfigSchema.safeParse(configInput);
  if (!config.success) {
    for (const issue of config.error.issues) {
      consola.error(`${issue.path.join('.')}: ${issue.message}`);
    }
    return 1;
  }

  initializeSharp(values.data['low-memory'] ? LOW_MEMORY_CONFIG : {});
  const builder = new AlbumThumbnailBuilder(configInput);

  for (const imagePath of imagePaths) {
    const added = await builder.addImage(imagePath);
    if (added.isErr()) {
      consola.warn(`Skipped ${imagePath}: ${added.error.message}`);
    }
  }

  const result = await builder.makeThumbnail(destPath);
  if (result.isErr()) {
    consola.error(`${result.error.code}: ${result.error.message}`);
    return 1;
  }
  if (result.value === null) {
    consola.warn('Fewer than four images loaded, nothing written.');
    return 0;
  }

  consola.success(
    `Wrote ${result.value.destPath} (${result.value.width}x${result.value.height}, layout ${result.value.layout})`,
  );
  return 0;
};

const parseCliArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      width: { type: 'string' },
      padding: { type: 'string' },
      border: { type: 'string' },
      background: { type: 'string' },
      'border-color': { type: 'string' },
      quality: { type: 'string' },
      lenient: { type: 'boolean' },
      'low-memory': { type: 'boolean' },
    },
  });

// npm の bin はシンボリックリンク経由で起動される
const isDirectRun =
  process.argv[1] !== undefined &&
  pathToFileURL(realpathSync(process.argv[1])).href === import.meta.url;

if (isDirectRun) {
  const code = await runCli(process.argv.slice(2));
  process.exit(code);
}
