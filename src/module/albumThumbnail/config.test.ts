import { describe, expect, it } from 'vitest';
import { ColorSchema, ThumbnailConfigSchema } from './config.js';

describe('ThumbnailConfigSchema', () => {
  it('未指定の項目はデフォルト値で埋める', () => {
    expect(ThumbnailConfigSchema.parse({})).toEqual({
      totalWidth: 196,
      padding: 2,
      borderWidth: 1,
      backgroundColor: { r: 255, g: 255, b: 255 },
      borderColor: { r: 128, g: 128, b: 128 },
      jpegQuality: 75,
      insufficientImages: 'error',
    });
  });

  it('指定された値を使う', () => {
    const config = ThumbnailConfigSchema.parse({
      totalWidth: 400,
      padding: 0,
      borderWidth: 3,
      backgroundColor: '#102030',
      borderColor: 0x000000,
      jpegQuality: 90,
      insufficientImages: 'skip',
    });

    expect(config.totalWidth).toBe(400);
    expect(config.padding).toBe(0);
    expect(config.borderWidth).toBe(3);
    expect(config.backgroundColor).toEqual({ r: 0x10, g: 0x20, b: 0x30 });
    expect(config.borderColor).toEqual({ r: 0, g: 0, b: 0 });
    expect(config.jpegQuality).toBe(90);
    expect(config.insufficientImages).toBe('skip');
  });

  it.each([
    { totalWidth: 0 },
    { totalWidth: 196.5 },
    { padding: -1 },
    { borderWidth: -2 },
    { jpegQuality: 0 },
    { jpegQuality: 101 },
    { insufficientImages: 'ignore' },
  ])('不正な値 %o は拒否する', (input) => {
    expect(ThumbnailConfigSchema.safeParse(input).success).toBe(false);
  });
});

describe('ColorSchema', () => {
  it('0xRRGGBB 形式の数値を RGB に分解する', () => {
    expect(ColorSchema.parse(0x808080)).toEqual({ r: 128, g: 128, b: 128 });
    expect(ColorSchema.parse(0xff0001)).toEqual({ r: 255, g: 0, b: 1 });
  });

  it('#rrggbb 形式の文字列を受け付ける（# は省略可、大文字可）', () => {
    expect(ColorSchema.parse('#ff8000')).toEqual({ r: 255, g: 128, b: 0 });
    expect(ColorSchema.parse('FF8000')).toEqual({ r: 255, g: 128, b: 0 });
  });

  it('RGB オブジェクトはそのまま受け付ける', () => {
    expect(ColorSchema.parse({ r: 1, g: 2, b: 3 })).toEqual({
      r: 1,
      g: 2,
      b: 3,
    });
  });

  it.each([0x1000000, -1, '#fff', 'red', { r: 256, g: 0, b: 0 }])(
    '不正な色 %o は拒否する',
    (input) => {
      expect(ColorSchema.safeParse(input).success).toBe(false);
    },
  );
});
