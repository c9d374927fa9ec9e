/**
 * Core type definitions for @texpack/texture-atlas
 * アトラス生成に必要な型を集約
 */

/**
 * 幅と高さを持つもの
 */
export interface Sized2D
{
  readonly width: number
  readonly height: number
}

/**
 * 配置状態
 * 未配置から配置済みへの一方向のみ遷移する
 */
export type Placement =
  | { state: 'unplaced' }
  | { state: 'placed'; x: number; y: number }

/**
 * 一度だけ位置を割り当てられるもの
 */
export interface Positioned2D
{
  readonly placement: Placement
  place(x: number, y: number): void
}

/**
 * パッキング対象の矩形
 */
export interface Packable extends Sized2D, Positioned2D
{
  readonly perimeter: number
}

/**
 * デコード済み画像 (RGBA, 行優先, 左上原点)
 */
export interface DecodedImage
{
  width: number
  height: number
  /** width * height * 4 バイト */
  data: Uint8Array
}

/**
 * 画像パスからデコード済み画像を返すローダー
 */
export type ImageLoader = (path: string) => Promise<DecodedImage>

/**
 * アトラス画像のカラーモード
 * RGB の場合はアルファを 255 に固定する
 */
export type ColorMode = 'RGBA' | 'RGB'

/**
 * 正規化 UV 座標 (u0, v0, u1, v1)
 */
export type UVBounds = readonly [number, number, number, number]

/**
 * ログ出力先
 * サイズ不足による再試行は warn で出力する
 */
export interface AtlasLogger
{
  info(message: string): void
  warn(message: string): void
}

/**
 * アトラス生成のオプション
 */
export interface AtlasBuildOptions
{
  /** アトラス一辺の上限（ピクセル）デフォルト: 16384 */
  maxSize?: number
  /** 出力画像のカラーモード デフォルト: RGBA */
  colorMode?: ColorMode
  /** 画像ローダー デフォルト: Jimp によるファイル読み込み */
  loader?: ImageLoader
  /** 同時に読み込む画像の最大数（1 以上の整数） デフォルト: 8 */
  concurrency?: number
  /** デフォルト: console */
  logger?: AtlasLogger
}

/**
 * 論理キー → 画像パス
 * プレーンオブジェクトでは整数風のキー（"0", "12"）が先に列挙されるため、
 * 記述順を保ちたい場合は Map を渡す
 */
export type TextureSources = ReadonlyMap<string, string> | Readonly<Record<string, string>>

/**
 * パック失敗（内部でのみ使用し、サイズを倍にして再試行する）
 */
export interface AtlasTooSmallError
{
  type: 'ATLAS_TOO_SMALL'
  message: string
  /** 試行中のアトラスサイズ */
  size: number
  /** 配置できなかったフレームの画像パス */
  frame: string
}

/**
 * エラー型定義
 */
export type AtlasBuildError =
  | { type: 'EMPTY_INPUT'; message: string }
  | { type: 'DECODE_FAILURE'; message: string; path: string }
  | { type: 'INVALID_DIMENSIONS'; message: string; path: string; width: number; height: number }
  | { type: 'SIZE_LIMIT_EXCEEDED'; message: string; size: number; maxSize: number }
