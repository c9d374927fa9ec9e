import type { AtlasBuildError, ColorMode } from '@texpack/texture-atlas'

/**
 * build コマンドのオプション
 */
export interface BuildOptions
{
  /** アトラス PNG の出力先 */
  output: string
  /** UV マップ JSON の出力先 */
  map: string
  maxSize: number
  colorMode: ColorMode
}

/**
 * build コマンドの結果
 */
export interface BuildSummary
{
  width: number
  height: number
  textureCount: number
  attemptedSizes: number[]
  efficiency: number
  output: string
  map: string
}

/**
 * エラー型定義
 */
export type CliError =
  | AtlasBuildError
  | { type: 'INVALID_MAPPING'; message: string }
  | { type: 'INVALID_OPTION'; message: string }
  | { type: 'IO_ERROR'; message: string }
