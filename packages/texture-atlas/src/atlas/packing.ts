/**
 * アトラスサイズの見積もりとリトライ付きパッキング
 *
 * 1. テクスチャを先頭フレームの周長で降順ソート（大きいものから置くと隙間が少ない）
 * 2. 最大幅・最大高さ・総面積の平方根を 2 の n 乗に切り上げた値の最大を初期サイズとする
 * 3. 収まらなければサイズを倍にして最初からやり直す
 */

import { err, ok, type Result } from 'neverthrow'
import type { AtlasBuildError, AtlasLogger } from '../types'
import { Atlas } from './atlas'
import type { Texture } from './texture'

/** デフォルトのアトラス一辺の上限 */
export const DEFAULT_MAX_ATLAS_SIZE = 16384

export interface PackOptions
{
  maxSize?: number
  logger?: AtlasLogger
}

export interface PackedAtlas
{
  atlas: Atlas
  /** 試行したサイズ（最後が採用されたサイズ） */
  attemptedSizes: number[]
}

/**
 * value 以上の最小の 2 の n 乗
 * 例: 1 -> 1, 3 -> 4, 64 -> 64, 74 -> 128
 */
export function nextPowerOfTwo(value: number): number
{
  let result = 1
  while (result < value)
  {
    result *= 2
  }
  return result
}

/**
 * 周長の降順に並べ替えた新しい配列を返す（同じ周長は入力順を保つ）
 */
export function sortTexturesForPacking(textures: readonly Texture[]): Texture[]
{
  return [...textures].sort(
    (a, b) => b.primaryFrame.perimeter - a.primaryFrame.perimeter,
  )
}

/**
 * 初期アトラスサイズを見積もる
 * 平均的には十分だが収まる保証はない
 */
export function estimateAtlasSize(textures: readonly Texture[]): number
{
  let maxWidth = 0
  let maxHeight = 0
  let pixels = 0

  for (const texture of textures)
  {
    for (const frame of texture.frames)
    {
      maxWidth = Math.max(frame.width, maxWidth)
      maxHeight = Math.max(frame.height, maxHeight)
      pixels += frame.width * frame.height
    }
  }

  return Math.max(
    maxHeight,
    maxWidth,
    nextPowerOfTwo(Math.ceil(Math.sqrt(pixels))),
  )
}

/**
 * テクスチャをすべて 1 枚のアトラスに詰める
 *
 * 渡された順にパックするので、通常は sortTexturesForPacking の結果を渡す。
 * フレームの位置は一度しか設定できないため、入力のテクスチャには触れず
 * 試行ごとに未配置の複製をパックする。
 */
export function packTexturesIntoAtlas(
  textures: readonly Texture[],
  options: PackOptions = {},
): Result<PackedAtlas, AtlasBuildError>
{
  const maxSize = options.maxSize ?? DEFAULT_MAX_ATLAS_SIZE
  const logger = options.logger ?? console
  const attemptedSizes: number[] = []

  let size = estimateAtlasSize(textures)

  while (size <= maxSize)
  {
    logger.info(`Trying to pack textures into image of size ${size}x${size}`)
    attemptedSizes.push(size)

    const atlas = new Atlas(size)
    const failure = packAll(atlas, textures.map((texture) => texture.clone()))

    if (failure === null)
    {
      logger.info(
        `Packed ${atlas.textures.length} textures into ${size}x${size} (efficiency ${(atlas.efficiency() * 100).toFixed(1)}%)`,
      )
      return ok({ atlas, attemptedSizes })
    }

    logger.warn(`${failure}. Trying with a larger area`)
    size *= 2
  }

  return err({
    type: 'SIZE_LIMIT_EXCEEDED' as const,
    message: `Textures do not fit in an atlas of at most ${maxSize}x${maxSize} (needed ${size}x${size})`,
    size,
    maxSize,
  })
}

/**
 * @returns 失敗時はそのメッセージ、成功時は null
 */
function packAll(atlas: Atlas, textures: readonly Texture[]): string | null
{
  for (const texture of textures)
  {
    const result = atlas.pack(texture)
    if (result.isErr())
    {
      return result.error.message
    }
  }
  return null
}
