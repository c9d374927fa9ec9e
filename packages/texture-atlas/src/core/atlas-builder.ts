/**
 * Core atlas builder
 *
 * 論理キー → 画像パスのマッピングを受け取り、全画像をデコードして
 * 1 枚の正方形アトラスにパックし、RGBA ピクセルバッファと
 * 論理キーごとの UV 範囲を返す。
 */

import { err, errAsync, ok, ResultAsync, type Result } from 'neverthrow'
import pLimit, { type LimitFunction } from 'p-limit'
import type { Atlas } from '../atlas/atlas'
import { Frame } from '../atlas/frame'
import { packTexturesIntoAtlas, sortTexturesForPacking } from '../atlas/packing'
import { Texture } from '../atlas/texture'
import { loadImageFile } from '../io/image'
import type {
  AtlasBuildError,
  AtlasBuildOptions,
  DecodedImage,
  ImageLoader,
  TextureSources,
  UVBounds,
} from '../types'

/** 同時にデコードする画像数のデフォルト */
export const DEFAULT_DECODE_CONCURRENCY = 8

/**
 * アトラス生成結果
 */
export interface AtlasBuildResult
{
  /** width * height * 4 バイトの RGBA（行優先・左上原点） */
  pixels: Uint8Array
  /** 論理キー → UV（入力の順序） */
  bounds: Map<string, UVBounds>
  width: number
  height: number
  /** 試行したサイズ（最後が採用されたサイズ） */
  attemptedSizes: number[]
  atlas: Atlas
}

export function buildAtlas(
  sources: TextureSources,
  options: AtlasBuildOptions = {},
): ResultAsync<AtlasBuildResult, AtlasBuildError>
{
  const entries = toEntries(sources)
  const logger = options.logger ?? console
  const colorMode = options.colorMode ?? 'RGBA'

  if (entries.length === 0)
  {
    return errAsync({ type: 'EMPTY_INPUT' as const, message: 'No textures to pack' })
  }

  logger.info(`Creating texture atlas from ${entries.length} textures`)

  // 同じパスは一度だけデコードし、テクスチャはキーごとに作る
  // 同時に開くファイル数は concurrency で抑える
  const imageCache = new Map<string, ResultAsync<DecodedImage, AtlasBuildError>>()
  const loader = options.loader ?? loadImageFile
  const limit = pLimit(options.concurrency ?? DEFAULT_DECODE_CONCURRENCY)

  const textures = ResultAsync.combine(
    entries.map(([key, path]) =>
      loadCached(path, loader, limit, imageCache).map(
        (image) => new Texture(key, [new Frame(path, image)]),
      ),
    ),
  )

  return textures
    .andThen((decoded) =>
      packTexturesIntoAtlas(sortTexturesForPacking(decoded), {
        maxSize: options.maxSize,
        logger,
      }),
    )
    .map(({ atlas, attemptedSizes }) =>
    {
      const image = atlas.generate(colorMode)
      const table = atlas.toBoundsTable()

      const bounds = new Map<string, UVBounds>()
      for (const [key] of entries)
      {
        const uv = table.get(key)
        if (uv) bounds.set(key, uv)
      }

      logger.info('Finished creating texture atlas')

      return {
        pixels: new Uint8Array(image.bitmap.data),
        bounds,
        width: atlas.width,
        height: atlas.height,
        attemptedSizes,
        atlas,
      }
    })
}

function loadCached(
  path: string,
  loader: ImageLoader,
  limit: LimitFunction,
  cache: Map<string, ResultAsync<DecodedImage, AtlasBuildError>>,
): ResultAsync<DecodedImage, AtlasBuildError>
{
  const cached = cache.get(path)
  if (cached) return cached

  const loaded = ResultAsync.fromPromise(
    limit(() => loader(path)),
    (error) => ({
      type: 'DECODE_FAILURE' as const,
      message: `Failed to decode image ${path}: ${String(error)}`,
      path,
    }),
  ).andThen((image) => validateImage(path, image))

  cache.set(path, loaded)
  return loaded
}

function validateImage(
  path: string,
  image: DecodedImage,
): Result<DecodedImage, AtlasBuildError>
{
  if (image.width <= 0 || image.height <= 0)
  {
    return err({
      type: 'INVALID_DIMENSIONS' as const,
      message: `Image ${path} has invalid dimensions ${image.width}x${image.height}`,
      path,
      width: image.width,
      height: image.height,
    })
  }
  if (image.data.length !== image.width * image.height * 4)
  {
    return err({
      type: 'DECODE_FAILURE' as const,
      message: `Image ${path} has ${image.data.length} bytes, expected ${image.width * image.height * 4}`,
      path,
    })
  }
  return ok(image)
}

function isSourceMap(sources: TextureSources): sources is ReadonlyMap<string, string>
{
  return sources instanceof Map
}

function toEntries(sources: TextureSources): Array<[string, string]>
{
  return isSourceMap(sources) ? [...sources.entries()] : Object.entries(sources)
}
