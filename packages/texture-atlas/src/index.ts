/**
 * @texpack/texture-atlas - テクスチャアトラス生成ライブラリ
 *
 * 大きさの異なる複数の画像を 1 枚の正方形アトラスにパックし、
 * 各画像の正規化 UV 範囲を返します。
 */

// Public API のみをエクスポート
export { buildAtlas, DEFAULT_DECODE_CONCURRENCY } from './core/atlas-builder'
export type { AtlasBuildResult } from './core/atlas-builder'
export { Atlas } from './atlas/atlas'
export { Frame } from './atlas/frame'
export { Rectangle, containsRect, intersects } from './atlas/geometry'
export type { Bounds } from './atlas/geometry'
export { PackRegion } from './atlas/pack-region'
export type { PackRegionNode, RegionIndex } from './atlas/pack-region'
export {
  DEFAULT_MAX_ATLAS_SIZE,
  estimateAtlasSize,
  nextPowerOfTwo,
  packTexturesIntoAtlas,
  sortTexturesForPacking,
} from './atlas/packing'
export type { PackedAtlas, PackOptions } from './atlas/packing'
export { Texture } from './atlas/texture'
export { encodeAtlasPng, loadImageFile, writeAtlasPng } from './io/image'
export { formatBoundsMap, toBoundsMap } from './io/bounds-map'
export type { AtlasBoundsMap } from './io/bounds-map'
export type {
  AtlasBuildError,
  AtlasBuildOptions,
  AtlasLogger,
  AtlasTooSmallError,
  ColorMode,
  DecodedImage,
  ImageLoader,
  Packable,
  Placement,
  Positioned2D,
  Sized2D,
  TextureSources,
  UVBounds,
} from './types'
