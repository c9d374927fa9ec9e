/**
 * テクスチャアトラス
 *
 * 正方形の PackRegion と、パック順に並んだテクスチャ列を合成したもの。
 * 1 つのアトラスは 1 回のサイズ試行に対応し、失敗したら呼び出し側で破棄する。
 */

import { Jimp } from 'jimp'
import { err, ok, type Result } from 'neverthrow'
import type { AtlasTooSmallError, ColorMode, UVBounds } from '../types'
import type { Frame } from './frame'
import { PackRegion } from './pack-region'
import type { Texture } from './texture'

export class Atlas
{
  readonly size: number
  private readonly region: PackRegion<Frame>
  private readonly packed: Texture[] = []

  constructor(size: number)
  {
    this.size = size
    this.region = new PackRegion<Frame>(0, 0, size, size)
  }

  get width(): number
  {
    return this.region.width
  }

  get height(): number
  {
    return this.region.height
  }

  /** パック順のテクスチャ */
  get textures(): readonly Texture[]
  {
    return this.packed
  }

  /**
   * テクスチャの全フレームをフレーム順にパックする
   * 1 枚でも収まらなければその時点で ATLAS_TOO_SMALL を返す（配置済みフレームは戻さない）
   */
  pack(texture: Texture): Result<void, AtlasTooSmallError>
  {
    for (const frame of texture.frames)
    {
      if (!this.region.pack(frame))
      {
        return err({
          type: 'ATLAS_TOO_SMALL' as const,
          message: `Failed to pack frame ${frame.source} (${frame.width}x${frame.height}) into ${this.size}x${this.size} atlas`,
          size: this.size,
          frame: frame.source,
        })
      }
    }

    this.packed.push(texture)
    return ok(undefined)
  }

  getAllPackables(): Frame[]
  {
    return this.region.getAllPackables()
  }

  /** 配置済みフレームの総ピクセル数 */
  get usedArea(): number
  {
    return this.getAllPackables().reduce(
      (sum, frame) => sum + frame.width * frame.height,
      0,
    )
  }

  /**
   * パッキング効率を計算（0-1）
   */
  efficiency(): number
  {
    return this.usedArea / (this.width * this.height)
  }

  /**
   * アトラス画像を生成
   * 背景は RGBA なら透明、RGB なら不透明の黒
   */
  generate(colorMode: ColorMode = 'RGBA')
  {
    const atlasImage = new Jimp({
      width: this.width,
      height: this.height,
      color: colorMode === 'RGB' ? 0x000000ff : 0x00000000,
    })

    for (const texture of this.packed)
    {
      for (const frame of texture.frames)
      {
        frame.draw(atlasImage.bitmap, colorMode)
      }
    }

    return atlasImage
  }

  /**
   * テクスチャ名 → 先頭フレームの正規化 UV
   *
   * v1 は (y + min(height, width)) / H で計算する。
   * 既存の利用側がこの値に合わせているため、非正方形でも高さを使わない。
   */
  toBoundsTable(): Map<string, UVBounds>
  {
    const table = new Map<string, UVBounds>()

    for (const texture of this.packed)
    {
      const frame = texture.primaryFrame
      table.set(texture.name, [
        frame.x / this.width,
        frame.y / this.height,
        (frame.x + frame.width) / this.width,
        (frame.y + Math.min(frame.height, frame.width)) / this.height,
      ])
    }

    return table
  }
}
