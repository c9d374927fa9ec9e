import type { Frame } from './frame'

/**
 * 1 つ以上のフレームをまとめた名前付きテクスチャ
 * 現状は単一フレームのみ使用している
 */
export class Texture
{
  readonly name: string
  readonly frames: readonly Frame[]

  constructor(name: string, frames: readonly Frame[])
  {
    if (frames.length === 0)
    {
      throw new Error(`Texture ${name} has no frames`)
    }
    this.name = name
    this.frames = [...frames]
  }

  /** 先頭フレーム（UV やソート順の基準） */
  get primaryFrame(): Frame
  {
    return this.frames[0]
  }

  get source(): string
  {
    return this.primaryFrame.source
  }

  /** 画像を共有した未配置の複製 */
  clone(): Texture
  {
    return new Texture(this.name, this.frames.map((frame) => frame.clone()))
  }
}
