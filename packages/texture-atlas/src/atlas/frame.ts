import type { ColorMode, DecodedImage, Packable, Placement } from '../types'
import { Rectangle } from './geometry'

/**
 * アトラスに配置される 1 枚の画像
 *
 * デコード済み画像と、その解像度で作られた Rectangle を合成したもの。
 * 同じ画像パスを複数のフレームで共有しても、配置はフレームごとに独立する。
 */
export class Frame implements Packable
{
  readonly source: string
  readonly image: DecodedImage
  readonly rectangle: Rectangle

  constructor(source: string, image: DecodedImage)
  {
    this.source = source
    this.image = image
    this.rectangle = new Rectangle(image.width, image.height)
  }

  get width(): number
  {
    return this.rectangle.width
  }

  get height(): number
  {
    return this.rectangle.height
  }

  get perimeter(): number
  {
    return this.rectangle.perimeter
  }

  get placement(): Placement
  {
    return this.rectangle.placement
  }

  get x(): number
  {
    return this.rectangle.x
  }

  get y(): number
  {
    return this.rectangle.y
  }

  place(x: number, y: number): void
  {
    this.rectangle.place(x, y)
  }

  /** 画像を共有した未配置の複製 */
  clone(): Frame
  {
    return new Frame(this.source, this.image)
  }

  /**
   * 配置済みの位置に画像を上書きコピーする（ブレンドなし）
   *
   * @param target - 書き込み先のビットマップ（RGBA）
   * @param colorMode - RGB の場合アルファを 255 にする
   */
  draw(target: DecodedImage, colorMode: ColorMode = 'RGBA'): void
  {
    const { x: targetX, y: targetY } = this.rectangle
    const { width, height, data } = this.image
    const rowBytes = width * 4

    for (let y = 0; y < height; y++)
    {
      const srcStart = y * rowBytes
      const dstStart = ((targetY + y) * target.width + targetX) * 4
      target.data.set(data.subarray(srcStart, srcStart + rowBytes), dstStart)

      if (colorMode === 'RGB')
      {
        for (let i = dstStart + 3; i < dstStart + rowBytes; i += 4)
        {
          target.data[i] = 0xff
        }
      }
    }
  }
}
