/**
 * 画像の読み込みと PNG 書き出し
 *
 * Jimp を使用して PNG / JPEG / BMP / GIF / TIFF をデコードする
 */

import { writeFile } from 'node:fs/promises'
import { Jimp } from 'jimp'
import type { DecodedImage } from '../types'

/**
 * 画像ファイルを RGBA ビットマップとして読み込む
 *
 * @param path - 画像ファイルのパス
 */
export async function loadImageFile(path: string): Promise<DecodedImage>
{
  const image = await Jimp.read(path)
  const { width, height, data } = image.bitmap

  return {
    width,
    height,
    data: new Uint8Array(data),
  }
}

/**
 * RGBA ピクセルバッファを PNG にエンコード
 */
export async function encodeAtlasPng(
  atlas: { pixels: Uint8Array; width: number; height: number },
): Promise<Uint8Array>
{
  const image = Jimp.fromBitmap({
    data: Buffer.from(atlas.pixels),
    width: atlas.width,
    height: atlas.height,
  })

  const pngBuffer = await image.getBuffer('image/png')
  return new Uint8Array(pngBuffer)
}

/**
 * アトラス画像を PNG ファイルとして保存
 */
export async function writeAtlasPng(
  atlas: { pixels: Uint8Array; width: number; height: number },
  path: string,
): Promise<void>
{
  await writeFile(path, await encodeAtlasPng(atlas))
}
