import type { UVBounds } from '../types'

/**
 * アトラスと一緒に書き出すマップファイルの内容
 */
export interface AtlasBoundsMap
{
  width: number
  height: number
  /** 論理キー → [u0, v0, u1, v1] */
  textures: Record<string, [number, number, number, number]>
}

export function toBoundsMap(
  bounds: ReadonlyMap<string, UVBounds>,
  width: number,
  height: number,
): AtlasBoundsMap
{
  // "__proto__" も独自プロパティとして残す
  const textures: AtlasBoundsMap['textures'] = Object.fromEntries(
    [...bounds].map(([key, [u0, v0, u1, v1]]) => [key, [u0, v0, u1, v1]]),
  )

  return { width, height, textures }
}

export function formatBoundsMap(map: AtlasBoundsMap): string
{
  return `${JSON.stringify(map, null, 2)}\n`
}
