/**
 * ギロチン分割による矩形パッキング
 *
 * 領域に矩形を 1 つ置くと、残りの空き領域を 2 つの子領域に分割する。
 * - sub1: 置いた矩形の真下（矩形と同じ幅）
 * - sub2: 置いた矩形の右側（親領域と同じ高さ）
 * 既に矩形を持つ領域では sub1 → sub2 の順に深さ優先で探索する。
 *
 * 領域ツリーは配列（アリーナ）上に保持し、子はインデックスで参照する。
 */

import type { Packable } from '../types'
import type { Bounds } from './geometry'

export type RegionIndex = number

/**
 * ツリー内の 1 領域
 */
export interface PackRegionNode<T extends Packable> extends Bounds
{
  /** この領域に置かれた矩形（未使用なら null） */
  occupant: T | null
  sub1: RegionIndex | null
  sub2: RegionIndex | null
}

export class PackRegion<T extends Packable>
{
  private readonly nodes: PackRegionNode<T>[] = []

  constructor(x: number, y: number, width: number, height: number)
  {
    this.addNode(x, y, width, height)
  }

  get root(): Readonly<PackRegionNode<T>>
  {
    return this.nodes[0]
  }

  get x(): number
  {
    return this.root.x
  }

  get y(): number
  {
    return this.root.y
  }

  get width(): number
  {
    return this.root.width
  }

  get height(): number
  {
    return this.root.height
  }

  /** 生成済みの領域数 */
  get regionCount(): number
  {
    return this.nodes.length
  }

  node(index: RegionIndex): Readonly<PackRegionNode<T>>
  {
    const node = this.nodes[index]
    if (!node)
    {
      throw new Error(`Invalid region index: ${index}`)
    }
    return node
  }

  /**
   * 矩形をツリー内のいずれかの空き領域に配置する
   *
   * @returns 配置できた場合 true。失敗時はツリーも矩形も変更しない
   */
  pack(packable: T): boolean
  {
    const stack: RegionIndex[] = [0]

    for (let index = stack.pop(); index !== undefined; index = stack.pop())
    {
      const node = this.nodes[index]

      if (node.occupant === null)
      {
        if (packable.width > node.width || packable.height > node.height)
        {
          continue
        }
        this.occupy(index, packable)
        return true
      }

      // sub1 を先に探索するため後から積む
      if (node.sub2 !== null) stack.push(node.sub2)
      if (node.sub1 !== null) stack.push(node.sub1)
    }

    return false
  }

  /**
   * 配置済みの矩形を前順（自身 → sub1 → sub2）で列挙
   */
  getAllPackables(): T[]
  {
    const result: T[] = []
    const stack: RegionIndex[] = [0]

    for (let index = stack.pop(); index !== undefined; index = stack.pop())
    {
      const node = this.nodes[index]
      if (node.occupant === null) continue

      result.push(node.occupant)
      if (node.sub2 !== null) stack.push(node.sub2)
      if (node.sub1 !== null) stack.push(node.sub1)
    }

    return result
  }

  private occupy(index: RegionIndex, packable: T): void
  {
    const node = this.nodes[index]
    packable.place(node.x, node.y)
    node.occupant = packable

    node.sub1 = this.addNode(
      node.x,
      node.y + packable.height,
      packable.width,
      node.height - packable.height,
    )
    node.sub2 = this.addNode(
      node.x + packable.width,
      node.y,
      node.width - packable.width,
      node.height,
    )
  }

  private addNode(x: number, y: number, width: number, height: number): RegionIndex
  {
    this.nodes.push({ x, y, width, height, occupant: null, sub1: null, sub2: null })
    return this.nodes.length - 1
  }
}
