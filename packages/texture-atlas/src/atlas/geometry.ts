import type { Packable, Placement, Sized2D } from '../types'

/**
 * 位置を一度だけ割り当てられる矩形
 *
 * 幅と高さは生成時に固定され、位置は place() でのみ設定される。
 * 配置済みの矩形を再配置しようとすると例外を投げる。
 */
export class Rectangle implements Packable
{
  readonly width: number
  readonly height: number
  private _placement: Placement = { state: 'unplaced' }

  constructor(width: number, height: number)
  {
    this.width = width
    this.height = height
  }

  get placement(): Placement
  {
    return this._placement
  }

  get isPlaced(): boolean
  {
    return this._placement.state === 'placed'
  }

  get perimeter(): number
  {
    return 2 * this.width + 2 * this.height
  }

  get x(): number
  {
    return this.placed().x
  }

  get y(): number
  {
    return this.placed().y
  }

  place(x: number, y: number): void
  {
    if (this._placement.state === 'placed')
    {
      throw new Error(
        `Rectangle ${this.width}x${this.height} is already placed at (${this._placement.x}, ${this._placement.y})`,
      )
    }
    this._placement = { state: 'placed', x, y }
  }

  private placed(): { x: number; y: number }
  {
    if (this._placement.state !== 'placed')
    {
      throw new Error(`Rectangle ${this.width}x${this.height} has not been placed`)
    }
    return this._placement
  }
}

/**
 * 位置とサイズを持つ軸平行な矩形領域
 */
export interface Bounds extends Sized2D
{
  x: number
  y: number
}

/**
 * 2 つの矩形が重なっているか判定（辺が接しているだけなら重ならない）
 */
export function intersects(a: Bounds, b: Bounds): boolean
{
  return !(
    a.x + a.width <= b.x ||
    a.x >= b.x + b.width ||
    a.y + a.height <= b.y ||
    a.y >= b.y + b.height
  )
}

/**
 * inner が outer の内側に収まっているか判定
 */
export function containsRect(outer: Bounds, inner: Bounds): boolean
{
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    inner.x + inner.width <= outer.x + outer.width &&
    inner.y + inner.height <= outer.y + outer.height
  )
}
