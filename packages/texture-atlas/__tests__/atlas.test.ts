import { describe, expect, it } from 'vitest'
import { Atlas } from '../src/atlas/atlas'
import { Frame } from '../src/atlas/frame'
import { Texture } from '../src/atlas/texture'
import { createSolidImage, pixelAt } from './helpers/images'

function createTexture(name: string, width: number, height: number, color?: number): Texture
{
  return new Texture(name, [new Frame(`${name}.png`, createSolidImage(width, height, color))])
}

describe('Atlas', () => {
  it('packs textures in order and records them', () => {
    const atlas = new Atlas(128)
    const a = createTexture('a', 64, 64)
    const b = createTexture('b', 32, 32)

    expect(atlas.pack(a).isOk()).toBe(true)
    expect(atlas.pack(b).isOk()).toBe(true)

    expect(atlas.textures).toEqual([a, b])
    expect(atlas.width).toBe(128)
    expect(atlas.height).toBe(128)
    expect([b.primaryFrame.x, b.primaryFrame.y]).toEqual([0, 64])
  })

  it('reports ATLAS_TOO_SMALL and leaves the texture out', () => {
    const atlas = new Atlas(32)
    const result = atlas.pack(createTexture('big', 33, 8))

    expect(result.isErr()).toBe(true)
    if (result.isErr())
    {
      expect(result.error).toEqual({
        type: 'ATLAS_TOO_SMALL',
        message: 'Failed to pack frame big.png (33x8) into 32x32 atlas',
        size: 32,
        frame: 'big.png',
      })
    }
    expect(atlas.textures).toHaveLength(0)
  })

  it('stops at the first frame that does not fit', () => {
    const atlas = new Atlas(16)
    const texture = new Texture('anim', [
      new Frame('anim-0.png', createSolidImage(16, 8)),
      new Frame('anim-1.png', createSolidImage(16, 9)),
    ])

    const result = atlas.pack(texture)

    expect(result.isErr()).toBe(true)
    expect(atlas.textures).toHaveLength(0)
    // 配置済みのフレームは戻さない
    expect(atlas.getAllPackables()).toEqual([texture.frames[0]])
  })

  it('normalizes the first frame into UV bounds', () => {
    const atlas = new Atlas(128)
    atlas.pack(createTexture('a', 64, 64))
    atlas.pack(createTexture('b', 32, 32))

    const table = atlas.toBoundsTable()

    expect(table.get('a')).toEqual([0, 0, 0.5, 0.5])
    expect(table.get('b')).toEqual([0, 0.5, 0.25, 0.75])
  })

  it('clamps the v extent to the smaller side of the frame', () => {
    const atlas = new Atlas(64)
    atlas.pack(createTexture('tall', 20, 40))

    expect(atlas.toBoundsTable().get('tall')).toEqual([0, 0, 20 / 64, 20 / 64])
  })

  it('computes the packing efficiency', () => {
    const atlas = new Atlas(128)
    atlas.pack(createTexture('a', 64, 64))

    expect(atlas.usedArea).toBe(4096)
    expect(atlas.efficiency()).toBe(0.25)
  })

  describe('generate', () => {
    it('draws every frame at its position over a transparent background', () => {
      const atlas = new Atlas(8)
      atlas.pack(createTexture('red', 4, 4, 0xff0000ff))
      atlas.pack(createTexture('green', 4, 2, 0x00ff0080))

      const image = atlas.generate('RGBA')
      const data = new Uint8Array(image.bitmap.data)

      expect(image.bitmap.width).toBe(8)
      expect(image.bitmap.height).toBe(8)
      expect(pixelAt(data, 8, 3, 3)).toEqual([255, 0, 0, 255])
      expect(pixelAt(data, 8, 0, 4)).toEqual([0, 255, 0, 128])
      expect(pixelAt(data, 8, 3, 5)).toEqual([0, 255, 0, 128])
      expect(pixelAt(data, 8, 0, 6)).toEqual([0, 0, 0, 0])
      expect(pixelAt(data, 8, 7, 7)).toEqual([0, 0, 0, 0])
    })

    it('forces opaque pixels in RGB mode', () => {
      const atlas = new Atlas(4)
      atlas.pack(createTexture('half', 2, 2, 0x10203040))

      const data = new Uint8Array(atlas.generate('RGB').bitmap.data)

      expect(pixelAt(data, 4, 1, 1)).toEqual([0x10, 0x20, 0x30, 255])
      expect(pixelAt(data, 4, 3, 3)).toEqual([0, 0, 0, 255])
    })
  })
})

describe('Texture', () => {
  it('requires at least one frame', () => {
    expect(() => new Texture('empty', [])).toThrow('Texture empty has no frames')
  })

  it('copies the frame list it is given', () => {
    const frames = [new Frame('a.png', createSolidImage(4, 4))]
    const texture = new Texture('a', frames)

    frames.length = 0

    expect(texture.frames).toHaveLength(1)
    expect(texture.primaryFrame.source).toBe('a.png')
  })

  it('clones into unplaced frames sharing the same pixels', () => {
    const texture = createTexture('a', 4, 4)
    texture.primaryFrame.place(1, 2)

    const copy = texture.clone()

    expect(copy.name).toBe('a')
    expect(copy.source).toBe('a.png')
    expect(copy.primaryFrame.placement).toEqual({ state: 'unplaced' })
    expect(copy.primaryFrame.image).toBe(texture.primaryFrame.image)
  })
})
