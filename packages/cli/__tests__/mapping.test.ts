import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { parseMapping, readMappingFile } from '../src/mapping'

describe('parseMapping', () => {
  it('resolves relative paths against the base directory', () => {
    const result = parseMapping({ stone: 'blocks/stone.png', abs: '/textures/dirt.png' }, '/work')

    expect(result.isOk()).toBe(true)
    if (result.isOk())
    {
      expect([...result.value.entries()]).toEqual([
        ['stone', resolve('/work', 'blocks/stone.png')],
        ['abs', '/textures/dirt.png'],
      ])
    }
  })

  it.each([
    ['an array', ['a.png']],
    ['null', null],
    ['a string', 'a.png'],
  ])('rejects %s', (_, json) => {
    const result = parseMapping(json, '/work')

    expect(result.isErr()).toBe(true)
    if (result.isErr())
    {
      expect(result.error).toEqual({
        type: 'INVALID_MAPPING',
        message: 'Mapping must be a JSON object of key to image path',
      })
    }
  })

  it('rejects a non-string image path', () => {
    const result = parseMapping({ stone: 3 }, '/work')

    expect(result.isErr()).toBe(true)
    if (result.isErr())
    {
      expect(result.error.message).toBe('Image path for "stone" must be a non-empty string')
    }
  })
})

describe('readMappingFile', () => {
  let dir: string

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'texpack-mapping-'))
  })

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads a mapping next to its images', async () => {
    const path = join(dir, 'mapping.json')
    await writeFile(path, JSON.stringify({ a: 'a.png' }))

    const result = await readMappingFile(path)

    expect(result.isOk()).toBe(true)
    if (result.isOk())
    {
      expect(result.value.get('a')).toBe(join(dir, 'a.png'))
    }
  })

  it('reports malformed JSON', async () => {
    const path = join(dir, 'broken.json')
    await writeFile(path, '{ "a": ')

    const result = await readMappingFile(path)

    expect(result.isErr()).toBe(true)
    if (result.isErr())
    {
      expect(result.error.type).toBe('INVALID_MAPPING')
    }
  })

  it('reports a missing file', async () => {
    const result = await readMappingFile(join(dir, 'nope.json'))

    expect(result.isErr()).toBe(true)
    if (result.isErr())
    {
      expect(result.error.type).toBe('IO_ERROR')
    }
  })
})
