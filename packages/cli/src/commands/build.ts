import { writeFile } from 'node:fs/promises'
import {
  buildAtlas,
  encodeAtlasPng,
  formatBoundsMap,
  toBoundsMap,
  type AtlasLogger,
  type ColorMode,
} from '@texpack/texture-atlas'
import { err, ok, type Result, ResultAsync } from 'neverthrow'
import { readMappingFile } from '../mapping'
import type { BuildOptions, BuildSummary, CliError } from '../types'

/**
 * マッピングファイルからアトラスを生成し、PNG と UV マップを書き出す
 *
 * @param mappingPath - { 論理キー: 画像パス } 形式の JSON
 */
export function runBuild(
  mappingPath: string,
  options: BuildOptions,
  logger: AtlasLogger = console,
): ResultAsync<BuildSummary, CliError>
{
  return readMappingFile(mappingPath)
    .andThen((mapping) =>
      buildAtlas(mapping, {
        maxSize: options.maxSize,
        colorMode: options.colorMode,
        logger,
      }),
    )
    .andThen((result) =>
      ResultAsync.fromPromise(
        (async () =>
        {
          const png = await encodeAtlasPng(result)
          const boundsMap = toBoundsMap(result.bounds, result.width, result.height)
          await Promise.all([
            writeFile(options.output, png),
            writeFile(options.map, formatBoundsMap(boundsMap)),
          ])

          return {
            width: result.width,
            height: result.height,
            textureCount: result.bounds.size,
            attemptedSizes: result.attemptedSizes,
            efficiency: result.atlas.efficiency(),
            output: options.output,
            map: options.map,
          }
        })(),
        (error): CliError => ({ type: 'IO_ERROR', message: `Failed to write atlas: ${String(error)}` }),
      ),
    )
}

export function parseMaxSize(value: string): Result<number, CliError>
{
  const size = Number(value)
  if (!Number.isInteger(size) || size < 1)
  {
    return err({ type: 'INVALID_OPTION' as const, message: `Max size must be a positive integer: ${value}` })
  }
  return ok(size)
}

export function parseColorMode(value: string): Result<ColorMode, CliError>
{
  const mode = value.toUpperCase()
  if (mode === 'RGBA' || mode === 'RGB')
  {
    return ok(mode)
  }
  return err({ type: 'INVALID_OPTION' as const, message: `Color mode must be RGBA or RGB: ${value}` })
}
