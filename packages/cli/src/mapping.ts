/**
 * マッピングファイルの読み込み
 *
 * { "論理キー": "画像パス", ... } 形式の JSON を読み込み、
 * 相対パスはマッピングファイルのディレクトリ基準で解決する。
 */

import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { err, ok, Result, ResultAsync } from 'neverthrow'
import type { CliError } from './types'

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (error): CliError => ({ type: 'INVALID_MAPPING', message: `Invalid JSON: ${String(error)}` }),
)

export function readMappingFile(path: string): ResultAsync<Map<string, string>, CliError>
{
  return ResultAsync.fromPromise(
    readFile(path, 'utf8'),
    (error): CliError => ({ type: 'IO_ERROR', message: `Failed to read ${path}: ${String(error)}` }),
  )
    .andThen(parseJson)
    .andThen((json) => parseMapping(json, dirname(path)))
}

/**
 * JSON 値をマッピングとして検証する
 *
 * @param baseDir - 相対パスの基準ディレクトリ
 */
export function parseMapping(json: unknown, baseDir: string): Result<Map<string, string>, CliError>
{
  if (typeof json !== 'object' || json === null || Array.isArray(json))
  {
    return err({ type: 'INVALID_MAPPING' as const, message: 'Mapping must be a JSON object of key to image path' })
  }

  const mapping = new Map<string, string>()
  for (const [key, value] of Object.entries(json))
  {
    if (typeof value !== 'string' || value.length === 0)
    {
      return err({ type: 'INVALID_MAPPING' as const, message: `Image path for "${key}" must be a non-empty string` })
    }
    mapping.set(key, resolve(baseDir, value))
  }

  return ok(mapping)
}
