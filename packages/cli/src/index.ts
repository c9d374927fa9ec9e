/**
 * @texpack/cli - テクスチャアトラス生成 CLI
 */

export { parseColorMode, parseMaxSize, runBuild } from './commands/build'
export { parseMapping, readMappingFile } from './mapping'
export { createProgram } from './program'
export type { BuildOptions, BuildSummary, CliError } from './types'
