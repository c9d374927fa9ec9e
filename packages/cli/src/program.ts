import path from 'node:path'
import { Command } from 'commander'
import { DEFAULT_MAX_ATLAS_SIZE } from '@texpack/texture-atlas'
import { parseColorMode, parseMaxSize, runBuild } from './commands/build'

interface BuildCommandOptions
{
  output: string
  map: string
  maxSize: string
  colorMode: string
}

export function createProgram(): Command
{
  const program = new Command()

  program
    .command('build <mapping>')
    .description('Pack the images listed in a JSON mapping file into one texture atlas')
    .option('-o, --output <path>', 'Path to output atlas PNG', 'atlas.png')
    .option('-m, --map <path>', 'Path to output UV bounds JSON', 'atlas.json')
    .option('--max-size <size>', 'Maximum atlas side in pixels', String(DEFAULT_MAX_ATLAS_SIZE))
    .option('--color-mode <mode>', 'Atlas color mode (RGBA or RGB)', 'RGBA')
    .action(async (mapping: string, options: BuildCommandOptions) => {
      const mappingPath = path.resolve(mapping)
      const outputPath = path.resolve(options.output)
      const mapPath = path.resolve(options.map)

      const parsed = parseMaxSize(options.maxSize).andThen((maxSize) =>
        parseColorMode(options.colorMode).map((colorMode) => ({ maxSize, colorMode })),
      )
      if (parsed.isErr())
      {
        console.error(`❌ Error: ${parsed.error.message}`)
        process.exit(1)
      }
      const { maxSize, colorMode } = parsed.value

      console.log(`📁 Mapping: ${mappingPath}`)
      console.log(`📁 Output:  ${outputPath}`)
      console.log(`📁 Map:     ${mapPath}`)
      console.log('⚙️  Packing textures...')

      const result = await runBuild(mappingPath, {
        output: outputPath,
        map: mapPath,
        maxSize,
        colorMode,
      })

      if (result.isErr())
      {
        const error = result.error
        console.error(`\n❌ Error (${error.type}): ${error.message}`)
        process.exit(1)
      }

      const summary = result.value
      console.log(`\n✅ Atlas complete!`)
      console.log(`   Size: ${summary.width}x${summary.height}`)
      console.log(`   Textures: ${summary.textureCount}`)
      console.log(`   Attempts: ${summary.attemptedSizes.join(' -> ')}`)
      console.log(`   Efficiency: ${(summary.efficiency * 100).toFixed(2)}%`)
    })

  program
    .name('texpack')
    .description('Texture atlas packing CLI tool')
    .version('0.1.0')

  return program
}
