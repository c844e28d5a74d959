import { Command } from 'commander'
import { DEFAULT_OPTIONS, resolveOptions, type GeneratorOptions } from './core/options.js'
import { parseAllowListFile } from './generator/allowListParser.js'
import {
  generateFromHeaders,
  loadModel,
  readHeaderList,
  type GenerateInputs,
} from './generator/codegen.js'
import { loadHeaderParser } from './generator/headerParser.js'
import { createWatcher } from './generator/watcher.js'
import { describeSelection, summarizeSelection } from './generator/summary.js'

const GENERATE_USAGE =
  '<header parser module> <bindings.cpp> <headers.txt> <core_bindings.cpp> <allowlist config>'
const VALIDATE_USAGE = 'validate <header parser module> <headers.txt> <allowlist config>'

interface GeneratorCommandOptions {
  typesDir?: string
  rootNamespace: string
  bindingName: string
  exportEnums: boolean
  exportConsts: boolean
  defaultParams: boolean
  wrappers: boolean
  vecFromJsArray: boolean
}

function withGeneratorOptions(command: Command): Command {
  return command
    .option('-t, --types-dir <dir>', 'Directory for the .d.ts files (default: types/ beside the bindings)')
    .option('--root-namespace <name>', 'Namespace whose declarations are bound', DEFAULT_OPTIONS.rootNamespace)
    .option('--binding-name <name>', 'Name of the EMSCRIPTEN_BINDINGS block', DEFAULT_OPTIONS.bindingName)
    .option('--export-enums', 'Bind enums with emscripten::enum_', DEFAULT_OPTIONS.exportEnums)
    .option('--no-export-consts', 'Do not bind constants')
    .option('--no-default-params', 'Do not emit wrappers for trailing default arguments')
    .option('--no-wrappers', 'Bind functions directly instead of through wrappers')
    .option('--no-vec-from-js-array', 'Take vector arguments as vectors instead of JS arrays')
}

function toGeneratorOptions(options: GeneratorCommandOptions): GeneratorOptions {
  return resolveOptions({
    rootNamespace: options.rootNamespace,
    bindingName: options.bindingName,
    exportEnums: options.exportEnums,
    exportConsts: options.exportConsts,
    defaultParams: options.defaultParams,
    wrappedFunctions: options.wrappers,
    vecFromJsArray: options.vecFromJsArray,
  })
}

/**
 * Print the usage and the arguments received when paths are missing
 */
function hasPaths(paths: string[], expected: number, usage: string): boolean {
  if (paths.length >= expected) {
    return true
  }
  console.log(`Usage:\n  embind-tsgen ${usage}`)
  console.log(
    `Current args are: ${process.argv.map((arg) => `'${arg}'`).join(', ')}`
  )
  return false
}

function toInputs(paths: string[], typesDir?: string): GenerateInputs {
  const [parserModule, bindingsFile, headersFile, coreBindingsFile, allowListFile] = paths
  return {
    parserModule,
    bindingsFile,
    headersFile,
    coreBindingsFile,
    allowListFile,
    typesDir,
  }
}

/**
 * Build the command-line program; `cli.ts` runs it on `process.argv`
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('embind-tsgen')
    .description('Generate Embind bindings and TypeScript declarations from a parsed header model')
    .version('0.1.0')

  withGeneratorOptions(
    program
      .command('generate', { isDefault: true })
      .description('Generate the bindings source and the declaration files')
      .argument('[paths...]', GENERATE_USAGE)
  ).action(async (paths: string[], options: GeneratorCommandOptions) => {
    if (!hasPaths(paths, 5, GENERATE_USAGE)) {
      return
    }
    try {
      await generateFromHeaders(
        toInputs(paths, options.typesDir),
        toGeneratorOptions(options)
      )
    } catch (error) {
      console.error('❌ Error generating bindings:', error)
      process.exit(1)
    }
  })

  withGeneratorOptions(
    program
      .command('watch')
      .description('Regenerate everything whenever an input file changes')
      .argument('[paths...]', GENERATE_USAGE)
  ).action((paths: string[], options: GeneratorCommandOptions) => {
    if (!hasPaths(paths, 5, `watch ${GENERATE_USAGE}`)) {
      return
    }

    const watcher = createWatcher({
      inputs: toInputs(paths, options.typesDir),
      generatorOptions: toGeneratorOptions(options),
    })
    console.log(`🔍 Watching ${watcher.watchedPaths().join(', ')} for changes...`)

    watcher.on('change', (filePath: string) => {
      console.log(`📝 ${filePath} changed, regenerating...`)
    })

    watcher.on('generated', () => {
      console.log('✅ Bindings regenerated')
    })

    watcher.on('error', (error: Error) => {
      console.error('❌ Error regenerating bindings:', error)
    })

    process.on('SIGINT', () => {
      console.log('\n👋 Stopping watcher...')
      watcher
        .stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('❌ Error stopping watcher:', error)
          process.exit(1)
        })
    })
  })

  program
    .command('validate')
    .description('Show what would be generated without writing anything')
    .argument('[paths...]', '<header parser module> <headers.txt> <allowlist config>')
    .option('--root-namespace <name>', 'Namespace whose declarations are bound', DEFAULT_OPTIONS.rootNamespace)
    .option('-f, --full', 'Print the full selection as JSON')
    .action(
      async (
        paths: string[],
        options: { rootNamespace: string; full?: boolean }
      ) => {
        if (!hasPaths(paths, 3, VALIDATE_USAGE)) {
          return
        }
        try {
          const [parserModule, headersFile, allowListFile] = paths
          const parser = await loadHeaderParser(parserModule)
          const { selection } = await loadModel(
            parser,
            readHeaderList(headersFile),
            parseAllowListFile(allowListFile),
            resolveOptions({ rootNamespace: options.rootNamespace })
          )
          const summary = summarizeSelection(selection)

          console.log('📋 Selection:')
          console.log(`- ${summary.functions.length} functions`)
          console.log(`- ${Object.keys(summary.classes).length} classes`)
          console.log(`- ${summary.enums.length} enums`)
          console.log(`- ${summary.constants.length} constants`)

          for (const [className, methods] of Object.entries(summary.classes)) {
            console.log(`\n📄 Class: ${className}`)
            console.log(`  - Methods: ${methods.length}`)
            if (methods.length > 0) {
              console.log(`    - ${methods.join(', ')}`)
            }
          }

          if (options.full) {
            console.log('\nFull selection:')
            console.log(JSON.stringify(describeSelection(selection), null, 2))
          }
        } catch (error) {
          console.error('❌ Validation failed:', error)
          process.exit(1)
        }
      }
    )

  return program
}
