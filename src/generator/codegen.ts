import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { basename, dirname, join, resolve } from 'path'
import { buildModel } from '../core/model.js'
import { resolveOptions, type GeneratorOptions } from '../core/options.js'
import { selectDeclarations } from '../core/selection.js'
import type {
  AllowListConfig,
  GeneratedFile,
  HeaderModel,
  HeaderParser,
  Selection,
} from '../core/types.js'
import { parseAllowListFile } from './allowListParser.js'
import { generateBindings } from './bindings.js'
import { generateDeclarations } from './declarations.js'
import { loadHeaderParser, parseHeaders } from './headerParser.js'

export interface GenerateInputs {
  /** Path to the header parser module */
  parserModule: string
  /** Bindings source to write */
  bindingsFile: string
  /** File listing the headers, separated by `;` */
  headersFile: string
  /** Bindings template the generated code is appended to */
  coreBindingsFile: string
  allowListFile: string
  /** Directory for the declaration files; defaults to `types/` beside the bindings */
  typesDir?: string
}

export interface GenerationResult {
  selection: Selection
  writtenFiles: string[]
}

export interface LoadedModel {
  model: HeaderModel
  config: AllowListConfig
  selection: Selection
}

/**
 * Header paths from a headers list file. Entries are `;` separated; blank
 * entries are dropped.
 */
export function readHeaderList(filePath: string): string[] {
  return readFileSync(filePath, 'utf8')
    .split(';')
    .map((header) => header.trim())
    .filter((header) => header.length > 0)
}

function requireFile(filePath: string, description: string): string {
  const resolvedPath = resolve(filePath)
  if (!existsSync(resolvedPath)) {
    throw new Error(`${description} not found: ${resolvedPath}`)
  }
  return resolvedPath
}

/**
 * Parse the headers and apply the allow-list
 */
export async function loadModel(
  parser: HeaderParser,
  headers: string[],
  config: AllowListConfig,
  options: GeneratorOptions
): Promise<LoadedModel> {
  const parsed = await parseHeaders(parser, headers)
  const model = buildModel(parsed, options.rootNamespace)
  const selection = selectDeclarations(model, config, options)
  return { model, config, selection }
}

/**
 * Write generated files into a directory, creating it when needed
 */
export function writeGeneratedFiles(
  files: GeneratedFile[],
  outputDir: string
): string[] {
  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true })
  }

  return files.map((file) => {
    const filePath = join(outputDir, file.fileName)
    writeFileSync(filePath, file.contents.replace(/\r\n/g, '\n'))
    console.log(`Written ${filePath}`)
    return filePath
  })
}

/**
 * Full pipeline: load the parser module, then generate with it
 */
export async function generateFromHeaders(
  inputs: GenerateInputs,
  overrides: Partial<GeneratorOptions> = {}
): Promise<GenerationResult> {
  const parserPath = requireFile(inputs.parserModule, 'Header parser module')
  const parser = await loadHeaderParser(parserPath)
  return generateWithParser(parser, inputs, overrides)
}

/**
 * Load the model, filter it, render the bindings and the declarations and
 * write them out
 */
export async function generateWithParser(
  parser: HeaderParser,
  inputs: Omit<GenerateInputs, 'parserModule'>,
  overrides: Partial<GeneratorOptions> = {}
): Promise<GenerationResult> {
  const options = resolveOptions(overrides)

  const headersPath = requireFile(inputs.headersFile, 'Headers list')
  const coreBindingsPath = requireFile(inputs.coreBindingsFile, 'Core bindings file')
  const allowListPath = requireFile(inputs.allowListFile, 'Allow-list file')
  const bindingsPath = resolve(inputs.bindingsFile)
  const typesDir = resolve(inputs.typesDir ?? join(dirname(bindingsPath), 'types'))

  const headers = readHeaderList(headersPath)
  const config = parseAllowListFile(allowListPath)
  const { selection } = await loadModel(parser, headers, config, options)

  const bindings = generateBindings(
    selection,
    readFileSync(coreBindingsPath, 'utf8'),
    headers,
    options
  )
  const writtenFiles = writeGeneratedFiles(
    [{ fileName: basename(bindingsPath), contents: bindings }],
    dirname(bindingsPath)
  )

  writtenFiles.push(
    ...writeGeneratedFiles(generateDeclarations(selection, options), typesDir)
  )

  return { selection, writtenFiles }
}
