import { existsSync } from 'fs'
import { resolve } from 'path'
import { pathToFileURL } from 'url'
import type {
  EnumValueDeclaration,
  HeaderArgument,
  HeaderDeclaration,
  HeaderParser,
  ParsedHeaders,
} from '../core/types.js'

type UnknownRecord = Record<string, unknown>

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return isRecord(value) && Symbol.iterator in value
}

function stringField(record: UnknownRecord, key: string): string {
  const value = record[key]
  return typeof value === 'string' ? value : ''
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return []
  }
  return value.filter((item): item is string => typeof item === 'string')
}

function readArgument(value: unknown): HeaderArgument | null {
  if (!isRecord(value) || typeof value.type !== 'string') {
    return null
  }
  return {
    type: value.type,
    name: stringField(value, 'name'),
    defaultValue: stringField(value, 'defaultValue'),
    modifiers: stringList(value.modifiers),
  }
}

function readArguments(value: unknown): HeaderArgument[] | null {
  if (value === undefined) {
    return []
  }
  if (!Array.isArray(value)) {
    return null
  }
  const args: HeaderArgument[] = []
  for (const item of value) {
    const arg = readArgument(item)
    if (!arg) {
      return null
    }
    args.push(arg)
  }
  return args
}

function readEnumValue(value: unknown): EnumValueDeclaration | null {
  if (!isRecord(value) || typeof value.name !== 'string') {
    return null
  }
  const raw = value.value
  if (typeof raw === 'string') {
    return { name: value.name, value: raw }
  }
  if (typeof raw === 'number') {
    return { name: value.name, value: String(raw) }
  }
  return null
}

/**
 * Validate one declaration coming from the parser module. Returns null when
 * the value does not have a declaration's shape.
 */
export function readDeclaration(value: unknown): HeaderDeclaration | null {
  if (!isRecord(value) || typeof value.name !== 'string') {
    return null
  }
  const name = value.name

  switch (value.kind) {
    case 'class':
    case 'struct': {
      const properties = readArguments(value.properties)
      if (!properties) return null
      return {
        kind: value.kind === 'struct' ? 'struct' : 'class',
        name,
        bases: stringList(value.bases),
        modifiers: stringList(value.modifiers),
        properties,
        docstring: stringField(value, 'docstring'),
      }
    }
    case 'enum': {
      if (!Array.isArray(value.values)) return null
      const values: EnumValueDeclaration[] = []
      for (const item of value.values) {
        const enumValue = readEnumValue(item)
        if (!enumValue) return null
        values.push(enumValue)
      }
      return {
        kind: 'enum',
        name,
        values,
        docstring: stringField(value, 'docstring'),
      }
    }
    case 'const': {
      const raw = value.value
      if (typeof raw !== 'string' && typeof raw !== 'number') return null
      return { kind: 'const', name, value: String(raw) }
    }
    case 'function': {
      const args = readArguments(value.args)
      if (!args) return null
      return {
        kind: 'function',
        name,
        returnType: stringField(value, 'returnType'),
        modifiers: stringList(value.modifiers),
        args,
        docstring: stringField(value, 'docstring'),
      }
    }
    default:
      return null
  }
}

function isHeaderParser(value: unknown): value is HeaderParser {
  return (
    isRecord(value) &&
    typeof value.parse === 'function' &&
    isIterable(value.namespaces)
  )
}

/**
 * Find the parser in an imported module: a `createHeaderParser` factory, a
 * default-exported factory or parser, or the module itself.
 */
export function resolveHeaderParser(
  moduleExports: unknown,
  source: string
): HeaderParser {
  if (isRecord(moduleExports)) {
    const candidates: unknown[] = [
      moduleExports.createHeaderParser,
      moduleExports.default,
    ]
    for (const candidate of candidates) {
      if (typeof candidate === 'function') {
        const parser: unknown = candidate()
        if (isHeaderParser(parser)) {
          return parser
        }
      } else if (isHeaderParser(candidate)) {
        return candidate
      }
    }
    if (isHeaderParser(moduleExports)) {
      return moduleExports
    }
  }

  throw new Error(
    `Header parser module ${source} must export createHeaderParser() or a parser with parse() and namespaces`
  )
}

/**
 * Import the header parser module from disk
 */
export async function loadHeaderParser(modulePath: string): Promise<HeaderParser> {
  const resolvedPath = resolve(modulePath)
  if (!existsSync(resolvedPath)) {
    throw new Error(`Header parser module not found: ${resolvedPath}`)
  }

  const moduleExports: unknown = await import(pathToFileURL(resolvedPath).href)
  return resolveHeaderParser(moduleExports, resolvedPath)
}

/**
 * Run the parser over every header. Malformed declarations are reported and
 * dropped; the namespace set is read once all headers are parsed.
 */
export async function parseHeaders(
  parser: HeaderParser,
  headers: string[]
): Promise<ParsedHeaders> {
  const declarations: HeaderDeclaration[] = []

  for (const header of headers) {
    const result: unknown = await parser.parse(header)
    if (!Array.isArray(result)) {
      console.warn(`Generator warning: parser returned no declarations for ${header}`)
      continue
    }

    for (const item of result) {
      const declaration = readDeclaration(item)
      if (declaration) {
        declarations.push(declaration)
      } else {
        console.warn(
          `Generator warning: skipping malformed declaration in ${header}: ${JSON.stringify(item)}`
        )
      }
    }
  }

  const namespaces = new Set<string>()
  for (const namespace of parser.namespaces) {
    if (typeof namespace === 'string') {
      namespaces.add(namespace)
    }
  }

  return { headers: [...headers], declarations, namespaces }
}
