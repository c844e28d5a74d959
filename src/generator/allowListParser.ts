import ts from 'typescript'
import { existsSync, readFileSync } from 'fs'
import { extname } from 'path'
import { makeAllowList } from '../core/allowList.js'
import type { AllowList, AllowListConfig } from '../core/types.js'

const ALLOW_LIST_EXPORTS = ['allowList', 'whiteList']
const MERGE_CALLS = ['makeAllowList', 'makeWhiteList']

/**
 * Reads an allow-list config module without executing it. Only literal
 * structure is understood; anything else is skipped.
 */
export class AllowListParser {
  private constants = new Map<string, ts.Expression>()

  constructor(private sourceFile: ts.SourceFile) {}

  parse(): AllowListConfig | null {
    let defaultExpr: ts.Expression | null = null
    let namedExpr: ts.Expression | null = null
    let prefixExpr: ts.Expression | null = null

    for (const statement of this.sourceFile.statements) {
      if (ts.isVariableStatement(statement)) {
        const exported = this.isExported(statement)
        for (const declaration of statement.declarationList.declarations) {
          if (!ts.isIdentifier(declaration.name) || !declaration.initializer) {
            continue
          }
          const name = declaration.name.text
          this.constants.set(name, declaration.initializer)

          if (exported && ALLOW_LIST_EXPORTS.includes(name)) {
            namedExpr = declaration.initializer
          }
          if (exported && name === 'namespacePrefixOverride') {
            prefixExpr = declaration.initializer
          }
        }
      }

      if (ts.isExportAssignment(statement) && !statement.isExportEquals) {
        defaultExpr = statement.expression
      }
    }

    // export default wins over a named export, wherever each one sits
    const allowListExpr = defaultExpr ?? namedExpr

    if (!allowListExpr) {
      return null
    }

    return {
      allowList: this.evaluateAllowList(allowListExpr, new Set()),
      namespacePrefixOverride: prefixExpr
        ? this.evaluateStringRecord(prefixExpr, new Set())
        : {},
    }
  }

  private isExported(statement: ts.VariableStatement): boolean {
    return (
      statement.modifiers?.some(
        (modifier) => modifier.kind === ts.SyntaxKind.ExportKeyword
      ) ?? false
    )
  }

  private unwrap(node: ts.Expression): ts.Expression {
    let current = node
    while (
      ts.isParenthesizedExpression(current) ||
      ts.isAsExpression(current) ||
      ts.isSatisfiesExpression(current) ||
      ts.isTypeAssertionExpression(current)
    ) {
      current = current.expression
    }
    return current
  }

  /**
   * Follow an identifier to the top-level const it names. `seen` stops
   * self-referencing definitions.
   */
  private resolve(node: ts.Expression, seen: Set<string>): ts.Expression | null {
    const expr = this.unwrap(node)
    if (!ts.isIdentifier(expr)) {
      return expr
    }
    if (seen.has(expr.text)) {
      return null
    }
    const target = this.constants.get(expr.text)
    if (!target) {
      return null
    }
    seen.add(expr.text)
    return this.resolve(target, seen)
  }

  private propertyKey(name: ts.PropertyName): string | null {
    if (
      ts.isIdentifier(name) ||
      ts.isStringLiteral(name) ||
      ts.isNumericLiteral(name) ||
      ts.isNoSubstitutionTemplateLiteral(name)
    ) {
      return name.text
    }
    return null
  }

  private stringValue(node: ts.Expression): string | null {
    const expr = this.unwrap(node)
    if (ts.isStringLiteral(expr) || ts.isNoSubstitutionTemplateLiteral(expr)) {
      return expr.text
    }
    return null
  }

  private evaluateAllowList(node: ts.Expression, seen: Set<string>): AllowList {
    const expr = this.resolve(node, seen)
    if (!expr) {
      return {}
    }

    if (ts.isCallExpression(expr)) {
      const callee = expr.expression
      if (
        ts.isIdentifier(callee) &&
        MERGE_CALLS.includes(callee.text) &&
        expr.arguments.length > 0
      ) {
        return this.evaluateAllowList(expr.arguments[0], new Set(seen))
      }
      return {}
    }

    if (ts.isArrayLiteralExpression(expr)) {
      return makeAllowList(
        expr.elements.map((element) =>
          ts.isSpreadElement(element)
            ? this.evaluateAllowList(element.expression, new Set(seen))
            : this.evaluateAllowList(element, new Set(seen))
        )
      )
    }

    if (ts.isObjectLiteralExpression(expr)) {
      return this.evaluateModule(expr, seen)
    }

    return {}
  }

  private evaluateModule(
    node: ts.ObjectLiteralExpression,
    seen: Set<string>
  ): AllowList {
    const modules: AllowList[] = []
    let current: AllowList = {}

    for (const property of node.properties) {
      if (ts.isSpreadAssignment(property)) {
        modules.push(current, this.evaluateAllowList(property.expression, new Set(seen)))
        current = {}
        continue
      }

      let key: string | null = null
      let value: ts.Expression | null = null
      if (ts.isPropertyAssignment(property)) {
        key = this.propertyKey(property.name)
        value = property.initializer
      } else if (ts.isShorthandPropertyAssignment(property)) {
        key = property.name.text
        value = property.name
      }
      if (key === null || value === null) {
        continue
      }

      const names = this.evaluateStringList(value, new Set(seen))
      if (names !== null) {
        current[key] = [...(current[key] ?? []), ...names]
      }
    }
    modules.push(current)

    return makeAllowList(modules)
  }

  private evaluateStringList(node: ts.Expression, seen: Set<string>): string[] | null {
    const expr = this.resolve(node, seen)
    if (!expr || !ts.isArrayLiteralExpression(expr)) {
      return null
    }

    const names: string[] = []
    for (const element of expr.elements) {
      if (ts.isSpreadElement(element)) {
        names.push(...(this.evaluateStringList(element.expression, new Set(seen)) ?? []))
        continue
      }
      const name = this.stringValue(element)
      if (name !== null) {
        names.push(name)
      }
    }
    return names
  }

  private evaluateStringRecord(
    node: ts.Expression,
    seen: Set<string>
  ): Record<string, string> {
    const expr = this.resolve(node, seen)
    const record: Record<string, string> = {}
    if (!expr || !ts.isObjectLiteralExpression(expr)) {
      return record
    }

    for (const property of expr.properties) {
      if (!ts.isPropertyAssignment(property)) {
        continue
      }
      const key = this.propertyKey(property.name)
      const value = this.stringValue(property.initializer)
      if (key !== null && value !== null) {
        record[key] = value
      }
    }
    return record
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readJsonAllowList(value: unknown): AllowList {
  const allowList: AllowList = {}
  if (!isPlainObject(value)) {
    return allowList
  }
  for (const [key, names] of Object.entries(value)) {
    if (Array.isArray(names)) {
      allowList[key] = names.filter((name): name is string => typeof name === 'string')
    }
  }
  return allowList
}

/**
 * JSON configs hold either `{ allowList, namespacePrefixOverride }` or the
 * plain module map.
 */
export function parseAllowListJson(text: string): AllowListConfig {
  const data: unknown = JSON.parse(text)
  if (isPlainObject(data) && isPlainObject(data.allowList)) {
    const overrides: Record<string, string> = {}
    if (isPlainObject(data.namespacePrefixOverride)) {
      for (const [key, value] of Object.entries(data.namespacePrefixOverride)) {
        if (typeof value === 'string') {
          overrides[key] = value
        }
      }
    }
    return {
      allowList: readJsonAllowList(data.allowList),
      namespacePrefixOverride: overrides,
    }
  }
  return { allowList: readJsonAllowList(data), namespacePrefixOverride: {} }
}

export function parseAllowListSource(
  sourceText: string,
  fileName = 'allowlist.config.ts'
): AllowListConfig {
  const sourceFile = ts.createSourceFile(
    fileName,
    sourceText,
    ts.ScriptTarget.ES2022,
    true
  )
  const config = new AllowListParser(sourceFile).parse()
  if (!config) {
    throw new Error(`No allow-list export found in ${fileName}`)
  }
  return config
}

/**
 * Load an allow-list config file (.ts/.js/.mjs or .json)
 */
export function parseAllowListFile(filePath: string): AllowListConfig {
  if (!existsSync(filePath)) {
    throw new Error(`Allow-list file not found: ${filePath}`)
  }

  const text = readFileSync(filePath, 'utf8')
  if (extname(filePath) === '.json') {
    return parseAllowListJson(text)
  }
  return parseAllowListSource(text, filePath)
}
