import { IGNORED_FUNCTIONS, isMethodAllowed, isModuleAllowed } from './allowList.js'
import type { GeneratorOptions } from './options.js'
import type {
  AllowListConfig,
  FuncInfo,
  HeaderModel,
  SelectedClass,
  SelectedConstant,
  SelectedEnum,
  SelectedFunction,
  Selection,
} from './types.js'

// Enum whose values only exist in the core bindings
export const SKIPPED_ENUMS: ReadonlySet<string> = new Set([
  '_OutputArray_DepthMask',
])

export const CLASS_RENAMES: Readonly<Record<string, string>> = {
  segmentation_IntelligentScissorsMB: 'IntelligentScissorsMB',
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function sortedEntries<T>(map: Map<string, T>): [string, T][] {
  return [...map.entries()].sort(([a], [b]) => compareNames(a, b))
}

export function isRootNamespace(name: string, rootNamespace: string): boolean {
  return name.split('.')[0] === rootNamespace
}

/**
 * JS prefix for the functions of a namespace: the segments below the root
 * joined by `_`, unless the config overrides it.
 */
export function namespacePrefix(
  name: string,
  overrides: Record<string, string>
): string {
  const id = name.split('.').slice(1).join('_')
  return Object.prototype.hasOwnProperty.call(overrides, id)
    ? overrides[id]
    : id
}

export function functionJsName(prefix: string, name: string): string {
  return prefix ? `${prefix}_${name}` : name
}

/** Normalized class name behind a `Ptr<...>` return type, if any */
export function smartPointerTarget(
  returnType: string,
  rootNamespace = 'cv'
): string | null {
  const match = /Ptr<\s*([\w:]+)\s*>/.exec(returnType)
  if (!match) {
    return null
  }
  const rootScope = `${rootNamespace}::`
  const target = match[1].startsWith(rootScope)
    ? match[1].slice(rootScope.length)
    : match[1]
  return target.replaceAll('::', '_')
}

export function classJsName(jsName: string): string {
  return CLASS_RENAMES[jsName] ?? jsName
}

/**
 * Apply the allow-list to the model. Both renderers read the result, so a
 * declaration is either in every output or in none.
 */
export function selectDeclarations(
  model: HeaderModel,
  config: AllowListConfig,
  options: Pick<GeneratorOptions, 'rootNamespace'>
): Selection {
  const { allowList, namespacePrefixOverride } = config
  const root = options.rootNamespace
  const smartPointers = new Set<string>()
  const externalConstructors = new Map<string, FuncInfo[]>()
  const functions: SelectedFunction[] = []

  const rootNamespaces = sortedEntries(model.namespaces).filter(([name]) =>
    isRootNamespace(name, root)
  )

  for (const [nsName, ns] of rootNamespaces) {
    const prefix = namespacePrefix(nsName, namespacePrefixOverride)

    for (const [, func] of sortedEntries(ns.funcs)) {
      const jsName = functionJsName(prefix, func.name)
      if (!isMethodAllowed(allowList, '', jsName)) {
        continue
      }

      const targets = func.variants
        .map((variant) => smartPointerTarget(variant.returnType, root))
        .filter((target): target is string => target !== null)

      if (targets.length === 0) {
        functions.push({ jsName, namespace: nsName, func })
        continue
      }

      for (const target of targets) {
        if (model.classes.has(target)) {
          smartPointers.add(target)
        } else {
          console.warn(
            `Generator warning: ${func.name} returns unknown class ${target}`
          )
        }
      }

      const named = func.name.replace('create', '')
      const host = model.classes.has(named) ? named : targets[0]
      const attached = externalConstructors.get(host) ?? []
      attached.push(func)
      externalConstructors.set(host, attached)
    }
  }

  const selectedMethods = new Map<string, FuncInfo[]>()
  for (const [key, info] of sortedEntries(model.classes)) {
    if (!isModuleAllowed(allowList, key)) {
      continue
    }

    const methods: FuncInfo[] = []
    for (const [, method] of sortedEntries(info.methods)) {
      if (IGNORED_FUNCTIONS.has(method.cname)) {
        continue
      }
      if (!isMethodAllowed(allowList, method.className, method.name)) {
        continue
      }
      methods.push(method)

      for (const variant of method.variants) {
        const target = smartPointerTarget(variant.returnType, root)
        if (target !== null) {
          smartPointers.add(model.classes.has(target) ? target : key)
        }
      }
    }
    selectedMethods.set(key, methods)
  }

  const classes: SelectedClass[] = []
  for (const [key, methods] of selectedMethods) {
    const info = model.classes.get(key)
    if (!info) {
      continue
    }
    const attached = externalConstructors.get(key) ?? []
    classes.push({
      jsName: classJsName(info.jsName),
      info,
      methods: [...methods, ...attached].sort((a, b) =>
        compareNames(a.name, b.name)
      ),
      externalConstructors: new Set(attached),
      hasSmartPtr: smartPointers.has(key),
    })
  }

  const enums: SelectedEnum[] = []
  const constants: SelectedConstant[] = []
  const seenConstants = new Set<string>()
  const rootPrefix = `${root}.`

  for (const [, ns] of rootNamespaces) {
    for (const [name, values] of sortedEntries(ns.enums)) {
      const bare = name.startsWith(rootPrefix)
        ? name.slice(rootPrefix.length)
        : name
      const jsName = bare.replaceAll('.', '_')
      // unnamed enums have no type to declare
      if (jsName.includes('unnamed') || SKIPPED_ENUMS.has(jsName)) {
        continue
      }
      enums.push({ jsName, name: bare, values })
    }

    // The same name can come from several namespaces; the first one wins
    for (const [name, constant] of sortedEntries(ns.consts)) {
      if (seenConstants.has(name)) {
        continue
      }
      seenConstants.add(name)
      constants.push({ jsName: name, cname: constant.cname })
    }
  }

  return { functions, classes, enums, constants }
}
