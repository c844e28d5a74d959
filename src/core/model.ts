import type {
  ArgInfo,
  ClassDeclaration,
  ClassInfo,
  ClassProp,
  EnumDeclaration,
  FuncInfo,
  FunctionDeclaration,
  HeaderArgument,
  HeaderModel,
  NamespaceInfo,
  ParsedHeaders,
} from './types.js'

export interface SplitName {
  namespace: string[]
  classes: string[]
  name: string
}

/**
 * Split a dotted declaration name into namespace, enclosing classes and the
 * bare name. Trailing scopes move to the class list until what is left is a
 * namespace the parser reported.
 */
export function splitDeclName(
  name: string,
  namespaces: ReadonlySet<string>
): SplitName {
  const chunks = name.split('.')
  const namespace = chunks.slice(0, -1)
  const classes: string[] = []

  while (namespace.length > 0 && !namespaces.has(namespace.join('.'))) {
    const scope = namespace.pop()
    if (scope !== undefined) {
      classes.unshift(scope)
    }
  }

  return { namespace, classes, name: chunks[chunks.length - 1] }
}

export function normalizeClassName(name: string, rootNamespace = 'cv'): string {
  const prefix = `${rootNamespace}.`
  const bare = name.startsWith(prefix) ? name.slice(prefix.length) : name
  return bare.replaceAll('.', '_')
}

/** `Ptr_ml_SVM` → `Ptr<ml::SVM>` */
export function handlePtr(type: string): string {
  if (type.startsWith('Ptr_')) {
    return `Ptr<${type.split('_').slice(1).join('::')}>`
  }
  return type
}

/** `vector_vector_Point` → `std::vector<std::vector<Point>>` */
export function handleVector(type: string): string {
  if (type.startsWith('vector_')) {
    const element = handleVector(type.slice(type.indexOf('_') + 1))
    return `std::vector<${element.split('_').join('::')}>`
  }
  return type
}

export function toArgInfo(arg: HeaderArgument): ArgInfo {
  let type = handlePtr(arg.type).trim()
  let isInput = true
  let isOutput = false
  let isConst = false
  let isReference = false

  for (const modifier of arg.modifiers) {
    if (modifier === '/O') {
      isInput = false
      isOutput = true
    } else if (modifier === '/IO') {
      isOutput = true
    } else if (modifier === '/C') {
      isConst = true
    } else if (modifier === '/Ref') {
      isReference = true
    }
  }

  if (type === 'Mat') {
    type = isOutput ? 'cv::Mat&' : 'const cv::Mat&'
  } else if (type === 'vector_Mat') {
    type = isOutput ? 'std::vector<cv::Mat>&' : 'const std::vector<cv::Mat>&'
  } else {
    type = handleVector(type).trim()
    if (isConst && !type.startsWith('const ')) {
      type = `const ${type}`
    }
    if (isReference && !type.endsWith('&')) {
      type = `${type}&`
    }
  }

  return {
    name: arg.name,
    type,
    defaultValue: arg.defaultValue,
    isInput,
    isOutput,
  }
}

function toClassProp(prop: HeaderArgument): ClassProp {
  return {
    type: prop.type.replaceAll('*', '_ptr').trim(),
    name: prop.name,
    readonly: !prop.modifiers.includes('/RW'),
  }
}

/**
 * Builds namespaces and classes out of the flat declaration list
 */
export class ModelBuilder {
  private namespaces = new Map<string, NamespaceInfo>()
  private classes = new Map<string, ClassInfo>()

  constructor(
    private knownNamespaces: ReadonlySet<string>,
    private rootNamespace = 'cv'
  ) {}

  build(parsed: ParsedHeaders): HeaderModel {
    // Classes first so methods find their owner regardless of header order
    for (const decl of parsed.declarations) {
      if (decl.kind === 'class' || decl.kind === 'struct') {
        this.addClass(decl)
      }
    }

    for (const decl of parsed.declarations) {
      switch (decl.kind) {
        case 'enum':
          this.addEnum(decl)
          break
        case 'const':
          this.addConst(decl.name.replace('const ', '').trim(), decl.value)
          break
        case 'function':
          this.addFunction(decl)
          break
        default:
          break
      }
    }

    this.resolveBases()

    return {
      headers: [...parsed.headers],
      namespaces: this.namespaces,
      classes: this.classes,
    }
  }

  private namespace(name: string): NamespaceInfo {
    let ns = this.namespaces.get(name)
    if (!ns) {
      ns = { funcs: new Map(), enums: new Map(), consts: new Map() }
      this.namespaces.set(name, ns)
    }
    return ns
  }

  private addClass(decl: ClassDeclaration): void {
    const key = normalizeClassName(decl.name, this.rootNamespace)
    if (this.classes.has(key)) {
      console.warn(`Generator warning: class ${decl.name} already exists`)
      return
    }

    let jsName = key
    for (const modifier of decl.modifiers) {
      if (modifier.startsWith('=')) {
        jsName = modifier.slice(1)
      }
    }

    const rootScope = `${this.rootNamespace}::`
    const baseCnames = decl.bases
      .map((base) => base.replace(/,$/, '').trim())
      .filter((base) => base.length > 0)
    const bases = baseCnames.map((base) =>
      base.startsWith(rootScope) ? base.slice(rootScope.length) : base
    )

    const { namespace } = splitDeclName(decl.name, this.knownNamespaces)

    this.classes.set(key, {
      name: key,
      cname: decl.name.replaceAll('.', '::'),
      jsName,
      namespace: namespace.join('.'),
      bases,
      baseCnames,
      props: decl.properties.map(toClassProp),
      methods: new Map(),
      docstring: decl.docstring,
    })
  }

  private addEnum(decl: EnumDeclaration): void {
    let name = decl.name || '<unnamed>'
    const { namespace } = splitDeclName(name, this.knownNamespaces)
    const ns = this.namespace(namespace.join('.'))

    if (name.endsWith('<unnamed>')) {
      let index = 1
      while (ns.enums.has(name.replace('<unnamed>', `unnamed_${index}`))) {
        index++
      }
      name = name.replace('<unnamed>', `unnamed_${index}`)
    }

    if (ns.enums.has(name)) {
      console.warn(`Generator warning: enum ${name} already exists`)
      return
    }
    ns.enums.set(name, [...decl.values])

    for (const value of decl.values) {
      this.addConst(value.name.replace('const ', '').trim(), value.value)
    }
  }

  private addConst(name: string, value: string): void {
    const cname = name.replaceAll('.', '::')
    const split = splitDeclName(name, this.knownNamespaces)
    const key = [...split.classes, split.name].join('_')
    const ns = this.namespace(split.namespace.join('.'))

    if (ns.consts.has(key)) {
      console.warn(
        `Generator warning: constant ${key} (cname=${cname}) already exists`
      )
      return
    }
    ns.consts.set(key, { name: key, cname, value })
  }

  private addFunction(decl: FunctionDeclaration): void {
    const split = splitDeclName(decl.name, this.knownNamespaces)
    let cname = [...split.namespace, ...split.classes, split.name].join('::')
    let name = split.name
    let className = ''
    let bareClassName = ''

    if (split.classes.length > 0) {
      className = normalizeClassName(
        [...split.namespace, ...split.classes].join('.'),
        this.rootNamespace
      )
      bareClassName = split.classes[split.classes.length - 1]
    }
    const namespace = split.namespace.join('.')
    const isConstructor = name === bareClassName

    let isStatic = false
    let isConst = false
    let isVirtual = false
    let isPureVirtual = false
    let refReturn = false
    let constReturn = false

    for (const modifier of decl.modifiers) {
      switch (modifier) {
        case '/S':
          isStatic = true
          break
        case '/C':
          isConst = true
          break
        case '/V':
          isVirtual = true
          break
        case '/PV':
          isPureVirtual = true
          break
        case '/Ref':
          refReturn = true
          break
        case '/CRet':
          constReturn = true
          break
        default:
          if (modifier.startsWith('=')) {
            name = modifier.slice(1)
          }
      }
    }

    let funcs: Map<string, FuncInfo>
    if (className) {
      const owner = this.classes.get(className)
      if (!owner) {
        console.warn(
          `Generator warning: method ${decl.name} belongs to undeclared class ${className}`
        )
        return
      }
      cname = split.name
      funcs = owner.methods
    } else {
      funcs = this.namespace(namespace).funcs
    }

    let func = funcs.get(name)
    if (!func) {
      func = { className, name, cname, namespace, isConstructor, variants: [] }
      funcs.set(name, func)
    }

    let returnType = handleVector(handlePtr(decl.returnType).trim()).trim()
    if (returnType === 'void') {
      returnType = ''
    }

    func.variants.push({
      className,
      name,
      isConstructor,
      isStatic,
      isConst,
      isVirtual,
      isPureVirtual,
      refReturn,
      constReturn,
      returnType,
      args: decl.args.map(toArgInfo),
      docstring: decl.docstring,
    })
  }

  /**
   * Qualify each base against the known classes, searching from the class's
   * own scope outward.
   */
  private resolveBases(): void {
    for (const info of this.classes.values()) {
      const qualified = info.cname.split('::')
      if (qualified[0] === this.rootNamespace) {
        qualified.shift()
      }
      const scope = qualified.slice(0, -1)

      info.bases.forEach((base, index) => {
        const chunks = base.split('::')
        for (let depth = scope.length; depth >= 0; depth--) {
          const candidate = [...scope.slice(0, depth), ...chunks]
          if (this.classes.has(candidate.join('_'))) {
            info.bases[index] = candidate.join('::')
            info.baseCnames[index] = [this.rootNamespace, ...candidate].join('::')
            return
          }
        }
        console.warn(
          `Generator warning: unable to resolve base ${base} for ${info.name}`
        )
      })
    }
  }
}

export function buildModel(
  parsed: ParsedHeaders,
  rootNamespace = 'cv'
): HeaderModel {
  return new ModelBuilder(parsed.namespaces, rootNamespace).build(parsed)
}
