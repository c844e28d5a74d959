import type { GeneratorOptions } from '../core/options.js'
import {
  JS_ARRAY_ELEMENT_TYPES,
  NATIVE_TYPE_MAP,
  nativeType,
  replaceNativeTypes,
} from '../core/typeMap.js'
import type {
  FuncInfo,
  FuncVariant,
  SelectedClass,
  Selection,
} from '../core/types.js'

export const WRAPPER_NAMESPACE = 'Wrappers'

interface Rendered {
  bindings: string[]
  wrappers: string[]
}

function wrapperFunction(
  returnType: string,
  name: string,
  signature: string[],
  call: string
): string {
  return `    ${returnType} ${name}(${signature.join(', ')}) {
        return ${call};
    }
`
}

function functionAttributes(variant: FuncVariant, argTypes: string[]): string {
  let attributes = ''
  if (argTypes.join('').includes('*')) {
    attributes += ', allow_raw_pointers()'
  }
  if (variant.isPureVirtual) {
    attributes += ', pure_virtual()'
  }
  return attributes
}

/**
 * Generates the Embind glue for the selected declarations
 */
export class BindingsGenerator {
  constructor(
    private selection: Selection,
    private options: GeneratorOptions
  ) {}

  /**
   * Fill the core bindings template and append the wrappers and the
   * EMSCRIPTEN_BINDINGS block
   */
  generate(coreBindings: string, headers: string[]): string {
    const bindings: string[] = []
    const wrappers: string[] = []

    for (const { jsName, func } of this.selection.functions) {
      const rendered = this.options.wrappedFunctions
        ? this.bindWithWrappers(func, jsName, null, new Set())
        : this.bindDirect(func, jsName, null)
      bindings.push(...rendered.bindings)
      wrappers.push(...rendered.wrappers)
    }

    for (const selected of this.selection.classes) {
      const rendered = this.bindClass(selected)
      bindings.push(...rendered.bindings)
      wrappers.push(...rendered.wrappers)
    }

    if (this.options.exportEnums) {
      bindings.push(...this.bindEnums())
    }

    if (this.options.exportConsts) {
      for (const constant of this.selection.constants) {
        bindings.push(`
    emscripten::constant("${constant.jsName}", static_cast<long>(${constant.cname}));
`)
      }
    }

    const includes = headers.map((header) => `#include "${header}"`).join('\n')
    let output = coreBindings.replaceAll('@INCLUDES@', () => includes)

    output += `\nnamespace ${WRAPPER_NAMESPACE} {\n${wrappers.join('\n')}\n}`
    output += `\n\nEMSCRIPTEN_BINDINGS(${this.options.bindingName}) {${bindings.join('')}\n}\n`
    return output
  }

  private returnType(variant: FuncVariant): string {
    let returnType = variant.returnType.trim() || 'void'
    if (returnType.startsWith('Ptr')) {
      const pointee = returnType.replace('Ptr<', '').replace('>', '')
      if (Object.prototype.hasOwnProperty.call(NATIVE_TYPE_MAP, pointee)) {
        returnType = NATIVE_TYPE_MAP[pointee]
      }
    }
    return replaceNativeTypes(returnType)
  }

  /**
   * Bind each variant through a free wrapper function, plus one extra
   * wrapper per trailing default argument
   */
  private bindWithWrappers(
    func: FuncInfo,
    jsName: string,
    owner: SelectedClass | null,
    constructorArgCounts: Set<number>
  ): Rendered {
    const bindings: string[] = []
    const wrappers: string[] = []

    func.variants.forEach((variant, index) => {
      const isFactory = owner !== null && variant.returnType.includes('Ptr<')
      const returnType = this.returnType(variant)

      const argTypes = variant.args.map((arg) => nativeType(arg.type))
      const defaultCount = this.options.defaultParams
        ? variant.args.filter((arg) => arg.defaultValue !== '').length
        : 0
      const attributes = functionAttributes(variant, argTypes)

      let wrapperName: string
      let jsFuncName: string
      if (owner === null) {
        jsFuncName = jsName
        wrapperName = `${jsName}_wrapper`
      } else {
        jsFuncName = func.name
        wrapperName = `${owner.info.name}_${func.name}_wrapper`
      }
      if (index > 0) {
        wrapperName += String(index)
        jsFuncName += String(index)
      }
      const qualifiedWrapper = `${WRAPPER_NAMESPACE}::${wrapperName}`

      const signature: string[] = []
      const callArgs: string[] = []
      const bindTypes: string[] = []

      argTypes.forEach((type, i) => {
        const name = `arg${i + 1}`
        let argType = type
        let callArg = name

        if (this.options.vecFromJsArray) {
          const match = /const std::vector<(.*)>&/.exec(argType)
          if (match && JS_ARRAY_ELEMENT_TYPES.has(match[1])) {
            callArg = `emscripten::vecFromJSArray<${match[1]}>(${name})`
            argType = argType.replace(/std::vector<(.*)>/, 'emscripten::val')
          }
        }

        signature.push(`${argType} ${name}`)
        callArgs.push(callArg)
        bindTypes.push(argType)
      })

      // overloads of an attached free function have no receiver
      const isMember =
        owner !== null &&
        !isFactory &&
        !variant.isStatic &&
        variant.className !== ''
      if (owner !== null && isMember) {
        signature.unshift(`${owner.info.cname}& arg0`)
        bindTypes.unshift(`${owner.info.cname}&`)
      }

      for (let dropped = 0; dropped <= defaultCount; dropped++) {
        const postfix = dropped > 0 ? `_${dropped}` : ''
        const args = callArgs.slice(0, callArgs.length - dropped).join(', ')
        const types = bindTypes.slice(0, bindTypes.length - dropped)

        let call: string
        if (owner === null) {
          call = `${func.cname}(${args})`
        } else if (isMember) {
          call = `arg0.${func.cname}(${args})`
        } else {
          const scope = variant.className ? `${owner.info.cname}::` : ''
          call = `${scope}${func.cname}(${args})`
        }

        let binding: string
        if (owner === null) {
          binding = `
    function("${jsFuncName}", select_overload<${returnType}(${types.join(', ')})>(&${qualifiedWrapper}${postfix})${attributes});
`
        } else if (isFactory) {
          // pure virtual factories and repeated arities cannot be told apart
          if (variant.isPureVirtual) {
            continue
          }
          const argCount = variant.args.length - dropped
          if (constructorArgCounts.has(argCount)) {
            continue
          }
          constructorArgCounts.add(argCount)
          binding = `
        .constructor(select_overload<${returnType}(${types.join(',')})>(&${qualifiedWrapper}${postfix})${attributes})`
        } else {
          const method = isMember ? 'function' : 'class_function'
          binding = `
        .${method}("${jsFuncName}", select_overload<${returnType}(${types.join(',')})>(&${qualifiedWrapper}${postfix})${attributes})`
        }

        bindings.push(binding)
        wrappers.push(
          wrapperFunction(
            returnType,
            wrapperName + postfix,
            signature.slice(0, signature.length - dropped),
            call
          )
        )
      }
    })

    return { bindings, wrappers }
  }

  /**
   * Bind the native function itself, selecting the overload by signature
   */
  private bindDirect(
    func: FuncInfo,
    jsName: string,
    owner: SelectedClass | null
  ): Rendered {
    const target = owner ? `${owner.info.cname}::${func.cname}` : func.cname

    const bindings = func.variants.map((variant, index) => {
      let returnType = this.returnType(variant)
      if (variant.constReturn && !returnType.startsWith('const')) {
        returnType = `const ${returnType}`
      }
      if (variant.refReturn && !returnType.endsWith('&')) {
        returnType += '&'
      }

      const argTypes = variant.args.map((arg) => nativeType(arg.type))
      const attributes = functionAttributes(variant, argTypes)
      const name = index > 0 ? `${jsName}${index}` : jsName

      if (owner === null) {
        return `
    function("${name}", select_overload<${returnType}(${argTypes.join(', ')})>(&${target})${attributes});
`
      }

      const qualifier = variant.isConst ? ' const' : ''
      const method = variant.isStatic ? 'class_function' : 'function'
      return `
        .${method}("${name}", select_overload<${returnType}(${argTypes.join(', ')})${qualifier}>(&${target})${attributes})`
    })

    return { bindings, wrappers: [] }
  }

  private bindClass(selected: SelectedClass): Rendered {
    const { info } = selected
    const items: string[] = []
    const wrappers: string[] = []
    const constructorArgCounts = new Set<number>()

    for (const method of selected.methods) {
      if (method.isConstructor) {
        for (const variant of method.variants) {
          if (constructorArgCounts.has(variant.args.length)) {
            continue
          }
          constructorArgCounts.add(variant.args.length)
          const signature = variant.args.map((arg) => nativeType(arg.type))
          items.push(`
        .constructor<${signature.join(', ')}>()`)
        }
        continue
      }

      const [first] = method.variants
      const needsWrapper =
        selected.externalConstructors.has(method) ||
        (this.options.wrappedFunctions &&
          (method.variants.length > 1 ||
            first.args.length > 0 ||
            first.returnType.includes('String')))

      const rendered = needsWrapper
        ? this.bindWithWrappers(method, method.name, selected, constructorArgCounts)
        : this.bindDirect(method, method.name, selected)
      items.push(...rendered.bindings)
      wrappers.push(...rendered.wrappers)
    }

    if (selected.hasSmartPtr) {
      items.push(`
        .smart_ptr<Ptr<${info.cname}>>("Ptr<${selected.jsName}>")`)
    }

    for (const prop of info.props) {
      items.push(`
        .property("${prop.name}", &${info.cname}::${prop.name})`)
    }

    const derivation =
      info.baseCnames.length > 0 ? `, base<${info.baseCnames[0]}>` : ''

    return {
      bindings: [
        `
    emscripten::class_<${info.cname}${derivation}>("${selected.jsName}")${items.join('')};
`,
      ],
      wrappers,
    }
  }

  private bindEnums(): string[] {
    return this.selection.enums.map((enumeration) => {
      const cppName = `${this.options.rootNamespace}::${enumeration.name.replaceAll('.', '::')}`
      const values = enumeration.values
        .map((value) => {
          const name = value.name.slice(value.name.lastIndexOf('.') + 1)
          return `
        .value("${name}", ${cppName}::${name})`
        })
        .join('')
      return `
    emscripten::enum_<${cppName}>("${enumeration.jsName}")${values};
`
    })
  }
}

/**
 * Render the bindings source for a selection
 */
export function generateBindings(
  selection: Selection,
  coreBindings: string,
  headers: string[],
  options: GeneratorOptions
): string {
  return new BindingsGenerator(selection, options).generate(coreBindings, headers)
}
