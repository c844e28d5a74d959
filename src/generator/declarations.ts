import type { GeneratorOptions } from '../core/options.js'
import { ARGUMENT_TYPE_OVERRIDES, declarationType } from '../core/typeMap.js'
import type {
  FuncInfo,
  FuncVariant,
  GeneratedFile,
  SelectedClass,
  Selection,
} from '../core/types.js'

// Parents the generated classes may extend; everything else extends the
// Embind handle directly
export const EXTENDABLE_BASES: ReadonlySet<string> = new Set([
  'Feature2D',
  'DescriptorMatcher',
])

const CORE_IMPORTS = `import { int, float, double } from '../core/_types'
import { Mat } from '../core/Mat'
import { IntVector, FloatVector, DoubleVector, PointVector, MatVector, RectVector, KeyPointVector, DMatchVector, DMatchVectorVector } from '../core/vectors'
`

const VALUE_OBJECT_IMPORTS = `import { SizeLike, PointLike, Point2fLike, RectLike, RotatedRectLike, ScalarLike, TermCriteriaLike, MomentsLike } from '../core/valueObjects'
`

const HANDLE_IMPORT = `import { EmClassHandle } from '../emscripten/emscripten'
`

/** Line splitting that drops the empty piece after a trailing newline */
export function splitLines(text: string): string[] {
  if (text === '') {
    return []
  }
  const lines = text.split(/\r\n|\r|\n/)
  if (lines[lines.length - 1] === '' && /[\r\n]$/.test(text)) {
    lines.pop()
  }
  return lines
}

function memberComment(docstring: string): string {
  return splitLines(docstring === '' ? ' ' : docstring)
    .map((line) => `   * ${line.replace(/^[ *]+/, '')}`)
    .join('\n')
}

function classComment(docstring: string): string {
  return splitLines(docstring)
    .map((line) => ` * ${line}`)
    .join('\n')
}

/**
 * Renders the TypeScript declaration files for the selected declarations
 */
export class DeclarationGenerator {
  private referencedTypes = new Set<string>()

  constructor(
    private selection: Selection,
    private options: Pick<GeneratorOptions, 'rootNamespace'>
  ) {}

  /**
   * All four declaration files, in write order
   */
  generate(): GeneratedFile[] {
    return [
      { fileName: 'constants.d.ts', contents: this.generateConstants() },
      { fileName: 'enums.d.ts', contents: this.generateEnums() },
      { fileName: 'functions.d.ts', contents: this.generateFunctions() },
      { fileName: 'classes.d.ts', contents: this.generateClasses() },
    ]
  }

  generateConstants(): string {
    return this.selection.constants
      .map(
        (constant) => `
/** ${constant.cname} */
export const ${constant.jsName}: number
`
      )
      .join('')
  }

  generateEnums(): string {
    return this.selection.enums
      .map((enumeration) => {
        const members = enumeration.values
          .map((value) => {
            const qualified = value.name.replace('const ', '')
            const name = qualified.slice(qualified.lastIndexOf('.') + 1)
            return `  ${name} = ${value.value},\n`
          })
          .join('')

        return `
export enum ${enumeration.jsName} {
${members}}
`
      })
      .join('')
  }

  generateFunctions(): string {
    this.referencedTypes.clear()
    const body = this.selection.functions
      .map(({ jsName, func }) => this.renderFunction(func, jsName, null))
      .join('')

    return CORE_IMPORTS + this.enumImports() + VALUE_OBJECT_IMPORTS + body
  }

  generateClasses(): string {
    this.referencedTypes.clear()
    const body = this.selection.classes
      .map((selected) => this.renderClass(selected))
      .join('')

    return (
      CORE_IMPORTS +
      this.enumImports() +
      VALUE_OBJECT_IMPORTS +
      HANDLE_IMPORT +
      body
    )
  }

  private typeOf(nativeType: string): string {
    const type = declarationType(nativeType, this.options.rootNamespace)
    this.referencedTypes.add(type)
    return type
  }

  private renderArgs(variant: FuncVariant): string {
    const overrides = Object.prototype.hasOwnProperty.call(
      ARGUMENT_TYPE_OVERRIDES,
      variant.name
    )
      ? ARGUMENT_TYPE_OVERRIDES[variant.name]
      : {}
    return variant.args
      .map((arg) => {
        const type = Object.prototype.hasOwnProperty.call(overrides, arg.name)
          ? overrides[arg.name]
          : this.typeOf(arg.type)
        const optional = arg.defaultValue !== '' ? '?' : ''
        return `${arg.name}${optional}: ${type}`
      })
      .join(', ')
  }

  private renderFunction(
    func: FuncInfo,
    jsName: string,
    owner: SelectedClass | null
  ): string {
    let result = ''

    for (const variant of func.variants) {
      const args = this.renderArgs(variant)
      const comment = memberComment(variant.docstring)

      if (owner === null) {
        result += `
/**
${comment}
 */
export function ${jsName}(${args}): ${this.typeOf(variant.returnType)}
`
      } else if (
        variant.isConstructor ||
        variant.returnType.includes('Ptr<')
      ) {
        result += `
  /**
${comment}
   */
  constructor(${args})
`
      } else {
        result += `
  /**
${comment}
   */
  ${variant.name}(${args}): ${this.typeOf(variant.returnType)}
`
      }
    }

    return result
  }

  private renderClass(selected: SelectedClass): string {
    const { info, jsName } = selected
    let body = ''

    for (const prop of info.props) {
      body += `
  ${prop.name}: ${this.typeOf(prop.type)}
`
    }

    for (const method of selected.methods) {
      body += this.renderFunction(method, method.name, selected)
    }

    let parent = 'EmClassHandle'
    if (info.bases.length > 0) {
      if (info.bases.length > 1) {
        console.warn(
          `WARNING: Class \`${jsName}\` has multiple parents: ${info.bases.join(', ')}`
        )
      }
      const base = info.bases[0].replaceAll('::', '_')
      if (EXTENDABLE_BASES.has(base)) {
        parent = base
      }
    }

    return `
/**
${classComment(info.docstring)}
 */
export class ${jsName} extends ${parent} {
${body}
}
`
  }

  /** Import line for the enums the rendered types mention */
  private enumImports(): string {
    const enumNames = new Set(this.selection.enums.map((e) => e.jsName))
    const used = new Set<string>()
    for (const type of this.referencedTypes) {
      for (const token of type.split(/\W+/)) {
        if (enumNames.has(token)) {
          used.add(token)
        }
      }
    }
    if (used.size === 0) {
      return ''
    }
    return `import { ${[...used].sort().join(', ')} } from './enums'\n`
  }
}

/**
 * Render the declaration files for a selection
 */
export function generateDeclarations(
  selection: Selection,
  options: Pick<GeneratorOptions, 'rootNamespace'>
): GeneratedFile[] {
  return new DeclarationGenerator(selection, options).generate()
}
