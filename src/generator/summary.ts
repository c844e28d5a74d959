import type {
  ClassProp,
  FuncInfo,
  SelectedConstant,
  Selection,
} from '../core/types.js'

export interface SelectionSummary {
  functions: string[]
  classes: Record<string, string[]>
  enums: string[]
  constants: string[]
}

export interface VariantDescription {
  returnType: string
  args: { name: string; type: string; defaultValue: string }[]
  isStatic: boolean
  isConst: boolean
}

export interface FunctionDescription {
  jsName: string
  cname: string
  variants: VariantDescription[]
}

export interface ClassDescription {
  jsName: string
  cname: string
  bases: string[]
  methods: (FunctionDescription & { factory: boolean })[]
  properties: ClassProp[]
  smartPtr: boolean
}

/** JSON-safe view of a selection, as printed by `validate --full` */
export interface SelectionDescription {
  functions: FunctionDescription[]
  classes: ClassDescription[]
  enums: { jsName: string; values: string[] }[]
  constants: SelectedConstant[]
}

/**
 * JS-visible names of everything a selection would emit
 */
export function summarizeSelection(selection: Selection): SelectionSummary {
  const classes: Record<string, string[]> = {}
  for (const selected of selection.classes) {
    classes[selected.jsName] = selected.methods.map((method) => method.name)
  }

  return {
    functions: selection.functions.map((fn) => fn.jsName),
    classes,
    enums: selection.enums.map((e) => e.jsName),
    constants: selection.constants.map((c) => c.jsName),
  }
}

function describeFunction(func: FuncInfo, jsName: string): FunctionDescription {
  return {
    jsName,
    cname: func.cname,
    variants: func.variants.map((variant) => ({
      returnType: variant.returnType || 'void',
      args: variant.args.map(({ name, type, defaultValue }) => ({
        name,
        type,
        defaultValue,
      })),
      isStatic: variant.isStatic,
      isConst: variant.isConst,
    })),
  }
}

export function describeSelection(selection: Selection): SelectionDescription {
  return {
    functions: selection.functions.map(({ func, jsName }) =>
      describeFunction(func, jsName)
    ),
    classes: selection.classes.map((selected) => ({
      jsName: selected.jsName,
      cname: selected.info.cname,
      bases: [...selected.info.baseCnames],
      methods: selected.methods.map((method) => ({
        ...describeFunction(method, method.name),
        factory: selected.externalConstructors.has(method),
      })),
      properties: selected.info.props.map((prop) => ({ ...prop })),
      smartPtr: selected.hasSmartPtr,
    })),
    enums: selection.enums.map((e) => ({
      jsName: e.jsName,
      values: e.values.map((value) => value.name.slice(value.name.lastIndexOf('.') + 1)),
    })),
    constants: selection.constants.map((c) => ({ ...c })),
  }
}
