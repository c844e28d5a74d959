// Declarations as produced by the header parser module

export interface HeaderArgument {
  type: string
  name: string
  defaultValue: string
  modifiers: string[]
}

export interface ClassDeclaration {
  kind: 'class' | 'struct'
  name: string
  bases: string[]
  modifiers: string[]
  properties: HeaderArgument[]
  docstring: string
}

export interface EnumValueDeclaration {
  name: string
  value: string
}

export interface EnumDeclaration {
  kind: 'enum'
  name: string
  values: EnumValueDeclaration[]
  docstring: string
}

export interface ConstDeclaration {
  kind: 'const'
  name: string
  value: string
}

export interface FunctionDeclaration {
  kind: 'function'
  name: string
  returnType: string
  modifiers: string[]
  args: HeaderArgument[]
  docstring: string
}

export type HeaderDeclaration =
  | ClassDeclaration
  | EnumDeclaration
  | ConstDeclaration
  | FunctionDeclaration

export interface HeaderParser {
  parse(headerPath: string): unknown
  readonly namespaces: Iterable<string>
}

export interface ParsedHeaders {
  headers: string[]
  namespaces: Set<string>
  declarations: HeaderDeclaration[]
}

// Model built from the declarations

export interface ArgInfo {
  name: string
  type: string
  defaultValue: string
  isInput: boolean
  isOutput: boolean
}

export interface FuncVariant {
  className: string
  name: string
  isConstructor: boolean
  isStatic: boolean
  isConst: boolean
  isVirtual: boolean
  isPureVirtual: boolean
  refReturn: boolean
  constReturn: boolean
  returnType: string
  args: ArgInfo[]
  docstring: string
}

export interface FuncInfo {
  /** Normalized name of the owning class, empty for free functions */
  className: string
  name: string
  cname: string
  namespace: string
  isConstructor: boolean
  variants: FuncVariant[]
}

export interface ClassProp {
  type: string
  name: string
  readonly: boolean
}

export interface ClassInfo {
  /** Normalized name, also the allow-list key */
  name: string
  cname: string
  jsName: string
  namespace: string
  /** Bases below the root namespace, `::` separated */
  bases: string[]
  /** Native names of the bases; unresolved ones as declared */
  baseCnames: string[]
  props: ClassProp[]
  methods: Map<string, FuncInfo>
  docstring: string
}

export interface ConstInfo {
  name: string
  cname: string
  value: string
}

export interface NamespaceInfo {
  funcs: Map<string, FuncInfo>
  enums: Map<string, EnumValueDeclaration[]>
  consts: Map<string, ConstInfo>
}

export interface HeaderModel {
  headers: string[]
  namespaces: Map<string, NamespaceInfo>
  classes: Map<string, ClassInfo>
}

// Allow-list

export type AllowListModule = Record<string, readonly string[]>
export type AllowList = Record<string, string[]>

export interface AllowListConfig {
  allowList: AllowList
  namespacePrefixOverride: Record<string, string>
}

// Selection handed to the renderers

export interface SelectedFunction {
  jsName: string
  namespace: string
  func: FuncInfo
}

export interface SelectedClass {
  jsName: string
  info: ClassInfo
  /** Methods in render order, attached factories included */
  methods: FuncInfo[]
  /** Free functions returning Ptr<...> attached to this class */
  externalConstructors: Set<FuncInfo>
  hasSmartPtr: boolean
}

export interface SelectedEnum {
  jsName: string
  /** Dotted name without the root namespace */
  name: string
  values: EnumValueDeclaration[]
}

export interface SelectedConstant {
  jsName: string
  cname: string
}

export interface Selection {
  functions: SelectedFunction[]
  classes: SelectedClass[]
  enums: SelectedEnum[]
  constants: SelectedConstant[]
}

export interface GeneratedFile {
  fileName: string
  contents: string
}
