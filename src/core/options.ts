export interface GeneratorOptions {
  /** First segment of the namespaces that get bound */
  rootNamespace: string
  /** Name passed to EMSCRIPTEN_BINDINGS() */
  bindingName: string
  exportEnums: boolean
  exportConsts: boolean
  /** Emit one wrapper per trailing default argument */
  defaultParams: boolean
  wrappedFunctions: boolean
  vecFromJsArray: boolean
}

export const DEFAULT_OPTIONS: GeneratorOptions = {
  rootNamespace: 'cv',
  bindingName: 'testBinding',
  exportEnums: false,
  exportConsts: true,
  defaultParams: true,
  wrappedFunctions: true,
  vecFromJsArray: true,
}

export function resolveOptions(
  overrides: Partial<GeneratorOptions> = {}
): GeneratorOptions {
  return {
    rootNamespace: overrides.rootNamespace ?? DEFAULT_OPTIONS.rootNamespace,
    bindingName: overrides.bindingName ?? DEFAULT_OPTIONS.bindingName,
    exportEnums: overrides.exportEnums ?? DEFAULT_OPTIONS.exportEnums,
    exportConsts: overrides.exportConsts ?? DEFAULT_OPTIONS.exportConsts,
    defaultParams: overrides.defaultParams ?? DEFAULT_OPTIONS.defaultParams,
    wrappedFunctions:
      overrides.wrappedFunctions ?? DEFAULT_OPTIONS.wrappedFunctions,
    vecFromJsArray: overrides.vecFromJsArray ?? DEFAULT_OPTIONS.vecFromJsArray,
  }
}
