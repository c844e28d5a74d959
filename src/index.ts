// Core exports
export { makeAllowList, IGNORED_FUNCTIONS } from './core/allowList.js'
export { buildModel, ModelBuilder, splitDeclName } from './core/model.js'
export { DEFAULT_OPTIONS, resolveOptions } from './core/options.js'
export { selectDeclarations } from './core/selection.js'

export * from './generator.js'

// Type exports
export type { GeneratorOptions } from './core/options.js'
export type {
  AllowList,
  AllowListConfig,
  AllowListModule,
  ClassDeclaration,
  ConstDeclaration,
  EnumDeclaration,
  FunctionDeclaration,
  HeaderArgument,
  HeaderDeclaration,
  HeaderModel,
  HeaderParser,
  Selection,
} from './core/types.js'
