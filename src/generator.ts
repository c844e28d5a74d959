// Generator exports - Node.js environment only
export {
  generateFromHeaders,
  generateWithParser,
  loadModel,
  readHeaderList,
  writeGeneratedFiles,
} from './generator/codegen.js'
export {
  parseAllowListFile,
  parseAllowListSource,
  parseAllowListJson,
} from './generator/allowListParser.js'
export { generateBindings, BindingsGenerator } from './generator/bindings.js'
export {
  generateDeclarations,
  DeclarationGenerator,
} from './generator/declarations.js'
export {
  loadHeaderParser,
  parseHeaders,
  resolveHeaderParser,
} from './generator/headerParser.js'
export { describeSelection, summarizeSelection } from './generator/summary.js'
export { createWatcher, GenerationWatcher } from './generator/watcher.js'

// Type exports for generator
export type {
  GenerateInputs,
  GenerationResult,
  LoadedModel,
} from './generator/codegen.js'
export type {
  SelectionDescription,
  SelectionSummary,
} from './generator/summary.js'
export type { WatcherOptions } from './generator/watcher.js'
