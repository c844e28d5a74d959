import type { AllowList, AllowListModule } from './types.js'

/**
 * Functions that never get bound, whatever the allow-list says. Most take
 * output references or raw pointers Embind cannot marshal.
 */
export const IGNORED_FUNCTIONS: ReadonlySet<string> = new Set([
  'locate', // int&
  'minEnclosingCircle', // float&
  'checkRange',
  'minMaxLoc', // double*
  'floodFill', // implemented in the core bindings
  'phaseCorrelate',
  'randShuffle',
  'calibrationMatrixValues', // double&
  'undistortPoints', // global redefinition
  'CamShift', // Rect&
  'meanShift', // Rect&
])

/**
 * Merge per-module allow-lists. Lists under the same key are concatenated.
 */
export function makeAllowList(modules: readonly AllowListModule[]): AllowList {
  const allowList: AllowList = {}
  for (const module of modules) {
    for (const [key, names] of Object.entries(module)) {
      allowList[key] = [...(allowList[key] ?? []), ...names]
    }
  }
  return allowList
}

export function isModuleAllowed(allowList: AllowList, module: string): boolean {
  return Object.prototype.hasOwnProperty.call(allowList, module)
}

/**
 * A name is allowed when its module lists it. A module missing from the
 * allow-list allows nothing.
 */
export function isMethodAllowed(
  allowList: AllowList,
  module: string,
  name: string
): boolean {
  if (IGNORED_FUNCTIONS.has(name)) {
    return false
  }
  if (!isModuleAllowed(allowList, module)) {
    return false
  }
  return allowList[module].includes(name)
}
