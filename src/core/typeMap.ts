/** Header types rewritten to what the Embind glue actually takes */
export const NATIVE_TYPE_MAP: Readonly<Record<string, string>> = {
  InputArray: 'const cv::Mat&',
  OutputArray: 'cv::Mat&',
  InputOutputArray: 'cv::Mat&',
  InputArrayOfArrays: 'const std::vector<cv::Mat>&',
  OutputArrayOfArrays: 'std::vector<cv::Mat>&',
  string: 'std::string',
  String: 'std::string',
  'const String&': 'const std::string&',
}

/** Native types as they appear in the TypeScript declarations */
export const DECLARATION_TYPE_MAP: Readonly<Record<string, string>> = {
  '': 'void',
  'cv::Mat': 'Mat',
  'std::vector<int>': 'IntVector|int[]',
  'std::vector<float>': 'FloatVector|float[]',
  vector_float: 'FloatVector|float[]',
  'std::vector<double>': 'DoubleVector|double[]',
  'std::vector<Point>': 'PointVector',
  'std::vector<cv::Mat>': 'MatVector',
  'std::vector<Rect>': 'RectVector',
  'std::vector<KeyPoint>': 'KeyPointVector',
  'std::vector<DMatch>': 'DMatchVector',
  'std::vector<std::vector<DMatch>>': 'DMatchVectorVector',
  'std::vector<char>': 'unknown',
  'std::vector<uchar>': 'unknown',
  'std::vector<std::vector<char>>': 'unknown',
  'std::vector<std::vector<KeyPoint>>': 'unknown',
  'std::vector<std::vector<Point>>': 'unknown',
  'std::vector<String>': 'unknown',
  bool: 'boolean',
  size_t: 'number',
  String: 'string',
  Size: 'SizeLike',
  Point: 'PointLike',
  Point2f: 'Point2fLike',
  Rect: 'RectLike',
  RotatedRect: 'RotatedRectLike',
  Scalar: 'ScalarLike',
  TermCriteria: 'TermCriteriaLike',
  UsacParams: 'unknown',
  Moments: 'MomentsLike',
  Net: 'unknown',
}

/** Per-function argument types the header model cannot express */
export const ARGUMENT_TYPE_OVERRIDES: Readonly<
  Record<string, Readonly<Record<string, string>>>
> = {
  inRange: {
    lowerb: 'Mat | ScalarLike | number[]',
    upperb: 'Mat | ScalarLike | number[]',
  },
}

// Element types vecFromJSArray can convert
export const JS_ARRAY_ELEMENT_TYPES: ReadonlySet<string> = new Set([
  'int',
  'float',
  'double',
  'char',
  'uchar',
  'String',
  'std::string',
])

function lookup(map: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : undefined
}

export function nativeType(type: string): string {
  return lookup(NATIVE_TYPE_MAP, type) ?? type
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Rewrite every mapped type name occurring inside a compound type, matching
 * whole names only (`String` must not hit `std::string`).
 */
export function replaceNativeTypes(type: string): string {
  let result = type
  for (const [key, replacement] of Object.entries(NATIVE_TYPE_MAP)) {
    if (!result.includes(key)) {
      continue
    }
    const head = /^\w/.test(key) ? '(?<![\\w:])' : ''
    const tail = /\w$/.test(key) ? '(?!\\w)' : ''
    result = result.replace(
      new RegExp(`${head}${escapeRegExp(key)}${tail}`, 'g'),
      replacement
    )
  }
  return result
}

/**
 * TypeScript type for a native type: qualifiers and `Ptr<>` dropped, then
 * the declaration table. Unmapped plain names like `ml::SVM` become `ml_SVM`.
 */
export function declarationType(type: string, rootNamespace = 'cv'): string {
  let bare = type.replaceAll('const ', '').replace(/&+$/, '')
  if (bare.startsWith('Ptr<')) {
    bare = bare.slice(4, -1)
  }

  const mapped = lookup(DECLARATION_TYPE_MAP, bare)
  if (mapped !== undefined) {
    return mapped
  }

  if (/^[\w:]+$/.test(bare) && bare.includes('::')) {
    const rootScope = `${rootNamespace}::`
    const local = bare.startsWith(rootScope)
      ? bare.slice(rootScope.length)
      : bare
    return local.replaceAll('::', '_')
  }
  return bare
}
