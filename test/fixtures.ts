import type {
  AllowListConfig,
  ClassDeclaration,
  HeaderArgument,
  HeaderDeclaration,
  HeaderParser,
} from '../src/core/types.js'

export const NAMESPACES = ['cv', 'cv.ml', 'cv.dnn', 'other']

export function arg(
  type: string,
  name: string,
  defaultValue = '',
  modifiers: string[] = []
): HeaderArgument {
  return { type, name, defaultValue, modifiers }
}

export function mat(name: string, modifiers: string[] = []): HeaderArgument {
  return arg('Mat', name, '', modifiers)
}

export function classDecl(
  name: string,
  bases: string[] = [],
  extra: Partial<Omit<ClassDeclaration, 'kind' | 'name' | 'bases'>> = {}
): HeaderDeclaration {
  return {
    kind: 'class',
    name,
    bases,
    modifiers: [],
    properties: [],
    docstring: '',
    ...extra,
  }
}

export function fn(
  name: string,
  returnType: string,
  args: HeaderArgument[] = [],
  modifiers: string[] = [],
  docstring = ''
): HeaderDeclaration {
  return { kind: 'function', name, returnType, modifiers, args, docstring }
}

export function sampleDeclarations(): HeaderDeclaration[] {
  return [
    classDecl('cv.Algorithm'),
    classDecl('cv.Feature2D', ['cv::Algorithm'], {
      docstring: 'Abstract base class for 2D image feature detectors.',
    }),
    classDecl('cv.ORB', ['cv::Feature2D']),
    classDecl('cv.CLAHE', ['cv::Algorithm'], {
      docstring: 'Contrast Limited Adaptive Histogram Equalization.\nSee apply().',
    }),
    classDecl('cv.KeyPoint', [], {
      properties: [arg('float', 'size', '', ['/RW']), arg('Point2f', 'pt')],
    }),
    fn('cv.KeyPoint.KeyPoint', ''),
    fn('cv.KeyPoint.KeyPoint', '', [
      arg('float', 'x'),
      arg('float', 'y'),
      arg('float', 'size'),
    ]),
    { kind: 'const', name: 'cv.CV_8U', value: '0' },
    {
      kind: 'enum',
      name: 'cv.BorderTypes',
      values: [
        { name: 'const cv.BORDER_CONSTANT', value: '0' },
        { name: 'const cv.BORDER_REFLECT', value: '2' },
      ],
      docstring: '',
    },
    {
      kind: 'enum',
      name: 'cv.<unnamed>',
      values: [{ name: 'const cv.FILLED', value: '-1' }],
      docstring: '',
    },
    fn(
      'cv.absdiff',
      'void',
      [mat('src1'), mat('src2'), mat('dst', ['/O'])],
      [],
      'Calculates the per-element absolute difference.'
    ),
    fn('cv.borderInterpolate', 'int', [
      arg('int', 'p'),
      arg('int', 'len'),
      arg('BorderTypes', 'borderType'),
    ]),
    fn('cv.inRange', 'void', [
      mat('src'),
      mat('lowerb'),
      mat('upperb'),
      mat('dst', ['/O']),
    ]),
    fn('cv.minMaxLoc', 'void', [mat('src')]),
    fn(
      'cv.createCLAHE',
      'Ptr_CLAHE',
      [arg('double', 'clipLimit', '40.0'), arg('Size', 'tileGridSize', 'Size(8, 8)')],
      [],
      'Creates a CLAHE.'
    ),
    fn('cv.CLAHE.apply', 'void', [mat('src'), mat('dst', ['/O'])]),
    fn('cv.CLAHE.getClipLimit', 'double', [], ['/C']),
    fn('cv.CLAHE.setClipLimit', 'void', [arg('double', 'clipLimit')]),
    fn('cv.ORB.create', 'Ptr_ORB', [arg('int', 'nfeatures', '500')], ['/S']),
    fn('cv.ORB.setMaxFeatures', 'void', [arg('int', 'maxFeatures')]),
    fn('cv.Feature2D.detect', 'void', [
      mat('image'),
      arg('vector_KeyPoint', 'keypoints', '', ['/O']),
    ]),
    fn('cv.dnn.readNet', 'Net', [
      arg('String', 'model'),
      arg('String', 'config', '""'),
    ]),
    fn('cv.ml.loadData', 'int'),
    fn('other.helper', 'int'),
    fn('cv.cvtColor', 'void', [
      mat('src'),
      mat('dst', ['/O']),
      arg('int', 'code'),
      arg('int', 'dstCn', '0'),
    ]),
  ]
}

export function sampleConfig(): AllowListConfig {
  return {
    allowList: {
      '': [
        'absdiff',
        'borderInterpolate',
        'inRange',
        'minMaxLoc',
        'createCLAHE',
        'readNet',
        'ml_loadData',
        'helper',
        'cvtColor',
      ],
      Algorithm: [],
      Feature2D: ['detect'],
      ORB: ['create', 'setMaxFeatures'],
      CLAHE: ['apply', 'getClipLimit'],
      KeyPoint: ['KeyPoint'],
    },
    namespacePrefixOverride: { dnn: '' },
  }
}

/**
 * In-process parser that reports every sample declaration for the core
 * header and nothing for the others
 */
export function createFixtureParser(
  declarations: HeaderDeclaration[] = sampleDeclarations()
): HeaderParser {
  return {
    namespaces: new Set(NAMESPACES),
    parse: (header: string) => (header.endsWith('core.hpp') ? declarations : []),
  }
}
