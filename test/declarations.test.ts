import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest'
import { buildModel } from '../src/core/model.js'
import { selectDeclarations } from '../src/core/selection.js'
import type { AllowListConfig, HeaderDeclaration, Selection } from '../src/core/types.js'
import {
  DeclarationGenerator,
  generateDeclarations,
  splitLines,
} from '../src/generator/declarations.js'
import {
  NAMESPACES,
  classDecl,
  sampleConfig,
  sampleDeclarations,
} from './fixtures.js'

function select(
  declarations: HeaderDeclaration[] = sampleDeclarations(),
  config: AllowListConfig = sampleConfig()
): Selection {
  const model = buildModel({
    headers: [],
    namespaces: new Set(NAMESPACES),
    declarations,
  })
  return selectDeclarations(model, config, { rootNamespace: 'cv' })
}

function generator(selection: Selection = select()): DeclarationGenerator {
  return new DeclarationGenerator(selection, { rootNamespace: 'cv' })
}

describe('splitLines', () => {
  it('drops the piece after a trailing newline', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b'])
    expect(splitLines('a\r\nb')).toEqual(['a', 'b'])
    expect(splitLines('')).toEqual([])
  })
})

describe('DeclarationGenerator', () => {
  let warn: MockInstance<typeof console.warn>

  beforeEach(() => {
    warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    warn.mockRestore()
  })

  it('names the four declaration files', () => {
    expect(
      generateDeclarations(select(), { rootNamespace: 'cv' }).map((f) => f.fileName)
    ).toEqual(['constants.d.ts', 'enums.d.ts', 'functions.d.ts', 'classes.d.ts'])
  })

  it('declares constants with their native name', () => {
    expect(generator().generateConstants()).toBe(
      '\n/** cv::BORDER_CONSTANT */\nexport const BORDER_CONSTANT: number\n' +
        '\n/** cv::BORDER_REFLECT */\nexport const BORDER_REFLECT: number\n' +
        '\n/** cv::CV_8U */\nexport const CV_8U: number\n' +
        '\n/** cv::FILLED */\nexport const FILLED: number\n'
    )
  })

  it('declares enums with bare member names', () => {
    expect(generator().generateEnums()).toBe(
      '\nexport enum BorderTypes {\n  BORDER_CONSTANT = 0,\n  BORDER_REFLECT = 2,\n}\n'
    )
  })

  describe('functions', () => {
    it('imports the core types and the enums it mentions', () => {
      const output = generator().generateFunctions()

      expect(output).toMatch(/^import \{ int, float, double \} from '\.\.\/core\/_types'\n/)
      expect(output).toContain("import { BorderTypes } from './enums'\n")
      expect(output).toContain(
        "import { SizeLike, PointLike, Point2fLike, RectLike, RotatedRectLike, ScalarLike, TermCriteriaLike, MomentsLike } from '../core/valueObjects'\n"
      )
    })

    it('renders documented functions', () => {
      expect(generator().generateFunctions()).toContain(
        '\n/**\n   * Calculates the per-element absolute difference.\n */\nexport function absdiff(src1: Mat, src2: Mat, dst: Mat): void\n'
      )
    })

    it('marks defaulted arguments optional', () => {
      expect(generator().generateFunctions()).toContain(
        '\n/**\n   * \n */\nexport function cvtColor(src: Mat, dst: Mat, code: int, dstCn?: int): void\n'
      )
    })

    it('widens the inRange bounds', () => {
      expect(generator().generateFunctions()).toContain(
        'export function inRange(src: Mat, lowerb: Mat | ScalarLike | number[], upperb: Mat | ScalarLike | number[], dst: Mat): void\n'
      )
    })

    it('uses prefixed JS names and mapped types', () => {
      const output = generator().generateFunctions()

      expect(output).toContain(
        'export function readNet(model: string, config?: string): unknown\n'
      )
      expect(output).toContain('export function ml_loadData(): int\n')
    })
  })

  describe('classes', () => {
    it('renders members, factories and the class comment', () => {
      expect(generator().generateClasses()).toContain(
        '\n/**\n * Contrast Limited Adaptive Histogram Equalization.\n * See apply().\n */\n' +
          'export class CLAHE extends EmClassHandle {\n' +
          '\n  /**\n   * \n   */\n  apply(src: Mat, dst: Mat): void\n' +
          '\n  /**\n   * Creates a CLAHE.\n   */\n  constructor(clipLimit?: double, tileGridSize?: SizeLike)\n' +
          '\n  /**\n   * \n   */\n  getClipLimit(): double\n' +
          '\n}\n'
      )
    })

    it('renders properties and overloaded constructors', () => {
      expect(generator().generateClasses()).toContain(
        'export class KeyPoint extends EmClassHandle {\n' +
          '\n  size: float\n' +
          '\n  pt: Point2fLike\n' +
          '\n  /**\n   * \n   */\n  constructor()\n' +
          '\n  /**\n   * \n   */\n  constructor(x: float, y: float, size: float)\n' +
          '\n}\n'
      )
    })

    it('extends only the known parent classes', () => {
      const output = generator().generateClasses()

      expect(output).toContain('export class ORB extends Feature2D {\n')
      expect(output).toContain('export class Feature2D extends EmClassHandle {\n')
      expect(output).toContain(
        '  detect(image: Mat, keypoints: KeyPointVector): void\n'
      )
      expect(output).toContain(
        '\n/**\n\n */\nexport class Algorithm extends EmClassHandle {\n\n}\n'
      )
    })

    it('imports the Embind handle but no enums', () => {
      const output = generator().generateClasses()

      expect(output).toContain(
        "import { EmClassHandle } from '../emscripten/emscripten'\n"
      )
      expect(output).not.toContain("from './enums'")
    })

    it('warns about classes with several parents', () => {
      const selection = select(
        [
          classDecl('cv.Feature2D'),
          classDecl('cv.Tracker'),
          classDecl('cv.Hybrid', ['cv::Feature2D', 'cv::Tracker']),
        ],
        { allowList: { Hybrid: [] }, namespacePrefixOverride: {} }
      )

      const output = generator(selection).generateClasses()

      expect(output).toContain('export class Hybrid extends Feature2D {\n')
      expect(warn).toHaveBeenCalledWith(
        'WARNING: Class `Hybrid` has multiple parents: Feature2D, Tracker'
      )
    })
  })
})
