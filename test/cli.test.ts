import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest'
import { DEFAULT_OPTIONS } from '../src/core/options.js'
import { createProgram } from '../src/program.js'

const { generateFromHeaders } = vi.hoisted(() => ({
  generateFromHeaders: vi.fn(async () => ({
    selection: { functions: [], classes: [], enums: [], constants: [] },
    writtenFiles: [],
  })),
}))

vi.mock('../src/generator/codegen.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../src/generator/codegen.js')>()),
  generateFromHeaders,
}))

vi.mock('../src/generator/headerParser.js', async (importOriginal) => {
  const { createFixtureParser } = await import('./fixtures.js')
  return {
    ...(await importOriginal<typeof import('../src/generator/headerParser.js')>()),
    loadHeaderParser: vi.fn(async () => createFixtureParser()),
  }
})

const PATHS = [
  'parser.mjs',
  'out/bindings.cpp',
  'headers.txt',
  'core_bindings.cpp',
  'allowlist.config.ts',
]

function run(...args: string[]): Promise<unknown> {
  return createProgram().parseAsync(['node', 'embind-tsgen', ...args])
}

describe('cli', () => {
  let log: MockInstance<typeof console.log>
  let error: MockInstance<typeof console.error>
  let warn: MockInstance<typeof console.warn>
  let exit: MockInstance<typeof process.exit>

  beforeEach(() => {
    generateFromHeaders.mockClear()
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined)
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`)
    })
  })

  afterEach(() => {
    log.mockRestore()
    error.mockRestore()
    warn.mockRestore()
    exit.mockRestore()
  })

  describe('generate', () => {
    it('prints the usage and returns when paths are missing', async () => {
      await run('parser.mjs', 'out/bindings.cpp')

      expect(log.mock.calls).toEqual([
        [
          'Usage:\n  embind-tsgen <header parser module> <bindings.cpp> <headers.txt> <core_bindings.cpp> <allowlist config>',
        ],
        [`Current args are: ${process.argv.map((arg) => `'${arg}'`).join(', ')}`],
      ])
      expect(generateFromHeaders).not.toHaveBeenCalled()
      expect(exit).not.toHaveBeenCalled()
    })

    it('leaves the types directory to the generator by default', async () => {
      await run(...PATHS)

      expect(generateFromHeaders).toHaveBeenCalledWith(
        {
          parserModule: 'parser.mjs',
          bindingsFile: 'out/bindings.cpp',
          headersFile: 'headers.txt',
          coreBindingsFile: 'core_bindings.cpp',
          allowListFile: 'allowlist.config.ts',
          typesDir: undefined,
        },
        DEFAULT_OPTIONS
      )
    })

    it('passes the types directory and the generator flags', async () => {
      await run(
        'generate',
        '-t',
        'typings',
        '--binding-name',
        'opencv',
        '--export-enums',
        '--no-wrappers',
        '--no-export-consts',
        ...PATHS
      )

      expect(generateFromHeaders).toHaveBeenCalledWith(
        expect.objectContaining({ typesDir: 'typings' }),
        {
          ...DEFAULT_OPTIONS,
          bindingName: 'opencv',
          exportEnums: true,
          exportConsts: false,
          wrappedFunctions: false,
        }
      )
    })

    it('reports failures and exits with status 1', async () => {
      const failure = new Error('Headers list not found: /work/headers.txt')
      generateFromHeaders.mockRejectedValueOnce(failure)

      await expect(run(...PATHS)).rejects.toThrow('process.exit(1)')
      expect(error).toHaveBeenCalledWith('❌ Error generating bindings:', failure)
      expect(exit).toHaveBeenCalledWith(1)
    })
  })

  describe('validate', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'cli-'))
      writeFileSync(join(dir, 'headers.txt'), 'opencv2/core.hpp;')
      writeFileSync(
        join(dir, 'allowlist.config.ts'),
        "export default { '': ['absdiff'], Algorithm: [] }\n"
      )
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    function validate(...flags: string[]): Promise<unknown> {
      return run(
        'validate',
        ...flags,
        'parser.mjs',
        join(dir, 'headers.txt'),
        join(dir, 'allowlist.config.ts')
      )
    }

    it('prints a summary of the selection', async () => {
      await validate()

      expect(log.mock.calls.map(([message]) => message)).toEqual([
        '📋 Selection:',
        '- 1 functions',
        '- 1 classes',
        '- 1 enums',
        '- 4 constants',
        '\n📄 Class: Algorithm',
        '  - Methods: 0',
      ])
    })

    it('prints the full selection as JSON', async () => {
      await validate('--full')

      const calls = log.mock.calls
      expect(calls[calls.length - 2]).toEqual(['\nFull selection:'])
      expect(JSON.parse(String(calls[calls.length - 1][0]))).toEqual({
        functions: [
          {
            jsName: 'absdiff',
            cname: 'cv::absdiff',
            variants: [
              {
                returnType: 'void',
                args: [
                  { name: 'src1', type: 'const cv::Mat&', defaultValue: '' },
                  { name: 'src2', type: 'const cv::Mat&', defaultValue: '' },
                  { name: 'dst', type: 'cv::Mat&', defaultValue: '' },
                ],
                isStatic: false,
                isConst: false,
              },
            ],
          },
        ],
        classes: [
          {
            jsName: 'Algorithm',
            cname: 'cv::Algorithm',
            bases: [],
            methods: [],
            properties: [],
            smartPtr: false,
          },
        ],
        enums: [{ jsName: 'BorderTypes', values: ['BORDER_CONSTANT', 'BORDER_REFLECT'] }],
        constants: [
          { jsName: 'BORDER_CONSTANT', cname: 'cv::BORDER_CONSTANT' },
          { jsName: 'BORDER_REFLECT', cname: 'cv::BORDER_REFLECT' },
          { jsName: 'CV_8U', cname: 'cv::CV_8U' },
          { jsName: 'FILLED', cname: 'cv::FILLED' },
        ],
      })
    })

    it('reports a missing allow-list and exits with status 1', async () => {
      const missing = join(dir, 'missing.ts')

      await expect(
        run('validate', 'parser.mjs', join(dir, 'headers.txt'), missing)
      ).rejects.toThrow('process.exit(1)')
      expect(error).toHaveBeenCalledWith(
        '❌ Validation failed:',
        new Error(`Allow-list file not found: ${missing}`)
      )
    })
  })
})
