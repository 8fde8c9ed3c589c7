/**
 * Report Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { MockInstance } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { executeReport, loadConfigFile, mergeConfigs, parseReportArgs } from '../report.js'

describe('parseReportArgs', () => {
  it('should default to the pretty format without overrides', () => {
    expect(parseReportArgs([])).toEqual({ options: { overrides: {}, format: 'pretty' } })
  })

  it('should parse every option', () => {
    const result = parseReportArgs([
      '--root',
      'pkg',
      '--config',
      'unicov.json',
      '--lcov',
      'a.info',
      '--lcov',
      'b.info',
      '--istanbul',
      'coverage/unit',
      '--llvm-cov',
      'target/llvm.json',
      '--coveragepy',
      'py.json',
      '--include',
      'src/**, lib/**',
      '--exclude',
      '**/gen/**',
      '--lines',
      '80',
      '--branches',
      '62.5',
      '--format',
      'compact',
      '--detail',
      '5',
      '--max-files',
      '3',
      '--max-hotspots',
      '2',
      '--page-fit',
      '--editor',
      'edit://{file}:{line}',
      '--malformed-lcov',
      'stop',
      '--log',
      '--timing',
    ])

    expect(result).toEqual({
      options: {
        configPath: 'unicov.json',
        format: 'compact',
        overrides: {
          root: 'pkg',
          lcov: ['a.info', 'b.info'],
          istanbul: ['coverage/unit'],
          llvmCov: ['target/llvm.json'],
          coveragePy: ['py.json'],
          include: ['src/**', 'lib/**'],
          exclude: ['**/gen/**'],
          thresholds: { lines: 80, branches: 62.5 },
          onMalformedLcov: 'stop',
          log: true,
          timing: true,
          print: {
            detail: { lines: 5 },
            maxFiles: 3,
            maxHotspots: 2,
            pageFit: true,
            editorCmd: 'edit://{file}:{line}',
          },
        },
      },
    })
  })

  it('should show help for --help', () => {
    expect(parseReportArgs(['--lcov', 'a.info', '--help'])).toEqual({ showHelp: true })
  })

  it('should reject positional arguments', () => {
    expect(parseReportArgs(['extra'])).toEqual({ error: 'Unexpected argument: extra', showHelp: true })
  })

  it('should report missing values', () => {
    expect(parseReportArgs(['--lcov'])).toEqual({ error: 'Missing value for --lcov' })
    expect(parseReportArgs(['--lines', '--log'])).toEqual({ error: 'Missing value for --lines' })
  })

  it('should report unknown options', () => {
    expect(parseReportArgs(['--bogus'])).toEqual({ error: 'Unknown option: --bogus', showHelp: true })
    expect(parseReportArgs(['--bogus', 'x'])).toEqual({ error: 'Unknown option: --bogus', showHelp: true })
  })

  it('should reject invalid values', () => {
    expect(parseReportArgs(['--lines', 'abc'])).toEqual({ error: 'Invalid value for --lines: abc' })
    expect(parseReportArgs(['--functions', '-5'])).toEqual({ error: 'Invalid value for --functions: -5' })
    expect(parseReportArgs(['--format', 'fancy'])).toEqual({
      error: 'Invalid value for --format: fancy (expected pretty, compact, hotspots, summary)',
    })
    expect(parseReportArgs(['--detail', 'none'])).toEqual({ error: 'Invalid value for --detail: none' })
    expect(parseReportArgs(['--max-files', '0'])).toEqual({ error: 'Invalid value for --max-files: 0' })
    expect(parseReportArgs(['--max-hotspots', '2.5'])).toEqual({ error: 'Invalid value for --max-hotspots: 2.5' })
    expect(parseReportArgs(['--malformed-lcov', 'ignore'])).toEqual({
      error: 'Invalid value for --malformed-lcov: ignore (expected skip or stop)',
    })
  })

  it('should accept detail modes', () => {
    expect(parseReportArgs(['--detail', 'all']).options?.overrides.print).toEqual({ detail: 'all' })
  })
})

describe('mergeConfigs', () => {
  it('should let overrides win and combine thresholds and print options', () => {
    expect(
      mergeConfigs(
        { lcov: ['a.info'], thresholds: { lines: 80, branches: 50 }, print: { maxFiles: 2 } },
        { lcov: ['b.info'], thresholds: { lines: 90 }, print: { pageFit: true } }
      )
    ).toEqual({
      lcov: ['b.info'],
      thresholds: { lines: 90, branches: 50 },
      print: { maxFiles: 2, pageFit: true },
    })
  })
})

describe('report command', () => {
  let dir: string
  let consoleLogSpy: MockInstance
  let consoleErrorSpy: MockInstance

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'unicov-report-'))
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    consoleLogSpy.mockRestore()
    consoleErrorSpy.mockRestore()
    rmSync(dir, { recursive: true, force: true })
  })

  function writeLcov(): void {
    mkdirSync(join(dir, 'coverage'))
    writeFileSync(join(dir, 'coverage', 'lcov.info'), 'SF:src/a.ts\nDA:1,1\nDA:2,0\nDA:3,1\nend_of_record\n')
  }

  describe('loadConfigFile', () => {
    it('should parse a JSON config and warn about invalid values', () => {
      const path = join(dir, 'unicov.json')
      writeFileSync(path, JSON.stringify({ lcov: 'x.info', thresholds: { lines: 70 }, log: 'yes' }))

      expect(loadConfigFile(path)).toEqual({ config: { lcov: ['x.info'], thresholds: { lines: 70 } } })
      expect(consoleLogSpy).toHaveBeenCalledWith(`⚠️  ${path}: log: expected a boolean`)
    })

    it('should report invalid JSON', () => {
      const path = join(dir, 'unicov.json')
      writeFileSync(path, '{')

      const result = loadConfigFile(path)
      expect(result.config).toBeUndefined()
      expect(result.error?.startsWith(`Invalid config file: ${path}: `)).toBe(true)
    })

    it('should report a missing file', () => {
      const path = join(dir, 'missing.json')
      const result = loadConfigFile(path)
      expect(result.error?.startsWith(`Cannot read config file ${path}: `)).toBe(true)
    })
  })

  describe('executeReport', () => {
    it('should print the report and fail unmet thresholds', async () => {
      writeLcov()

      const exitCode = await executeReport(
        { overrides: { root: dir, thresholds: { lines: 90 } }, format: 'summary' },
        { isTTY: false }
      )

      expect(exitCode).toBe(1)
      expect(consoleLogSpy.mock.calls).toEqual([
        ['Lines: 66.7% (2/3)'],
        [''],
        ['Coverage thresholds not met'],
        [' Lines: 66.67% < 90% (short 23.33%)'],
      ])
    })

    it('should read thresholds from the config file', async () => {
      writeLcov()
      const configPath = join(dir, 'unicov.json')
      writeFileSync(configPath, JSON.stringify({ thresholds: { lines: 50 } }))

      const exitCode = await executeReport(
        { configPath, overrides: { root: dir }, format: 'summary' },
        { isTTY: false }
      )

      expect(exitCode).toBe(0)
      expect(consoleLogSpy.mock.calls).toEqual([['Lines: 66.7% (2/3)']])
    })

    it('should let command-line thresholds override the config file', async () => {
      writeLcov()
      const configPath = join(dir, 'unicov.json')
      writeFileSync(configPath, JSON.stringify({ thresholds: { lines: 50 } }))

      const exitCode = await executeReport(
        { configPath, overrides: { root: dir, thresholds: { lines: 70 } }, format: 'summary' },
        { isTTY: false }
      )

      expect(exitCode).toBe(1)
    })

    it('should warn when no coverage data is found', async () => {
      const exitCode = await executeReport({ overrides: { root: dir }, format: 'pretty' }, { isTTY: false })

      expect(exitCode).toBe(0)
      expect(consoleLogSpy).toHaveBeenCalledWith('⚠️  No coverage data found')
    })

    it('should fail on an unreadable config file', async () => {
      const configPath = join(dir, 'missing.json')

      const exitCode = await executeReport({ configPath, overrides: { root: dir }, format: 'pretty' }, { isTTY: false })

      expect(exitCode).toBe(1)
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1)
      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringMatching(/^Cannot read config file /))
    })
  })
})
