/**
 * unicov CLI
 *
 * Commands:
 *   report - Merge coverage artifacts, print a report and check thresholds
 */

import { fileURLToPath } from 'node:url'

const HELP = `
unicov - Coverage aggregation and reporting for LCOV, Istanbul, llvm-cov and coverage.py

Usage:
  unicov <command> [options]

Commands:
  report      Merge coverage artifacts, print a report and check thresholds

Options:
  --help      Show this help message

Examples:
  unicov report
  unicov report --lcov coverage/lcov.info --lines 80
  unicov report --help
`

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    console.log(HELP)
    return 0
  }

  const command = argv[0]

  if (command === 'report') {
    return await runReport(argv.slice(1))
  } else {
    console.error(`Unknown command: ${command}`)
    console.log(HELP)
    return 1
  }
}

async function runReport(args: string[]): Promise<number> {
  // Dynamic import to avoid loading the engine until needed
  const { parseReportArgs, executeReport, REPORT_HELP } = await import('./commands/report.js')

  const result = parseReportArgs(args)

  if (result.showHelp) {
    console.log(REPORT_HELP)
    if (result.error) {
      console.error(result.error)
      return 1
    }
    return 0
  }

  if (!result.options) {
    console.error(result.error ?? 'Invalid arguments')
    return 1
  }

  return await executeReport(result.options)
}

// Only run main() when executed directly, not when imported for testing
const currentFile = fileURLToPath(import.meta.url).replace(/\\/g, '/')
const executedFile = process.argv[1]?.replace(/\\/g, '/')

const isMainModule = currentFile === executedFile
  || executedFile?.endsWith('/unicov')  // npm bin symlink name
  || executedFile?.endsWith('/cli/index.js')

// process.exitCode lets Node exit after stdout is flushed
if (isMainModule) {
  main()
    .then((code) => {
      process.exitCode = code
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error)
      process.exitCode = 1
    })
}
