/**
 * Show Command
 *
 * Print the aggregated benchmark report of one device.
 */

import { parseArgs } from 'node:util'
import { type BenchmarkReport, DeviceNotFoundError, type HardwareDevice } from '@rigbench/core'
import { colors, createContext, formatNumber } from '../context'

const HELP = `
Usage: rigbench show <device-id> [options]

Options:
  -c, --config <path>   Configuration file (YAML)
  -d, --data-dir <dir>  Data directory (overrides configuration)
  --json                Output as JSON
  -h, --help            Show this help message

Examples:
  rigbench show nvidia-geforce-rtx-3090
  rigbench show amd-ryzen-7-5800x-8-core-processor --json
`

function printDevice(device: HardwareDevice) {
  console.log(`${colors.bold}${device.name}${colors.reset} ${colors.dim}(${device.id})${colors.reset}`)
  console.log(`  Type:         ${device.type}`)
  console.log(`  Manufacturer: ${device.manufacturer}`)
  if (device.cores !== undefined) console.log(`  Cores:        ${device.cores}`)
  if (device.threads !== undefined) console.log(`  Threads:      ${device.threads}`)
  if (device.framework) console.log(`  Framework:    ${device.framework}`)
}

function printBenchmark(report: BenchmarkReport) {
  console.log()
  console.log(`${colors.bold}${report.benchmark}${colors.reset} ${colors.dim}(${report.payloadCount} upload(s))${colors.reset}`)
  if (report.buildSeconds !== null) {
    console.log(`  Build time: ${formatNumber(report.buildSeconds)} s`)
  }

  const { aggregation } = report
  if (aggregation.status === 'no-data') {
    console.log(`  ${colors.yellow}No data: ${aggregation.reason}${colors.reset}`)
    return
  }

  for (const group of aggregation.groups) {
    const medians = Object.entries(group.medians)
      .filter(([, value]) => value !== null)
      .map(([metric, value]) => `${metric}=${formatNumber(value)}`)
      .join('  ')
    console.log(`  ${group.label.padEnd(36)} ${colors.dim}n=${group.runCount}${colors.reset}  ${medians}`)
  }
}

export async function show(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h' },
      config: { type: 'string', short: 'c' },
      'data-dir': { type: 'string', short: 'd' },
      json: { type: 'boolean' },
    },
    allowPositionals: true,
  })

  const id = positionals[0]
  if (values.help || !id) {
    console.log(HELP)
    return
  }

  const { engine } = await createContext({ config: values.config, dataDir: values['data-dir'] })

  try {
    const report = await engine.report(id)
    if (values.json) {
      console.log(JSON.stringify(report, null, 2))
      return
    }

    printDevice(report.device)
    if (report.benchmarks.length === 0) {
      console.log('\nNo benchmark results stored.')
    }
    for (const benchmark of report.benchmarks) {
      printBenchmark(benchmark)
    }
  } catch (error) {
    if (error instanceof DeviceNotFoundError) {
      console.error(`Device not found: ${id}`)
      console.log('Run `rigbench devices` to list stored devices.')
      process.exit(1)
    }
    throw error
  }
}
