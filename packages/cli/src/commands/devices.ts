import { parseArgs } from 'node:util'
import { BENCHMARK_TYPES } from '@rigbench/core'
import { colors, createContext, formatDate } from '../context'

const HELP = `
Usage: rigbench devices [options]

List stored devices, CPUs first.

Options:
  -c, --config <path>   Configuration file (YAML)
  -d, --data-dir <dir>  Data directory (overrides configuration)
  --json                Output as JSON
  -h, --help            Show this help message
`

export async function devices(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h' },
      config: { type: 'string', short: 'c' },
      'data-dir': { type: 'string', short: 'd' },
      json: { type: 'boolean' },
    },
  })

  if (values.help) {
    console.log(HELP)
    return
  }

  const { engine } = await createContext({ config: values.config, dataDir: values['data-dir'] })
  const summaries = await engine.listDevices()

  if (values.json) {
    console.log(JSON.stringify(summaries, null, 2))
    return
  }

  if (summaries.length === 0) {
    console.log('No devices found.')
    return
  }

  console.log(`${colors.bold}Devices (${summaries.length})${colors.reset}\n`)
  console.log(
    `${'Type'.padEnd(5)} ${'ID'.padEnd(44)} ${'Manufacturer'.padEnd(13)} ${BENCHMARK_TYPES.map((b) => b.padEnd(9)).join(' ')} Last upload`,
  )
  console.log('-'.repeat(120))

  for (const { device, payloadCounts, lastUploadAt } of summaries) {
    const typeColor = device.type === 'cpu' ? colors.cyan : colors.green
    const counts = BENCHMARK_TYPES.map((benchmark) => String(payloadCounts[benchmark]).padEnd(9)).join(' ')
    console.log(
      `${typeColor}${device.type.padEnd(5)}${colors.reset} ${device.id.padEnd(44)} ${device.manufacturer.padEnd(13)} ${counts} ${formatDate(lastUploadAt)}`,
    )
  }
}
