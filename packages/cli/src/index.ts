#!/usr/bin/env tsx
/**
 * Rigbench CLI
 *
 * Store benchmark uploads and inspect per-device results.
 *
 * Usage:
 *   rigbench ingest results/llama.json results/blender.json
 *   rigbench devices
 *   rigbench show nvidia-geforce-rtx-3090
 */

import { devices } from './commands/devices'
import { ingest } from './commands/ingest'
import { show } from './commands/show'

const HELP = `
Rigbench - Hardware Benchmark Results

Usage:
  rigbench <command> [options]

Commands:
  ingest <file...>  Store the results of one upload
  devices           List stored devices
  show <id>         Show aggregated results of a device

Options:
  -h, --help        Show this help message
  -v, --version     Show version

Environment:
  RIGBENCH_CONFIG         Configuration file (YAML)
  RIGBENCH_DATA_DIR       Data directory (default: ~/.config/rigbench/data)
  RIGBENCH_DEFAULT_CLASS  Class for unrecognised device names: cpu or gpu
  RIGBENCH_DEBUG          Set to "true" for debug logging

Examples:
  rigbench ingest upload.json
  rigbench ingest reversan.json --cpu "AMD Ryzen 5 5600X 6-Core Processor"
  rigbench devices --json
  rigbench show nvidia-geforce-rtx-3090
`

async function main() {
  const args = process.argv.slice(2)

  if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
    console.log(HELP)
    process.exit(0)
  }

  if (args[0] === '-v' || args[0] === '--version') {
    console.log('rigbench v0.1.0')
    process.exit(0)
  }

  const command = args[0]

  switch (command) {
    case 'ingest':
      await ingest(args.slice(1))
      break
    case 'devices':
      await devices(args.slice(1))
      break
    case 'show':
      await show(args.slice(1))
      break
    default:
      console.error(`Unknown command: ${command}`)
      console.log(HELP)
      process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error))
  process.exit(1)
})
