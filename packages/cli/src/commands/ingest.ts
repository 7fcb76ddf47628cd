/**
 * Ingest Command
 *
 * Store the benchmark payloads of one upload and the devices they name.
 */

import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { parseArgs } from 'node:util'
import * as p from '@clack/prompts'
import {
  BENCHMARK_TYPES,
  type BenchmarkType,
  type HardwareHint,
  isJsonObject,
  NoDeviceError,
  type PayloadSet,
  parseBenchmarkType,
  payloadsFromDocument,
} from '@rigbench/core'
import { colors, createContext } from '../context'

const HELP = `
Usage: rigbench ingest <file...> [options]

Arguments:
  file                  JSON result files of one upload (unified or per-tool)

Options:
  -t, --type <type>     Benchmark type for files that do not name one
                        Available: ${BENCHMARK_TYPES.join(', ')}
  --cpu <name>          CPU name to use when the results name none
  --gpu <name>          GPU name to use when the results name none
  --hardware <text>     Comma-separated hardware description
  --upload-id <id>      Upload id (default: generated)
  -c, --config <path>   Configuration file (YAML)
  -d, --data-dir <dir>  Data directory (overrides configuration)
  --json                Output as JSON
  -h, --help            Show this help message

Examples:
  rigbench ingest results/llama.json results/blender.json
  rigbench ingest upload.json --cpu "AMD Ryzen 7 5800X 8-Core Processor"
  rigbench ingest runs.json --type 7zip --json
`

async function readDocument(path: string): Promise<Record<string, unknown>> {
  const text = await readFile(path, 'utf8')
  let document: unknown
  try {
    document = JSON.parse(text)
  } catch (error) {
    throw new Error(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`)
  }
  if (!isJsonObject(document)) {
    throw new Error(`${path} does not contain a JSON object`)
  }
  return document
}

/**
 * Benchmark type implied by a file name such as `llama.json` or `7zip_results.json`.
 */
function typeFromFileName(path: string): BenchmarkType | undefined {
  const stem = basename(path).replace(/\.json$/i, '').split(/[_.-]/)[0] ?? ''
  return parseBenchmarkType(stem) ?? undefined
}

export async function ingest(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h' },
      type: { type: 'string', short: 't' },
      cpu: { type: 'string' },
      gpu: { type: 'string' },
      hardware: { type: 'string' },
      'upload-id': { type: 'string' },
      config: { type: 'string', short: 'c' },
      'data-dir': { type: 'string', short: 'd' },
      json: { type: 'boolean' },
    },
    allowPositionals: true,
  })

  if (values.help || positionals.length === 0) {
    console.log(HELP)
    return
  }

  let explicitType: BenchmarkType | undefined
  if (values.type) {
    const parsed = parseBenchmarkType(values.type)
    if (!parsed) {
      console.error(`Error: Unknown benchmark type: ${values.type}`)
      console.log(`Available: ${BENCHMARK_TYPES.join(', ')}`)
      process.exit(1)
    }
    explicitType = parsed
  }

  const payloads: PayloadSet = {}
  for (const path of positionals) {
    const found = payloadsFromDocument(await readDocument(path), explicitType ?? typeFromFileName(path))
    const benchmarks = BENCHMARK_TYPES.filter((benchmark) => found[benchmark] !== undefined)
    if (benchmarks.length === 0) {
      console.error(`${colors.yellow}Skipping ${path}: no benchmark results recognised${colors.reset}`)
      continue
    }
    for (const benchmark of benchmarks) {
      if (payloads[benchmark] !== undefined) {
        console.error(`${colors.yellow}${path}: replaces earlier ${benchmark} results${colors.reset}`)
      }
      payloads[benchmark] = found[benchmark]
    }
  }

  if (Object.keys(payloads).length === 0) {
    console.error('Error: No benchmark results to ingest')
    process.exit(1)
  }

  const hint: HardwareHint = {}
  if (values.cpu) hint.cpu = values.cpu
  if (values.gpu) hint.gpu = values.gpu
  if (values.hardware) hint.description = values.hardware

  const { config, engine } = await createContext({ config: values.config, dataDir: values['data-dir'] })
  const json = !!values.json

  const s = json ? undefined : p.spinner()
  s?.start('Ingesting results')
  try {
    const result = await engine.ingest({
      payloads,
      hint: Object.keys(hint).length > 0 ? hint : undefined,
      uploadId: values['upload-id'],
    })
    s?.stop('Results stored')

    if (json) {
      console.log(JSON.stringify(result, null, 2))
      return
    }

    p.log.info(`Upload ${result.uploadId} → ${config.storage.dataDir}`)
    for (const { device, change } of result.devices) {
      const changeColor = change === 'created' ? colors.green : change === 'renamed' ? colors.yellow : colors.dim
      const benchmarks = result.stored.filter((entry) => entry.deviceId === device.id).map((entry) => entry.benchmark)
      p.log.message(
        `${device.type.toUpperCase()}  ${colors.bold}${device.name}${colors.reset} ${colors.dim}(${device.id})${colors.reset}  ` +
          `${changeColor}${change}${colors.reset}  ${benchmarks.join(', ') || 'no runs'}`,
      )
    }
  } catch (error) {
    s?.stop('Ingest failed')
    if (error instanceof NoDeviceError) {
      console.error(`Error: ${error.message}`)
      console.log('Pass --cpu, --gpu or --hardware to name the hardware.')
      process.exit(1)
    }
    throw error
  }
}
