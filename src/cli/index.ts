/**
 * MOSDL Generator CLI
 *
 * Usage:
 *   mosdl-gen spec.json                       # One .mosdl file per area in the current directory
 *   mosdl-gen spec.yaml --out ./mosdl         # Custom output directory
 *   mosdl-gen a.json b.json --doc inline      # Several inputs, inline documentation
 *   mosdl-gen spec.json --stdout              # Print all areas to stdout
 */

import { loadConfig, type GeneratorConfigInput } from '../config.js'
import { Errors } from '../errors/index.js'
import { generate, getUnitName } from '../mosdl/generator/index.js'
import { DirectorySink, MemorySink } from '../mosdl/output/index.js'
import { mergeSpecifications, parseFile } from '../mosdl/parser/index.js'
import type { Specification } from '../mosdl/spec/types.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('cli')

export interface CliOptions {
  inputs: string[]
  config: GeneratorConfigInput
  stdout: boolean
  help: boolean
  version: boolean
}

/**
 * Parse command-line arguments
 */
export function parseArgs(args: string[]): CliOptions {
  const result: CliOptions = {
    inputs: [],
    config: {},
    stdout: false,
    help: false,
    version: false,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]

    if (arg === '--out' || arg === '-o') {
      result.config.outDir = args[++i]
    } else if (arg === '--doc' || arg === '-d') {
      result.config.docType = args[++i]
    } else if (arg === '--crlf') {
      result.config.newline = '\r\n'
    } else if (arg === '--stdout') {
      result.stdout = true
    } else if (arg === '--help' || arg === '-h') {
      result.help = true
    } else if (arg === '--version' || arg === '-v') {
      result.version = true
    } else {
      result.inputs.push(arg)
    }
  }

  return result
}

function printHelp(): void {
  console.log(`
Usage: mosdl-gen <spec.json|spec.yaml>... [options]

Converts MO service specifications to MOSDL, one file per area.

Options:
  -o, --out <dir>        Output directory (default: ., env MOSDL_OUT_DIR)
  -d, --doc <type>       Documentation: bulk, inline, suppress (default: bulk, env MOSDL_DOC_TYPE)
  --crlf                 Use CRLF line breaks
  --stdout               Print generated MOSDL instead of writing files
  -h, --help             Show this help message
  -v, --version          Show version

Environment:
  LOG_LEVEL              Log level (default: info)
`)
}

/**
 * Run the CLI, returning the process exit code
 */
export async function run(args: string[]): Promise<number> {
  const options = parseArgs(args)

  if (options.help) {
    printHelp()
    return 0
  }
  if (options.version) {
    console.log('mosdl-gen version 1.0.0')
    return 0
  }
  if (options.inputs.length === 0) {
    printHelp()
    return 2
  }

  try {
    const config = loadConfig(options.config)
    const specs: Specification[] = []
    for (const input of options.inputs) {
      logger.debug({ input }, 'Loading specification')
      specs.push(await parseFile(input))
    }
    const spec = mergeSpecifications(specs)

    if (options.stdout) {
      const sink = new MemorySink()
      generate(spec, sink, config)
      for (const area of spec.areas) {
        process.stdout.write(sink.get(getUnitName(area)) ?? '')
      }
      return 0
    }

    const result = generate(spec, new DirectorySink(config.outDir), config)
    logger.info({ outDir: config.outDir, units: result.units }, 'MOSDL generated')
    return 0
  } catch (err) {
    const error = Errors.wrap(err)
    logger.error({ err: error, code: error.code }, error.message)
    return error.exitCode
  }
}
