/**
 * MOSDL Generator
 *
 * Walks a service specification and writes one MOSDL unit per area:
 * area header, services (capability sets, operations, data types, errors),
 * then area-level data types and errors.
 */

import type { DocType } from '../../config.js'
import { Errors } from '../../errors/index.js'
import { createLogger } from '../../utils/logger.js'
import { MOSDL_FILE_EXTENSION } from '../spec/defaults.js'
import type { Area, CapabilitySet, Service, Specification } from '../spec/types.js'
import { StringUnit } from '../output/memory.js'
import type { OutputSink, OutputUnit } from '../output/types.js'
import type { RenderContext } from './context.js'
import { writeDataTypes, writeErrors } from './data-types.js'
import { writeDoc } from './docs.js'
import { escapeId } from './identifiers.js'
import { writeOperation } from './operations.js'
import { IndentWriter, type TextOutput } from './writer.js'

const logger = createLogger('mosdl-generator')

export interface GenerateOptions {
  /** How documentation is rendered (default: BULK) */
  docType?: DocType
  /** Line break sequence (default: '\n') */
  newline?: string
}

export interface GenerateResult {
  /** Names of the units written, in area order */
  units: string[]
}

/**
 * Name of the output unit generated for an area
 */
export function getUnitName(area: Area): string {
  return `${area.name}${MOSDL_FILE_EXTENSION}`
}

function writeCapabilitySet(ctx: RenderContext, cs: CapabilitySet): void {
  const { writer } = ctx
  writeDoc(ctx, cs.comment)
  if (cs.number === undefined) {
    writer.writeLine('capability {')
  } else {
    writer.writeLine('capability [', cs.number, '] {')
  }
  writer.indent()
  for (const op of cs.operations) {
    writeOperation(ctx, op)
  }
  writer.outdent()
  writer.writeLine('}')
  writer.writeLine()
}

function writeService(parent: RenderContext, service: Service): void {
  const ctx: RenderContext = { ...parent, service }
  const { writer } = ctx

  writeDoc(ctx, service.comment)
  writer.writeLine('service ', escapeId(service.name), ' [', service.number, '] {')
  writer.indent()
  for (const cs of service.capabilitySets) {
    writeCapabilitySet(ctx, cs)
  }
  writeDataTypes(ctx, service.dataTypes)
  writeErrors(ctx, service.errors)
  writer.outdent()
  writer.writeLine('}')
  writer.writeLine()
}

/**
 * Write a complete area with a fresh writer context
 */
export function writeArea(ctx: RenderContext, area: Area): void {
  const areaCtx: RenderContext = { ...ctx, area, service: undefined }
  const { writer } = areaCtx

  writeDoc(areaCtx, area.comment)
  writer.writeLine('area ', escapeId(area.name), ' [', area.number, area.version === 1 ? '' : `.${area.version}`, ']')
  writer.writeLine()
  // Imports are not generated yet
  for (const service of area.services) {
    writeService(areaCtx, service)
  }
  writeDataTypes(areaCtx, area.dataTypes)
  writeErrors(areaCtx, area.errors)
}

/**
 * Render one area to a string
 */
export function renderArea(area: Area, options: GenerateOptions = {}): string {
  const { docType = 'BULK', newline = '\n' } = options
  const unit = new StringUnit()
  writeArea({ writer: new IndentWriter(unit, newline), docType }, area)
  return unit.toString()
}

function openUnit(sink: OutputSink, area: Area, name: string): OutputUnit {
  try {
    return sink.open(name)
  } catch (err) {
    throw Errors.output(area.name, err)
  }
}

function closeAfterRenderError(unit: OutputUnit, name: string): void {
  try {
    unit.close()
  } catch (err) {
    logger.warn({ unit: name, err }, 'Failed to close MOSDL unit after a rendering error')
  }
}

/**
 * Generate one MOSDL unit per area into the sink
 *
 * The first failure aborts the run: the failing unit is still closed and
 * the remaining areas are skipped. Only failures of the sink become
 * GenerationError; anything else thrown while rendering (a malformed
 * document, for instance) propagates unchanged.
 *
 * @throws GenerationError (OUTPUT_FAILURE) carrying the underlying cause
 */
export function generate(
  spec: Specification,
  sink: OutputSink,
  options: GenerateOptions = {}
): GenerateResult {
  const { docType = 'BULK', newline = '\n' } = options
  const units: string[] = []

  logger.debug({ destination: sink.describe(), docType }, 'Generating MOSDL unit(s)')

  for (const area of spec.areas) {
    const name = getUnitName(area)
    logger.debug({ unit: name }, 'Generating MOSDL unit')

    const unit = openUnit(sink, area, name)
    const sinkErrors = new Set<unknown>()
    const output: TextOutput = {
      write(chunk) {
        try {
          unit.write(chunk)
        } catch (err) {
          sinkErrors.add(err)
          throw err
        }
      },
    }

    const failures: unknown[] = []
    try {
      writeArea({ writer: new IndentWriter(output, newline), docType }, area)
    } catch (err) {
      if (!sinkErrors.has(err)) {
        closeAfterRenderError(unit, name)
        throw err
      }
      failures.push(err)
    }
    try {
      unit.close()
    } catch (err) {
      failures.push(err)
    }

    if (failures.length > 0) {
      throw Errors.output(
        area.name,
        failures.length === 1 ? failures[0] : new AggregateError(failures, 'Writing and closing the unit failed')
      )
    }

    units.push(name)
    logger.debug({ unit: name }, 'Generated MOSDL unit')
  }

  logger.debug({ destination: sink.describe(), units: units.length }, 'Generated all MOSDL units')
  return { units }
}
