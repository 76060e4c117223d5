import type { DocType } from '../../config.js'
import { StringUnit } from '../output/memory.js'
import type { Area, Service } from '../spec/types.js'
import type { RenderContext } from './context.js'
import { IndentWriter } from './writer.js'

export const testArea: Area = { name: 'test', number: 4711, version: 1, services: [] }

export const testService: Service = { name: 'ServiceName', number: 1, capabilitySets: [] }

/**
 * Render with a fresh writer at indent level zero
 */
export function renderWith(
  render: (ctx: RenderContext) => void,
  docType: DocType = 'BULK',
  scope: { area?: Area; service?: Service } = { area: testArea, service: testService }
): string {
  const unit = new StringUnit()
  render({ writer: new IndentWriter(unit), docType, ...scope })
  return unit.toString()
}

export function lines(...text: string[]): string {
  return text.join('\n')
}
