/**
 * Specification Builder
 *
 * Fluent API for building service specifications. Each nested builder
 * returns to its parent with `done()`.
 */

import type {
  Area,
  CapabilitySet,
  DataType,
  ExtraInformation,
  Operation,
  Service,
  Specification,
} from '../spec/types.js'
import { errorDef } from './elements.js'

/**
 * Capability set builder
 */
export class CapabilityBuilder {
  private cs: CapabilitySet = { operations: [] }

  constructor(
    private serviceBuilder: ServiceBuilder,
    number?: number
  ) {
    if (number !== undefined) this.cs.number = number
  }

  comment(comment: string): this {
    this.cs.comment = comment
    return this
  }

  /**
   * Add operations, in declaration order
   */
  operation(...ops: Operation[]): this {
    this.cs.operations.push(...ops)
    return this
  }

  build(): CapabilitySet {
    return this.cs
  }

  /**
   * Return to the service builder
   */
  done(): ServiceBuilder {
    return this.serviceBuilder
  }
}

/**
 * Service builder
 */
export class ServiceBuilder {
  private service: Service
  private capabilities: CapabilityBuilder[] = []

  constructor(
    private areaBuilder: AreaBuilder,
    name: string,
    number: number
  ) {
    this.service = { name, number, capabilitySets: [] }
  }

  comment(comment: string): this {
    this.service.comment = comment
    return this
  }

  /**
   * Start a capability set; the id is optional
   */
  capability(number?: number): CapabilityBuilder {
    const builder = new CapabilityBuilder(this, number)
    this.capabilities.push(builder)
    return builder
  }

  dataType(...dataTypes: DataType[]): this {
    this.service.dataTypes = [...(this.service.dataTypes ?? []), ...dataTypes]
    return this
  }

  error(name: string, number: number, options?: { extraInformation?: ExtraInformation; comment?: string }): this {
    this.service.errors = [...(this.service.errors ?? []), errorDef(name, number, options)]
    return this
  }

  build(): Service {
    return {
      ...this.service,
      capabilitySets: this.capabilities.map((builder) => builder.build()),
    }
  }

  /**
   * Return to the area builder
   */
  done(): AreaBuilder {
    return this.areaBuilder
  }
}

/**
 * Area builder
 */
export class AreaBuilder {
  private area: Area
  private services: ServiceBuilder[] = []

  constructor(
    private specBuilder: SpecificationBuilder,
    name: string,
    number: number,
    version = 1
  ) {
    this.area = { name, number, version, services: [] }
  }

  comment(comment: string): this {
    this.area.comment = comment
    return this
  }

  version(version: number): this {
    this.area.version = version
    return this
  }

  service(name: string, number: number): ServiceBuilder {
    const builder = new ServiceBuilder(this, name, number)
    this.services.push(builder)
    return builder
  }

  dataType(...dataTypes: DataType[]): this {
    this.area.dataTypes = [...(this.area.dataTypes ?? []), ...dataTypes]
    return this
  }

  error(name: string, number: number, options?: { extraInformation?: ExtraInformation; comment?: string }): this {
    this.area.errors = [...(this.area.errors ?? []), errorDef(name, number, options)]
    return this
  }

  build(): Area {
    return {
      ...this.area,
      services: this.services.map((builder) => builder.build()),
    }
  }

  /**
   * Return to the specification builder
   */
  done(): SpecificationBuilder {
    return this.specBuilder
  }
}

/**
 * Specification builder
 */
export class SpecificationBuilder {
  private areas: AreaBuilder[] = []

  area(name: string, number: number, version = 1): AreaBuilder {
    const builder = new AreaBuilder(this, name, number, version)
    this.areas.push(builder)
    return builder
  }

  build(): Specification {
    return { areas: this.areas.map((builder) => builder.build()) }
  }
}

/**
 * Create a new specification builder
 *
 * @example
 * ```typescript
 * const spec = specification()
 *   .area('test', 4711)
 *     .service('ServiceName', 1)
 *       .capability(7)
 *         .operation(Op.request('getDefinition', 1, [field('definitionId', malType('Identifier'))], []))
 *       .done()
 *     .done()
 *   .done()
 *   .build()
 * ```
 */
export function specification(): SpecificationBuilder {
  return new SpecificationBuilder()
}

/**
 * MOSDL builder namespace
 */
export const MOSDL = {
  specification,
}
