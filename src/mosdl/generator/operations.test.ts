import { describe, it, expect } from 'vitest'
import { writeOperation } from './operations.js'
import { renderWith, lines } from './test-helpers.js'
import { Op, errorDef, errorRef, extraInfo, field, listOf, malType, message, typeRef } from '../builder/index.js'
import type { Operation } from '../spec/types.js'
import type { DocType } from '../../config.js'

function render(op: Operation, docType: DocType = 'BULK'): string {
  return renderWith((ctx) => writeOperation(ctx, op), docType)
}

function count(text: string, token: string): number {
  return text.split(token).length - 1
}

const documentedRequest = Op.request(
  'getDefinition',
  2,
  [field('definitionId', malType('Identifier'), { comment: 'The id' })],
  message([field('definition', malType('Element'))], 'The result'),
  {
    comment: 'Gets a definition.',
    errors: [
      errorRef(typeRef('MAL', 'UNKNOWN'), { comment: 'Unknown id' }),
      errorDef('BAD', 1, { extraInformation: extraInfo(malType('String'), 'Why') }),
    ],
  }
)

describe('writeOperation', () => {
  describe('interaction patterns', () => {
    it('should render SEND with a single message group', () => {
      const out = render(Op.send('ping', 1, [field('seq', malType('UInteger'))]))

      expect(out).toBe(lines('send ping [1] (seq: UInteger)', '', ''))
      expect(count(out, '->')).toBe(0)
    })

    it('should render SUBMIT with a single message group', () => {
      const out = render(
        Op.submit('addDefinition', 3, [
          field('definitionId', malType('Identifier')),
          field('newDefinition', malType('Element')),
        ])
      )

      expect(out).toBe(lines('submit addDefinition [3] (definitionId: Identifier, newDefinition: Element)', '', ''))
      expect(count(out, '->')).toBe(0)
    })

    it('should render REQUEST with one response arrow', () => {
      const out = render(Op.request('listDefinitions', 1, [], [field('definitionIds', listOf(malType('Identifier')))]))

      expect(out).toBe(lines('request listDefinitions [1] ()', '\t-> (definitionIds: List<Identifier>)', '', ''))
      expect(count(out, '->')).toBe(1)
    })

    it('should render INVOKE with two arrows', () => {
      const out = render(Op.invoke('run', 2, [field('a', malType('String'))], [], [field('result', malType('Boolean'))]))

      expect(out).toBe(lines('invoke run [2] (a: String)', '\t-> ()', '\t-> (result: Boolean)', '', ''))
      expect(count(out, '->')).toBe(2)
    })

    it('should render PROGRESS with a repeat marker before the final response', () => {
      const out = render(
        Op.progress(
          'copy',
          3,
          [field('source', malType('URI'))],
          [],
          [field('percent', malType('UOctet'))],
          [field('ok', malType('Boolean'))]
        )
      )

      expect(out).toBe(
        lines('progress copy [3] (source: URI)', '\t-> ()', '\t-> (percent: UOctet)*', '\t-> (ok: Boolean)', '', '')
      )
      expect(count(out, '->')).toBe(3)
      expect(count(out, ')*')).toBe(1)
    })

    it('should render PUBSUB in notify direction', () => {
      const out = render(Op.pubsub('monitor', 4, [field('value', malType('Double'), { nullable: true })]))

      expect(out).toBe(lines('pubsub monitor [4] <- (value: Double?)', '', ''))
      expect(count(out, '->')).toBe(0)
    })
  })

  it('should mark replayable operations before the name', () => {
    expect(render(Op.send('ping', 1, [], { replay: true }))).toBe(lines('send *ping [1] ()', '', ''))
  })

  it('should escape reserved operation and field names', () => {
    const out = render(Op.send('request', 1, [field('error', malType('String'))]))

    expect(out).toBe(lines('send "request" [1] ("error": String)', '', ''))
  })

  describe('throws clause', () => {
    it('should list undocumented errors on one line', () => {
      const op = Op.submit('store', 5, [field('value', malType('String'))], {
        errors: [errorRef(typeRef('MAL', 'UNKNOWN')), errorRef(typeRef('test', 'FULL'), { extraInformation: extraInfo(malType('UInteger')) })],
      })

      expect(render(op, 'INLINE')).toBe(
        lines('submit store [5] (value: String)', '\tthrows MAL::UNKNOWN, test::FULL: UInteger', '', '')
      )
    })

    it('should not qualify errors of the current service', () => {
      const op = Op.submit('store', 5, [], {
        errors: [errorRef(typeRef('test', 'FULL', { service: 'ServiceName' }))],
      })

      expect(render(op)).toBe(lines('submit store [5] ()', '\tthrows FULL', '', ''))
    })
  })

  describe('BULK documentation', () => {
    it('should print one aggregated block before the operation', () => {
      expect(render(documentedRequest)).toBe(
        lines(
          '"""',
          'Gets a definition.',
          '',
          '@requestparam definitionId: The id',
          '',
          '@response: The result',
          '',
          '@error MAL::UNKNOWN: Unknown id',
          '@errorinfo BAD: Why',
          '"""',
          'request getDefinition [2] (definitionId: Identifier)',
          '\t-> (definition: Element)',
          '\tthrows MAL::UNKNOWN, error BAD [1]: String',
          '',
          ''
        )
      )
    })

    it('should print no doc lines for an undocumented operation', () => {
      const out = render(Op.request('getDefinition', 2, [field('definitionId', malType('Identifier'))], []))

      expect(out.startsWith('request getDefinition [2]')).toBe(true)
    })
  })

  describe('INLINE documentation', () => {
    it('should document every element in place', () => {
      expect(render(documentedRequest, 'INLINE')).toBe(
        lines(
          '/// Gets a definition.',
          'request getDefinition [2] (',
          '\t\t/// The id',
          '\t\tdefinitionId: Identifier',
          '\t)',
          '\t/// The result',
          '\t-> (definition: Element)',
          '\tthrows',
          '\t\t/// Unknown id',
          '\t\tMAL::UNKNOWN,',
          '\t\terror BAD [1]:',
          '\t\t\t/// Why',
          '\t\t\tString',
          '',
          ''
        )
      )
    })

    it('should move a documented first stage to its own line', () => {
      const op = Op.request('get', 1, message([field('id', malType('Identifier'))], 'Input'), [field('value', malType('String'))])

      expect(render(op, 'INLINE')).toBe(
        lines('request get [1]', '\t/// Input', '\t(id: Identifier)', '\t-> (value: String)', '', '')
      )
    })

    it('should separate commented fields with commas', () => {
      const op = Op.send('set', 1, [
        field('a', malType('String'), { comment: 'First' }),
        field('b', malType('String')),
      ])

      expect(render(op, 'INLINE')).toBe(
        lines('send set [1] (', '\t\t/// First', '\t\ta: String,', '\t\tb: String', '\t)', '', '')
      )
    })

    it('should put a multi-line extra information comment in a block below the error', () => {
      const op = Op.submit('doIt', 5, [field('value', malType('String'))], {
        errors: [
          errorRef(typeRef('MAL', 'FAILED'), {
            extraInformation: extraInfo(malType('UInteger'), 'Index of the\nfailing item'),
          }),
        ],
      })

      expect(render(op, 'INLINE')).toBe(
        lines(
          'submit doIt [5] (value: String)',
          '\tthrows',
          '\t\tMAL::FAILED:',
          '\t\t\t"""',
          '\t\t\tIndex of the',
          '\t\t\tfailing item',
          '\t\t\t"""',
          '\t\t\tUInteger',
          '',
          ''
        )
      )
    })

    it('should put a multi-line error comment one level below throws', () => {
      const op = Op.submit('doIt', 5, [], {
        errors: [errorDef('Denied', 9, { comment: 'Access denied\nfor caller' })],
      })

      expect(render(op, 'INLINE')).toBe(
        lines(
          'submit doIt [5] ()',
          '\tthrows',
          '\t\t"""',
          '\t\tAccess denied',
          '\t\tfor caller',
          '\t\t"""',
          '\t\terror Denied [9]',
          '',
          ''
        )
      )
    })
  })

  describe('SUPPRESS documentation', () => {
    it('should strip every comment', () => {
      const out = render(documentedRequest, 'SUPPRESS')

      expect(out).toBe(
        lines(
          'request getDefinition [2] (definitionId: Identifier)',
          '\t-> (definition: Element)',
          '\tthrows MAL::UNKNOWN, error BAD [1]: String',
          '',
          ''
        )
      )
    })
  })
})
