import { describe, expect, it } from 'vitest'
import { TimedRecord } from '../types'
import { exportTextGrid, fillTier } from './textGridExporter'

describe('fillTier', () => {
  it('fills gaps and clips overlaps', () => {
    const tier = fillTier(
      'ORT',
      [
        { xmin: 0.5, xmax: 1, text: 'b' },
        { xmin: 0.1, xmax: 0.6, text: 'a' }
      ],
      0,
      2
    )
    expect(tier.intervals).toEqual([
      { xmin: 0, xmax: 0.1, text: '' },
      { xmin: 0.1, xmax: 0.6, text: 'a' },
      { xmin: 0.6, xmax: 1, text: 'b' },
      { xmin: 1, xmax: 2, text: '' }
    ])
  })
})

describe('exportTextGrid', () => {
  it('writes utterance, word, pronunciation and phone tiers', () => {
    const records: TimedRecord[] = [
      {
        id: '1',
        span: { start: 250, end: 500 },
        words: [
          {
            recordId: '1',
            ordinal: 0,
            index: 0,
            form: 'la',
            phonemes: ['l', 'a'],
            span: { start: 250, end: 500 },
            segments: [
              { index: 0, start: 250, duration: 125, symbol: 'l', failed: false },
              { index: 1, start: 375, duration: 125, symbol: 'a', failed: false }
            ]
          }
        ]
      }
    ]
    const lines = exportTextGrid(records, 1000).split('\n')
    expect(lines.slice(0, 8)).toEqual([
      'File type = "ooTextFile"',
      'Object class = "TextGrid"',
      '',
      'xmin = 0',
      'xmax = 0.5',
      'tiers? <exists>',
      'size = 4',
      'item []:'
    ])
    expect(lines.slice(8, 22)).toEqual([
      '    item [1]:',
      '        class = "IntervalTier"',
      '        name = "RID"',
      '        xmin = 0',
      '        xmax = 0.5',
      '        intervals: size = 2',
      '        intervals [1]:',
      '            xmin = 0',
      '            xmax = 0.25',
      '            text = ""',
      '        intervals [2]:',
      '            xmin = 0.25',
      '            xmax = 0.5',
      '            text = "1"'
    ])
    const mauAt = lines.indexOf('        name = "MAU"')
    expect(lines[mauAt + 3]).toBe('        intervals: size = 3')
    expect(lines.slice(mauAt + 8, mauAt + 12)).toEqual([
      '        intervals [2]:',
      '            xmin = 0.25',
      '            xmax = 0.375',
      '            text = "l"'
    ])
  })
})
