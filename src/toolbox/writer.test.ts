import { describe, expect, it } from 'vitest'
import { ToolboxFormatError } from '../errors'
import { TimedRecord, TimedWord } from '../types'
import { annotateToolbox, createToolbox, regularIntervals } from './writer'

const opts = {
  sampleRate: 16000,
  referenceMarker: 'ref',
  textMarker: 't',
  utteranceStartMarker: 'ELANBegin',
  utteranceEndMarker: 'ELANEnd',
  wordStartMarker: 'WordBegin',
  wordEndMarker: 'WordEnd',
  toolboxType: 'Text'
}

function word(recordId: string, ordinal: number, form: string, span?: [number, number]): TimedWord {
  const w: TimedWord = { recordId, ordinal, index: ordinal, form, phonemes: [], segments: [] }
  if (span) w.span = { start: span[0], end: span[1] }
  return w
}

const records: TimedRecord[] = [
  { id: '1', words: [word('1', 0, 'Casa.', [800, 7200])], span: { start: 0, end: 8000 } },
  {
    id: '2',
    words: [word('2', 0, 'la', [9600, 12800]), word('2', 1, 'casa', [12800, 19200])],
    span: { start: 9600, end: 19200 }
  }
]

const original = ['\\_sh v3.0  400  Text', '\\ref 1', '\\ELANBegin 0.000', '\\ELANEnd 0.500', '\\t Casa.', '', '\\ref 2', '\\t la casa', ''].join('\n')

describe('annotateToolbox', () => {
  it('inserts utterance and word times after each record marker', () => {
    const { text, report } = annotateToolbox(original, records, { ...opts, outputWordTimes: true })
    expect(text).toBe(
      [
        '\\_sh v3.0  400  Text',
        '\\ref 1',
        '\\ELANBegin 0.000',
        '\\ELANEnd 0.500',
        '\\WordBegin 0.050',
        '\\WordEnd 0.450',
        '\\t Casa.',
        '',
        '\\ref 2',
        '\\ELANBegin 0.600',
        '\\ELANEnd 1.200',
        '\\WordBegin 0.600 0.800',
        '\\WordEnd 0.800 1.200',
        '\\t la casa',
        ''
      ].join('\n')
    )
    expect(report.size).toBe(0)
  })

  it('keeps original utterance times in keep mode', () => {
    const { text } = annotateToolbox(original, records, { ...opts, keepUtteranceTimes: true })
    expect(text).toBe(original)
  })

  it('preserves CRLF line endings', () => {
    const crlf = original.replace(/\n/g, '\r\n')
    const { text } = annotateToolbox(crlf, records, opts)
    expect(text.split('\r\n').slice(6, 9)).toEqual(['\\ref 2', '\\ELANBegin 0.600', '\\ELANEnd 1.200'])
  })

  it('spreads words over the original utterance when some failed', () => {
    const failed: TimedRecord[] = [{ id: '3', words: [word('3', 0, 'la'), word('3', 1, 'casa')] }]
    const text = ['\\ref 3', '\\ELANBegin 1.000', '\\ELANEnd 2.000', '\\t la casa'].join('\n')
    const out = annotateToolbox(text, failed, { ...opts, outputWordTimes: true, fillFailedWords: true })
    expect(out.text.split('\n')).toEqual([
      '\\ref 3',
      '\\WordBegin 1.010 1.510',
      '\\WordEnd 1.490 1.990',
      '\\ELANBegin 1.000',
      '\\ELANEnd 2.000',
      '\\t la casa'
    ])
    expect(out.report.ofKind('InterpolatedWords')).toEqual([{ kind: 'InterpolatedWords', recordId: '3', words: 2 }])
  })

  it('omits word times for a record with untimed words when not filling', () => {
    const failed: TimedRecord[] = [{ id: '3', words: [word('3', 0, 'la'), word('3', 1, 'casa', [0, 10])] }]
    const out = annotateToolbox('\\ref 3\n\\t la casa\n', failed, { ...opts, outputWordTimes: true })
    expect(out.text).toBe('\\ref 3\n\\t la casa\n')
  })

  it('fails when the record marker never occurs', () => {
    expect(() => annotateToolbox('\\id 1\n\\t hola\n', records, opts)).toThrow(ToolboxFormatError)
  })
})

describe('createToolbox', () => {
  it('writes a new database with a header and CRLF endings', () => {
    const text = createToolbox(records.slice(0, 1), { ...opts, outputWordTimes: true })
    expect(text).toBe(
      [
        '\\_sh v3.0  400  Text',
        '',
        '\\ref 1',
        '\\ELANBegin 0.000',
        '\\ELANEnd 0.500',
        '\\WordBegin 0.050',
        '\\WordEnd 0.450',
        '',
        '\\t Casa.',
        '',
        ''
      ].join('\r\n')
    )
  })
})

describe('regularIntervals', () => {
  it('divides the span evenly with a small inset', () => {
    expect(regularIntervals(3, 0, 3)).toEqual({ starts: ['0.010', '1.010', '2.010'], ends: ['0.990', '1.990', '2.990'] })
  })
})
