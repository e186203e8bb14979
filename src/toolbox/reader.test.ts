import { describe, expect, it } from 'vitest'
import { SAMPLE_TOOLBOX } from '../../test/fixtures'
import { ToolboxFormatError } from '../errors'
import { readToolbox, readWordTimes } from './reader'

const base = { referenceMarker: 'ref', textMarker: 't', sampleRate: 16000 }

describe('readToolbox', () => {
  it('segments records into words with running indices', () => {
    const model = readToolbox(SAMPLE_TOOLBOX, base)
    expect(model.records.map((r) => r.id)).toEqual(['1', '2'])
    expect(model.records[1].words).toEqual([
      { recordId: '2', ordinal: 0, index: 1, form: 'la', phonemes: [] },
      { recordId: '2', ordinal: 1, index: 2, form: 'casa', phonemes: [] }
    ])
    expect(model.records[0].tiers.get('ELANBegin')).toEqual(['0.000'])
    expect(model.records[0].constraint).toBeUndefined()
  })

  it('reads time constraints in samples when markers are given', () => {
    const model = readToolbox(SAMPLE_TOOLBOX, { ...base, startTimeMarker: 'ELANBegin', endTimeMarker: 'ELANEnd' })
    expect(model.records.map((r) => r.constraint)).toEqual([
      { start: 0, end: 8000 },
      { start: 9600, end: 19200 }
    ])
  })

  it('joins continuation lines and repeated transcription fields', () => {
    const text = ['\\ref a', '\\t uno', '  dos', '\\t tres', '\\ref b', '\\t', '\\ref c', '\\t cuatro'].join('\r\n')
    const model = readToolbox(text, base)
    expect(model.records.map((r) => r.id)).toEqual(['a', 'c'])
    expect(model.records[0].words.map((w) => w.form)).toEqual(['uno', 'dos', 'tres'])
    expect(model.records[1].words[0].index).toBe(3)
  })

  it('fails when a constrained record lacks a time', () => {
    const text = ['\\ref 1', '\\t hola', '\\ELANBegin 0.5'].join('\n')
    expect(() => readToolbox(text, { ...base, startTimeMarker: 'ELANBegin', endTimeMarker: 'ELANEnd' })).toThrow(
      ToolboxFormatError
    )
  })

  it('reads only the selected records and restarts word indices', () => {
    const text = ['\\ref a', '\\t uno dos', '\\ref b', '\\t tres', '\\ref c', '\\t cuatro cinco', '\\ref d', '\\t seis'].join('\n')
    const byNumber = readToolbox(text, { ...base, range: { startRecord: 2, endRecord: 3 } })
    expect(byNumber.records.map((r) => r.id)).toEqual(['b', 'c'])
    expect(byNumber.records.flatMap((r) => r.words.map((w) => w.index))).toEqual([0, 1, 2])
    const byId = readToolbox(text, { ...base, range: { startId: 'c' } })
    expect(byId.records.map((r) => r.id)).toEqual(['c', 'd'])
    expect(byId.records[0].words[0].index).toBe(0)
  })

  it('rejects contradictory record ranges', () => {
    expect(() => readToolbox(SAMPLE_TOOLBOX, { ...base, range: { startRecord: 2, endRecord: 1 } })).toThrow(/comes after/)
    expect(() => readToolbox(SAMPLE_TOOLBOX, { ...base, range: { startRecord: 1, startId: '1' } })).toThrow(ToolboxFormatError)
    expect(() => readToolbox(SAMPLE_TOOLBOX, { ...base, range: { endId: '9' } })).toThrow(/No record with id 9/)
  })

  it('needs both time markers or neither', () => {
    expect(() => readToolbox(SAMPLE_TOOLBOX, { ...base, startTimeMarker: 'ELANBegin' })).toThrow(ToolboxFormatError)
  })
})

describe('readWordTimes', () => {
  const opts = { referenceMarker: 'ref', wordStartMarker: 'WordBegin', wordEndMarker: 'WordEnd' }

  it('converts word times to milliseconds per record', () => {
    const text = [
      '\\ref 1',
      '\\WordBegin 0.010 0.250',
      '\\WordEnd 0.240 0.490',
      '\\t la casa',
      '',
      '\\ref 2',
      '\\t nada'
    ].join('\n')
    const times = readWordTimes(text, opts)
    expect([...times.keys()]).toEqual(['1'])
    expect(times.get('1')).toEqual({ starts: [10, 250], ends: [240, 490] })
  })

  it('reports the line of an unreadable time', () => {
    const text = '\\ref 1\n\\WordBegin 0.1 x'
    expect(() => readWordTimes(text, opts)).toThrow(/line 2/)
  })
})
