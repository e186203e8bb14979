import { MisalignedOutputError, PartiturFormatError } from '../errors'
import { debug } from '../logger'
import { PhonemeSlot, PhoneSegment, RecordModel, ToolboxRecord, Word } from '../types'
import { headerSampleRate, parsePartitur, PartiturDocument, PartiturLine } from './format'

export const PAUSE_INDEX = -1

export interface PartiturSource {
  model: RecordModel
  slots: PhonemeSlot[]
  sampleRate?: number
}

function wordMap(lines: PartiturLine[] | undefined, tier: string): Map<number, string[]> {
  const map = new Map<number, string[]>()
  for (const { line, fields } of lines ?? []) {
    if (fields.length < 2) throw new PartiturFormatError(`${tier} line needs a word number and a value`, line)
    const index = Number(fields[0])
    if (!Number.isInteger(index)) throw new PartiturFormatError(`${tier} word number "${fields[0]}" is not an integer`, line)
    map.set(index, fields.slice(1))
  }
  return map
}

function parseInt10(raw: string, what: string, line: number): number {
  const value = Number(raw)
  if (!Number.isInteger(value)) throw new PartiturFormatError(`${what} "${raw}" is not an integer`, line)
  return value
}

/**
 * Rebuilds records, words and the phoneme back-reference table from the
 * Partitur file that was sent to the aligner. Indices are re-derived in
 * emission order (RID order, then word order, then KAN symbol order); a PHO
 * tier, when present, must agree with them.
 */
export function readPartiturSource(text: string): PartiturSource {
  const doc = parsePartitur(text)
  const ort = wordMap(doc.tiers.get('ORT'), 'ORT')
  const kan = wordMap(doc.tiers.get('KAN'), 'KAN')
  const constraints = readConstraints(doc)

  const records: ToolboxRecord[] = []
  const slots: PhonemeSlot[] = []
  let next = 0
  for (const { line, fields } of doc.tiers.get('RID') ?? []) {
    if (fields.length < 2) throw new PartiturFormatError('RID line needs word numbers and a record id', line)
    const recordId = fields.slice(1).join(' ')
    const words: Word[] = fields[0].split(',').map((raw, ordinal) => {
      const index = parseInt10(raw, 'Word number', line)
      const phonemes = kan.get(index)
      if (!phonemes) throw new PartiturFormatError(`No KAN entry for word ${index} of record ${recordId}`, line)
      const form = ort.get(index)?.join(' ') ?? ''
      phonemes.forEach((symbol, phonemeOrdinal) => {
        slots.push({ index: next++, recordId, wordOrdinal: ordinal, wordIndex: index, phonemeOrdinal, symbol })
      })
      return { recordId, ordinal, index, form, phonemes }
    })
    const record: ToolboxRecord = { id: recordId, words, tiers: new Map() }
    const constraint = constraints.get(recordId)
    if (constraint) record.constraint = constraint
    records.push(record)
  }

  checkPhonemeTier(doc, slots)
  return { model: { records }, slots, sampleRate: headerSampleRate(doc) }
}

function readConstraints(doc: PartiturDocument) {
  const constraints = new Map<string, { start: number; end: number }>()
  for (const { line, fields } of doc.tiers.get('TRN') ?? []) {
    if (fields.length < 4) throw new PartiturFormatError('TRN line needs start, duration, word numbers and a record id', line)
    const start = parseInt10(fields[0], 'TRN start', line)
    const duration = parseInt10(fields[1], 'TRN duration', line)
    constraints.set(fields.slice(3).join(' '), { start, end: start + duration })
  }
  return constraints
}

function checkPhonemeTier(doc: PartiturDocument, slots: PhonemeSlot[]) {
  const pho = doc.tiers.get('PHO')
  if (!pho) return
  if (pho.length !== slots.length) {
    throw new PartiturFormatError(`PHO tier lists ${pho.length} phonemes but KAN/RID define ${slots.length}`)
  }
  pho.forEach(({ line, fields }, i) => {
    const slot = slots[i]
    const index = parseInt10(fields[0] ?? '', 'PHO index', line)
    const wordIndex = parseInt10(fields[1] ?? '', 'PHO word number', line)
    if (index !== slot.index || wordIndex !== slot.wordIndex || fields[2] !== slot.symbol) {
      throw new PartiturFormatError(`PHO entry does not match phoneme ${slot.index} (${slot.symbol}) of word ${slot.wordIndex}`, line)
    }
  })
}

/**
 * Parses the aligner's MAU tier: `MAU: <start> <duration> <index> <symbol>`
 * in samples, where index is the phoneme's position in the slot table (not a
 * word number). Index -1 marks a pause; a negative start or duration marks a
 * segment the aligner failed on.
 */
export function readPhoneSegments(text: string, slots: PhonemeSlot[]): PhoneSegment[] {
  const doc = parsePartitur(text)
  const segments: PhoneSegment[] = []
  for (const { line, fields } of doc.tiers.get('MAU') ?? []) {
    if (fields.length !== 4) {
      throw new PartiturFormatError('MAU line needs start, duration, phoneme index and symbol', line)
    }
    const start = parseInt10(fields[0], 'MAU start', line)
    const duration = parseInt10(fields[1], 'MAU duration', line)
    const index = parseInt10(fields[2], 'MAU index', line)
    if (index === PAUSE_INDEX) continue
    segments.push({ index, start, duration, symbol: fields[3], failed: start < 0 || duration < 0 })
  }
  assertAligned(segments, slots)
  return segments
}

export function assertAligned(segments: PhoneSegment[], slots: PhonemeSlot[]) {
  if (segments.length !== slots.length) {
    throw new MisalignedOutputError(
      `Aligner returned ${segments.length} phoneme segments for ${slots.length} phonemes; both files must come from the same conversion run`
    )
  }
  segments.forEach((seg, i) => {
    if (seg.index !== slots[i].index) {
      throw new MisalignedOutputError(`Segment ${i} carries index ${seg.index}, expected ${slots[i].index}`)
    }
    if (seg.symbol !== slots[i].symbol) debug(`Aligner relabelled phoneme ${seg.index}: ${slots[i].symbol} -> ${seg.symbol}`)
  })
}
