import { ToolboxFormatError } from '../errors'
import { debug } from '../logger'
import { RecordModel, SampleSpan, ToolboxRecord, Word } from '../types'
import { markerValue, splitToolboxLines } from './document'
import { secondsToSamples, timecodeToSeconds } from './timecode'

export interface ToolboxReadOptions {
  referenceMarker: string
  textMarker: string
  sampleRate: number
  /** Both or neither; when given every record must carry both times. */
  startTimeMarker?: string
  endTimeMarker?: string
  range?: RecordRange
}

/**
 * Inclusive slice of the records to read, by 1-based record number or by
 * record id. A bound may be given by number or by id, not both.
 */
export interface RecordRange {
  startRecord?: number
  endRecord?: number
  startId?: string
  endId?: string
}

interface Draft {
  id: string
  line: number
  textParts: string[]
  tiers: Map<string, string[]>
}

function pushTier(tiers: Map<string, string[]>, marker: string, value: string) {
  const values = tiers.get(marker)
  if (values) values.push(value)
  else tiers.set(marker, [value])
}

/**
 * Parses a Toolbox text into records. Lines without a marker continue the
 * previous field; records whose transcription tier is empty are dropped.
 */
export function readToolbox(text: string, opts: ToolboxReadOptions): RecordModel {
  if (!!opts.startTimeMarker !== !!opts.endTimeMarker) {
    throw new ToolboxFormatError('Both an utterance start time marker and an end time marker are needed to constrain the alignment')
  }

  const drafts: Draft[] = []
  let current: Draft | undefined
  let lastMarker: string | undefined

  splitToolboxLines(text).forEach((line, i) => {
    const lineNo = i + 1
    if (line.content.trim() === '') return

    if (!line.marker) {
      if (!current || !lastMarker) return
      const continuation = line.content.trim().replace(/\s+/g, ' ')
      const values = current.tiers.get(lastMarker)
      if (values && values.length > 0) values[values.length - 1] = `${values[values.length - 1]} ${continuation}`.trim()
      if (lastMarker === opts.textMarker) current.textParts.push(continuation)
      return
    }

    const value = markerValue(line)
    if (line.marker === opts.referenceMarker) {
      if (!value) throw new ToolboxFormatError('Record marker without a record id', lineNo)
      current = { id: value, line: lineNo, textParts: [], tiers: new Map() }
      drafts.push(current)
      lastMarker = line.marker
      debug('Reading record', value)
      return
    }
    if (!current) return

    lastMarker = line.marker
    pushTier(current.tiers, line.marker, value)
    if (line.marker === opts.textMarker && value) current.textParts.push(value)
  })

  const records: ToolboxRecord[] = []
  let wordIndex = 0
  for (const draft of selectRange(drafts, opts.range)) {
    const forms = draft.textParts.join(' ').split(/\s+/).filter(Boolean)
    if (forms.length === 0) {
      debug(`Skipping record ${draft.id} without transcription`)
      continue
    }
    const words: Word[] = forms.map((form, ordinal) => ({
      recordId: draft.id,
      ordinal,
      index: wordIndex++,
      form,
      phonemes: []
    }))
    const record: ToolboxRecord = { id: draft.id, words, tiers: draft.tiers }
    const constraint = readConstraint(draft, opts)
    if (constraint) record.constraint = constraint
    records.push(record)
  }
  return { records }
}

function selectRange(drafts: Draft[], range: RecordRange | undefined): Draft[] {
  if (!range) return drafts
  const { startRecord, endRecord, startId, endId } = range
  if (startRecord !== undefined && startId !== undefined) {
    throw new ToolboxFormatError('The first record can be given by number or by id, not both')
  }
  if (endRecord !== undefined && endId !== undefined) {
    throw new ToolboxFormatError('The last record can be given by number or by id, not both')
  }
  for (const n of [startRecord, endRecord]) {
    if (n !== undefined && (!Number.isInteger(n) || n < 1)) throw new ToolboxFormatError(`Record number ${n} is not a positive integer`)
  }

  const positionOf = (id: string) => {
    const at = drafts.findIndex((d) => d.id === id)
    if (at < 0) throw new ToolboxFormatError(`No record with id ${id}`)
    return at
  }
  const from = startId !== undefined ? positionOf(startId) : (startRecord ?? 1) - 1
  const to = endId !== undefined ? positionOf(endId) : (endRecord ?? drafts.length) - 1
  if (from > to) throw new ToolboxFormatError(`The first record (${from + 1}) comes after the last record (${to + 1})`)
  debug(`Reading records ${from + 1} to ${to + 1} of ${drafts.length}`)
  return drafts.slice(from, to + 1)
}

function readConstraint(draft: Draft, opts: ToolboxReadOptions): SampleSpan | undefined {
  if (!opts.startTimeMarker || !opts.endTimeMarker) return undefined
  const start = draft.tiers.get(opts.startTimeMarker)?.[0]
  const end = draft.tiers.get(opts.endTimeMarker)?.[0]
  if (!start || !end) {
    throw new ToolboxFormatError(`Could not determine utterance start and/or end time for record ${draft.id}`, draft.line)
  }
  return {
    start: secondsToSamples(timecodeToSeconds(start), opts.sampleRate),
    end: secondsToSamples(timecodeToSeconds(end), opts.sampleRate)
  }
}

export interface WordTimes {
  starts: number[] // milliseconds
  ends: number[]
}

export interface WordTimeReadOptions {
  referenceMarker: string
  wordStartMarker: string
  wordEndMarker: string
}

/**
 * Collects the per-word begin/end tiers written by the time writer, keyed by
 * record id. Records lacking either tier are left out.
 */
export function readWordTimes(text: string, opts: WordTimeReadOptions): Map<string, WordTimes> {
  const result = new Map<string, WordTimes>()
  let current: { id: string; times: WordTimes } | undefined

  const flush = () => {
    if (!current) return
    if (current.times.starts.length > 0 && current.times.ends.length > 0) result.set(current.id, current.times)
    else debug(`No word times for record ${current.id}`)
  }

  const toMillis = (value: string, lineNo: number) =>
    value.split(' ').filter(Boolean).map((token) => {
      try {
        return Math.round(timecodeToSeconds(token) * 1000)
      } catch (err) {
        throw new ToolboxFormatError(err instanceof Error ? err.message : String(err), lineNo)
      }
    })

  splitToolboxLines(text).forEach((line, i) => {
    if (!line.marker) return
    const value = markerValue(line)
    if (line.marker === opts.referenceMarker) {
      flush()
      if (!value) throw new ToolboxFormatError('Record marker without a record id', i + 1)
      current = { id: value, times: { starts: [], ends: [] } }
    } else if (current && line.marker === opts.wordStartMarker) {
      current.times.starts.push(...toMillis(value, i + 1))
    } else if (current && line.marker === opts.wordEndMarker) {
      current.times.ends.push(...toMillis(value, i + 1))
    }
  })
  flush()
  return result
}
