import { debug } from '../logger'
import { assertAligned } from '../partitur/reader'
import { Report } from '../report'
import { PhonemeSlot, PhoneSegment, RecordModel, SampleSpan, TimedRecord, TimedWord } from '../types'

export interface ReconstructOptions {
  /** Keep each record's prior constraint as its span; only words get new times. */
  keepUtteranceTimes?: boolean
}

export interface Reconstruction {
  records: TimedRecord[]
  report: Report
}

function wordSpan(segments: PhoneSegment[]): SampleSpan | undefined {
  const timed = segments.filter((s) => !s.failed)
  if (timed.length === 0) return undefined
  const first = timed[0]
  const last = timed[timed.length - 1]
  return { start: first.start, end: last.start + last.duration }
}

function recordSpan(words: TimedWord[]): SampleSpan | undefined {
  let span: SampleSpan | undefined
  for (const w of words) {
    if (!w.span) continue
    span = span
      ? { start: Math.min(span.start, w.span.start), end: Math.max(span.end, w.span.end) }
      : { ...w.span }
  }
  return span
}

/**
 * Groups aligned phone segments back into words and records through the
 * phoneme back-reference table. Returns new objects; the model is untouched.
 */
export function reconstructTimes(
  model: RecordModel,
  slots: PhonemeSlot[],
  segments: PhoneSegment[],
  opts: ReconstructOptions = {}
): Reconstruction {
  assertAligned(segments, slots)
  const report = new Report()

  const byWord = new Map<number, PhoneSegment[]>()
  segments.forEach((seg, i) => {
    const slot = slots[i]
    if (seg.failed) {
      report.add({ kind: 'FailedSegment', index: seg.index, recordId: slot.recordId, wordOrdinal: slot.wordOrdinal })
    }
    const list = byWord.get(slot.wordIndex)
    if (list) list.push(seg)
    else byWord.set(slot.wordIndex, [seg])
  })

  const records: TimedRecord[] = model.records.map((record) => {
    const words: TimedWord[] = record.words.map((word) => {
      const own = byWord.get(word.index) ?? []
      const timed: TimedWord = {
        recordId: word.recordId,
        ordinal: word.ordinal,
        index: word.index,
        form: word.form,
        phonemes: [...word.phonemes],
        segments: own
      }
      const span = wordSpan(own)
      if (span) timed.span = span
      else report.add({ kind: 'UntimedWord', recordId: record.id, wordOrdinal: word.ordinal, form: word.form })
      return timed
    })

    const result: TimedRecord = { id: record.id, words }
    const span = opts.keepUtteranceTimes && record.constraint ? { ...record.constraint } : recordSpan(words)
    if (span) result.span = span
    else report.add({ kind: 'UntimedRecord', recordId: record.id })
    return result
  })

  debug(`Reconstructed times for ${records.length} records from ${segments.length} segments`)
  return { records, report }
}
