import { ToolboxFormatError } from '../errors'
import { Report } from '../report'
import { TimedRecord } from '../types'
import { dominantEnding, joinToolboxLines, markerValue, splitToolboxLines, ToolboxLine } from './document'
import { formatSeconds, samplesToSeconds, timecodeToSeconds } from './timecode'

export interface ToolboxTimeOptions {
  sampleRate: number
  referenceMarker: string
  textMarker: string
  utteranceStartMarker: string
  utteranceEndMarker: string
  wordStartMarker: string
  wordEndMarker: string
  toolboxType: string
  outputWordTimes?: boolean
  keepUtteranceTimes?: boolean
  /** Spread words evenly over the original utterance time when some have no time. */
  fillFailedWords?: boolean
}

export interface ToolboxTimeOutput {
  text: string
  report: Report
}

// Keeps interpolated words from touching their neighbours
const INTERPOLATION_INSET = 0.01

type FormattedWordTimes = { starts: string[]; ends: string[] }

function alignedWordTimes(record: TimedRecord, sampleRate: number): FormattedWordTimes | undefined {
  const starts: string[] = []
  const ends: string[] = []
  for (const w of record.words) {
    if (!w.span) return undefined
    starts.push(formatSeconds(samplesToSeconds(w.span.start, sampleRate)))
    ends.push(formatSeconds(samplesToSeconds(w.span.end, sampleRate)))
  }
  return { starts, ends }
}

export function regularIntervals(count: number, start: number, end: number): FormattedWordTimes {
  const length = (end - start) / count
  const starts: string[] = []
  const ends: string[] = []
  for (let i = 0; i < count; i++) {
    starts.push(formatSeconds(start + i * length + INTERPOLATION_INSET))
    ends.push(formatSeconds(start + (i + 1) * length - INTERPOLATION_INSET))
  }
  return { starts, ends }
}

function readOriginalUtteranceTimes(lines: ToolboxLine[], opts: ToolboxTimeOptions) {
  const times = new Map<string, { start?: number; end?: number }>()
  let current: string | undefined
  for (const line of lines) {
    if (line.marker === opts.referenceMarker) {
      current = markerValue(line)
      continue
    }
    if (current === undefined) continue
    if (line.marker !== opts.utteranceStartMarker && line.marker !== opts.utteranceEndMarker) continue
    const value = markerValue(line)
    if (!value) continue
    const entry = times.get(current) ?? {}
    if (line.marker === opts.utteranceStartMarker) entry.start = timecodeToSeconds(value)
    else entry.end = timecodeToSeconds(value)
    times.set(current, entry)
  }
  return times
}

/**
 * Copies an existing Toolbox file, inserting utterance and (optionally) word
 * times right after each record marker. Existing time lines for a record are
 * replaced when new values are written and kept otherwise.
 */
export function annotateToolbox(original: string, records: TimedRecord[], opts: ToolboxTimeOptions): ToolboxTimeOutput {
  const report = new Report()
  const lines = splitToolboxLines(original)
  if (!lines.some((l) => l.marker === opts.referenceMarker)) {
    throw new ToolboxFormatError(`The record marker \\${opts.referenceMarker} does not occur in the Toolbox file`)
  }
  const byId = new Map(records.map((r) => [r.id, r]))
  const originalTimes = readOriginalUtteranceTimes(lines, opts)
  const fallbackEnding = dominantEnding(lines)

  const out: ToolboxLine[] = []
  let wroteUtterance = false
  let wroteWords = false

  for (const line of lines) {
    if (line.marker === opts.referenceMarker) {
      out.push(line)
      wroteUtterance = false
      wroteWords = false
      if (!line.ending) line.ending = fallbackEnding
      const ending = line.ending
      const recordId = markerValue(line)
      const record = byId.get(recordId)
      if (!record) continue

      if (!opts.keepUtteranceTimes && record.span) {
        out.push({ marker: opts.utteranceStartMarker, content: `\\${opts.utteranceStartMarker} ${formatSeconds(samplesToSeconds(record.span.start, opts.sampleRate))}`, ending })
        out.push({ marker: opts.utteranceEndMarker, content: `\\${opts.utteranceEndMarker} ${formatSeconds(samplesToSeconds(record.span.end, opts.sampleRate))}`, ending })
        wroteUtterance = true
      }

      if (opts.outputWordTimes) {
        let words = alignedWordTimes(record, opts.sampleRate)
        const known = originalTimes.get(recordId)
        if (!words && opts.fillFailedWords && known?.start !== undefined && known.end !== undefined) {
          words = regularIntervals(record.words.length, known.start, known.end)
          report.add({ kind: 'InterpolatedWords', recordId, words: record.words.length })
        }
        if (words) {
          out.push({ marker: opts.wordStartMarker, content: `\\${opts.wordStartMarker} ${words.starts.join(' ')}`, ending })
          out.push({ marker: opts.wordEndMarker, content: `\\${opts.wordEndMarker} ${words.ends.join(' ')}`, ending })
          wroteWords = true
        }
      }
      continue
    }

    const isUtteranceTime = line.marker === opts.utteranceStartMarker || line.marker === opts.utteranceEndMarker
    const isWordTime = line.marker === opts.wordStartMarker || line.marker === opts.wordEndMarker
    if (isUtteranceTime && wroteUtterance) continue
    if (isWordTime && wroteWords) continue
    out.push(line)
  }

  return { text: joinToolboxLines(out), report }
}

/** Writes a fresh Toolbox database from aligned records. */
export function createToolbox(records: TimedRecord[], opts: ToolboxTimeOptions): string {
  const eol = '\r\n'
  const out: string[] = [`\\_sh v3.0  400  ${opts.toolboxType}`, '']

  for (const record of records) {
    out.push(`\\${opts.referenceMarker} ${record.id}`)
    if (record.span) {
      out.push(`\\${opts.utteranceStartMarker} ${formatSeconds(samplesToSeconds(record.span.start, opts.sampleRate))}`)
      out.push(`\\${opts.utteranceEndMarker} ${formatSeconds(samplesToSeconds(record.span.end, opts.sampleRate))}`)
    }
    if (opts.outputWordTimes) {
      const words = alignedWordTimes(record, opts.sampleRate)
      if (words) {
        out.push(`\\${opts.wordStartMarker} ${words.starts.join(' ')}`)
        out.push(`\\${opts.wordEndMarker} ${words.ends.join(' ')}`)
      }
    }
    out.push('', `\\${opts.textMarker} ${record.words.map((w) => w.form).join(' ')}`, '', '')
  }

  return out.join(eol)
}
