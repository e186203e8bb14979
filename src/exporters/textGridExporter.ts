import { TimedRecord } from '../types'

export interface Interval {
  xmin: number
  xmax: number
  text: string
}

export interface IntervalTier {
  name: string
  intervals: Interval[]
}

function quote(text: string) {
  return `"${text.replace(/"/g, '""')}"`
}

/**
 * Sorts intervals and fills the gaps with empty ones so the tier covers
 * [xmin, xmax] without holes, as Praat expects. Overlaps are clipped.
 */
export function fillTier(name: string, items: Interval[], xmin: number, xmax: number): IntervalTier {
  const sorted = [...items].sort((a, b) => a.xmin - b.xmin)
  const intervals: Interval[] = []
  let cursor = xmin
  for (const item of sorted) {
    const start = Math.max(item.xmin, cursor)
    if (item.xmax <= start) continue
    if (start > cursor) intervals.push({ xmin: cursor, xmax: start, text: '' })
    intervals.push({ xmin: start, xmax: item.xmax, text: item.text })
    cursor = item.xmax
  }
  if (cursor < xmax) intervals.push({ xmin: cursor, xmax, text: '' })
  return { name, intervals }
}

export function recordsToTiers(records: TimedRecord[], sampleRate: number): { tiers: IntervalTier[]; xmax: number } {
  const sec = (samples: number) => samples / sampleRate
  const utterances: Interval[] = []
  const ort: Interval[] = []
  const kan: Interval[] = []
  const mau: Interval[] = []
  let end = 0

  for (const record of records) {
    if (record.span) {
      utterances.push({ xmin: sec(record.span.start), xmax: sec(record.span.end), text: record.id })
      end = Math.max(end, record.span.end)
    }
    for (const w of record.words) {
      if (w.span) {
        ort.push({ xmin: sec(w.span.start), xmax: sec(w.span.end), text: w.form })
        kan.push({ xmin: sec(w.span.start), xmax: sec(w.span.end), text: w.phonemes.join(' ') })
        end = Math.max(end, w.span.end)
      }
      for (const seg of w.segments) {
        if (seg.failed) continue
        mau.push({ xmin: sec(seg.start), xmax: sec(seg.start + seg.duration), text: seg.symbol })
        end = Math.max(end, seg.start + seg.duration)
      }
    }
  }

  const xmax = sec(end)
  return {
    xmax,
    tiers: [
      fillTier('RID', utterances, 0, xmax),
      fillTier('ORT', ort, 0, xmax),
      fillTier('KAN', kan, 0, xmax),
      fillTier('MAU', mau, 0, xmax)
    ]
  }
}

export function buildTextGrid(tiers: IntervalTier[], xmin: number, xmax: number): string {
  const out = [
    'File type = "ooTextFile"',
    'Object class = "TextGrid"',
    '',
    `xmin = ${xmin}`,
    `xmax = ${xmax}`,
    'tiers? <exists>',
    `size = ${tiers.length}`,
    'item []:'
  ]
  tiers.forEach((tier, t) => {
    out.push(
      `    item [${t + 1}]:`,
      '        class = "IntervalTier"',
      `        name = ${quote(tier.name)}`,
      `        xmin = ${xmin}`,
      `        xmax = ${xmax}`,
      `        intervals: size = ${tier.intervals.length}`
    )
    tier.intervals.forEach((iv, i) => {
      out.push(
        `        intervals [${i + 1}]:`,
        `            xmin = ${iv.xmin}`,
        `            xmax = ${iv.xmax}`,
        `            text = ${quote(iv.text)}`
      )
    })
  })
  return out.join('\n') + '\n'
}

export function exportTextGrid(records: TimedRecord[], sampleRate: number): string {
  const { tiers, xmax } = recordsToTiers(records, sampleRate)
  return buildTextGrid(tiers, 0, xmax)
}
