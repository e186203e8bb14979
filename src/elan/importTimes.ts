import { EafFormatError } from '../errors'
import { debug } from '../logger'
import { Report } from '../report'
import { WordTimes } from '../toolbox/reader'
import { AnnotationGraph, childrenOf, cloneGraph, getTier, slotPositions, slotSpan, tierAnnotations } from './graph'

export interface ImportOptions {
  /** Linguistic type of the word tiers to fill */
  wordType: string
}

export interface ImportResult {
  graph: AnnotationGraph
  report: Report
  applied: number // parent annotations whose word times were committed
}

interface Violation {
  earlierSlot: string
  earlierTime: number
  laterSlot: string
  laterTime: number
}

/** First pair of anchored slots between `from` and `to` (inclusive) that runs backwards in time. */
export function findViolation(g: AnnotationGraph, from: number, to: number): Violation | undefined {
  let previous: { id: string; value: number } | undefined
  for (let i = from; i <= to && i < g.timeOrder.length; i++) {
    const id = g.timeOrder[i]
    const value = g.timeSlots.get(id)?.value
    if (value === undefined) continue
    if (previous && value < previous.value) {
      return { earlierSlot: previous.id, earlierTime: previous.value, laterSlot: id, laterTime: value }
    }
    previous = { id, value }
  }
  return undefined
}

/**
 * Anchors the word annotations of each utterance with the times recorded for
 * that utterance (looked up by the parent annotation's value). The words of
 * one utterance are committed together: if they would break the time order
 * inside the utterance's span they are rolled back and a TimeOrderConflict
 * is reported.
 */
export function importWordTimes(input: AnnotationGraph, times: Map<string, WordTimes>, opts: ImportOptions): ImportResult {
  const g = cloneGraph(input)
  const report = new Report()
  let applied = 0

  const targets = g.tiers.filter((t) => t.linguisticType === opts.wordType && t.parent)
  if (targets.length === 0) throw new EafFormatError(`No dependent tier of type ${opts.wordType}`)

  for (const tier of targets) {
    if (!tier.parent) continue
    if (!g.linguisticTypes.get(tier.linguisticType)?.timeAlignable) {
      throw new EafFormatError(`Tier ${tier.id} is not time-alignable; flexibilize the file first`)
    }
    for (const parent of tierAnnotations(g, getTier(g, tier.parent))) {
      const recordId = parent.value.trim()
      const words = childrenOf(g, parent, tier)
      const recordTimes = times.get(recordId)
      const span = slotSpan(g, parent)
      if (words.length === 0 || !span) continue
      const timed = recordTimes ? Math.max(recordTimes.starts.length, recordTimes.ends.length) : 0
      if (timed > words.length) report.add({ kind: 'SurplusWordTimes', recordId, words: words.length, times: timed })

      const before = new Map<string, number | undefined>()
      words.forEach((word, position) => {
        const start = recordTimes?.starts[position]
        const end = recordTimes?.ends[position]
        if (word.kind !== 'alignable' || start === undefined || end === undefined) {
          report.add({ kind: 'MissingWordTime', recordId, annotationId: word.id, position })
          return
        }
        for (const [slotId, value] of [
          [word.start, start],
          [word.end, end]
        ] as const) {
          const slot = g.timeSlots.get(slotId)
          if (!slot) throw new EafFormatError(`Annotation ${word.id} refers to unknown slot ${slotId}`)
          if (!before.has(slotId)) before.set(slotId, slot.value)
          slot.value = value
        }
      })
      if (before.size === 0) continue

      const pos = slotPositions(g)
      const violation = findViolation(g, pos.get(span.start) ?? 0, pos.get(span.end) ?? g.timeOrder.length - 1)
      if (violation) {
        for (const [slotId, value] of before) {
          const slot = g.timeSlots.get(slotId)
          if (slot) slot.value = value
        }
        report.add({ kind: 'TimeOrderConflict', recordId, parentAnnotationId: parent.id, ...violation })
        debug(`Rolled back word times of ${recordId}`)
      } else {
        applied++
      }
    }
  }
  return { graph: g, report, applied }
}
