import { info, warn } from './logger'

export type Diagnostic =
  | { kind: 'UnmappableCharacter'; word: string; character: string; position: number; recordId?: string }
  | { kind: 'EmptyTransliteration'; word: string; recordId?: string }
  | { kind: 'OverlappingConstraint'; recordId: string; start: number; previousEnd: number }
  | { kind: 'FailedSegment'; index: number; recordId: string; wordOrdinal: number }
  | { kind: 'UntimedWord'; recordId: string; wordOrdinal: number; form: string }
  | { kind: 'UntimedRecord'; recordId: string }
  | { kind: 'InterpolatedWords'; recordId: string; words: number }
  | { kind: 'MissingWordTime'; recordId: string; annotationId: string; position: number }
  | { kind: 'SurplusWordTimes'; recordId: string; words: number; times: number }
  | {
      kind: 'TimeOrderConflict'
      recordId: string
      parentAnnotationId: string
      earlierSlot: string
      earlierTime: number
      laterSlot: string
      laterTime: number
    }

export type DiagnosticKind = Diagnostic['kind']

type Of<K extends DiagnosticKind> = Extract<Diagnostic, { kind: K }>

export class Report {
  private readonly entries: Diagnostic[] = []

  add(diagnostic: Diagnostic) {
    this.entries.push(diagnostic)
  }

  merge(other: Report) {
    for (const d of other.all()) this.entries.push(d)
  }

  all(): readonly Diagnostic[] {
    return this.entries
  }

  ofKind<K extends DiagnosticKind>(kind: K): Of<K>[] {
    return this.entries.filter((d): d is Of<K> => d.kind === kind)
  }

  get size() {
    return this.entries.length
  }

  /** One line per diagnostic kind, in first-seen order. */
  summary(): string[] {
    const counts = new Map<DiagnosticKind, number>()
    for (const d of this.entries) counts.set(d.kind, (counts.get(d.kind) ?? 0) + 1)
    const lines: string[] = []
    for (const [kind, count] of counts) {
      if (kind === 'UnmappableCharacter') {
        const chars = new Set(this.ofKind('UnmappableCharacter').map((d) => d.character))
        lines.push(`${count} unmapped character(s) passed through: ${[...chars].join(' ')}`)
      } else {
        lines.push(`${count} × ${kind}`)
      }
    }
    return lines
  }

  log(label: string) {
    if (this.entries.length === 0) {
      info(`${label}: no problems found`)
      return
    }
    warn(`${label}: ${this.entries.length} problem(s)`)
    for (const line of this.summary()) warn(`  ${line}`)
    for (const d of this.entries) {
      if (d.kind === 'TimeOrderConflict') {
        warn(
          `  conflict in ${d.recordId} (${d.parentAnnotationId}): ${d.earlierSlot}=${d.earlierTime} > ${d.laterSlot}=${d.laterTime}`
        )
      } else if (d.kind === 'UntimedWord') {
        warn(`  no time for word ${d.wordOrdinal} "${d.form}" in record ${d.recordId}`)
      } else if (d.kind === 'SurplusWordTimes') {
        warn(`  record ${d.recordId} has ${d.times} word time(s) for ${d.words} word(s)`)
      } else if (d.kind === 'UntimedRecord') {
        warn(`  no time span for record ${d.recordId}`)
      }
    }
  }
}
