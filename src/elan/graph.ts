import { EafFormatError } from '../errors'

// In-memory ELAN annotation graph. Slots and annotations live in id-keyed
// maps; tiers and the timeline only hold ids.

export const CONSTRAINTS = ['Time_Subdivision', 'Symbolic_Subdivision', 'Symbolic_Association', 'Included_In'] as const
export type Constraint = (typeof CONSTRAINTS)[number]

export function isConstraint(value: string): value is Constraint {
  return CONSTRAINTS.some((c) => c === value)
}

export interface TimeSlot {
  id: string
  value?: number // milliseconds; absent while unanchored
}

interface AnnotationBase {
  id: string
  tierId: string
  value: string
  /** Attributes carried through untouched (EXT_REF, CVE_REF, LANG_REF, ...) */
  extra: Array<[string, string]>
}

export interface AlignableAnnotation extends AnnotationBase {
  kind: 'alignable'
  start: string
  end: string
}

export interface RefAnnotation extends AnnotationBase {
  kind: 'reference'
  ref: string
  previous?: string
}

export type Annotation = AlignableAnnotation | RefAnnotation

export interface Tier {
  id: string
  linguisticType: string
  parent?: string
  annotationIds: string[]
}

export interface LinguisticType {
  id: string
  constraint?: Constraint
  timeAlignable: boolean
}

export interface AnnotationGraph {
  timeOrder: string[]
  timeSlots: Map<string, TimeSlot>
  annotations: Map<string, Annotation>
  tiers: Tier[]
  linguisticTypes: Map<string, LinguisticType>
  /** The document the graph was read from; everything not modelled here is written back from it. */
  sourceXml: string
}

export interface SlotSpan {
  start: string
  end: string
}

export function cloneGraph(g: AnnotationGraph): AnnotationGraph {
  return {
    timeOrder: [...g.timeOrder],
    timeSlots: new Map([...g.timeSlots].map(([id, s]) => [id, { ...s }])),
    annotations: new Map([...g.annotations].map(([id, a]) => [id, { ...a, extra: [...a.extra] }])),
    tiers: g.tiers.map((t) => ({ ...t, annotationIds: [...t.annotationIds] })),
    linguisticTypes: new Map([...g.linguisticTypes].map(([id, lt]) => [id, { ...lt }])),
    sourceXml: g.sourceXml
  }
}

export function getTier(g: AnnotationGraph, id: string): Tier {
  const tier = g.tiers.find((t) => t.id === id)
  if (!tier) throw new EafFormatError(`Unknown tier ${id}`)
  return tier
}

export function getAnnotation(g: AnnotationGraph, id: string): Annotation {
  const annotation = g.annotations.get(id)
  if (!annotation) throw new EafFormatError(`Unknown annotation ${id}`)
  return annotation
}

export function tierAnnotations(g: AnnotationGraph, tier: Tier): Annotation[] {
  return tier.annotationIds.map((id) => getAnnotation(g, id))
}

export function slotPositions(g: AnnotationGraph): Map<string, number> {
  return new Map(g.timeOrder.map((id, i) => [id, i]))
}

export function tierDepth(g: AnnotationGraph, tier: Tier): number {
  let depth = 0
  let current = tier
  while (current.parent) {
    current = getTier(g, current.parent)
    if (++depth > g.tiers.length) throw new EafFormatError(`Tier ${tier.id} is part of a parent cycle`)
  }
  return depth
}

/** Slot pair an annotation spans, following references up to the first time-aligned ancestor. */
export function slotSpan(g: AnnotationGraph, annotation: Annotation): SlotSpan | undefined {
  let current = annotation
  for (let hops = 0; hops <= g.annotations.size; hops++) {
    if (current.kind === 'alignable') return { start: current.start, end: current.end }
    const parent = g.annotations.get(current.ref)
    if (!parent) return undefined
    current = parent
  }
  return undefined
}

/**
 * Child annotations of `parent` on `childTier`, left to right. Reference
 * annotations follow their PREVIOUS_ANNOTATION chain; time-aligned ones are
 * those inside the parent's slot range, ordered by timeline position.
 */
export function childrenOf(g: AnnotationGraph, parent: Annotation, childTier: Tier): Annotation[] {
  const candidates = tierAnnotations(g, childTier)
  const refs = candidates.filter((a): a is RefAnnotation => a.kind === 'reference' && a.ref === parent.id)
  const ordered = orderByPrevious(refs)

  const span = slotSpan(g, parent)
  if (!span) return ordered
  const pos = slotPositions(g)
  const from = pos.get(span.start) ?? -1
  const to = pos.get(span.end) ?? -1
  const aligned = candidates
    .filter((a): a is AlignableAnnotation => a.kind === 'alignable')
    .map((a, docIndex) => ({ a, docIndex, start: pos.get(a.start) ?? -1, end: pos.get(a.end) ?? -1 }))
    .filter((c) => c.start >= from && c.end <= to && c.start >= 0)
    .sort((x, y) => x.start - y.start || x.docIndex - y.docIndex)
    .map((c) => c.a)
  return [...ordered, ...aligned]
}

function orderByPrevious(refs: RefAnnotation[]): RefAnnotation[] {
  const ids = new Set(refs.map((r) => r.id))
  const following = new Map<string, RefAnnotation>()
  for (const r of refs) if (r.previous && ids.has(r.previous)) following.set(r.previous, r)

  const ordered: RefAnnotation[] = []
  const seen = new Set<string>()
  for (const head of refs) {
    if (head.previous && ids.has(head.previous)) continue
    let current: RefAnnotation | undefined = head
    while (current && !seen.has(current.id)) {
      seen.add(current.id)
      ordered.push(current)
      current = following.get(current.id)
    }
  }
  // chains with a cycle keep document order
  for (const r of refs) if (!seen.has(r.id)) ordered.push(r)
  return ordered
}

/** Allocates `tsN` ids above the highest numbered slot in the graph. */
export class SlotIdAllocator {
  private last: number

  constructor(g: AnnotationGraph) {
    this.last = 0
    for (const id of g.timeSlots.keys()) {
      const m = /^ts(\d+)$/.exec(id)
      if (m) this.last = Math.max(this.last, Number(m[1]))
    }
  }

  next(): string {
    this.last += 1
    return `ts${this.last}`
  }
}
