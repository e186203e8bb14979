import { EafFormatError } from '../errors'
import { debug } from '../logger'
import {
  AlignableAnnotation,
  AnnotationGraph,
  childrenOf,
  cloneGraph,
  Constraint,
  getTier,
  slotSpan,
  SlotIdAllocator,
  Tier,
  tierAnnotations,
  tierDepth
} from './graph'

const RIGID: ReadonlySet<Constraint> = new Set<Constraint>(['Symbolic_Association', 'Symbolic_Subdivision', 'Included_In'])

export interface FlexibilizeResult {
  graph: AnnotationGraph
  /** Tiers whose annotations received their own time slots */
  tiers: string[]
}

/** Dependent tiers whose annotations cannot move independently of their parent */
export function rigidTiers(g: AnnotationGraph): Tier[] {
  return g.tiers.filter((tier) => {
    const constraint = g.linguisticTypes.get(tier.linguisticType)?.constraint
    return tier.parent !== undefined && constraint !== undefined && RIGID.has(constraint)
  })
}

/**
 * Gives every annotation on a rigid dependent tier a private pair of time
 * slots inside its parent's span, turning the tier into a time subdivision.
 * Symbolic children get unanchored slots just before the parent's end slot.
 * Children that were already time-aligned get copies of their old slots,
 * times included, placed beside the old ones; old slots nothing refers to
 * any more are dropped. A graph without rigid tiers is returned as is.
 */
export function flexibilize(input: AnnotationGraph): FlexibilizeResult {
  const candidates = rigidTiers(input)
  if (candidates.length === 0) return { graph: input, tiers: [] }

  const g = cloneGraph(input)
  const ids = new SlotIdAllocator(g)
  // parents first, so a child tier sees time-aligned parent annotations
  const ordered = [...candidates].sort((a, b) => tierDepth(g, a) - tierDepth(g, b))
  const released = new Set<string>()

  for (const tier of ordered) {
    if (!tier.parent) continue
    const parentTier = getTier(g, tier.parent)
    const claimed = new Set<string>()

    for (const parent of tierAnnotations(g, parentTier)) {
      const span = slotSpan(g, parent)
      if (!span) throw new EafFormatError(`Annotation ${parent.id} on tier ${parentTier.id} is not anchored in time`)
      const children = childrenOf(g, parent, tier).filter((c) => !claimed.has(c.id))
      if (children.length === 0) continue

      const fresh: string[] = []
      for (const child of children) {
        claimed.add(child.id)
        const start = ids.next()
        const end = ids.next()
        const aligned: AlignableAnnotation = {
          kind: 'alignable',
          id: child.id,
          tierId: child.tierId,
          value: child.value,
          extra: child.extra,
          start,
          end
        }
        if (child.kind === 'alignable') {
          // an already aligned word keeps its times on slots of its own
          g.timeSlots.set(start, { ...g.timeSlots.get(child.start), id: start })
          g.timeSlots.set(end, { ...g.timeSlots.get(child.end), id: end })
          g.timeOrder.splice(timelineIndex(g, child.start) + 1, 0, start)
          g.timeOrder.splice(timelineIndex(g, child.end), 0, end)
          released.add(child.start)
          released.add(child.end)
        } else {
          g.timeSlots.set(start, { id: start })
          g.timeSlots.set(end, { id: end })
          fresh.push(start, end)
        }
        g.annotations.set(child.id, aligned)
      }
      if (fresh.length > 0) g.timeOrder.splice(timelineIndex(g, span.end), 0, ...fresh)
    }

    const orphan = tier.annotationIds.find((id) => !claimed.has(id))
    if (orphan) throw new EafFormatError(`Annotation ${orphan} on tier ${tier.id} has no parent annotation`)
    debug(`Flexibilized tier ${tier.id}`)
  }

  for (const tier of ordered) {
    const type = g.linguisticTypes.get(tier.linguisticType)
    if (type) {
      type.constraint = 'Time_Subdivision'
      type.timeAlignable = true
    }
  }

  pruneSlots(g, released)
  return { graph: g, tiers: ordered.map((t) => t.id) }
}

function timelineIndex(g: AnnotationGraph, slot: string): number {
  const at = g.timeOrder.indexOf(slot)
  if (at < 0) throw new EafFormatError(`Time slot ${slot} is not on the timeline`)
  return at
}

/** Drops the given slots once no annotation refers to them */
function pruneSlots(g: AnnotationGraph, candidates: ReadonlySet<string>) {
  const referenced = new Set<string>()
  for (const a of g.annotations.values()) {
    if (a.kind === 'alignable') {
      referenced.add(a.start)
      referenced.add(a.end)
    }
  }
  const dropped = (id: string) => candidates.has(id) && !referenced.has(id)
  g.timeOrder = g.timeOrder.filter((id) => !dropped(id))
  for (const id of [...g.timeSlots.keys()]) if (dropped(id)) g.timeSlots.delete(id)
}
