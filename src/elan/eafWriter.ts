import { EafFormatError } from '../errors'
import { childElements, firstChildElement, parseXml, removeChildren, serializeXml } from '../utils/xml'
import { Annotation, AnnotationGraph, Constraint } from './graph'

const CONSTRAINT_DESCRIPTIONS: Record<Constraint, string> = {
  Time_Subdivision: "Time subdivision of parent annotation's time interval, no time gaps allowed within this interval",
  Symbolic_Subdivision: 'Symbolic subdivision of a parent annotation. Annotations refering to the same parent are ordered',
  Symbolic_Association: '1-1 association with a parent annotation',
  Included_In: 'Time alignable annotations within the parent annotation\'s time interval, gaps are allowed'
}

// elements the schema places after the CONSTRAINT block
const FOLLOWS_CONSTRAINTS = new Set(['CONTROLLED_VOCABULARY', 'LEXICON_REF', 'REF_LINK_SET', 'EXTERNAL_REF'])

function indent(doc: Document, parent: Element, depth: number) {
  parent.appendChild(doc.createTextNode('\n' + '    '.repeat(depth)))
}

function writeAnnotation(doc: Document, a: Annotation): Element {
  const wrapper = doc.createElement('ANNOTATION')
  const el = doc.createElement(a.kind === 'alignable' ? 'ALIGNABLE_ANNOTATION' : 'REF_ANNOTATION')
  el.setAttribute('ANNOTATION_ID', a.id)
  if (a.kind === 'alignable') {
    el.setAttribute('TIME_SLOT_REF1', a.start)
    el.setAttribute('TIME_SLOT_REF2', a.end)
  } else {
    el.setAttribute('ANNOTATION_REF', a.ref)
    if (a.previous) el.setAttribute('PREVIOUS_ANNOTATION', a.previous)
  }
  for (const [name, value] of a.extra) el.setAttribute(name, value)

  const value = doc.createElement('ANNOTATION_VALUE')
  value.appendChild(doc.createTextNode(a.value))
  indent(doc, el, 4)
  el.appendChild(value)
  indent(doc, el, 3)
  indent(doc, wrapper, 3)
  wrapper.appendChild(el)
  indent(doc, wrapper, 2)
  return wrapper
}

/**
 * Writes the graph back over the document it came from: the timeline, tier
 * contents and linguistic type constraints are regenerated, everything else
 * (header, locales, controlled vocabularies, ...) is kept as it was.
 */
export function serializeEaf(g: AnnotationGraph): string {
  const doc = parseXml(g.sourceXml)
  const root = doc.documentElement

  let order = firstChildElement(root, 'TIME_ORDER')
  if (!order) {
    order = doc.createElement('TIME_ORDER')
    root.insertBefore(order, firstChildElement(root, 'TIER') ?? null)
  }
  removeChildren(order)
  for (const id of g.timeOrder) {
    const slot = doc.createElement('TIME_SLOT')
    slot.setAttribute('TIME_SLOT_ID', id)
    const value = g.timeSlots.get(id)?.value
    if (value !== undefined) slot.setAttribute('TIME_VALUE', String(Math.round(value)))
    indent(doc, order, 2)
    order.appendChild(slot)
  }
  indent(doc, order, 1)

  for (const el of childElements(root, 'TIER')) {
    const id = el.getAttribute('TIER_ID')
    const tier = g.tiers.find((t) => t.id === id)
    if (!tier) throw new EafFormatError(`Tier ${id ?? '?'} is missing from the graph`)
    removeChildren(el)
    for (const annotationId of tier.annotationIds) {
      const annotation = g.annotations.get(annotationId)
      if (!annotation) throw new EafFormatError(`Tier ${tier.id} lists unknown annotation ${annotationId}`)
      indent(doc, el, 2)
      el.appendChild(writeAnnotation(doc, annotation))
    }
    if (tier.annotationIds.length > 0) indent(doc, el, 1)
  }

  const used = new Set<Constraint>()
  for (const el of childElements(root, 'LINGUISTIC_TYPE')) {
    const type = g.linguisticTypes.get(el.getAttribute('LINGUISTIC_TYPE_ID') ?? '')
    if (!type) continue
    el.setAttribute('TIME_ALIGNABLE', String(type.timeAlignable))
    if (type.constraint) {
      el.setAttribute('CONSTRAINTS', type.constraint)
      used.add(type.constraint)
    } else {
      el.removeAttribute('CONSTRAINTS')
    }
  }

  const declared = new Set(childElements(root, 'CONSTRAINT').map((el) => el.getAttribute('STEREOTYPE')))
  const anchor =
    childElements(root, 'CONSTRAINT').pop()?.nextSibling ??
    childElements(root).find((el) => FOLLOWS_CONSTRAINTS.has(el.tagName)) ??
    null
  for (const stereotype of used) {
    if (declared.has(stereotype)) continue
    const el = doc.createElement('CONSTRAINT')
    el.setAttribute('DESCRIPTION', CONSTRAINT_DESCRIPTIONS[stereotype])
    el.setAttribute('STEREOTYPE', stereotype)
    root.insertBefore(el, anchor)
    root.insertBefore(doc.createTextNode('\n    '), anchor)
  }

  return serializeXml(doc)
}
