import { EafFormatError } from '../errors'
import { childElements, firstChildElement, parseXml } from '../utils/xml'
import { Annotation, AnnotationGraph, isConstraint, LinguisticType, Tier, TimeSlot } from './graph'

const MODELLED_ATTRIBUTES = new Set([
  'ANNOTATION_ID',
  'TIME_SLOT_REF1',
  'TIME_SLOT_REF2',
  'ANNOTATION_REF',
  'PREVIOUS_ANNOTATION'
])

function required(el: Element, name: string): string {
  const value = el.getAttribute(name)
  if (!value) throw new EafFormatError(`<${el.tagName}> without ${name}`)
  return value
}

function extraAttributes(el: Element): Array<[string, string]> {
  const extra: Array<[string, string]> = []
  for (let i = 0; i < el.attributes.length; i++) {
    const attr = el.attributes.item(i)
    if (attr && !MODELLED_ATTRIBUTES.has(attr.name)) extra.push([attr.name, attr.value])
  }
  return extra
}

function readAnnotation(wrapper: Element, tierId: string): Annotation {
  const [el] = childElements(wrapper)
  if (!el) throw new EafFormatError(`Empty <ANNOTATION> on tier ${tierId}`)
  const id = required(el, 'ANNOTATION_ID')
  const value = firstChildElement(el, 'ANNOTATION_VALUE')?.textContent ?? ''
  const extra = extraAttributes(el)

  if (el.tagName === 'ALIGNABLE_ANNOTATION') {
    return {
      kind: 'alignable',
      id,
      tierId,
      value,
      extra,
      start: required(el, 'TIME_SLOT_REF1'),
      end: required(el, 'TIME_SLOT_REF2')
    }
  }
  if (el.tagName === 'REF_ANNOTATION') {
    const previous = el.getAttribute('PREVIOUS_ANNOTATION')
    return {
      kind: 'reference',
      id,
      tierId,
      value,
      extra,
      ref: required(el, 'ANNOTATION_REF'),
      ...(previous ? { previous } : {})
    }
  }
  throw new EafFormatError(`Unexpected <${el.tagName}> on tier ${tierId}`)
}

/** Reads an .eaf document into the arena graph. Unknown elements stay in `sourceXml`. */
export function parseEaf(xml: string): AnnotationGraph {
  const doc = parseXml(xml)
  const root = doc.documentElement
  if (root.tagName !== 'ANNOTATION_DOCUMENT') throw new EafFormatError(`Not an ELAN file: root element is <${root.tagName}>`)

  const timeOrder: string[] = []
  const timeSlots = new Map<string, TimeSlot>()
  const order = firstChildElement(root, 'TIME_ORDER')
  for (const el of order ? childElements(order, 'TIME_SLOT') : []) {
    const id = required(el, 'TIME_SLOT_ID')
    const raw = el.getAttribute('TIME_VALUE')
    const slot: TimeSlot = { id }
    if (raw) {
      const value = Number(raw)
      if (!Number.isInteger(value)) throw new EafFormatError(`Time slot ${id} has a non-integer value "${raw}"`)
      slot.value = value
    }
    if (timeSlots.has(id)) throw new EafFormatError(`Duplicate time slot ${id}`)
    timeSlots.set(id, slot)
    timeOrder.push(id)
  }

  const annotations = new Map<string, Annotation>()
  const tiers: Tier[] = childElements(root, 'TIER').map((el) => {
    const id = required(el, 'TIER_ID')
    const parent = el.getAttribute('PARENT_REF')
    const tier: Tier = { id, linguisticType: required(el, 'LINGUISTIC_TYPE_REF'), annotationIds: [] }
    if (parent) tier.parent = parent
    for (const wrapper of childElements(el, 'ANNOTATION')) {
      const annotation = readAnnotation(wrapper, id)
      if (annotations.has(annotation.id)) throw new EafFormatError(`Duplicate annotation ${annotation.id}`)
      if (annotation.kind === 'alignable' && !(timeSlots.has(annotation.start) && timeSlots.has(annotation.end))) {
        throw new EafFormatError(`Annotation ${annotation.id} refers to an unknown time slot`)
      }
      annotations.set(annotation.id, annotation)
      tier.annotationIds.push(annotation.id)
    }
    return tier
  })

  const linguisticTypes = new Map<string, LinguisticType>()
  for (const el of childElements(root, 'LINGUISTIC_TYPE')) {
    const id = required(el, 'LINGUISTIC_TYPE_ID')
    const constraint = el.getAttribute('CONSTRAINTS')
    const type: LinguisticType = { id, timeAlignable: el.getAttribute('TIME_ALIGNABLE') === 'true' }
    if (constraint) {
      if (!isConstraint(constraint)) throw new EafFormatError(`Linguistic type ${id} has unknown constraint ${constraint}`)
      type.constraint = constraint
    }
    linguisticTypes.set(id, type)
  }

  for (const tier of tiers) {
    if (!linguisticTypes.has(tier.linguisticType)) {
      throw new EafFormatError(`Tier ${tier.id} uses undeclared linguistic type ${tier.linguisticType}`)
    }
    if (tier.parent && !tiers.some((t) => t.id === tier.parent)) {
      throw new EafFormatError(`Tier ${tier.id} has unknown parent tier ${tier.parent}`)
    }
  }

  return { timeOrder, timeSlots, annotations, tiers, linguisticTypes, sourceXml: xml }
}
