import { DOMParser, XMLSerializer } from '@xmldom/xmldom'
import { EafFormatError } from '../errors'

export function parseXml(source: string): Document {
  const problems: string[] = []
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => problems.push(msg),
      fatalError: (msg: string) => problems.push(msg)
    }
  })
  let doc: Document
  try {
    doc = parser.parseFromString(source, 'text/xml')
  } catch (err) {
    throw new EafFormatError(`XML parse error: ${err instanceof Error ? err.message : String(err)}`)
  }
  if (problems.length > 0 || !doc.documentElement) {
    throw new EafFormatError(`XML parse error: ${problems[0] ?? 'no root element'}`)
  }
  return doc
}

export function serializeXml(doc: Document): string {
  let xml = new XMLSerializer().serializeToString(doc)
  if (!xml.startsWith('<?xml')) xml = '<?xml version="1.0" encoding="UTF-8"?>\n' + xml
  return xml
}

export function isElement(node: Node): node is Element {
  return node.nodeType === 1
}

export function childElements(node: Node, tagName?: string): Element[] {
  const out: Element[] = []
  for (let i = 0; i < node.childNodes.length; i++) {
    const child = node.childNodes.item(i)
    if (isElement(child) && (tagName === undefined || child.tagName === tagName)) out.push(child)
  }
  return out
}

export function firstChildElement(node: Node, tagName: string): Element | undefined {
  return childElements(node, tagName)[0]
}

export function removeChildren(node: Node) {
  while (node.firstChild) node.removeChild(node.firstChild)
}
