import fs from 'node:fs/promises'
import { MalformedRuleError } from '../errors'
import { debug } from '../logger'
import { Rule, RuleTable } from '../types'

const SUBSTITUTION_ARROW = ' --> '
const DELETION_RE = /^(\S+)\s+--\s*$/

export function parseRuleLine(raw: string, line: number): Rule | undefined {
  const text = raw.replace(/[\r\n]+$/, '')
  if (text.trim() === '' || text.startsWith('#')) return undefined

  const parts = text.split(SUBSTITUTION_ARROW)
  if (parts.length === 2) {
    const pattern = parts[0].trim()
    const replacement = parts[1].trim().split(/\s+/).filter(Boolean)
    if (!pattern) throw new MalformedRuleError(line, text)
    if (replacement.length === 0) return { kind: 'delete', pattern, replacement: [], line }
    return { kind: 'substitute', pattern, replacement, line }
  }

  const deletion = DELETION_RE.exec(text)
  if (deletion) return { kind: 'delete', pattern: deletion[1], replacement: [], line }

  throw new MalformedRuleError(line, text)
}

/** Rules keep their file order; the transliterator relies on it. */
export function parseRuleTable(text: string): RuleTable {
  const rules: Rule[] = []
  const lines = text.split('\n')
  lines.forEach((raw, i) => {
    const rule = parseRuleLine(raw, i + 1)
    if (rule) rules.push(rule)
  })
  debug(`${rules.length} transliteration rules read`)
  return { rules }
}

export async function loadRuleTable(filePath: string, encoding: BufferEncoding = 'utf8'): Promise<RuleTable> {
  const text = await fs.readFile(filePath, encoding)
  return parseRuleTable(text.replace(/^\uFEFF/, ''))
}

export type LintFinding =
  | { kind: 'duplicate'; rule: Rule; first: Rule }
  | { kind: 'shadowed'; rule: Rule; by: Rule }

/**
 * Flags rules that can never fire: a later rule whose pattern starts with an
 * earlier rule's pattern is always pre-empted at that position.
 */
export function lintRuleTable(table: RuleTable, caseInsensitive = false): LintFinding[] {
  const norm = (s: string) => (caseInsensitive ? s.toLowerCase() : s)
  const findings: LintFinding[] = []
  table.rules.forEach((rule, i) => {
    for (const earlier of table.rules.slice(0, i)) {
      const a = norm(earlier.pattern)
      const b = norm(rule.pattern)
      if (a === b) {
        findings.push({ kind: 'duplicate', rule, first: earlier })
        break
      }
      if (b.startsWith(a)) {
        findings.push({ kind: 'shadowed', rule, by: earlier })
        break
      }
    }
  })
  return findings
}
