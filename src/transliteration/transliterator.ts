import { Rule, RuleTable } from '../types'

export interface TransliteratorOptions {
  caseInsensitive?: boolean
  /** Emit unmatched whitespace as a symbol (off: it is dropped silently) */
  passThroughWhitespace?: boolean
}

export interface UnmappedCharacter {
  character: string
  position: number
}

export interface Transliteration {
  phonemes: string[]
  symbols: Set<string>
  unmapped: UnmappedCharacter[]
}

type CompiledRule = { rule: Rule; chars: string[] }

export interface Transliterator {
  (word: string): Transliteration
  readonly table: RuleTable
}

/**
 * Position-anchored rewrite: at each cursor position the first rule in table
 * order whose pattern matches wins; with no match the character passes
 * through as its own symbol. No longest-match search, no backtracking.
 */
export function createTransliterator(table: RuleTable, options: TransliteratorOptions = {}): Transliterator {
  const fold = options.caseInsensitive ? (c: string) => c.toLowerCase() : (c: string) => c
  const compiled: CompiledRule[] = table.rules.map((rule) => ({ rule, chars: Array.from(rule.pattern).map(fold) }))

  const matchesAt = (input: string[], pos: number, pattern: string[]) => {
    if (pos + pattern.length > input.length) return false
    for (let k = 0; k < pattern.length; k++) {
      if (input[pos + k] !== pattern[k]) return false
    }
    return true
  }

  const transliterate = (word: string): Transliteration => {
    const original = Array.from(word)
    const input = original.map(fold)
    const phonemes: string[] = []
    const unmapped: UnmappedCharacter[] = []

    let cursor = 0
    while (cursor < input.length) {
      const hit = compiled.find((c) => matchesAt(input, cursor, c.chars))
      if (!hit && !options.passThroughWhitespace && /\s/.test(input[cursor])) {
        cursor += 1
        continue
      }
      if (!hit) {
        phonemes.push(original[cursor])
        unmapped.push({ character: original[cursor], position: cursor })
        cursor += 1
        continue
      }
      if (hit.rule.kind === 'substitute') phonemes.push(...hit.rule.replacement)
      cursor += hit.chars.length
    }

    return { phonemes, symbols: new Set(phonemes), unmapped }
  }

  return Object.assign(transliterate, { table })
}
