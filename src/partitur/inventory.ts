import { parse } from 'csv-parse/sync'
import fs from 'fs/promises'
import { PartiturFormatError } from '../errors'
import { parsePartitur } from './format'

/** Allowed phoneme symbols, longest first so the greedy scan prefers multi-character symbols. */
export type PhonemeInventory = string[]

function isRowList(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every((row) => Array.isArray(row) && row.every((c) => typeof c === 'string'))
}

/**
 * One symbol per line in the first column. Extra tab-separated columns
 * (descriptions, example words) and `#` comment lines are ignored.
 */
export function parseInventory(text: string): PhonemeInventory {
  const rows: unknown = parse(text.replace(/^\uFEFF/, ''), {
    delimiter: '\t',
    relax_column_count: true,
    quote: false,
    skip_empty_lines: true,
    comment: '#',
    trim: true
  })
  if (!isRowList(rows)) throw new PartiturFormatError('Phoneme inventory could not be read as a table')

  const seen = new Set<string>()
  for (const row of rows) {
    const symbol = row[0]
    if (symbol) seen.add(symbol)
  }
  return [...seen].sort((a, b) => b.length - a.length)
}

export async function loadInventory(file: string, encoding: BufferEncoding = 'utf8'): Promise<PhonemeInventory> {
  return parseInventory(await fs.readFile(file, encoding))
}

function record(results: Map<string, number[]>, symbol: string, line: number) {
  const lines = results.get(symbol)
  if (lines) lines.push(line)
  else results.set(symbol, [line])
}

function scanUnspaced(word: string, inventory: PhonemeInventory, line: number, results: Map<string, number[]>) {
  const chars = Array.from(word)
  let pos = 0
  while (pos < chars.length) {
    const match = inventory.find((symbol) => {
      const len = Array.from(symbol).length
      return pos + len <= chars.length && chars.slice(pos, pos + len).join('') === symbol
    })
    if (match) {
      pos += Array.from(match).length
    } else {
      record(results, chars[pos], line)
      pos += 1
    }
  }
}

/**
 * Returns every KAN symbol missing from the inventory with the lines it
 * occurs on. Space-separated KAN entries are checked symbol by symbol;
 * unspaced entries are segmented greedily from the left.
 */
export function checkInventory(partiturText: string, inventory: PhonemeInventory): Map<string, number[]> {
  const allowed = new Set(inventory)
  const results = new Map<string, number[]>()
  const doc = parsePartitur(partiturText)
  for (const { line, fields } of doc.tiers.get('KAN') ?? []) {
    if (fields.length < 2) throw new PartiturFormatError('KAN line needs a word number and a transcription', line)
    const symbols = fields.slice(1)
    if (symbols.length > 1) {
      for (const symbol of symbols) if (!allowed.has(symbol)) record(results, symbol, line)
    } else {
      scanUnspaced(symbols[0], inventory, line, results)
    }
  }
  return results
}
