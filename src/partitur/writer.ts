import { ToolboxFormatError } from '../errors'
import { info } from '../logger'
import { Report } from '../report'
import { Transliterator } from '../transliteration/transliterator'
import { PhonemeSlot, RecordModel, Word } from '../types'
import { formatHeader, PartiturHeader } from './format'

/** Placeholder BAS uses for a word without any phonemic content */
export const EMPTY_WORD_SYMBOL = '<nib>'

/**
 * Hands out strictly increasing phoneme indices. One counter per output
 * file; passing it in keeps the writer free of module-level state.
 */
export class IndexCounter {
  private current: number

  constructor(start = 0) {
    this.current = start
  }

  next(): number {
    return this.current++
  }

  peek(): number {
    return this.current
  }
}

export interface PartiturOutput {
  text: string
  slots: PhonemeSlot[]
  words: Word[] // transliterated copies of the input words
  inventory: Set<string>
  report: Report
}

export function writePartitur(
  model: RecordModel,
  transliterate: Transliterator,
  header: PartiturHeader,
  counter = new IndexCounter()
): PartiturOutput {
  const report = new Report()
  const slots: PhonemeSlot[] = []
  const words: Word[] = []
  const inventory = new Set<string>()

  const ort: string[] = []
  const kan: string[] = []
  const rid: string[] = []
  const trn: string[] = []
  const pho: string[] = []
  let lastEnd = 0

  for (const record of model.records) {
    for (const word of record.words) {
      const result = transliterate(word.form)
      for (const u of result.unmapped) {
        report.add({ kind: 'UnmappableCharacter', word: word.form, character: u.character, position: u.position, recordId: record.id })
      }
      let phonemes = result.phonemes
      if (phonemes.length === 0) {
        report.add({ kind: 'EmptyTransliteration', word: word.form, recordId: record.id })
        phonemes = [EMPTY_WORD_SYMBOL]
      }
      words.push({ ...word, phonemes })
      for (const p of phonemes) inventory.add(p)

      ort.push(`ORT: ${word.index} ${word.form}`)
      kan.push(`KAN: ${word.index} ${phonemes.join(' ')}`)
      phonemes.forEach((symbol, phonemeOrdinal) => {
        const index = counter.next()
        slots.push({ index, recordId: record.id, wordOrdinal: word.ordinal, wordIndex: word.index, phonemeOrdinal, symbol })
        pho.push(`PHO: ${index} ${word.index} ${symbol}`)
      })
    }

    const wordIds = record.words.map((w) => w.index).join(',')
    rid.push(`RID: ${wordIds} ${record.id}`)

    if (record.constraint) {
      const { start, end } = record.constraint
      if (start >= end) throw new ToolboxFormatError(`Start time of record ${record.id} is not before its end time`)
      if (start < lastEnd) report.add({ kind: 'OverlappingConstraint', recordId: record.id, start, previousEnd: lastEnd })
      lastEnd = end
      trn.push(`TRN: ${start} ${end - start} ${wordIds} ${record.id}`)
    }
  }

  const blocks = [formatHeader(header), ort, kan, rid]
  if (trn.length > 0) blocks.push(trn)
  blocks.push(pho)
  const text = blocks.map((b) => b.join('\n')).join('\n\n') + '\n'

  info(`Wrote ${words.length} words and ${slots.length} phonemes for ${model.records.length} records`)
  return { text, slots, words, inventory, report }
}
