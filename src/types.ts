// Shared data model for the Toolbox -> BAS Partitur -> ELAN round trip

export type RuleKind = 'substitute' | 'delete'

export interface Rule {
  kind: RuleKind
  pattern: string
  replacement: string[] // empty for deletions
  line: number // 1-based position in the table file
}

export interface RuleTable {
  rules: Rule[]
}

/** Absolute sample offsets from the start of the recording */
export interface SampleSpan {
  start: number
  end: number
}

export interface Word {
  recordId: string
  ordinal: number // position within the record's word tier
  index: number // running word number across the whole file (ORT/KAN/RID key)
  form: string
  phonemes: string[]
}

export interface ToolboxRecord {
  id: string
  words: Word[]
  tiers: Map<string, string[]>
  constraint?: SampleSpan
}

export interface RecordModel {
  records: ToolboxRecord[]
}

export interface PhonemeSlot {
  index: number
  recordId: string
  wordOrdinal: number
  wordIndex: number
  phonemeOrdinal: number
  symbol: string
}

export interface PhoneSegment {
  index: number
  start: number // samples
  duration: number // samples
  symbol: string
  failed: boolean
}

export interface TimedWord {
  recordId: string
  ordinal: number
  index: number
  form: string
  phonemes: string[]
  segments: PhoneSegment[]
  span?: SampleSpan
}

export interface TimedRecord {
  id: string
  words: TimedWord[]
  span?: SampleSpan
}
