import { PartiturFormatError } from '../errors'

// Keys that belong to the header block rather than to a tier
const HEADER_KEYS = new Set(['LHD', 'REP', 'SNB', 'SAM', 'SBF', 'SSB', 'NCH', 'SPN', 'DBN', 'SRC', 'SPA', 'BEG', 'END', 'LBD'])

export interface PartiturHeader {
  sampleRate: number
  channels: number
  bitDepth: number
  databaseName: string
  sourceName?: string
}

export interface PartiturLine {
  line: number
  fields: string[]
}

export interface PartiturDocument {
  header: Map<string, string>
  tiers: Map<string, PartiturLine[]>
}

export function formatHeader(h: PartiturHeader): string[] {
  const lines = [
    'LHD: Partitur 1.2',
    'REP: unknown',
    `SNB: ${h.bitDepth}`,
    `SAM: ${h.sampleRate}`,
    'SBF: 01',
    `SSB: ${h.bitDepth * 8}`,
    `NCH: ${h.channels}`,
    'SPN: unknown',
    `DBN: ${h.databaseName}`
  ]
  if (h.sourceName) lines.push(`SRC: ${h.sourceName}`)
  lines.push('SPA: SAM-PA', 'LBD:')
  return lines
}

export function parsePartitur(text: string): PartiturDocument {
  const header = new Map<string, string>()
  const tiers = new Map<string, PartiturLine[]>()
  text.split(/\r\n|\n|\r/).forEach((raw, i) => {
    const trimmed = raw.trim()
    if (!trimmed) return
    const m = /^([A-Z0-9]{3}):\s*(.*)$/.exec(trimmed)
    if (!m) throw new PartiturFormatError(`Unrecognized line "${trimmed}"`, i + 1)
    const [, key, rest] = m
    if (HEADER_KEYS.has(key)) {
      header.set(key, rest)
      return
    }
    const entry = { line: i + 1, fields: rest.split(/\s+/).filter(Boolean) }
    const list = tiers.get(key)
    if (list) list.push(entry)
    else tiers.set(key, [entry])
  })
  return { header, tiers }
}

export function headerSampleRate(doc: PartiturDocument): number | undefined {
  const raw = doc.header.get('SAM')
  if (raw === undefined) return undefined
  const rate = Number(raw)
  if (!Number.isFinite(rate) || rate <= 0) throw new PartiturFormatError(`Invalid sample rate "${raw}"`)
  return rate
}
