import fsp from 'fs/promises'
import path from 'path'
import { runAligner } from './aligner'
import { reconstructTimes, Reconstruction } from './alignment/reconstruct'
import { ConverterConfig } from './config'
import { parseEaf } from './elan/eafParser'
import { serializeEaf } from './elan/eafWriter'
import { flexibilize } from './elan/flexibilize'
import { importWordTimes } from './elan/importTimes'
import { ConfigError } from './errors'
import { exportTextGrid } from './exporters/textGridExporter'
import { atomicWrite } from './interfaces/atomicWrite'
import { info } from './logger'
import { checkInventory, loadInventory } from './partitur/inventory'
import { readPartiturSource, readPhoneSegments } from './partitur/reader'
import { writePartitur } from './partitur/writer'
import { Report } from './report'
import { readToolbox, readWordTimes, RecordRange } from './toolbox/reader'
import { annotateToolbox, createToolbox, ToolboxTimeOptions } from './toolbox/writer'
import { LintFinding, loadRuleTable, lintRuleTable } from './transliteration/ruleTable'
import { createTransliterator } from './transliteration/transliterator'

async function readText(file: string, encoding: BufferEncoding) {
  const text = await fsp.readFile(file, encoding)
  return text.replace(/^\uFEFF/, '')
}

function distinctPaths(input: string, output: string) {
  if (path.resolve(input) === path.resolve(output)) {
    throw new ConfigError('Input and output file name are the same; refusing to overwrite the input file')
  }
}

export interface ToolboxToPartiturArgs {
  toolbox: string
  output: string
  rules: string
  caseInsensitive?: boolean
  /** Record time tiers that constrain the alignment */
  startMarker?: string
  endMarker?: string
  /** Recording the transcript belongs to; its name goes into the SRC header */
  audio?: string
  inventory?: string
  range?: RecordRange
}

export interface ToolboxToPartiturResult {
  report: Report
  phonemes: number
  illegal?: Map<string, number[]>
}

export async function toolboxToPartitur(args: ToolboxToPartiturArgs, cfg: ConverterConfig): Promise<ToolboxToPartiturResult> {
  distinctPaths(args.toolbox, args.output)
  const table = await loadRuleTable(args.rules, cfg.encoding)
  const transliterate = createTransliterator(table, { caseInsensitive: args.caseInsensitive })
  const model = readToolbox(await readText(args.toolbox, cfg.encoding), {
    referenceMarker: cfg.referenceMarker,
    textMarker: cfg.textMarker,
    sampleRate: cfg.sampleRate,
    startTimeMarker: args.startMarker,
    endTimeMarker: args.endMarker,
    range: args.range
  })
  const out = writePartitur(model, transliterate, {
    sampleRate: cfg.sampleRate,
    channels: cfg.channels,
    bitDepth: cfg.bitDepth,
    databaseName: path.basename(args.toolbox, path.extname(args.toolbox)),
    sourceName: args.audio ? path.basename(args.audio) : undefined
  })
  await atomicWrite(args.output, out.text, cfg.encoding)
  info(`Wrote ${out.slots.length} phonemes for ${model.records.length} records to ${args.output}`)

  const result: ToolboxToPartiturResult = { report: out.report, phonemes: out.slots.length }
  if (args.inventory) result.illegal = checkInventory(out.text, await loadInventory(args.inventory, cfg.encoding))
  return result
}

export async function alignPartitur(input: string, output: string, cfg: ConverterConfig, audio?: string) {
  distinctPaths(input, output)
  await runAligner(cfg.alignerCommand, { input, output, audio })
  info(`Aligner wrote ${output}`)
}

async function reconstruct(aligned: string, original: string, cfg: ConverterConfig, keepUtteranceTimes = false) {
  const source = readPartiturSource(await readText(original, cfg.encoding))
  const segments = readPhoneSegments(await readText(aligned, cfg.encoding), source.slots)
  const sampleRate = source.sampleRate ?? cfg.sampleRate
  const result: Reconstruction = reconstructTimes(source.model, source.slots, segments, { keepUtteranceTimes })
  return { ...result, sampleRate }
}

export interface PartiturToToolboxArgs {
  aligned: string
  original: string
  output: string
  /** Toolbox file to annotate; without it a new file is created */
  toolbox?: string
  wordTimes?: boolean
  keepUtteranceTimes?: boolean
  fillFailedWords?: boolean
}

export function toolboxTimeOptions(cfg: ConverterConfig, sampleRate: number): ToolboxTimeOptions {
  return {
    sampleRate,
    referenceMarker: cfg.referenceMarker,
    textMarker: cfg.textMarker,
    utteranceStartMarker: cfg.utteranceStartMarker,
    utteranceEndMarker: cfg.utteranceEndMarker,
    wordStartMarker: cfg.wordStartMarker,
    wordEndMarker: cfg.wordEndMarker,
    toolboxType: cfg.toolboxType
  }
}

export async function partiturToToolbox(args: PartiturToToolboxArgs, cfg: ConverterConfig): Promise<Report> {
  const { records, report, sampleRate } = await reconstruct(args.aligned, args.original, cfg, args.keepUtteranceTimes)
  const opts: ToolboxTimeOptions = {
    ...toolboxTimeOptions(cfg, sampleRate),
    outputWordTimes: args.wordTimes,
    keepUtteranceTimes: args.keepUtteranceTimes,
    fillFailedWords: args.fillFailedWords
  }
  if (args.toolbox) {
    distinctPaths(args.toolbox, args.output)
    const out = annotateToolbox(await readText(args.toolbox, cfg.encoding), records, opts)
    report.merge(out.report)
    await atomicWrite(args.output, out.text, cfg.encoding)
  } else {
    await atomicWrite(args.output, createToolbox(records, opts), cfg.encoding)
  }
  info(`Wrote times for ${records.length} records to ${args.output}`)
  return report
}

export async function partiturToTextGrid(aligned: string, original: string, output: string, cfg: ConverterConfig) {
  const { records, report, sampleRate } = await reconstruct(aligned, original, cfg)
  await atomicWrite(output, exportTextGrid(records, sampleRate), cfg.encoding)
  info(`Wrote TextGrid to ${output}`)
  return report
}

export async function checkInventoryFile(partitur: string, inventory: string, cfg: ConverterConfig) {
  return checkInventory(await readText(partitur, cfg.encoding), await loadInventory(inventory, cfg.encoding))
}

export async function lintRulesFile(rules: string, cfg: ConverterConfig, caseInsensitive = false): Promise<LintFinding[]> {
  return lintRuleTable(await loadRuleTable(rules, cfg.encoding), caseInsensitive)
}

export async function flexibilizeFile(input: string, output: string, cfg: ConverterConfig) {
  distinctPaths(input, output)
  const { graph, tiers } = flexibilize(parseEaf(await readText(input, 'utf8')))
  if (tiers.length === 0) info('No tiers need to be flexibilized')
  else info(`Flexibilized tiers: ${tiers.join(' ')}`)
  await atomicWrite(output, serializeEaf(graph), 'utf8')
  return tiers
}

export interface ImportWordTimesArgs {
  eaf: string
  toolbox: string
  output: string
  /** Do not write anything when a record's times conflict */
  strict?: boolean
}

export async function importWordTimesFile(args: ImportWordTimesArgs, cfg: ConverterConfig) {
  distinctPaths(args.eaf, args.output)
  const times = readWordTimes(await readText(args.toolbox, cfg.encoding), cfg)
  const { graph, report, applied } = importWordTimes(parseEaf(await readText(args.eaf, 'utf8')), times, {
    wordType: cfg.textMarker
  })
  const conflicts = report.ofKind('TimeOrderConflict').length
  if (args.strict && conflicts > 0) return { report, written: false }
  await atomicWrite(args.output, serializeEaf(graph), 'utf8')
  info(`Set word times for ${applied} utterances in ${args.output}`)
  return { report, written: true }
}
