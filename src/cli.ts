#!/usr/bin/env node
import { configFromEnv, ConverterConfig, loadEnv, mergeConfig, parsePositiveInt } from './config'
import { ConversionError } from './errors'
import { error, info, warn } from './logger'
import {
  alignPartitur,
  checkInventoryFile,
  flexibilizeFile,
  importWordTimesFile,
  lintRulesFile,
  partiturToTextGrid,
  partiturToToolbox,
  toolboxToPartitur
} from './pipeline'

const USAGE = [
  'Usage: toolbox-maus-elan <command> [args]',
  'Commands:',
  '  toolbox2partitur <toolbox> <out.par> <rules> [--start-marker m --end-marker m] [--case-insensitive] [--audio file.wav] [--inventory file]',
  '                   [--start n | --start-id id] [--end n | --end-id id]',
  '  align <in.par> <out.par> [--audio file.wav]',
  '  partitur2toolbox <aligned.par> <original.par> <out.txt> [--toolbox file] [--word-times] [--keep-utterance-times] [--fill-failed-words]',
  '  partitur2textgrid <aligned.par> <original.par> <out.TextGrid>',
  '  check-inventory <file.par> <inventory>',
  '  lint-rules <rules> [--case-insensitive]',
  '  flexibilize <in.eaf> <out.eaf>',
  '  import-word-times <in.eaf> <toolbox> <out.eaf> [--strict]',
  'Options for every command:',
  '  -r <marker> -t <marker> --utterance-start-tier <m> --utterance-end-tier <m>',
  '  --word-start-tier <m> --word-end-tier <m> --toolbox-type <type> --sample-rate <Hz>'
]

const BOOLEAN_FLAGS = new Set(['case-insensitive', 'word-times', 'keep-utterance-times', 'fill-failed-words', 'strict'])
const SHORT_FLAGS: Record<string, string> = { t: 'text-marker', r: 'ref-marker' }

export interface ParsedArgs {
  positional: string[]
  flags: Map<string, string | true>
}

export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = []
  const flags = new Map<string, string | true>()
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    const long = /^--([\w-]+)$/.exec(arg)?.[1]
    const short = /^-(\w)$/.exec(arg)?.[1]
    const name = long ?? (short ? SHORT_FLAGS[short] : undefined)
    if (!name) {
      if (short) throw new Error(`Unknown option ${arg}`)
      positional.push(arg)
      continue
    }
    if (BOOLEAN_FLAGS.has(name)) {
      flags.set(name, true)
      continue
    }
    const value = argv[i + 1]
    if (value === undefined) throw new Error(`Option ${arg} needs a value`)
    flags.set(name, value)
    i++
  }
  return { positional, flags }
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name)
  return typeof value === 'string' ? value : undefined
}

/** Settings given on the command line; they override the environment. */
export function configFromFlags(args: ParsedArgs): Partial<ConverterConfig> {
  return {
    referenceMarker: stringFlag(args, 'ref-marker'),
    textMarker: stringFlag(args, 'text-marker'),
    utteranceStartMarker: stringFlag(args, 'utterance-start-tier'),
    utteranceEndMarker: stringFlag(args, 'utterance-end-tier'),
    wordStartMarker: stringFlag(args, 'word-start-tier'),
    wordEndMarker: stringFlag(args, 'word-end-tier'),
    toolboxType: stringFlag(args, 'toolbox-type'),
    sampleRate: parsePositiveInt('--sample-rate', stringFlag(args, 'sample-rate'))
  }
}

function need(args: ParsedArgs, count: number, usage: string): string[] {
  if (args.positional.length < count) throw new Error(`Usage: ${usage}`)
  return args.positional.slice(0, count)
}

async function cmdToolboxToPartitur(args: ParsedArgs, cfg: ConverterConfig) {
  const [toolbox, output, rules] = need(args, 3, 'toolbox2partitur <toolbox> <out.par> <rules>')
  const { report, phonemes, illegal } = await toolboxToPartitur(
    {
      toolbox,
      output,
      rules,
      caseInsensitive: args.flags.has('case-insensitive'),
      startMarker: stringFlag(args, 'start-marker'),
      endMarker: stringFlag(args, 'end-marker'),
      audio: stringFlag(args, 'audio'),
      inventory: stringFlag(args, 'inventory'),
      range: {
        startRecord: parsePositiveInt('--start', stringFlag(args, 'start')),
        endRecord: parsePositiveInt('--end', stringFlag(args, 'end')),
        startId: stringFlag(args, 'start-id'),
        endId: stringFlag(args, 'end-id')
      }
    },
    cfg
  )
  info(`${phonemes} phonemes written to ${output}`)
  report.log('toolbox2partitur')
  if (illegal) logIllegal(illegal)
}

async function cmdAlign(args: ParsedArgs, cfg: ConverterConfig) {
  const [input, output] = need(args, 2, 'align <in.par> <out.par>')
  await alignPartitur(input, output, cfg, stringFlag(args, 'audio'))
}

async function cmdPartiturToToolbox(args: ParsedArgs, cfg: ConverterConfig) {
  const [aligned, original, output] = need(args, 3, 'partitur2toolbox <aligned.par> <original.par> <out.txt>')
  const report = await partiturToToolbox(
    {
      aligned,
      original,
      output,
      toolbox: stringFlag(args, 'toolbox'),
      wordTimes: args.flags.has('word-times'),
      keepUtteranceTimes: args.flags.has('keep-utterance-times'),
      fillFailedWords: args.flags.has('fill-failed-words')
    },
    cfg
  )
  report.log('partitur2toolbox')
}

async function cmdPartiturToTextGrid(args: ParsedArgs, cfg: ConverterConfig) {
  const [aligned, original, output] = need(args, 3, 'partitur2textgrid <aligned.par> <original.par> <out.TextGrid>')
  const report = await partiturToTextGrid(aligned, original, output, cfg)
  report.log('partitur2textgrid')
}

function logIllegal(illegal: Map<string, number[]>) {
  if (illegal.size === 0) {
    info('No illegal phonemes found')
    return
  }
  for (const symbol of [...illegal.keys()].sort()) {
    warn(`Illegal phoneme ${JSON.stringify(symbol)} occurring in lines: ${illegal.get(symbol)?.join(' ') ?? ''}`)
  }
}

async function cmdCheckInventory(args: ParsedArgs, cfg: ConverterConfig) {
  const [partitur, inventory] = need(args, 2, 'check-inventory <file.par> <inventory>')
  const illegal = await checkInventoryFile(partitur, inventory, cfg)
  logIllegal(illegal)
  return illegal.size === 0
}

async function cmdLintRules(args: ParsedArgs, cfg: ConverterConfig) {
  const [rules] = need(args, 1, 'lint-rules <rules>')
  const findings = await lintRulesFile(rules, cfg, args.flags.has('case-insensitive'))
  if (findings.length === 0) info('No shadowed or duplicate rules')
  for (const f of findings) {
    if (f.kind === 'duplicate') warn(`line ${f.rule.line}: duplicate of line ${f.first.line} ("${f.rule.pattern}")`)
    else warn(`line ${f.rule.line}: "${f.rule.pattern}" never fires, line ${f.by.line} ("${f.by.pattern}") matches first`)
  }
  return findings.length === 0
}

async function cmdFlexibilize(args: ParsedArgs, cfg: ConverterConfig) {
  const [input, output] = need(args, 2, 'flexibilize <in.eaf> <out.eaf>')
  await flexibilizeFile(input, output, cfg)
  info(`Flexibilized file written to ${output}`)
}

async function cmdImportWordTimes(args: ParsedArgs, cfg: ConverterConfig) {
  const [eaf, toolbox, output] = need(args, 3, 'import-word-times <in.eaf> <toolbox> <out.eaf>')
  const { report, written } = await importWordTimesFile({ eaf, toolbox, output, strict: args.flags.has('strict') }, cfg)
  report.log('import-word-times')
  if (!written) error(`Time order conflicts found; ${output} was not written (--strict)`)
  return written
}

/** Returns the process exit code. */
export async function main(argv: string[]): Promise<number> {
  const cmd = argv[0]
  try {
    const args = parseArgs(argv.slice(1))
    loadEnv()
    const cfg = mergeConfig(configFromEnv(), configFromFlags(args))
    let ok = true
    if (cmd === 'toolbox2partitur') await cmdToolboxToPartitur(args, cfg)
    else if (cmd === 'align') await cmdAlign(args, cfg)
    else if (cmd === 'partitur2toolbox') await cmdPartiturToToolbox(args, cfg)
    else if (cmd === 'partitur2textgrid') await cmdPartiturToTextGrid(args, cfg)
    else if (cmd === 'check-inventory') ok = await cmdCheckInventory(args, cfg)
    else if (cmd === 'lint-rules') ok = await cmdLintRules(args, cfg)
    else if (cmd === 'flexibilize') await cmdFlexibilize(args, cfg)
    else if (cmd === 'import-word-times') ok = await cmdImportWordTimes(args, cfg)
    else {
      for (const line of USAGE) console.log(line)
      return 1
    }
    return ok ? 0 : 1
  } catch (err) {
    if (err instanceof ConversionError) error(`${err.name}: ${err.message}`)
    else error('Error:', err instanceof Error ? err.message : String(err))
    return 1
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then((code) => {
    process.exitCode = code
  })
}
