import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'
import { ConfigError } from './errors'

export interface ConverterConfig {
  sampleRate: number
  channels: number
  bitDepth: number // bytes per sample
  encoding: BufferEncoding
  referenceMarker: string
  textMarker: string
  utteranceStartMarker: string
  utteranceEndMarker: string
  wordStartMarker: string
  wordEndMarker: string
  toolboxType: string
  alignerCommand?: string
}

export const defaultConfig: ConverterConfig = {
  sampleRate: 16000,
  channels: 1,
  bitDepth: 2,
  encoding: 'utf8',
  referenceMarker: 'ref',
  textMarker: 't',
  utteranceStartMarker: 'ELANBegin',
  utteranceEndMarker: 'ELANEnd',
  wordStartMarker: 'WordBegin',
  wordEndMarker: 'WordEnd',
  toolboxType: 'Text'
}

let envLoaded = false

/** Loads `.env`, `.env.local`, `.env.<NODE_ENV>` ... from the project root once. */
export function loadEnv() {
  if (envLoaded) return
  dotenv.config({ path: appRootPath.path, silent: true })
  envLoaded = true
}

export function parsePositiveInt(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') return undefined
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) throw new ConfigError(`${name} must be a positive integer, got "${raw}"`)
  return value
}

function intFromEnv(name: string, env: NodeJS.ProcessEnv): number | undefined {
  return parsePositiveInt(name, env[name])
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ConverterConfig> {
  const partial: Partial<ConverterConfig> = {}
  const sampleRate = intFromEnv('ALIGN_SAMPLE_RATE', env)
  const channels = intFromEnv('ALIGN_CHANNELS', env)
  const bitDepth = intFromEnv('ALIGN_BIT_DEPTH', env)
  if (sampleRate !== undefined) partial.sampleRate = sampleRate
  if (channels !== undefined) partial.channels = channels
  if (bitDepth !== undefined) partial.bitDepth = bitDepth
  if (env.ALIGN_ENCODING) {
    if (!Buffer.isEncoding(env.ALIGN_ENCODING)) throw new ConfigError(`Unknown encoding ${env.ALIGN_ENCODING}`)
    partial.encoding = env.ALIGN_ENCODING
  }
  if (env.ALIGNER_CMD) partial.alignerCommand = env.ALIGNER_CMD
  return partial
}

const TIER_NAME_RE = /^\w+$/

export function mergeConfig(...partials: Array<Partial<ConverterConfig> | undefined>): ConverterConfig {
  const cfg: ConverterConfig = { ...defaultConfig }
  for (const partial of partials) {
    if (!partial) continue
    for (const [key, value] of Object.entries(partial)) {
      if (value !== undefined) Object.assign(cfg, { [key]: value })
    }
  }

  const markers = [
    cfg.referenceMarker,
    cfg.textMarker,
    cfg.utteranceStartMarker,
    cfg.utteranceEndMarker,
    cfg.wordStartMarker,
    cfg.wordEndMarker
  ]
  for (const marker of markers) {
    if (!TIER_NAME_RE.test(marker)) {
      throw new ConfigError(
        `"${marker}" is not a valid tier name: only ASCII letters, digits and the underscore are allowed`
      )
    }
  }
  if (!TIER_NAME_RE.test(cfg.toolboxType)) throw new ConfigError(`"${cfg.toolboxType}" is not a valid Toolbox database type`)
  if (cfg.channels !== 1 && cfg.channels !== 2) throw new ConfigError('channels must be 1 or 2')
  return cfg
}
