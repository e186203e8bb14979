import { ToolboxFormatError } from '../errors'

const HMS_RE = /^(\d+):(\d+):(\d+(?:\.\d+)?)$/
const SECONDS_RE = /^\d+(?:\.\d+)?$/

/** Accepts `h:mm:ss.sss` or plain seconds (`12.345`). */
export function timecodeToSeconds(code: string): number {
  const trimmed = code.trim()
  const hms = HMS_RE.exec(trimmed)
  if (hms) return Number(hms[1]) * 3600 + Number(hms[2]) * 60 + Number(hms[3])
  if (SECONDS_RE.test(trimmed)) return Number(trimmed)
  throw new ToolboxFormatError(`Could not read time code "${code}"`)
}

export function secondsToSamples(seconds: number, sampleRate: number): number {
  return Math.round(seconds * sampleRate)
}

export function samplesToSeconds(samples: number, sampleRate: number): number {
  return Math.round((samples / sampleRate) * 1000) / 1000
}

export function formatSeconds(seconds: number): string {
  return seconds.toFixed(3)
}
