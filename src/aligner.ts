import { exec as cpExec } from 'node:child_process'
import fs from 'node:fs'
import util from 'node:util'
import { AlignerError, ConfigError } from './errors'
import { debug } from './logger'

const exec = util.promisify(cpExec)

function escapePath(p: string) {
  return `"${p.replace(/"/g, '\\"')}"`
}

export interface AlignerPaths {
  input: string
  output: string
  audio?: string
}

/**
 * Fills `{in}`, `{out}` and `{audio}` in an ALIGNER_CMD template, e.g.
 * `maus-wrapper {in} {audio} {out}`. The command must leave a MAU tier whose
 * third column is the phoneme index of the input (the line number among the
 * KAN symbols, counted from 0), not the word number MAUS itself writes; a
 * wrapper script renumbers MAUS output accordingly.
 */
export function buildAlignerCommand(template: string, paths: AlignerPaths): string {
  if (!template.includes('{in}') || !template.includes('{out}')) {
    throw new ConfigError('ALIGNER_CMD must contain {in} and {out} placeholders')
  }
  if (template.includes('{audio}') && !paths.audio) {
    throw new ConfigError('ALIGNER_CMD expects an audio file ({audio}) but none was given')
  }
  return template.replace(/\{(in|out|audio)\}/g, (_, key: string) => {
    if (key === 'in') return escapePath(paths.input)
    if (key === 'out') return escapePath(paths.output)
    return escapePath(paths.audio ?? '')
  })
}

/** Runs the aligner once; re-running after a failure is left to the operator. */
export async function runAligner(template: string | undefined, paths: AlignerPaths) {
  if (!template) throw new ConfigError('No aligner configured: set ALIGNER_CMD')
  const cmd = buildAlignerCommand(template, paths)
  debug('Running aligner', cmd)
  try {
    await exec(cmd, { maxBuffer: 20 * 1024 * 1024 })
  } catch (err) {
    throw new AlignerError(`Aligner failed: ${err instanceof Error ? err.message : String(err)}`)
  }
  if (!fs.existsSync(paths.output)) {
    throw new AlignerError(`Aligner did not produce ${paths.output}`)
  }
}
