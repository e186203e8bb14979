import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { mergeConfig } from '../src/config'
import { ConfigError } from '../src/errors'
import { readPartiturSource } from '../src/partitur/reader'
import {
  flexibilizeFile,
  importWordTimesFile,
  partiturToTextGrid,
  partiturToToolbox,
  toolboxToPartitur
} from '../src/pipeline'
import { fakeAlignment, SAMPLE_EAF, SAMPLE_RULES, SAMPLE_TOOLBOX } from './fixtures'

const cfg = mergeConfig()

describe('Toolbox -> Partitur -> Toolbox -> ELAN', () => {
  let dir: string
  const file = (name: string) => path.join(dir, name)

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'toolbox-maus-elan-'))
    await fs.writeFile(file('session.txt'), SAMPLE_TOOLBOX, 'utf8')
    await fs.writeFile(file('rules.txt'), SAMPLE_RULES, 'utf8')
    await fs.writeFile(file('session.eaf'), SAMPLE_EAF, 'utf8')
    await fs.writeFile(file('inventory.txt'), 'k\na\ns\n', 'utf8')
  })

  afterAll(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true })
  })

  it('writes a Partitur file for the aligner', async () => {
    const { report, phonemes, illegal } = await toolboxToPartitur(
      {
        toolbox: file('session.txt'),
        output: file('session.par'),
        rules: file('rules.txt'),
        caseInsensitive: true,
        startMarker: 'ELANBegin',
        endMarker: 'ELANEnd',
        audio: file('session.wav'),
        inventory: file('inventory.txt')
      },
      cfg
    )
    expect(phonemes).toBe(10)
    expect(report.size).toBe(0)
    expect(illegal && [...illegal.keys()]).toEqual(['l'])

    const par = await fs.readFile(file('session.par'), 'utf8')
    expect(par).toContain('DBN: session\n')
    expect(par).toContain('SRC: session.wav\n')
    expect(par).toContain('KAN: 0 k a s a\n')
  })

  it('writes word and utterance times back into the Toolbox file', async () => {
    const { slots } = readPartiturSource(await fs.readFile(file('session.par'), 'utf8'))
    await fs.writeFile(file('aligned.par'), fakeAlignment(slots, { durations: slots.map(() => 1600) }), 'utf8')

    const report = await partiturToToolbox(
      {
        aligned: file('aligned.par'),
        original: file('session.par'),
        output: file('timed.txt'),
        toolbox: file('session.txt'),
        wordTimes: true
      },
      cfg
    )
    expect(report.size).toBe(0)
    expect(await fs.readFile(file('timed.txt'), 'utf8')).toBe(
      [
        '\\_sh v3.0  400  Text',
        '',
        '\\ref 1',
        '\\ELANBegin 0.000',
        '\\ELANEnd 0.400',
        '\\WordBegin 0.000',
        '\\WordEnd 0.400',
        '\\t Casa.',
        '',
        '\\ref 2',
        '\\ELANBegin 0.400',
        '\\ELANEnd 1.000',
        '\\WordBegin 0.400 0.600',
        '\\WordEnd 0.600 1.000',
        '\\t la casa',
        ''
      ].join('\n')
    )
  })

  it('exports a TextGrid', async () => {
    await partiturToTextGrid(file('aligned.par'), file('session.par'), file('session.TextGrid'), cfg)
    const lines = (await fs.readFile(file('session.TextGrid'), 'utf8')).split('\n')
    expect(lines[0]).toBe('File type = "ooTextFile"')
    expect(lines[4]).toBe('xmax = 1')
  })

  it('flexibilizes the ELAN file and imports the word times', async () => {
    expect(await flexibilizeFile(file('session.eaf'), file('flex.eaf'), cfg)).toEqual(['t', 'g'])

    const { report, written } = await importWordTimesFile(
      { eaf: file('flex.eaf'), toolbox: file('timed.txt'), output: file('timed.eaf') },
      cfg
    )
    expect(written).toBe(true)
    // the second utterance starts at 0.600 in ELAN but its first word at 0.400
    expect(report.ofKind('TimeOrderConflict')).toEqual([
      {
        kind: 'TimeOrderConflict',
        recordId: '2',
        parentAnnotationId: 'a2',
        earlierSlot: 'ts3',
        earlierTime: 600,
        laterSlot: 'ts7',
        laterTime: 400
      }
    ])
    const xml = await fs.readFile(file('timed.eaf'), 'utf8')
    expect(xml).toContain('<TIME_SLOT TIME_SLOT_ID="ts6" TIME_VALUE="400"/>')
  })

  it('writes nothing in strict mode when times conflict', async () => {
    const { written } = await importWordTimesFile(
      { eaf: file('flex.eaf'), toolbox: file('timed.txt'), output: file('strict.eaf'), strict: true },
      cfg
    )
    expect(written).toBe(false)
    await expect(fs.access(file('strict.eaf'))).rejects.toThrow()
  })

  it('refuses to overwrite its input', async () => {
    await expect(flexibilizeFile(file('flex.eaf'), file('flex.eaf'), cfg)).rejects.toBeInstanceOf(ConfigError)
  })
})
