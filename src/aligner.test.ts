import { describe, expect, it } from 'vitest'
import { buildAlignerCommand } from './aligner'
import { ConfigError } from './errors'

describe('buildAlignerCommand', () => {
  it('substitutes quoted paths', () => {
    const cmd = buildAlignerCommand('maus BPF={in} SIGNAL={audio} OUT={out}', {
      input: 'in.par',
      output: 'my "out".par',
      audio: 'a.wav'
    })
    expect(cmd).toBe('maus BPF="in.par" SIGNAL="a.wav" OUT="my \\"out\\".par"')
  })

  it('requires input and output placeholders', () => {
    expect(() => buildAlignerCommand('maus {in}', { input: 'a', output: 'b' })).toThrow(ConfigError)
  })

  it('requires an audio file when the template asks for one', () => {
    expect(() => buildAlignerCommand('maus {in} {audio} {out}', { input: 'a', output: 'b' })).toThrow(/audio/)
  })
})
