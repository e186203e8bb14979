import { PhonemeSlot } from '../src/types'

export const SAMPLE_TOOLBOX = [
  '\\_sh v3.0  400  Text',
  '',
  '\\ref 1',
  '\\t Casa.',
  '\\ELANBegin 0.000',
  '\\ELANEnd 0.500',
  '',
  '\\ref 2',
  '\\t la casa',
  '\\ELANBegin 0.600',
  '\\ELANEnd 1.200',
  ''
].join('\n')

export const SAMPLE_RULES = ['# test table', 'C --> k', 'a --> a', 's --> s', 'l --> l', '. --'].join('\n')

/**
 * Builds a MAU tier the way the aligner would return it: every phoneme gets
 * `durations[i]` samples (default 100) back to back from `offset`.
 */
export function fakeAlignment(
  slots: PhonemeSlot[],
  opts: { offset?: number; durations?: number[]; failed?: number[]; pauseFirst?: number } = {}
): string {
  const lines = ['LHD: Partitur 1.2', 'SAM: 16000', 'LBD:']
  let t = opts.offset ?? 0
  if (opts.pauseFirst) {
    lines.push(`MAU: ${t} ${opts.pauseFirst} -1 <p:>`)
    t += opts.pauseFirst
  }
  slots.forEach((slot, i) => {
    const d = opts.durations?.[i] ?? 100
    if (opts.failed?.includes(slot.index)) {
      lines.push(`MAU: -1 -1 ${slot.index} ${slot.symbol}`)
      return
    }
    lines.push(`MAU: ${t} ${d} ${slot.index} ${slot.symbol}`)
    t += d
  })
  return lines.join('\n') + '\n'
}

/** Two utterances as ELAN imports them from Toolbox: words hang off the record tier by reference. */
export const SAMPLE_EAF = `<?xml version="1.0" encoding="UTF-8"?>
<ANNOTATION_DOCUMENT AUTHOR="" DATE="2024-01-01T00:00:00+00:00" FORMAT="3.0" VERSION="3.0">
    <HEADER MEDIA_FILE="" TIME_UNITS="milliseconds">
        <MEDIA_DESCRIPTOR MEDIA_URL="file:///tmp/session.wav" MIME_TYPE="audio/x-wav"/>
        <PROPERTY NAME="lastUsedAnnotationId">6</PROPERTY>
    </HEADER>
    <TIME_ORDER>
        <TIME_SLOT TIME_SLOT_ID="ts1" TIME_VALUE="0"/>
        <TIME_SLOT TIME_SLOT_ID="ts2" TIME_VALUE="500"/>
        <TIME_SLOT TIME_SLOT_ID="ts3" TIME_VALUE="600"/>
        <TIME_SLOT TIME_SLOT_ID="ts4" TIME_VALUE="1200"/>
    </TIME_ORDER>
    <TIER LINGUISTIC_TYPE_REF="ref" TIER_ID="ref">
        <ANNOTATION>
            <ALIGNABLE_ANNOTATION ANNOTATION_ID="a1" TIME_SLOT_REF1="ts1" TIME_SLOT_REF2="ts2">
                <ANNOTATION_VALUE>1</ANNOTATION_VALUE>
            </ALIGNABLE_ANNOTATION>
        </ANNOTATION>
        <ANNOTATION>
            <ALIGNABLE_ANNOTATION ANNOTATION_ID="a2" TIME_SLOT_REF1="ts3" TIME_SLOT_REF2="ts4">
                <ANNOTATION_VALUE>2</ANNOTATION_VALUE>
            </ALIGNABLE_ANNOTATION>
        </ANNOTATION>
    </TIER>
    <TIER LINGUISTIC_TYPE_REF="t" PARENT_REF="ref" TIER_ID="t">
        <ANNOTATION>
            <REF_ANNOTATION ANNOTATION_ID="a3" ANNOTATION_REF="a1">
                <ANNOTATION_VALUE>Casa.</ANNOTATION_VALUE>
            </REF_ANNOTATION>
        </ANNOTATION>
        <ANNOTATION>
            <REF_ANNOTATION ANNOTATION_ID="a5" ANNOTATION_REF="a2" PREVIOUS_ANNOTATION="a4">
                <ANNOTATION_VALUE>casa</ANNOTATION_VALUE>
            </REF_ANNOTATION>
        </ANNOTATION>
        <ANNOTATION>
            <REF_ANNOTATION ANNOTATION_ID="a4" ANNOTATION_REF="a2">
                <ANNOTATION_VALUE>la</ANNOTATION_VALUE>
            </REF_ANNOTATION>
        </ANNOTATION>
    </TIER>
    <TIER LINGUISTIC_TYPE_REF="g" PARENT_REF="t" TIER_ID="g">
        <ANNOTATION>
            <REF_ANNOTATION ANNOTATION_ID="a6" ANNOTATION_REF="a3" LANG_REF="eng">
                <ANNOTATION_VALUE>house &amp; home</ANNOTATION_VALUE>
            </REF_ANNOTATION>
        </ANNOTATION>
    </TIER>
    <LINGUISTIC_TYPE GRAPHIC_REFERENCES="false" LINGUISTIC_TYPE_ID="ref" TIME_ALIGNABLE="true"/>
    <LINGUISTIC_TYPE CONSTRAINTS="Symbolic_Subdivision" GRAPHIC_REFERENCES="false" LINGUISTIC_TYPE_ID="t" TIME_ALIGNABLE="false"/>
    <LINGUISTIC_TYPE CONSTRAINTS="Symbolic_Association" GRAPHIC_REFERENCES="false" LINGUISTIC_TYPE_ID="g" TIME_ALIGNABLE="false"/>
    <LANGUAGE LANG_ID="eng"/>
    <CONSTRAINT DESCRIPTION="Symbolic subdivision of a parent annotation. Annotations refering to the same parent are ordered" STEREOTYPE="Symbolic_Subdivision"/>
    <CONSTRAINT DESCRIPTION="1-1 association with a parent annotation" STEREOTYPE="Symbolic_Association"/>
</ANNOTATION_DOCUMENT>
`
