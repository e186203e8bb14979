// Line-level view of a Toolbox file, used when times are written back into it

export interface ToolboxLine {
  marker?: string
  content: string // the line without its ending
  ending: string
}

const MARKER_RE = /^\\(\S+)(?=$|\s)/
const CONTENTS_RE = /^\\\S+\s+(.*)$/

export function splitToolboxLines(text: string): ToolboxLine[] {
  const lines: ToolboxLine[] = []
  const re = /([^\r\n]*)(\r\n|\n|\r|$)/g
  let match: RegExpExecArray | null
  while ((match = re.exec(text))) {
    if (match[0] === '') break
    const content = match[1]
    const marker = MARKER_RE.exec(content)?.[1]
    lines.push({ marker, content, ending: match[2] })
  }
  return lines
}

/** Value after the marker, whitespace-normalized; '' for an empty field. */
export function markerValue(line: ToolboxLine): string {
  const m = CONTENTS_RE.exec(line.content)
  return m ? m[1].trim().replace(/\s+/g, ' ') : ''
}

export function joinToolboxLines(lines: ToolboxLine[]): string {
  return lines.map((l) => l.content + l.ending).join('')
}

/** The line ending most used in the file, so inserted lines blend in. */
export function dominantEnding(lines: ToolboxLine[]): string {
  let crlf = 0
  let lf = 0
  for (const l of lines) {
    if (l.ending === '\r\n') crlf++
    else if (l.ending === '\n') lf++
  }
  return crlf > lf ? '\r\n' : '\n'
}
