export type FatalErrorCode =
  | 'MALFORMED_RULE'
  | 'MISALIGNED_OUTPUT'
  | 'TOOLBOX_FORMAT'
  | 'PARTITUR_FORMAT'
  | 'EAF_FORMAT'
  | 'CONFIG'
  | 'ALIGNER'

/**
 * Structural problems with an input file. These abort the current run;
 * content-level anomalies go into a Report instead (see report.ts).
 */
export class ConversionError extends Error {
  readonly code: FatalErrorCode

  constructor(code: FatalErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

export class MalformedRuleError extends ConversionError {
  constructor(readonly line: number, readonly text: string) {
    super('MALFORMED_RULE', `Line ${line} of the transliteration table is not well-formed: ${text}`)
  }
}

export class MisalignedOutputError extends ConversionError {
  constructor(message: string) {
    super('MISALIGNED_OUTPUT', message)
  }
}

export class ToolboxFormatError extends ConversionError {
  constructor(message: string, readonly line?: number) {
    super('TOOLBOX_FORMAT', line === undefined ? message : `${message} (line ${line})`)
  }
}

export class PartiturFormatError extends ConversionError {
  constructor(message: string, readonly line?: number) {
    super('PARTITUR_FORMAT', line === undefined ? message : `${message} (line ${line})`)
  }
}

export class EafFormatError extends ConversionError {
  constructor(message: string) {
    super('EAF_FORMAT', message)
  }
}

export class ConfigError extends ConversionError {
  constructor(message: string) {
    super('CONFIG', message)
  }
}

export class AlignerError extends ConversionError {
  constructor(message: string) {
    super('ALIGNER', message)
  }
}
