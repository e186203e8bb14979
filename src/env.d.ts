declare namespace NodeJS {
  interface ProcessEnv {
    ALIGN_SAMPLE_RATE?: string
    ALIGN_CHANNELS?: string
    ALIGN_BIT_DEPTH?: string
    ALIGN_ENCODING?: string
    ALIGNER_CMD?: string
    DEV_LOG?: string
    QUIET?: string
  }
}
