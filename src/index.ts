export * from './errors'
export * from './report'
export type * from './types'
export type { ConverterConfig } from './config'
export { configFromEnv, defaultConfig, loadEnv, mergeConfig } from './config'

export type { LintFinding } from './transliteration/ruleTable'
export { parseRuleTable, loadRuleTable, lintRuleTable } from './transliteration/ruleTable'
export type { Transliterator, TransliteratorOptions } from './transliteration/transliterator'
export { createTransliterator } from './transliteration/transliterator'

export type { RecordRange, WordTimes } from './toolbox/reader'
export { readToolbox, readWordTimes } from './toolbox/reader'
export type { ToolboxTimeOptions } from './toolbox/writer'
export { annotateToolbox, createToolbox } from './toolbox/writer'

export type { PartiturOutput } from './partitur/writer'
export { IndexCounter, writePartitur } from './partitur/writer'
export { readPartiturSource, readPhoneSegments, assertAligned } from './partitur/reader'
export { checkInventory, parseInventory, loadInventory } from './partitur/inventory'

export type { Reconstruction } from './alignment/reconstruct'
export { reconstructTimes } from './alignment/reconstruct'
export { exportTextGrid } from './exporters/textGridExporter'

export type { AnnotationGraph } from './elan/graph'
export { parseEaf } from './elan/eafParser'
export { serializeEaf } from './elan/eafWriter'
export { flexibilize } from './elan/flexibilize'
export { importWordTimes } from './elan/importTimes'

export { runAligner } from './aligner'
export * from './pipeline'
