// @navi-morph/data - Exception tables, dictionary providers and configuration

export {
  JsonFileExceptionSource,
  parseExceptionData,
  type ExceptionSource
} from './exceptions.js';
export {
  InMemoryLexicon,
  loadLexicon,
  toLexicalRecord,
  UNKNOWN_PART_OF_SPEECH,
  type LexicalRecord,
  type LexiconLookup,
  type LexiconProvider,
  type RawRecordFields
} from './lexicon.js';
export { TsvLexiconProvider, parseLexiconTsv, TSV_COLUMNS } from './providers/tsv.js';
export { DictionaryApiProvider, toApiRecords, type DictionaryApiOptions, type FetchFn } from './providers/api.js';
export {
  loadConfig,
  loadEnvFile,
  createProvider,
  DEFAULTS,
  PROVIDER_TYPES,
  type Env,
  type NaviConfig,
  type ProviderConfig,
  type ProviderType
} from './config.js';
export {
  SentenceParser,
  unknownWord,
  partOfSpeechCounts,
  formatResultsTsv,
  type SentenceParserOptions,
  type WordInfo
} from './parser.js';
