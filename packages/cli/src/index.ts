#!/usr/bin/env node

/**
 * Command line interface for navi-morph
 *
 *   navi-morph lemmatize pxetsmukan kameie
 *   navi-morph generate noun tsmukan --form case --case agentive --number plural
 *   navi-morph parse "Oel ngati kameie, ma tsmukan!"
 */

import { pathToFileURL } from 'url';
import { Command, CommanderError, Option } from 'commander';
import {
  consoleTraceHook,
  generate,
  Lemmatizer,
  parseGenerateRequest,
  setDebug
} from '@navi-morph/core';
import {
  formatResultsTsv,
  JsonFileExceptionSource,
  loadConfig,
  loadEnvFile,
  partOfSpeechCounts,
  SentenceParser,
  type Env,
  type FetchFn
} from '@navi-morph/data';

export interface RunCliOptions {
  env?: Env;
  /** Replaces global fetch for the api provider */
  fetch?: FetchFn;
}

type GlobalOptions = {
  debug?: boolean;
  trace?: boolean;
};

interface LemmatizeOptions {
  exceptions?: string;
  json?: boolean;
}

interface GenerateOptions {
  form: string;
  case?: string;
  number?: string;
  person?: string;
  animacy?: string;
  inclusivity?: string;
  gender?: string;
  honorific?: boolean;
  register?: string;
  voice?: string;
  preFirst?: string;
  first?: string;
  second?: string;
  position?: string;
  leDerived?: boolean;
  comparison?: string;
  comparedTo?: string;
  type?: string;
  context?: string;
  noun?: string;
  value?: number;
}

const OUTPUT_FORMATS = ['tsv', 'json'] as const;

interface ParseOptions {
  format: typeof OUTPUT_FORMATS[number];
  stats?: boolean;
}

// Generator options map one to one onto request fields
function toRawRequest(category: string, lemma: string | undefined, options: GenerateOptions): Record<string, unknown> {
  return {
    category,
    lemma,
    form: options.form,
    case: options.case,
    number: options.number,
    gender: options.gender,
    register: options.register,
    voice: options.voice,
    preFirst: options.preFirst,
    first: options.first,
    second: options.second,
    position: options.position,
    leDerived: options.leDerived,
    comparison: options.comparison,
    comparedTo: options.comparedTo,
    type: options.type,
    context: options.context,
    noun: options.noun,
    value: options.value,
    features: {
      person: options.person,
      number: options.number,
      animacy: options.animacy,
      inclusivity: options.inclusivity,
      gender: options.gender,
      honorific: options.honorific
    }
  };
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new CommanderError(1, 'navi-morph.invalidNumber', `error: '${value}' is not a number`);
  }
  return parsed;
}

/**
 * Programmatic interface for CLI operations.
 * Returns what would be printed to stdout; errors are thrown.
 */
export async function runCli(args: string[], options: RunCliOptions = {}): Promise<string> {
  const config = loadConfig(options.env ?? process.env);
  const lines: string[] = [];
  let helpText = '';

  const program = new Command();
  program
    .name('navi-morph')
    .description("Lemmatizer and word-form generator for Na'vi")
    .version('0.1.0')
    .option('-d, --debug', 'print debug output')
    .option('-t, --trace', 'print a trace line for every call')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => { helpText += text; },
      writeErr: (text) => { helpText += text; }
    });

  // Applies --debug and returns the trace hook selected by --trace or NAVI_TRACE
  const applyGlobalOptions = () => {
    const global = program.opts<GlobalOptions>();
    setDebug(config.debug || global.debug === true);
    return config.trace || global.trace === true ? consoleTraceHook : undefined;
  };

  program
    .command('lemmatize')
    .description('reduce each word to its lemma')
    .argument('<words...>', 'inflected words')
    .option('-e, --exceptions <path>', 'exception table (JSON)')
    .option('--json', 'print JSON instead of tab-separated lines')
    .action((words: string[], opts: LemmatizeOptions) => {
      const lemmatizer = new Lemmatizer({
        exceptions: new JsonFileExceptionSource(opts.exceptions ?? config.exceptionsPath).load(),
        cacheSize: config.lemmaCacheSize,
        trace: applyGlobalOptions()
      });
      const results = words.map(word => ({ word, lemma: lemmatizer.lemmatize(word) }));
      if (opts.json) {
        lines.push(JSON.stringify(results));
      } else {
        lines.push(...results.map(({ word, lemma }) => `${word}\t${lemma}`));
      }
    });

  program
    .command('generate')
    .description('produce a word form')
    .argument('<category>', 'noun, pronoun, verb, adjective, number, particle or prenoun')
    .argument('[lemma]', 'base form (not used by number, basic, question and lahe forms)')
    .requiredOption('-f, --form <form>', 'form to generate, e.g. case, participle, ordinal')
    .option('--case <case>', 'subjective, agentive, patientive, dative, genitive or topical')
    .option('--number <number>', 'singular, dual, trial or plural')
    .option('--person <person>', 'first, second or third')
    .option('--animacy <animacy>', 'animate or inanimate')
    .option('--inclusivity <inclusivity>', 'exclusive or inclusive')
    .option('--gender <gender>', 'neutral, male or female; common for question words')
    .option('--honorific', 'honorific pronoun')
    .option('--register <register>', 'full or short')
    .option('--voice <voice>', 'active or passive')
    .option('--pre-first <infix>', 'pre-first position infix')
    .option('--first <infix>', 'first position infix')
    .option('--second <infix>', 'second position infix')
    .option('--position <position>', 'before or after the noun')
    .option('--le-derived', 'adjective derived with le-')
    .option('--comparison <comparison>', 'standard, superlative or equality')
    .option('--compared-to <word>', 'object of comparison')
    .option('--type <type>', 'particle type: question, vocative, negative or general')
    .option('--context <text>', 'words the particle attaches to')
    .option('--noun <noun>', 'noun a prenoun combines with')
    .option('--value <n>', 'numeral value, 1 to 8', parseNumber)
    .action((category: string, lemma: string | undefined, opts: GenerateOptions) => {
      const request = parseGenerateRequest(toRawRequest(category, lemma, opts));
      const result = generate(request, applyGlobalOptions());
      lines.push(...(Array.isArray(result) ? result : [result]));
    });

  program
    .command('parse')
    .description('look up every word of a sentence in the configured dictionary')
    .argument('<sentence...>', 'sentence text')
    .addOption(new Option('--format <format>', 'output format').choices(OUTPUT_FORMATS).default('tsv'))
    .option('--stats', 'append part-of-speech counts')
    .action(async (sentence: string[], opts: ParseOptions) => {
      const trace = applyGlobalOptions();
      const parser = await SentenceParser.fromConfig({ ...config, trace: trace !== undefined }, options.fetch);
      const results = parser.parseSentence(sentence.join(' '));
      lines.push(opts.format === 'json' ? JSON.stringify(results, null, 2) : formatResultsTsv(results));
      if (opts.stats) {
        lines.push('', ...partOfSpeechCounts(results).map(([pos, count]) => `${pos}\t${count}`));
      }
    });

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError && (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')) {
      return helpText.trim();
    }
    if (error instanceof CommanderError) {
      throw new Error(helpText.trim() || error.message);
    }
    throw error;
  }

  return lines.join('\n');
}

async function main(): Promise<void> {
  loadEnvFile();
  const output = await runCli(process.argv.slice(2));
  if (output) {
    process.stdout.write(output);
    process.stdout.write('\n');
  }
}

// Run main if this is the entry point
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(2);
  });
}
