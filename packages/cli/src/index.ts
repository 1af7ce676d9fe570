#!/usr/bin/env node

/**
 * CLI interface for kanaroma
 *
 *   kanaroma encode [-s hepburn|kunrei] <katakana...>
 *   kanaroma decode <romaji...>
 *   kanaroma classify <verb>
 *   kanaroma stem <verb> [-f irrealis|continuative] [-c <class>]
 */

import { Command, CommanderError, Option } from 'commander';
import { config } from 'dotenv';
import {
  decodeRomajiToHiragana,
  encodeKatakanaToRomaji,
  HIRAGANA_REGEX,
  parseRomanizationSystem,
  readConfig,
  setDebug,
  UnknownSystemError,
  type KanaromaConfig
} from '@kanaroma/core';
import {
  CONJUGATION_CLASSES,
  STEM_FORMS,
  inferAndDeriveStem,
  inferConjugationClass,
  unwrapVerbResult,
  VerbFormError,
  type ConjugationClass,
  type StemForm
} from '@kanaroma/verb';

export interface CliResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

interface CliOutput {
  out(text: string): void;
  err(text: string): void;
  exit(code: number): void;
}

// Errors that mean "bad input", reported as ERROR lines instead of crashing
function reportError(io: CliOutput, error: unknown): void {
  if (error instanceof UnknownSystemError) {
    io.err(`ERROR: ${error.message}\n`);
    io.exit(2);
  } else if (error instanceof VerbFormError) {
    io.err(`ERROR: ${error.message}\n`);
    io.exit(1);
  } else {
    throw error;
  }
}

export function buildProgram(settings: KanaromaConfig, io: CliOutput): Command {
  const program = new Command();

  program
    .name('kanaroma')
    .description('Convert between katakana and romaji, and derive Japanese verb stems')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text),
      writeErr: (text) => io.err(text)
    });

  program
    .command('encode')
    .description('katakana → romaji')
    .argument('[text...]', 'katakana text')
    .option('-s, --system <system>', 'romanization system (hepburn, kunrei)', settings.defaultSystem)
    .action((text: string[], options: { system: string }) => {
      try {
        const system = parseRomanizationSystem(options.system);
        const input = text.join(' ');
        if (HIRAGANA_REGEX.test(input)) {
          io.err('WARNING: hiragana input is not romanized (convert it to katakana first)\n');
        }
        io.out(encodeKatakanaToRomaji(input, system) + '\n');
      } catch (error) {
        reportError(io, error);
      }
    });

  program
    .command('decode')
    .description('romaji → hiragana')
    .argument('[text...]', 'romaji text')
    .action((text: string[]) => {
      io.out(decodeRomajiToHiragana(text.join(' ')) + '\n');
    });

  program
    .command('classify')
    .description('guess the conjugation class of a dictionary-form verb')
    .argument('<verb>', 'verb in dictionary form')
    .action((verb: string) => {
      try {
        io.out(unwrapVerbResult(verb, inferConjugationClass(verb)) + '\n');
      } catch (error) {
        reportError(io, error);
      }
    });

  program
    .command('stem')
    .description('irrealis (nai) or continuative (masu) stem of a verb')
    .argument('<verb>', 'verb in dictionary form')
    .addOption(new Option('-f, --form <form>', 'stem form').choices(STEM_FORMS).default('irrealis'))
    .addOption(new Option('-c, --class <class>', 'conjugation class (inferred when omitted)').choices(CONJUGATION_CLASSES))
    .action((verb: string, options: { form: StemForm; class?: ConjugationClass }) => {
      try {
        io.out(unwrapVerbResult(verb, inferAndDeriveStem(verb, options.form, options.class)) + '\n');
      } catch (error) {
        reportError(io, error);
      }
    });

  return program;
}

/**
 * Programmatic interface for CLI operations
 * Returns what would be written to stdout/stderr and the exit code
 */
export async function runCli(argv: string[], settings: KanaromaConfig = readConfig()): Promise<CliResult> {
  const result: CliResult = { exitCode: 0, stdout: '', stderr: '' };

  const program = buildProgram(settings, {
    out: (text) => { result.stdout += text; },
    err: (text) => { result.stderr += text; },
    exit: (code) => { result.exitCode = code; }
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    // exitOverride turns commander's own exits (help, usage errors) into CommanderError
    if (error instanceof CommanderError) {
      result.exitCode = error.exitCode;
    } else {
      throw error;
    }
  }

  return result;
}

async function main(): Promise<void> {
  config();

  const settings = readConfig();
  setDebug(settings.debug);

  const { exitCode, stdout, stderr } = await runCli(process.argv.slice(2), settings);
  process.stdout.write(stdout);
  process.stderr.write(stderr);
  process.exitCode = exitCode;
}

// Run main if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
