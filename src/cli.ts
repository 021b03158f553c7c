#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { Lexer } from './lexer/lexer';
import { Parser, formatParseError } from './parser/parser';
import { Evaluator, EvaluatorOptions, InitializationError } from './runtime/evaluator';
import { Environment } from './runtime/environment';
import { loadConfig, loadConfigForScript, TernConfig } from './runtime/config';
import { valueToString } from './runtime/values';

const USAGE = `
tern - The Tern Language Runtime v0.1.0

Usage:
  tern <file.tern>          Run a Tern script
  tern                      Start an interactive session
  tern --parse <file.tern>  Parse and print AST
  tern --lex <file.tern>    Tokenize and print tokens
  tern --help               Show this help message

Options:
  --trace              Enable execution tracing
  --max-depth <n>      Deepest allowed function call nesting (default: 200)
  --max-steps <n>      Stop a run after n evaluation steps
  --config <path>      Path to tern.config.json (auto-detected by default)

Examples:
  tern examples/fib.tern
  tern --trace --max-steps 10000 examples/loop.tern
  tern --parse examples/fib.tern
`;

const FLAGS_WITH_VALUES = new Set(['--max-depth', '--max-steps', '--config']);

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

function getIntArg(args: string[], flag: string): number | undefined {
  const raw = getArg(args, flag);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${flag} expects a positive integer, got "${raw}"`);
  }
  return value;
}

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function resolveOptions(args: string[], config: TernConfig): EvaluatorOptions {
  return {
    trace: args.includes('--trace') || config.trace === true,
    maxDepth: getIntArg(args, '--max-depth') ?? config.maxDepth,
    maxSteps: getIntArg(args, '--max-steps') ?? config.maxSteps,
  };
}

/**
 * Evaluate one chunk of source against `env`, printing the outcome.
 * Returns false when the chunk failed to parse or ended in an error.
 */
function evaluateAndPrint(source: string, env: Environment, options: EvaluatorOptions): boolean {
  let evaluator: Evaluator;
  try {
    evaluator = Evaluator.fromSource(source, options);
  } catch (e) {
    if (e instanceof InitializationError) {
      for (const message of e.errors) console.error(message);
      return false;
    }
    throw e;
  }

  const result = evaluator.run(env);
  if (result.kind === 'error') {
    console.error(`Error: ${result.message}`);
    return false;
  }
  if (result.kind !== 'none') {
    console.log(`=> ${valueToString(result)}`);
  }
  return true;
}

async function repl(
  options: EvaluatorOptions,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): Promise<void> {
  const rl = readline.createInterface({ input, output, prompt: 'tern> ' });
  const env = new Environment();
  rl.prompt();
  for await (const line of rl) {
    if (line.trim() !== '') {
      evaluateAndPrint(line, env, options);
    }
    rl.prompt();
  }
}

/**
 * Run the CLI with `args` (without the node and script paths). The
 * interactive session reads from `input` and prompts on `output`.
 */
export async function main(
  args: string[],
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return 0;
  }

  const flags = new Set(args.filter(a => a.startsWith('--')));
  // Files are args that don't start with -- and aren't values for flags
  const files: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      if (FLAGS_WITH_VALUES.has(args[i])) i++;
      continue;
    }
    files.push(args[i]);
  }

  if (files.length === 0) {
    try {
      const options = resolveOptions(args, loadConfig(getArg(args, '--config')));
      await repl(options, input, output);
    } catch (e) {
      console.error(`Error: ${messageOf(e)}`);
      return 1;
    }
    return 0;
  }

  const filePath = path.resolve(files[0]);

  if (!fs.existsSync(filePath)) {
    console.error(`Error: File not found: ${filePath}`);
    return 1;
  }

  const source = fs.readFileSync(filePath, 'utf-8');

  // Lex-only mode
  if (flags.has('--lex')) {
    const tokens = new Lexer(source).tokenize();
    for (const tok of tokens) {
      const val = tok.value ? ` ${JSON.stringify(tok.value)}` : '';
      console.log(`${tok.line}:${tok.column}\t${tok.type}${val}`);
    }
    return 0;
  }

  // Parse-only mode
  if (flags.has('--parse')) {
    const parser = new Parser();
    const ast = parser.parse(new Lexer(source).tokenize());
    if (parser.hasErrors()) {
      for (const err of parser.errors) console.error(formatParseError(err));
      return 1;
    }
    console.log(JSON.stringify(ast, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value), 2));
    return 0;
  }

  // Full execution
  let options: EvaluatorOptions;
  try {
    const configPath = getArg(args, '--config');
    const config = configPath ? loadConfig(configPath) : loadConfigForScript(filePath);
    options = resolveOptions(args, config);
  } catch (e) {
    console.error(`Error: ${messageOf(e)}`);
    return 1;
  }

  return evaluateAndPrint(source, new Environment(), options) ? 0 : 1;
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(`Error: ${messageOf(e)}`);
      process.exitCode = 1;
    },
  );
}
