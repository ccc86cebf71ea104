/*
 * Benchmark encoding and filtering per output context.
 *
 * Notes:
 * - This is a micro-benchmark. Results vary by machine and Node.js version.
 * - Every scenario is run through the string form of each selected context.
 */

import { performance } from 'node:perf_hooks';

import { builtinContexts } from '../src/context-registry.js';
import type { Manipulator } from '../src/manipulator.js';
import type {
  ContextName,
  TransformMode,
} from '../src/types.js';

type OutputFormat = 'table' | 'md' | 'json';
type BenchmarkMode = 'all' | TransformMode;

interface BenchmarkResult {
  mode: TransformMode;
  context: string;
  scenario: string;
  iterations: number;
  totalMs: number;
  msPerOp: number;
  opsPerSec: number;
}

interface Scenario {
  name: string;
  input: string;
}

interface BenchmarkArgs {
  iterations: number;
  warmup: number;
  format: OutputFormat;
  mode: BenchmarkMode;
  contexts: ContextName[];
}

const isOutputFormat = (value: string): value is OutputFormat => value === 'table' || value === 'md' || value === 'json';
const isBenchmarkMode = (value: string): value is BenchmarkMode => value === 'all' || value === 'encode' || value === 'filter';
const isContextName = (value: string): value is ContextName => Object.prototype.hasOwnProperty.call(builtinContexts, value);

function parseArgs (argv: string[]): BenchmarkArgs {
  const out: BenchmarkArgs = {
    iterations: 20_000,
    warmup: 2_000,
    format: 'table',
    mode: 'all',
    contexts: [ 'HtmlContent', 'XmlContent', 'JavaScriptInHTML', 'JSONValue', 'UriComponent', 'CDATAContent' ],
  };

  for (const arg of argv) {
    const m = /^--(iterations|warmup)=(\d+)$/.exec(arg);
    if (!m) continue;

    const value = Number.parseInt(m[2] ?? '', 10);
    if (!Number.isFinite(value) || value < 0) continue;

    if (m[1] === 'iterations') out.iterations = value;
    if (m[1] === 'warmup') out.warmup = value;
  }

  // keep things sane
  out.warmup = Math.max(0, Math.min(out.warmup, 200_000));
  out.iterations = Math.max(1, Math.min(out.iterations, 2_000_000));

  for (const arg of argv) {
    const format = /^--format=(.+)$/.exec(arg)?.[1];
    if (format && isOutputFormat(format)) out.format = format;

    const mode = /^--mode=(.+)$/.exec(arg)?.[1];
    if (mode && isBenchmarkMode(mode)) out.mode = mode;

    const contexts = /^--contexts=(.+)$/.exec(arg)?.[1];
    if (contexts === 'all') {
      out.contexts = Object.keys(builtinContexts).filter(isContextName);
    } else if (contexts) {
      out.contexts = contexts.split(',').filter(isContextName);
    }
  }

  return out;
}

function bench (
  manipulator: Manipulator,
  mode: TransformMode,
  scenario: Scenario,
  iterations: number,
  warmup: number,
): BenchmarkResult {
  const run = mode === 'encode'
    ? (input: string): string => manipulator.encode(input)
    : (input: string): string => manipulator.filter(input);

  let sink = 0;
  for (let i = 0; i < warmup; i++) {
    sink += run(scenario.input).length;
  }

  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    sink += run(scenario.input).length;
  }
  const end = performance.now();

  if (sink === Number.NEGATIVE_INFINITY) {
    // Prevent DCE in case of overly aggressive optimizations.
    console.log('sink', sink);
  }

  const totalMs = end - start;

  return {
    mode,
    context: manipulator.name,
    scenario: scenario.name,
    iterations,
    totalMs,
    msPerOp: totalMs / iterations,
    opsPerSec: (iterations / totalMs) * 1000,
  };
}

function main (): void {
  const args = parseArgs(process.argv.slice(2));

  if (process.execArgv.some((a) => a.startsWith('--inspect'))) {
    console.warn('Warning: Node inspector is enabled; benchmark results will be distorted.');
    console.warn('Tip: run in a normal terminal / unset NODE_OPTIONS.');
    console.warn('');
  }

  const scenarios: Scenario[] = [
    {
      name: 'plain text',
      input: 'The quick brown fox jumps over the lazy dog 0123456789',
    },
    {
      name: 'markup',
      input: '<a href="https://example.test/?q=1&x=\'2\'">link</a><script>alert(1)</script>'.repeat(4),
    },
    {
      name: 'non-ASCII',
      input: 'Grüße aus Köln • ¿Qué tal? 你好'.repeat(4),
    },
    {
      name: 'bracket run',
      input: ']'.repeat(10_000) + '>',
    },
  ];

  const modes: TransformMode[] = args.mode === 'all' ? [ 'encode', 'filter' ] : [ args.mode ];
  const results: BenchmarkResult[] = [];

  for (const context of args.contexts) {
    for (const mode of modes) {
      for (const scenario of scenarios) {
        results.push(bench(builtinContexts[context], mode, scenario, args.iterations, args.warmup));
      }
    }
  }

  const rows = results.map((r) => ({
    mode: r.mode,
    context: r.context,
    scenario: r.scenario,
    iterations: r.iterations,
    totalMs: Number(r.totalMs.toFixed(2)),
    msPerOp: Number(r.msPerOp.toFixed(6)),
    opsPerSec: Number(r.opsPerSec.toFixed(0)),
  }));

  if (args.format === 'json') {
    console.log(JSON.stringify({
      node: process.version,
      params: {
        iterations: args.iterations,
        warmup: args.warmup,
        mode: args.mode,
        contexts: args.contexts,
      },
      results: rows,
    }));
    return;
  }

  if (args.format === 'md') {
    console.log('## context-encoder benchmark');
    console.log('');
    console.log(`- Node: ${process.version}`);
    console.log(`- Params: iterations=${args.iterations}, warmup=${args.warmup}, mode=${args.mode}`);
    console.log('');
    console.log('| Mode | Context | Scenario | Iterations | Total (ms) | ms/op | ops/sec |');
    console.log('| --- | --- | --- | ---: | ---: | ---: | ---: |');

    for (const r of rows) {
      console.log(`| ${r.mode} | ${r.context} | ${r.scenario} | ${r.iterations} | ${r.totalMs} | ${r.msPerOp} | ${r.opsPerSec} |`);
    }
    return;
  }

  console.log('Encoder benchmark');
  console.log(`Node: ${process.version}`);
  console.log(`iterations=${args.iterations} warmup=${args.warmup} mode=${args.mode}`);
  console.log('');

  console.table(rows);
}

main();
