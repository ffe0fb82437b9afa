#!/usr/bin/env node

import { readFileSync } from 'fs';
import { createRewrites, findRule } from './arith/Rewrites.js';
import { toSolverRuleSet } from './arith/Export.js';
import { formatRule, formatMatches } from './arith/Report.js';
import { EGraph } from './egraph/EGraph.js';
import { addTerm } from './egraph/Convert.js';
import { parsePatterns } from './egraph/Pattern.js';
import type { Pattern } from './egraph/Pattern.js';
import { saturate, provesEquivalent } from './egraph/Rewriter.js';
import type { SaturationOptions } from './egraph/Rewriter.js';

function printUsage() {
  console.log(`
arith-rewrites - Width-aware rewrite rules for datapath equivalence

Usage:
  arith-rewrites rules
  arith-rewrites prove <term> <term> [options]
  arith-rewrites matches <rule> <term>... [options]

Options:
  --file <path>           Read terms from a file (whitespace-separated)
  --max-iterations <n>    Saturation iteration limit (default: 30)
  --saturate              matches: saturate with all rules before searching
  --verbose               Log saturation progress
  --help, -h              Show this help message

Terms:
  (<< 17 17 unsign (<< 17 16 unsign A 2 unsign B) 2 unsign C)

  Binary operators (+ - * << >> >>>) take: output width, then width, sign and
  expression of each operand. Signs are 'sign' or 'unsign'.

Exit status:
  prove exits 0 when the terms were proven equivalent, 2 when they were not.
  `.trim());
}

interface CliArgs {
  command: string;
  positional: string[];
  file?: string;
  saturate: boolean;
  options: SaturationOptions;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { command: args[0], positional: [], saturate: false, options: {} };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--file') {
      if (i + 1 >= args.length) {
        throw new Error('Missing value for --file');
      }
      result.file = args[++i];
    } else if (arg === '--max-iterations') {
      if (i + 1 >= args.length) {
        throw new Error('Missing value for --max-iterations');
      }
      const value = parseInt(args[++i], 10);
      if (isNaN(value) || value <= 0) {
        throw new Error('Invalid --max-iterations value. Must be a positive integer.');
      }
      result.options.maxIterations = value;
    } else if (arg === '--saturate') {
      result.saturate = true;
    } else if (arg === '--verbose') {
      result.options.verbose = true;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option "${arg}"`);
    } else {
      result.positional.push(arg);
    }
  }

  return result;
}

function readTerms(texts: string[], file: string | undefined): Pattern[] {
  const terms = texts.flatMap(text => parsePatterns(text));
  if (file !== undefined) {
    terms.push(...parsePatterns(readFileSync(file, 'utf-8')));
  }
  return terms;
}

function main(): number {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printUsage();
    return 0;
  }

  const { command, positional, file, saturate: saturateFirst, options } = parseArgs(args);
  const rules = createRewrites();

  switch (command) {
    case 'rules': {
      console.log(rules.map(formatRule).join('\n'));
      return 0;
    }

    case 'prove': {
      const terms = readTerms(positional, file);
      if (terms.length !== 2) {
        throw new Error(`prove expects exactly 2 terms, got ${terms.length}`);
      }
      const result = provesEquivalent(terms[0], terms[1], toSolverRuleSet(rules), options);
      const { stats } = result;
      console.log(result.equivalent ? 'equivalent' : 'not proven');
      console.log(`${stats.iterations} iterations, ${stats.merges} merges, ${stats.classCount} classes (${stats.stopReason})`);
      return result.equivalent ? 0 : 2;
    }

    case 'matches': {
      const [name, ...texts] = positional;
      if (name === undefined) {
        throw new Error('matches expects a rule name');
      }
      const target = findRule(rules, name);
      if (!target) {
        throw new Error(`Unknown rule "${name}". Known rules: ${rules.map(r => r.name).join(', ')}`);
      }
      const egraph = new EGraph();
      for (const term of readTerms(texts, file)) {
        addTerm(egraph, term);
      }
      if (saturateFirst) {
        saturate(egraph, toSolverRuleSet(rules), options);
      } else {
        egraph.rebuild();
      }
      console.log(formatMatches(target, target.findMatches(egraph)));
      return 0;
    }

    default:
      throw new Error(`Unknown command "${command}"`);
  }
}

try {
  process.exitCode = main();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
