#!/usr/bin/env npx tsx
/**
 * CLI script to type-check transformation expressions
 * Usage: npx tsx scripts/check.ts [options] "<expression>"...
 */

import { resolve } from 'node:path';
import chalk from 'chalk';
import { cctCatalogPath } from '../src/catalog/index.js';
import { loadSignatureTable } from '../src/signature/index.js';
import { ExpressionChecker } from '../src/checker/index.js';
import { loadConformanceCases, runConformance } from '../src/conformance/index.js';
import { formatError, formatResultJSON } from '../src/output/index.js';
import { isTypingError } from '../src/constraint/index.js';

function usage(): never {
  console.log('Usage: npx tsx scripts/check.ts [options] "<expression>"...');
  console.log('');
  console.log('Options:');
  console.log('  --catalog=<file>  Signature catalog (default: the CCT catalog)');
  console.log('  --cases=<file>    Run a conformance case file instead of expressions');
  console.log('  --json            Machine-readable JSON output');
  console.log('  --partial         Accept results with free type variables');
  process.exit(1);
}

function main(): number {
  const args = process.argv.slice(2);
  if (args.length === 0) {
    usage();
  }

  let catalogPath = cctCatalogPath;
  let casesPath: string | undefined;
  let json = false;
  let allowPartial = false;
  const expressions: string[] = [];

  for (const arg of args) {
    if (arg.startsWith('--catalog=')) {
      catalogPath = resolve(process.cwd(), arg.slice('--catalog='.length));
    } else if (arg.startsWith('--cases=')) {
      casesPath = resolve(process.cwd(), arg.slice('--cases='.length));
    } else if (arg === '--json') {
      json = true;
    } else if (arg === '--partial') {
      allowPartial = true;
    } else if (arg.startsWith('-')) {
      console.error(chalk.red(`Unknown option ${arg}`));
      usage();
    } else {
      expressions.push(arg);
    }
  }

  console.error(`Loading ${catalogPath}...`);
  const table = loadSignatureTable(catalogPath);
  console.error(`${table.size} operators, ${table.lattice.operators().length} type operators`);
  const checker = new ExpressionChecker(table, { allowPartial });

  if (casesPath !== undefined) {
    const cases = loadConformanceCases(casesPath);
    const startTime = Date.now();
    const report = runConformance(checker, cases);
    console.error(`Checked ${cases.length} cases in ${Date.now() - startTime}ms`);

    for (const outcome of report.outcomes) {
      if (outcome.passed) {
        console.log(`${chalk.green('PASS')} ${outcome.case.expression}`);
      } else {
        console.log(`${chalk.red('FAIL')} ${outcome.case.expression}`);
        console.log(`     expected ${outcome.expected}, got ${outcome.actual}`);
      }
    }
    console.log('');
    const summary = `${report.passed} passed, ${report.failed} failed`;
    console.log(report.failed > 0 ? chalk.red(summary) : chalk.green(summary));
    return report.failed > 0 ? 1 : 0;
  }

  if (expressions.length === 0) {
    usage();
  }

  let failures = 0;
  for (const expression of expressions) {
    const result = checker.check(expression);
    if (json) {
      console.log(formatResultJSON(expression, result));
    } else if (result.success) {
      console.log(`${expression} ${chalk.dim(':')} ${chalk.cyan(result.text)}`);
    } else {
      console.log(`${expression} ${chalk.dim(':')} ${chalk.red(formatError(result.error))}`);
    }
    if (!result.success) {
      failures++;
    }
  }
  return failures > 0 ? 1 : 0;
}

try {
  process.exitCode = main();
} catch (error) {
  if (isTypingError(error)) {
    console.error(chalk.red(formatError(error)));
    process.exitCode = 1;
  } else {
    throw error;
  }
}
