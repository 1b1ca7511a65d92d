#!/usr/bin/env node
import fs from 'fs/promises';
import path from 'path';
import { parseArgs } from 'util';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { createContext, createOrchestrator } from './context';
import { DEFAULT_IMPROVEMENT_CONFIG, ImprovementConfig } from './services/improvement-orchestrator';
import { ConfigError, PromptConfigError, errorMessage } from './errors';
import { ImprovementReport } from './types';

export const EXIT_SUCCESS = 0;
export const EXIT_TARGET_MISSED = 1;
export const EXIT_CONFIG_ERROR = 2;

const USAGE = `Usage: outreach-improve [options]

  --max-iterations N       Maximum improvement iterations (default 10)
  --target-pass-rate R     Pass rate to reach, 0-1 (default 0.95)
  --num-prospects N        Prospects per iteration (default 20)
  --output-report PATH     Where to write the final report (default improvement_report.json)
  --test-only              Run one test suite without changing prompts
  --no-backup              Do not back up the prompt documents first
  --help                   Show this message`;

const CliSchema = z.object({
  maxIterations: z.coerce.number().int().min(1).default(DEFAULT_IMPROVEMENT_CONFIG.maxIterations),
  targetPassRate: z.coerce.number().min(0).max(1).default(DEFAULT_IMPROVEMENT_CONFIG.targetPassRate),
  numProspects: z.coerce.number().int().min(1).default(DEFAULT_IMPROVEMENT_CONFIG.numProspects),
  outputReport: z.string().min(1).default('improvement_report.json'),
  testOnly: z.boolean().default(false),
  noBackup: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliSchema>;

function readFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      'max-iterations': { type: 'string' },
      'target-pass-rate': { type: 'string' },
      'num-prospects': { type: 'string' },
      'output-report': { type: 'string' },
      'test-only': { type: 'boolean' },
      'no-backup': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  }).values;
}

export function parseCliArgs(argv: string[]): CliOptions | 'help' {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(argv);
  } catch (err) {
    throw new ConfigError(errorMessage(err));
  }
  if (values.help) return 'help';

  const parsed = CliSchema.safeParse({
    maxIterations: values['max-iterations'],
    targetPassRate: values['target-pass-rate'],
    numProspects: values['num-prospects'],
    outputReport: values['output-report'],
    testOnly: values['test-only'],
    noBackup: values['no-backup'],
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid arguments: ${issues}`);
  }
  return parsed.data;
}

function printSummary(report: ImprovementReport): void {
  const pct = (rate: number) => `${(rate * 100).toFixed(1)}%`;
  console.log('');
  console.log(`Status:          ${report.status}`);
  console.log(`Iterations:      ${report.iterations}`);
  console.log(`Pass rate:       ${pct(report.initialPassRate)} → ${pct(report.finalPassRate)} (target ${pct(report.targetPassRate)})`);
  console.log(`Avg quality:     ${report.finalAvgQuality.toFixed(1)}/100`);
  console.log(`Tests run:       ${report.totalTestsRun}`);
  console.log(report.message);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    const parsed = parseCliArgs(argv);
    if (parsed === 'help') {
      console.log(USAGE);
      return EXIT_SUCCESS;
    }
    options = parsed;
  } catch (err) {
    console.error(errorMessage(err));
    console.error(USAGE);
    return EXIT_CONFIG_ERROR;
  }

  try {
    const ctx = createContext();
    await ctx.store.load();

    const improvement: ImprovementConfig = {
      maxIterations: options.maxIterations,
      targetPassRate: options.targetPassRate,
      numProspects: options.numProspects,
      backupDir: options.noBackup || options.testOnly ? undefined : ctx.config.backupDir,
    };
    const orchestrator = createOrchestrator(ctx, uuidv4(), improvement);
    const report = options.testOnly ? await orchestrator.testOnly() : await orchestrator.run();

    const reportPath = path.resolve(options.outputReport);
    await fs.writeFile(reportPath, JSON.stringify(report, null, 2), 'utf-8');
    printSummary(report);
    console.log(`Report written to ${reportPath}`);
    return report.success ? EXIT_SUCCESS : EXIT_TARGET_MISSED;
  } catch (err) {
    if (err instanceof PromptConfigError) {
      console.error(`Prompt configuration error in ${err.filePath}: ${err.message}`);
      return EXIT_CONFIG_ERROR;
    }
    if (err instanceof ConfigError) {
      console.error(err.message);
      return EXIT_CONFIG_ERROR;
    }
    throw err;
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(err => {
      console.error(`Improvement run failed: ${errorMessage(err)}`);
      process.exitCode = EXIT_TARGET_MISSED;
    });
}
