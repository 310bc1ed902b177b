#!/usr/bin/env node
import fs from 'node:fs';
import { cac } from 'cac';
import { CFG, RUN_DEFAULTS, createRunConfig } from '../config';
import { EvolverError, InvariantViolationError, ProfileFormatError, RunNotFoundError, StorageError } from '../errors';
import { Orchestrator } from '../engine/orchestrator';
import { createLlmProvider } from '../llm/provider';
import { LlmModeSchema } from '../schemas/run';
import { FileStorage } from '../state/storage';
import { validateRun } from '../state/validate';
import { runTournament } from '../preferences/tournament';
import { buildPortableProfile, parsePortableProfile, profileShow, profileWeights } from '../preferences/profile';
import { renderFinalMarkdown, renderProgress } from '../report/markdown';
import { renderTree } from '../report/tree';
import { seededRandom } from '../util/random';
import { createReadlineIO } from './readlineIO';
import type { RunOutcome } from '../engine/orchestrator';
import type { PortableProfile, TournamentMode } from '../types';

interface CommonOptions {
  out?: string;
}

function intOption(value: unknown, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new EvolverError('BAD_OPTION', `--${name} must be an integer (got ${String(value)})`);
  }
  return n;
}

function numOption(value: unknown, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new EvolverError('BAD_OPTION', `--${name} must be a number (got ${String(value)})`);
  }
  return n;
}

function storageFor(options: CommonOptions): FileStorage {
  return new FileStorage(options.out ?? CFG.RUNS_DIR);
}

function readProfile(file: string): PortableProfile {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new StorageError('Failed to read profile', file, error);
  }
  return parsePortableProfile(raw);
}

function printOutcome(outcome: RunOutcome) {
  const { result, state, stopReason } = outcome;
  console.log(`\nRun ${state.runId} finished after ${state.iteration} rounds (${stopReason})`);
  console.log(`Best: ${result.best.title} [${result.best.overallScore.toFixed(2)}]`);
  for (const reason of result.best.whyWon) console.log(`  - ${reason}`);
}

export function createCli() {
  const cli = cac('idea-evolver');

  cli
    .command('run <prompt>', 'Evolve ideas for a prompt')
    .option('--mode <mode>', 'LLM provider: mock | openai', { default: RUN_DEFAULTS.mode })
    .option('--max-rounds <n>', 'Maximum rounds', { default: RUN_DEFAULTS.maxRounds })
    .option('--population <n>', 'Active population size', { default: RUN_DEFAULTS.populationSize })
    .option('--elite <n>', 'Ideas always kept each round', { default: RUN_DEFAULTS.eliteCount })
    .option('--threshold <score>', 'Stop once the best score reaches this', { default: RUN_DEFAULTS.scoreThreshold })
    .option('--stagnation <n>', 'Stop after this many rounds without improvement', {
      default: RUN_DEFAULTS.stagnationPatience
    })
    .option('--refine-top-k <n>', 'Ideas refined per round', { default: RUN_DEFAULTS.refineTopK })
    .option('--seed <n>', 'Seed for diversity sampling')
    .option('--weights-from <file>', 'Score with the fitted weights of an exported profile')
    .option('--out <dir>', 'Runs directory', { default: CFG.RUNS_DIR })
    .action(async (prompt: string, options: Record<string, unknown> & CommonOptions) => {
      const mode = LlmModeSchema.safeParse(options.mode);
      if (!mode.success) {
        throw new EvolverError('BAD_OPTION', `--mode must be mock or openai (got ${String(options.mode)})`);
      }
      const weightsFile = options.weightsFrom;
      const scoringWeights = typeof weightsFile === 'string' ? profileWeights(readProfile(weightsFile)) : undefined;
      const config = createRunConfig({
        prompt,
        mode: mode.data,
        maxRounds: intOption(options.maxRounds, 'max-rounds'),
        populationSize: intOption(options.population, 'population'),
        eliteCount: intOption(options.elite, 'elite'),
        scoreThreshold: numOption(options.threshold, 'threshold'),
        stagnationPatience: intOption(options.stagnation, 'stagnation'),
        refineTopK: intOption(options.refineTopK, 'refine-top-k'),
        scoringWeights,
        outputDir: options.out
      });
      const seed = intOption(options.seed, 'seed');

      const orchestrator = Orchestrator.create(config, {
        llm: createLlmProvider(config.mode),
        storage: storageFor(options),
        random: seed === undefined ? undefined : seededRandom(seed)
      });
      printOutcome(await orchestrator.run());
    });

  cli
    .command('resume <runId>', 'Continue a stored run')
    .option('--max-rounds <n>', 'Raise the round limit')
    .option('--out <dir>', 'Runs directory', { default: CFG.RUNS_DIR })
    .action(async (runId: string, options: { maxRounds?: unknown } & CommonOptions) => {
      const storage = storageFor(options);
      const config = storage.loadConfig(runId);
      const orchestrator = Orchestrator.resume(
        runId,
        { llm: createLlmProvider(config.mode), storage },
        intOption(options.maxRounds, 'max-rounds')
      );
      printOutcome(await orchestrator.run());
    });

  cli
    .command('show <runId>', 'Print the final result of a run')
    .option('--format <format>', 'json | md', { default: 'md' })
    .option('--out <dir>', 'Runs directory', { default: CFG.RUNS_DIR })
    .action((runId: string, options: { format: string } & CommonOptions) => {
      const storage = storageFor(options);
      const final = storage.runExists(runId) ? storage.loadFinal(runId) : null;
      if (!final) {
        console.log(renderProgress(storage.loadState(runId)));
        return;
      }
      console.log(options.format === 'json' ? JSON.stringify(final, null, 2) : renderFinalMarkdown(final));
    });

  cli
    .command('validate <runId>', 'Check run artifacts and state invariants')
    .option('--out <dir>', 'Runs directory', { default: CFG.RUNS_DIR })
    .action((runId: string, options: CommonOptions) => {
      const report = validateRun(storageFor(options), runId);
      for (const line of report.checks) console.log(line);
      if (report.errors.length === 0) {
        console.log('Invariants: OK');
        return;
      }
      for (const error of report.errors) console.log(`  - ${error}`);
      throw new InvariantViolationError(report.errors);
    });

  cli
    .command('list', 'List runs, newest first')
    .option('--out <dir>', 'Runs directory', { default: CFG.RUNS_DIR })
    .action((options: CommonOptions) => {
      const dir = options.out ?? CFG.RUNS_DIR;
      const runs = storageFor(options).listRuns();
      if (runs.length === 0) {
        console.log(`No runs found in: ${dir}`);
        return;
      }
      console.log(`Runs in ${dir}:`);
      console.log(`${'RUN ID'.padEnd(30)} ${'STATUS'.padEnd(12)} BEST SCORE`);
      console.log('-'.repeat(55));
      for (const run of runs) {
        const score = run.bestScore === null ? '-' : run.bestScore.toFixed(2);
        console.log(`${run.runId.padEnd(30)} ${run.status.padEnd(12)} ${score}`);
      }
    });

  cli
    .command('tree <runId>', 'Render idea ancestry')
    .option('--format <format>', 'ascii | mermaid', { default: 'ascii' })
    .option('--out <dir>', 'Runs directory', { default: CFG.RUNS_DIR })
    .action((runId: string, options: { format: string } & CommonOptions) => {
      const state = storageFor(options).loadState(runId);
      const format = options.format === 'mermaid' ? 'mermaid' : 'ascii';
      console.log(renderTree(runId, state.ideas, format).join('\n'));
    });

  cli
    .command('tournament <runId>', 'Rank a finished run by your own preferences')
    .option('--auto', 'Rank by score without asking')
    .option('--pairwise', 'Adaptive pairs, about 2n comparisons')
    .option('--out <dir>', 'Runs directory', { default: CFG.RUNS_DIR })
    .action(async (runId: string, options: { auto?: boolean; pairwise?: boolean } & CommonOptions) => {
      const mode: TournamentMode = options.auto ? 'auto' : options.pairwise ? 'pairwise' : 'exhaustive';
      const io = createReadlineIO();
      try {
        const result = await runTournament({ runId, storage: storageFor(options), mode, io });
        if (result.excluded > 0) {
          console.log(`Warning: ${result.excluded} active ideas have missing scores and were excluded.`);
        }
        console.log(mode === 'auto' ? '\n=== Auto Mode: Ranking by Score ===\n' : '\n=== Current Rankings (by Elo) ===\n');
        result.ranking.forEach((idea, i) => {
          const value = mode === 'auto' ? idea.value.toFixed(2) : `Elo: ${idea.value.toFixed(0)}`;
          console.log(`${i + 1}. [${value}] ${idea.title}`);
        });
        if (mode !== 'auto') console.log(`\nComparisons made: ${result.comparisonsMade}`);
      } finally {
        io.close();
      }
    });

  cli
    .command('profile <action> [...args]', 'export <runId> [-o file] | import <file> <runId> | show <runId>')
    .option('-o, --output <file>', 'Write the exported profile here')
    .option('--out <dir>', 'Runs directory', { default: CFG.RUNS_DIR })
    .action((action: string, args: string[], options: { output?: string } & CommonOptions) => {
      const storage = storageFor(options);

      if (action === 'export' && args[0]) {
        const runId = args[0];
        const preferences = storage.loadPreferences(runId);
        if (!preferences) {
          throw new ProfileFormatError(`No preferences found for run ${runId}. Run tournament first.`);
        }
        const state = storage.runExists(runId) ? storage.loadState(runId) : null;
        const json = JSON.stringify(buildPortableProfile(runId, preferences, state), null, 2);
        if (options.output) {
          try {
            fs.writeFileSync(options.output, json, 'utf-8');
          } catch (error) {
            throw new StorageError('Failed to write profile', options.output, error);
          }
          console.log(`Profile exported to: ${options.output}`);
        } else {
          console.log(json);
        }
        return;
      }

      if (action === 'import' && args[0] && args[1]) {
        const [file, runId] = args;
        if (!storage.runExists(runId)) {
          throw new RunNotFoundError(runId);
        }
        const profile = readProfile(file);
        storage.savePreferences(runId, profile.preferences);
        console.log(`Imported profile from ${profile.sourceRun} into ${runId}`);
        return;
      }

      if (action === 'show' && args[0]) {
        const runId = args[0];
        const preferences = storage.loadPreferences(runId);
        if (!preferences) {
          console.log(`No preferences found for run ${runId}`);
          console.log(`Run 'idea-evolver tournament ${runId}' to generate preferences`);
          return;
        }
        const summary = profileShow(runId, preferences, storage.runExists(runId) ? storage.loadState(runId) : null);
        console.log(`=== Profile for ${runId} ===\n`);
        console.log(`Comparisons: ${summary.comparisons}`);
        console.log(`Ideas rated: ${summary.ideasRated}`);
        console.log('\nElo Rankings:');
        summary.ranking.forEach((r, i) => console.log(`  ${i + 1}. [${r.elo.toFixed(0)}] ${r.title}`));
        if (summary.derived) {
          console.log('\nDerived weights:');
          for (const line of summary.derived.summary) console.log(`  ${line}`);
        }
        return;
      }

      throw new EvolverError('BAD_OPTION', `Unknown profile usage: ${[action, ...args].join(' ')}`);
    });

  cli.help();
  return cli;
}

export async function main(argv: string[] = process.argv) {
  const cli = createCli();
  const { options } = cli.parse(argv, { run: false });
  if (options.help) return;
  if (!cli.matchedCommand) {
    cli.outputHelp();
    return;
  }
  await cli.runMatchedCommand();
}

if (require.main === module) {
  main().catch(e => {
    if (e instanceof EvolverError) {
      console.error(`${e.code}: ${e.message}`);
    } else {
      console.error('Fatal error:', e);
    }
    process.exit(1);
  });
}
