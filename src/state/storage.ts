import fs from 'node:fs';
import path from 'node:path';
import { PopulationStateSchema } from '../schemas/idea';
import { FinalResultSchema, RunConfigSchema, RunEventSchema } from '../schemas/run';
import { PreferencesSchema } from '../schemas/preferences';
import { RunNotFoundError, StorageError } from '../errors';
import { appendLine, ensureDir, readJSON, saveJSON } from '../util/fileCache';
import { createLogger } from '../util/logger';
import type { FinalResult, PopulationState, Preferences, RunConfig, RunEvent } from '../types';

const logger = createLogger('Storage');

/**
 * Run artifact persistence.
 * State, config, final result and preferences are full-overwrite snapshots;
 * events are an append-only log.
 */
export interface Storage {
  initRun(config: RunConfig): string;
  runExists(runId: string): boolean;
  loadConfig(runId: string): RunConfig;
  saveConfig(config: RunConfig): void;
  loadState(runId: string): PopulationState;
  saveState(state: PopulationState): void;
  appendEvent(runId: string, event: RunEvent): void;
  loadEvents(runId: string): RunEvent[];
  saveFinal(result: FinalResult): void;
  loadFinal(runId: string): FinalResult | null;
  loadPreferences(runId: string): Preferences | null;
  savePreferences(runId: string, preferences: Preferences): void;
}

export function emptyState(runId: string): PopulationState {
  return {
    runId,
    iteration: 0,
    ideas: [],
    bestIdeaId: null,
    bestScore: null,
    stagnationCounter: 0
  };
}

export interface RunListing {
  runId: string;
  status: 'complete' | 'in_progress' | 'unknown';
  bestScore: number | null;
}

export class FileStorage implements Storage {
  private basePath: string;

  constructor(basePath: string = './runs') {
    this.basePath = basePath;
  }

  runDir(runId: string): string {
    return path.join(this.basePath, runId);
  }

  private file(runId: string, name: string): string {
    return path.join(this.runDir(runId), name);
  }

  initRun(config: RunConfig): string {
    const dir = this.runDir(config.runId);
    ensureDir(dir);
    saveJSON(dir, 'config', config);
    this.saveState(emptyState(config.runId));

    const historyPath = this.file(config.runId, 'history.ndjson');
    try {
      fs.writeFileSync(historyPath, '', 'utf-8');
    } catch (error) {
      throw new StorageError('Failed to create history', historyPath, error);
    }

    logger.info(`Initialised run ${config.runId}`, { dir });
    return config.runId;
  }

  runExists(runId: string): boolean {
    return fs.existsSync(this.file(runId, 'config.json')) || fs.existsSync(this.file(runId, 'state.json'));
  }

  loadConfig(runId: string): RunConfig {
    this.assertRun(runId);
    return readJSON(this.file(runId, 'config.json'), RunConfigSchema);
  }

  saveConfig(config: RunConfig): void {
    saveJSON(this.runDir(config.runId), 'config', config);
  }

  loadState(runId: string): PopulationState {
    this.assertRun(runId);
    return readJSON(this.file(runId, 'state.json'), PopulationStateSchema);
  }

  saveState(state: PopulationState): void {
    saveJSON(this.runDir(state.runId), 'state', state);
  }

  appendEvent(runId: string, event: RunEvent): void {
    appendLine(this.file(runId, 'history.ndjson'), JSON.stringify(event));
  }

  loadEvents(runId: string): RunEvent[] {
    const historyPath = this.file(runId, 'history.ndjson');
    if (!fs.existsSync(historyPath)) return [];

    let content: string;
    try {
      content = fs.readFileSync(historyPath, 'utf-8');
    } catch (error) {
      throw new StorageError('Failed to read history', historyPath, error);
    }

    return content
      .split('\n')
      .filter(line => line.trim().length > 0)
      .map((line, index) => {
        const parsed = RunEventSchema.safeParse(safeJson(line));
        if (!parsed.success) {
          throw new StorageError(`Invalid event on line ${index + 1} of`, historyPath);
        }
        return parsed.data;
      });
  }

  saveFinal(result: FinalResult): void {
    saveJSON(this.runDir(result.runId), 'final', result);
  }

  loadFinal(runId: string): FinalResult | null {
    const finalPath = this.file(runId, 'final.json');
    return fs.existsSync(finalPath) ? readJSON(finalPath, FinalResultSchema) : null;
  }

  loadPreferences(runId: string): Preferences | null {
    const prefsPath = this.file(runId, 'preferences.json');
    return fs.existsSync(prefsPath) ? readJSON(prefsPath, PreferencesSchema) : null;
  }

  savePreferences(runId: string, preferences: Preferences): void {
    saveJSON(this.runDir(runId), 'preferences', preferences);
  }

  /** Newest first, assuming ids sort by creation. */
  listRuns(): RunListing[] {
    if (!fs.existsSync(this.basePath)) return [];

    const entries = fs.readdirSync(this.basePath, { withFileTypes: true }).filter(e => e.isDirectory());
    const runs = entries.map((entry): RunListing => {
      const runId = entry.name;
      if (fs.existsSync(this.file(runId, 'final.json'))) {
        const parsed = FinalResultSchema.safeParse(safeJson(fs.readFileSync(this.file(runId, 'final.json'), 'utf-8')));
        return { runId, status: 'complete', bestScore: parsed.success ? parsed.data.best.overallScore : null };
      }
      if (fs.existsSync(this.file(runId, 'state.json'))) {
        return { runId, status: 'in_progress', bestScore: null };
      }
      return { runId, status: 'unknown', bestScore: null };
    });

    return runs.sort((a, b) => b.runId.localeCompare(a.runId));
  }

  private assertRun(runId: string) {
    if (!fs.existsSync(this.runDir(runId))) {
      throw new RunNotFoundError(runId);
    }
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
