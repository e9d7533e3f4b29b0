/**
 * Wires settings into the production pipeline dependencies
 */

import { ArxivSource } from './arxiv.js';
import { ConfigError } from './errors.js';
import { AnthropicProvider } from './llm.js';
import { loadTemplates } from './render.js';
import { JsonlRunLog, type RunLog } from './runlog.js';
import { buildSinks } from './send.js';
import { systemClock } from './time.js';
import { loadSettings, type Settings } from './config.js';
import type { PipelineDeps } from './pipeline.js';

export type GlobalOptions = {
  config?: string;
};

export interface AppContext {
  settings: Settings;
  deps: PipelineDeps;
  runLog: RunLog;
}

export async function createContext(options: GlobalOptions): Promise<AppContext> {
  const settings = await loadSettings(options.config);

  if (!settings.anthropic.apiKey) {
    throw new ConfigError(['anthropic.apiKey is empty; set ANTHROPIC_API_KEY']);
  }

  const templates = await loadTemplates();

  return {
    settings,
    runLog: new JsonlRunLog(settings.output.runLog),
    deps: {
      settings,
      source: new ArxivSource({ maxResults: settings.research.maxResults, clock: systemClock }),
      provider: new AnthropicProvider({
        apiKey: settings.anthropic.apiKey,
        model: settings.analysis.model,
        timeoutMs: settings.analysis.requestTimeoutMs,
      }),
      templates,
      sinks: buildSinks(settings),
      clock: systemClock,
    },
  };
}
