/**
 * Digest pipeline
 *
 * fetch -> filter -> analyze -> aggregate -> (weekly trends) -> render ->
 * deliver, strictly in that order. runPipeline never throws: anything
 * escaping a stage becomes a failed RunResult. Once the run is aborted no
 * further artifact is delivered.
 */

import { analyzePapers } from './analyzer.js';
import { buildDigest } from './digest.js';
import { RenderFailure, RunTimeout, errorMessage } from './errors.js';
import { renderArtifact, type Templates } from './render.js';
import { filterPapers } from './score.js';
import { deliverAll, type DeliverySink } from './send.js';
import { collectPapers, streamPapers, type PaperSource } from './source.js';
import { fileStamp, windowFor, type Clock } from './time.js';
import { summarizeTrends } from './trends.js';
import type { Settings } from './config.js';
import type { AnalysisProvider } from './llm.js';
import type { RunLog } from './runlog.js';
import type {
  Artifact,
  Digest,
  DigestKind,
  RunCounts,
  RunResult,
  RunStatus,
  RunWarning,
  TokenUsage,
} from '../types.js';

export interface PipelineDeps {
  settings: Settings;
  source: PaperSource;
  provider: AnalysisProvider;
  templates: Templates;
  sinks: DeliverySink[];
  clock: Clock;
}

export interface RunOptions {
  kind: DigestKind;
  /** Run every stage except delivery. */
  dryRun?: boolean;
}

export interface PipelineOutput {
  result: RunResult;
  digest?: Digest;
  artifacts: Artifact[];
}

interface RunState {
  counts: RunCounts;
  usage: TokenUsage;
  warnings: RunWarning[];
  artifacts: Artifact[];
  delivered: string[];
  digest?: Digest;
}

export async function runPipeline(deps: PipelineDeps, options: RunOptions): Promise<PipelineOutput> {
  const { settings, clock } = deps;
  const startedAt = clock.now();
  const runId = `${options.kind}_${fileStamp(startedAt, settings.schedule.timezone)}`;
  const state: RunState = {
    counts: { fetched: 0, kept: 0, analyzed: 0, inDigest: 0 },
    usage: { inputTokens: 0, outputTokens: 0 },
    warnings: [],
    artifacts: [],
    delivered: [],
  };

  console.log(`[run] ${runId} starting${options.dryRun ? ' (dry run)' : ''}`);

  const controller = new AbortController();
  const timeoutMs = settings.schedule.runTimeoutMs;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new RunTimeout(timeoutMs));
    }, timeoutMs);
    timer.unref();
  });

  let status: RunStatus;
  let error: string | undefined;
  try {
    await Promise.race([executeStages(deps, options, state, controller.signal), timeout]);
    status = state.warnings.some(w => w.kind !== 'filter') ? 'partial' : 'success';
  } catch (caught) {
    status = 'failed';
    error = errorMessage(caught);
    console.error(`[run] ${runId} failed: ${error}`);
  } finally {
    clearTimeout(timer);
    controller.abort();
  }

  const result: RunResult = {
    runId,
    kind: options.kind,
    status,
    startedAt,
    finishedAt: clock.now(),
    dryRun: options.dryRun ?? false,
    counts: { ...state.counts },
    usage: { ...state.usage },
    warnings: [...state.warnings],
    artifacts: [...state.delivered],
    ...(state.digest ? { digestGeneratedAt: state.digest.generatedAt } : {}),
    ...(error === undefined ? {} : { error }),
  };

  console.log(
    `[run] ${runId} ${status}: fetched ${result.counts.fetched}, kept ${result.counts.kept}, analyzed ${result.counts.analyzed}, in digest ${result.counts.inDigest}, ${result.warnings.length} warning(s)`
  );

  return {
    result,
    digest: state.digest,
    artifacts: status === 'failed' ? [] : [...state.artifacts],
  };
}

async function executeStages(deps: PipelineDeps, options: RunOptions, state: RunState, signal: AbortSignal): Promise<void> {
  const { settings, clock } = deps;
  const { research, analysis } = settings;

  // 1. Fetch
  const window = windowFor(options.kind, clock.now(), research.lookbackDays);
  console.log(`[source] Fetching ${research.categories.join(', ')} from ${window.start.toISOString()} to ${window.end.toISOString()}`);
  const papers = await collectPapers(streamPapers(deps.source, { categories: research.categories, window }));
  state.counts.fetched = papers.length;
  signal.throwIfAborted();

  // 2. Cheap filter
  const filtered = filterPapers(papers, research);
  state.counts.kept = filtered.kept.length;
  console.log(
    `[run] Filter kept ${filtered.kept.length} of ${filtered.total} (reduction ${(filtered.reduction * 100).toFixed(0)}%)`
  );
  if (filtered.total > 0 && filtered.reduction < research.targetReduction) {
    const message = `Filter reduction ${(filtered.reduction * 100).toFixed(0)}% is below the ${(research.targetReduction * 100).toFixed(0)}% target`;
    console.warn(`[run] ${message}`);
    state.warnings.push({ kind: 'filter', message });
  }

  // 3. Analyze
  const outcome = await analyzePapers(filtered.kept, {
    provider: deps.provider,
    budget: analysis.budget,
    parallelism: analysis.parallelism,
    maxTokens: analysis.maxTokens,
    retry: analysis.retry,
    clock,
    interests: research.keywords,
    signal,
  });
  state.counts.analyzed = outcome.analyzed.length;
  state.usage = outcome.usage;
  for (const failure of outcome.failures) {
    state.warnings.push({ kind: 'analysis', message: failure.message, paperId: failure.paperId });
  }
  signal.throwIfAborted();

  // 4. Aggregate
  let digest = buildDigest(outcome.analyzed, {
    kind: options.kind,
    generatedAt: clock.now(),
    minSignificance: analysis.minSignificance,
    highSignificance: analysis.highSignificance,
  });
  state.counts.inDigest = digest.papers.length;

  // 4b. Trend summary, weekly only
  if (options.kind === 'weekly' && analysis.trendSummary && digest.papers.length > 0) {
    const trend = await summarizeTrends(digest.papers, {
      provider: deps.provider,
      maxTokens: analysis.trendMaxTokens,
      retry: analysis.retry,
      clock,
      signal,
    });
    if (trend.ok) {
      digest = { ...digest, trends: trend.trends };
      state.usage = {
        inputTokens: state.usage.inputTokens + (trend.usage?.inputTokens ?? 0),
        outputTokens: state.usage.outputTokens + (trend.usage?.outputTokens ?? 0),
      };
    } else {
      const message = `Trend summary failed: ${trend.error}`;
      console.warn(`[analyze] ${message}`);
      state.warnings.push({ kind: 'trends', message });
    }
    signal.throwIfAborted();
  }
  state.digest = digest;

  // 5. Render
  const renderOptions = {
    timezone: settings.schedule.timezone,
    brandName: settings.output.brandName,
    highSignificance: analysis.highSignificance,
  };
  for (const format of settings.output.formats) {
    try {
      const artifact = renderArtifact(format, digest, deps.templates, renderOptions);
      state.artifacts.push(artifact);
      console.log(`[render] ${format}: ${artifact.filename}`);
    } catch (caught) {
      const failure =
        caught instanceof RenderFailure ? caught : new RenderFailure(format, errorMessage(caught), { cause: caught });
      console.error(`[render] ${failure.message}`);
      state.warnings.push({ kind: 'render', message: failure.message, format });
    }
  }
  signal.throwIfAborted();

  // 6. Deliver
  if (options.dryRun) {
    console.log(`[deliver] Dry run, skipping delivery of ${state.artifacts.length} artifact(s)`);
    return;
  }
  const report = await deliverAll(state.artifacts, digest, deps.sinks, {
    retry: analysis.retry,
    clock,
    signal,
    onDelivered: where => state.delivered.push(where),
  });
  for (const failure of report.failures) {
    state.warnings.push({ kind: 'delivery', message: failure.message, sink: failure.sink });
  }
}

/**
 * Run the pipeline and append its result to the run log.
 */
export async function runAndRecord(deps: PipelineDeps, runLog: RunLog, options: RunOptions): Promise<PipelineOutput> {
  const output = await runPipeline(deps, options);
  try {
    await runLog.append(output.result);
  } catch (caught) {
    console.error(`[run] Could not append to run log: ${errorMessage(caught)}`);
  }
  return output;
}
