/**
 * Preview command - dry run, artifact to stdout
 */

import { createContext, type GlobalOptions } from '../lib/context.js';
import { runPipeline } from '../lib/pipeline.js';
import type { OutputFormat } from '../types.js';

interface PreviewOptions extends GlobalOptions {
  format: OutputFormat;
}

export async function preview(options: PreviewOptions): Promise<void> {
  const { deps } = await createContext(options);

  const { result, artifacts } = await runPipeline(
    { ...deps, settings: { ...deps.settings, output: { ...deps.settings.output, formats: [options.format] } } },
    { kind: 'manual', dryRun: true }
  );

  const artifact = artifacts.find(a => a.format === options.format);
  if (!artifact) {
    console.error(`[preview] No ${options.format} output (${result.status}${result.error ? `: ${result.error}` : ''})`);
    process.exitCode = 1;
    return;
  }

  if (artifact.subject) {
    console.error(`[preview] Subject: ${artifact.subject}`);
  }
  process.stdout.write(artifact.content);
}
