/**
 * Progress Reporter
 *
 * Progress display for `pdfvec index` and `pdfvec extract`, in one of three modes:
 * - Interactive: an ora spinner per stage (stdout is a TTY)
 * - JSON: one NDJSON event per line (--json)
 * - Text: a line per stage start and end (pipes, CI logs)
 *
 * Spinner updates are throttled to one per 100ms. NO_COLOR disables colours.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type {
  DocumentFailure,
  ExtractPipelineResult,
  IndexingStage,
  IndexPipelineResult,
  StageStats,
} from '../../indexer/pipeline.js';
import { formatDuration, formatNamespace, formatNumber, formatUsage } from './format.js';

export type { IndexingStage, IndexPipelineResult, StageStats };

/**
 * An extract run without the page texts.
 */
export type ExtractSummary = Omit<ExtractPipelineResult, 'documents'> & { documentsExtracted: number };

export function toExtractSummary({ documents, ...rest }: ExtractPipelineResult): ExtractSummary {
  return { ...rest, documentsExtracted: documents.length };
}

const STAGES: Record<IndexingStage, { label: string; unit: string }> = {
  scanning: { label: 'Scanning', unit: 'PDFs' },
  extracting: { label: 'Extracting', unit: 'documents' },
  chunking: { label: 'Chunking', unit: 'chunks' },
  embedding: { label: 'Embedding', unit: 'chunks embedded' },
  storing: { label: 'Storing', unit: 'chunks stored' },
};

/** Stages in the order they run */
const STAGE_ORDER: readonly IndexingStage[] = ['scanning', 'extracting', 'chunking', 'embedding', 'storing'];

/** Failed documents and warnings listed in the summary before "... and N more" */
const LIST_LIMIT = 5;

const UPDATE_THROTTLE_MS = 100;
const MAX_PATH_LENGTH = 40;

export interface ProgressReporterOptions {
  /** NDJSON events instead of text */
  json: boolean;
  /** Per-file lines and warnings while spinners run */
  verbose: boolean;
  noColor: boolean;
  /** stdout is a TTY (spinners) */
  isInteractive: boolean;
}

/**
 * One line of --json output.
 */
export type ProgressEvent = { timestamp: string } & (
  | { type: 'stage_start'; stage: IndexingStage; data: { total: number } }
  | {
      type: 'stage_progress';
      stage: IndexingStage;
      data: { processed: number; total: number; currentFile?: string };
    }
  | {
      type: 'stage_complete';
      stage: IndexingStage;
      data: Omit<StageStats, 'stage'>;
    }
  | { type: 'warning' | 'error'; stage?: IndexingStage; data: { message: string; context?: string } }
  | { type: 'complete'; data: { result: IndexPipelineResult | ExtractSummary } }
);

export type ProgressEventType = ProgressEvent['type'];

function truncatePath(path: string): string {
  return path.length <= MAX_PATH_LENGTH ? path : `...${path.slice(-(MAX_PATH_LENGTH - 3))}`;
}

function limitedList(items: readonly string[]): string[] {
  const lines = items.slice(0, LIST_LIMIT).map((item) => chalk.dim(`    - ${item}`));
  if (items.length > LIST_LIMIT) {
    lines.push(chalk.dim(`    ... and ${items.length - LIST_LIMIT} more`));
  }
  return lines;
}

function field(label: string, value: string): string {
  return `  ${chalk.dim(`${label}:`.padEnd(18))}${value}`;
}

function breakdownLines(stageDurations: Partial<Record<IndexingStage, number>>): string[] {
  const timed = STAGE_ORDER.filter((stage) => stageDurations[stage] !== undefined);
  if (timed.length === 0) return [];
  return [
    '',
    chalk.dim('  Breakdown:'),
    ...timed.map((stage) => `    ${chalk.dim(`${STAGES[stage].label}:`.padEnd(13))}${formatDuration(stageDurations[stage] ?? 0)}`),
  ];
}

function failureLines(
  result: { documentFailures: readonly DocumentFailure[]; warnings: readonly string[] },
  verbose: boolean
): string[] {
  const lines: string[] = [];
  if (result.documentFailures.length > 0) {
    lines.push('', chalk.red(`  ${result.documentFailures.length} document(s) failed`));
    lines.push(...limitedList(result.documentFailures.map(({ file, failure }) => `${file}: ${failure.message}`)));
  }
  if (result.warnings.length > 0) {
    lines.push('', chalk.yellow(`  ${result.warnings.length} warning(s) during indexing`));
    if (verbose) {
      lines.push(...limitedList(result.warnings));
    }
  }
  return lines;
}

/**
 * Lines of the end-of-run summary.
 *
 * @param verbose - Adds the per-stage timing breakdown and lists warnings
 */
export function summaryLines(result: IndexPipelineResult, verbose = false): string[] {
  const { embedding } = result;

  const lines = [
    '',
    result.cancelled ? chalk.yellow.bold('Index Cancelled') : chalk.green.bold('Index Complete ✓'),
    '',
    field('Namespace', formatNamespace(result.namespace)),
    field('PDFs found', formatNumber(result.filesScanned)),
    field('Documents', formatNumber(result.documentsExtracted)),
    field('Chunks created', formatNumber(result.chunksCreated)),
    field(
      'Embeddings',
      `${formatNumber(embedding.embedded)} new, ${formatNumber(embedding.cached)} cached, ${formatNumber(embedding.failed)} failed`
    ),
    field('Est. API usage', formatUsage(result.usage)),
    field('Chunks stored', formatNumber(result.chunksStored)),
  ];

  const notStored = result.chunksCreated - result.chunksStored;
  if (notStored > 0) {
    lines.push(field('Not stored', chalk.yellow(formatNumber(notStored))));
  }
  if (result.vectorsRemoved > 0) {
    lines.push(field('Reset removed', formatNumber(result.vectorsRemoved)));
  }
  if (result.resetFailure) {
    lines.push(field('Reset failed', chalk.red(result.resetFailure.message)));
  }
  if (result.markdownFiles.length > 0) {
    lines.push(field('Markdown files', formatNumber(result.markdownFiles.length)));
  }
  lines.push(field('Time elapsed', formatDuration(result.totalDurationMs)));

  if (verbose) {
    lines.push(...breakdownLines(result.stageDurations));
  }
  lines.push(...failureLines(result, verbose));

  lines.push('');
  return lines;
}

/**
 * Lines of the `pdfvec extract` summary.
 */
export function extractSummaryLines(result: ExtractSummary, verbose = false): string[] {
  const lines = [
    '',
    result.cancelled ? chalk.yellow.bold('Extract Cancelled') : chalk.green.bold('Extract Complete ✓'),
    '',
    field('PDFs found', formatNumber(result.filesScanned)),
    field('Documents', formatNumber(result.documentsExtracted)),
    field('Markdown files', formatNumber(result.markdownFiles.length)),
    field('Time elapsed', formatDuration(result.totalDurationMs)),
  ];
  if (verbose) {
    lines.push(...breakdownLines(result.stageDurations));
  }
  lines.push(...failureLines(result, verbose), '');
  return lines;
}

/**
 * Display for one index or extract run.
 *
 * ```typescript
 * const reporter = createProgressReporter({ json: ctx.options.json });
 * reporter.startStage('extracting', 12);
 * reporter.updateProgress(3, 'manuals/setup.pdf');
 * reporter.completeStage({ stage: 'extracting', processed: 12, total: 12, durationMs: 800 });
 * reporter.showSummary(result);
 * ```
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private currentStage: IndexingStage | null = null;
  private currentTotal = 0;
  private lastUpdateTime = 0;
  private verboseLines: string[] = [];

  constructor(private readonly options: ProgressReporterOptions) {
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * @param total - Expected items, 0 while unknown (scanning)
   */
  startStage(stage: IndexingStage, total = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.verboseLines = [];

    if (this.options.json) {
      this.emit({ type: 'stage_start', timestamp: new Date().toISOString(), stage, data: { total } });
      return;
    }

    const { label } = STAGES[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({ text: `${label}...`, prefixText: chalk.cyan(label.padEnd(12)) }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  updateProgress(processed: number, currentFile?: string): void {
    const stage = this.currentStage;
    if (!stage) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emit({
        type: 'stage_progress',
        timestamp: new Date().toISOString(),
        stage,
        data: { processed, total: this.currentTotal, currentFile },
      });
      return;
    }

    if (this.options.verbose && currentFile) {
      this.verboseLines.push(`  → ${currentFile}`);
    }
    if (!this.spinner) return;

    const count =
      this.currentTotal > 0
        ? `${processed}/${this.currentTotal} (${Math.round((processed / this.currentTotal) * 100)}%)`
        : `Found ${processed} PDFs`;
    this.spinner.text = currentFile ? `${count.padEnd(25)} ${chalk.dim(truncatePath(currentFile))}` : count;
  }

  completeStage(stats: StageStats): void {
    const { stage, ...data } = stats;
    const { label, unit } = STAGES[stage];
    const done = `${formatNumber(stats.processed)} ${unit}`;

    if (this.options.json) {
      this.emit({ type: 'stage_complete', timestamp: new Date().toISOString(), stage, data });
    } else if (this.spinner) {
      this.spinner.succeed(`${done} ${chalk.dim(formatDuration(stats.durationMs))}`);
      if (this.options.verbose) {
        for (const line of this.verboseLines.slice(0, 10)) {
          console.log(chalk.dim(line));
        }
        if (this.verboseLines.length > 10) {
          console.log(chalk.dim(`  ... and ${this.verboseLines.length - 10} more`));
        }
      }
    } else {
      console.log(`${label} complete: ${done} (${formatDuration(stats.durationMs)})`);
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * @param context - e.g. the PDF's relative path
   */
  warn(message: string, context?: string): void {
    if (this.options.json) {
      this.emit({ type: 'warning', timestamp: new Date().toISOString(), stage: this.currentStage ?? undefined, data: { message, context } });
      return;
    }
    // Spinners hide warnings unless --verbose
    if (this.options.verbose || !this.options.isInteractive) {
      console.warn(chalk.yellow(`Warning: ${message}${context ? ` (${context})` : ''}`));
    }
  }

  /**
   * A failed document or batch; the run goes on.
   */
  error(message: string, context?: string): void {
    if (this.options.json) {
      this.emit({ type: 'error', timestamp: new Date().toISOString(), stage: this.currentStage ?? undefined, data: { message, context } });
      return;
    }
    console.error(chalk.red(`Error: ${message}${context ? ` (${context})` : ''}`));
  }

  showSummary(result: IndexPipelineResult): void {
    if (this.options.json) {
      this.emit({ type: 'complete', timestamp: new Date().toISOString(), data: { result } });
      return;
    }
    for (const line of summaryLines(result, this.options.verbose)) {
      console.log(line);
    }
  }

  showExtractSummary(result: ExtractSummary): void {
    if (this.options.json) {
      this.emit({ type: 'complete', timestamp: new Date().toISOString(), data: { result } });
      return;
    }
    for (const line of extractSummaryLines(result, this.options.verbose)) {
      console.log(line);
    }
  }

  private emit(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }
}

/**
 * Create a ProgressReporter, filling unset options from the environment.
 */
export function createProgressReporter(options: Partial<ProgressReporterOptions> = {}): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? process.stdout.isTTY ?? false,
  });
}
