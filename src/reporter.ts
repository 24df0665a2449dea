import chalk from 'chalk';
import moment from 'moment';
import { AggregateReport, PlayEvent, RankedTotal, TimeWindow } from './types';
import { WEEKDAYS, rankTotals } from './aggregator';

export const TOP_LIMIT = 5;

export const EMPTY_RESULT_MESSAGE =
  'No listening data was returned for the selected time range. Spotify only shares a limited ' +
  'number of recent plays, so try listening to something new and run this again.';

export interface ReportContext {
  timeWindow: TimeWindow;
  cutoff: Date;
  complete: boolean;
}

export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);

  const parts: string[] = [];
  if (hours) parts.push(`${hours}h`);
  if (minutes) parts.push(`${minutes}m`);
  if (parts.length === 0) parts.push(`${total % 60}s`);
  return parts.join(' ');
}

function topListing(title: string, entries: RankedTotal[]): string[] {
  const lines = ['', chalk.bold(title), '-'.repeat(title.length)];

  if (entries.length === 0) {
    lines.push('No data for this time range.');
    return lines;
  }

  entries.forEach((entry, index) => {
    lines.push(`${String(index + 1).padStart(2, '0')}. ${entry.name} - ${formatDuration(entry.seconds)}`);
  });
  return lines;
}

export function renderReport(report: AggregateReport, context: ReportContext): string[] {
  const lines = [
    chalk.bold.green('=============== Spotify Listening Summary ==============='),
    `Time range requested : Last ${context.timeWindow} (since ${moment(context.cutoff).format('YYYY-MM-DD')})`,
    `Total plays analyzed : ${report.totalPlays}`,
    `Total listening time : ${formatDuration(report.totalDurationSeconds)}`,
    ...topListing('Top artists by listening time', rankTotals(report.artists, TOP_LIMIT)),
    ...topListing('Top podcasts by listening time', rankTotals(report.podcasts, TOP_LIMIT)),
    '',
    chalk.bold('Listening pattern by day of week:')
  ];

  for (const day of WEEKDAYS) {
    const seconds = report.weekdays.get(day);
    if (seconds) {
      lines.push(`- ${day.padEnd(9)} ${formatDuration(seconds)}`);
    }
  }

  lines.push('', chalk.bold('Listening pattern by hour of day:'));
  for (const hour of [...report.hours.keys()].sort((a, b) => a - b)) {
    lines.push(`- ${String(hour).padStart(2, '0')}:00  ${formatDuration(report.hours.get(hour) ?? 0)}`);
  }

  if (!context.complete) {
    lines.push(
      '',
      chalk.yellow('Warning: Spotify stopped responding part-way through. These totals only cover the plays fetched before the error.')
    );
  }

  return lines;
}

export interface RunResult {
  events: readonly PlayEvent[];
  report: AggregateReport;
  cutoff: Date;
  complete: boolean;
  error?: Error;
}

export interface RunOutcome {
  lines: string[];
  exitCode: number;
  hasReport: boolean;  // False when there was nothing to summarize
  errorMessage?: string;
}

/**
 * Decide what a finished run prints and how the process exits. An empty but
 * complete history is not a failure; a partial one is reported and exits 1.
 */
export function reportOutcome(result: RunResult, timeWindow: TimeWindow): RunOutcome {
  if (result.events.length === 0 && result.complete) {
    return { lines: [EMPTY_RESULT_MESSAGE], exitCode: 0, hasReport: false };
  }

  const lines = renderReport(result.report, {
    timeWindow,
    cutoff: result.cutoff,
    complete: result.complete
  });

  if (result.complete) {
    return { lines, exitCode: 0, hasReport: true };
  }

  return {
    lines,
    exitCode: 1,
    hasReport: true,
    errorMessage: `❌ ${result.error?.message ?? 'Fetching the listening history did not finish'}`
  };
}

export function printReport(lines: string[]): void {
  console.log(`\n${lines.join('\n')}\n`);
}
