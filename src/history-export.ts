import * as fs from 'fs';
import * as path from 'path';
import { AggregateReport, PlayEvent } from './types';
import logger from './logger';

export interface ExportedPlay {
  type: PlayEvent['type'];
  name: string;
  performers: string[];
  showName?: string;
  albumName?: string;
  durationSeconds: number;
  playedAt: string;
}

export interface HistoryExport {
  generatedAt: string;
  plays: ExportedPlay[];
  totals: { plays: number; durationSeconds: number };
  artists: Record<string, number>;
  podcasts: Record<string, number>;
  weekdays: Record<string, number>;
  hours: Record<string, number>;
}

export function buildHistoryExport(events: readonly PlayEvent[], report: AggregateReport, generatedAt: Date = new Date()): HistoryExport {
  return {
    generatedAt: generatedAt.toISOString(),
    plays: events.map(event => ({
      type: event.type,
      name: event.name,
      performers: [...event.performerNames],
      showName: event.type === 'episode' ? event.showName : undefined,
      albumName: event.type === 'track' ? event.albumName : undefined,
      durationSeconds: event.durationSeconds,
      playedAt: event.playedAt.toISOString()
    })),
    totals: {
      plays: report.totalPlays,
      durationSeconds: report.totalDurationSeconds
    },
    artists: Object.fromEntries(report.artists),
    podcasts: Object.fromEntries(report.podcasts),
    weekdays: Object.fromEntries(report.weekdays),
    hours: Object.fromEntries(report.hours)
  };
}

/**
 * Write the play history and its totals as JSON. Returns the resolved path.
 */
export function exportHistory(destination: string, events: readonly PlayEvent[], report: AggregateReport): string {
  const resolved = path.resolve(destination);
  const dir = path.dirname(resolved);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(resolved, JSON.stringify(buildHistoryExport(events, report), null, 2), 'utf-8');
  logger.info('Exported play history', { path: resolved, plays: events.length });
  return resolved;
}
