import moment from 'moment';
import { AggregateReport, PlayEvent, RankedTotal, Weekday } from './types';

// Indexed by ISO weekday - 1, which is also the report order
export const WEEKDAYS: readonly Weekday[] = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday'
];

function addTo<K>(totals: Map<K, number>, key: K, seconds: number): void {
  totals.set(key, (totals.get(key) ?? 0) + seconds);
}

/**
 * Group listening time by artist, podcast, local weekday and local hour.
 *
 * A track counts in full for every listed performer. Episodes feed the
 * podcast totals only. Maps keep first-encountered order, which rankTotals
 * relies on for ties.
 */
export function summarize(events: readonly PlayEvent[]): AggregateReport {
  const report: AggregateReport = {
    artists: new Map(),
    podcasts: new Map(),
    weekdays: new Map(),
    hours: new Map(),
    totalPlays: 0,
    totalDurationSeconds: 0
  };

  for (const event of events) {
    const seconds = event.durationSeconds;

    if (event.type === 'track') {
      for (const performer of new Set(event.performerNames)) {
        addTo(report.artists, performer, seconds);
      }
    } else {
      addTo(report.podcasts, event.showName, seconds);
    }

    const local = moment(event.playedAt);
    addTo(report.weekdays, WEEKDAYS[local.isoWeekday() - 1], seconds);
    addTo(report.hours, local.hour(), seconds);

    report.totalPlays++;
    report.totalDurationSeconds += seconds;
  }

  return report;
}

export function rankTotals(totals: Map<string, number>, limit?: number): RankedTotal[] {
  // Array.prototype.sort is stable, so equal totals keep insertion order
  const ranked = Array.from(totals, ([name, seconds]) => ({ name, seconds }))
    .sort((a, b) => b.seconds - a.seconds);

  return limit === undefined ? ranked : ranked.slice(0, limit);
}
