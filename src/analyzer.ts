import { AggregateReport, TimeWindow } from './types';
import { AuthorizationInput, OAuthClient } from './oauth-client';
import { FetchResult, HistoryFetcher } from './history-fetcher';
import { summarize } from './aggregator';
import logger from './logger';

export interface AnalysisOptions {
  timeWindow: TimeWindow;
  maxPages: number;
}

export interface AnalysisResult extends FetchResult {
  report: AggregateReport;
}

export class ListeningAnalyzer {
  constructor(
    private oauth: OAuthClient,
    private fetcher: HistoryFetcher,
    private input: AuthorizationInput
  ) {}

  async run(options: AnalysisOptions): Promise<AnalysisResult> {
    const credential = await this.oauth.ensureCredential(this.input);
    const result = await this.fetcher.fetch(credential, options.timeWindow, options.maxPages);
    const report = summarize(result.events);

    logger.info('Listening history analyzed', {
      plays: report.totalPlays,
      durationSeconds: report.totalDurationSeconds,
      pagesRequested: result.pagesRequested,
      complete: result.complete
    });

    return { ...result, report };
  }
}
