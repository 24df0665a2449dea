#!/usr/bin/env node

// Load .env before any other imports to ensure environment variables are available
import 'dotenv/config';

import { Command, Option } from 'commander';
import { APP_NAME, APP_VERSION, TIME_WINDOWS, config, loadSpotifyConfig } from './config';
import { CliOptionsSchema } from './api-schemas';
import { AppError, describeError, failureMessage } from './errors';
import { FileTokenStore } from './token-store';
import { OAuthClient } from './oauth-client';
import { SpotifyApi } from './spotify-api';
import { HistoryFetcher } from './history-fetcher';
import { ListeningAnalyzer } from './analyzer';
import { ConsoleAuthorizationInput } from './authorization-input';
import { printReport, reportOutcome } from './reporter';
import { exportHistory } from './history-export';
import logger from './logger';

// Create CLI interface
const program = new Command();

program
  .name(APP_NAME)
  .description('Authenticate with the Spotify Web API and analyze your recent listening history')
  .version(APP_VERSION);

program
  .addOption(
    new Option('-t, --time-range <range>', 'How far back to look when filtering the play history')
      .choices(Object.keys(TIME_WINDOWS))
      .default(config.defaultTimeWindow)
  )
  .option('-e, --export <path>', 'Write the play history and totals to a JSON file')
  .option('-m, --max-pages <number>', 'Maximum number of Spotify pages to fetch', String(config.defaultMaxPages))
  .option('--no-browser', 'Print the authorization URL instead of opening a browser')
  .option('--logout', 'Delete the stored Spotify credential and exit')
  .option('--debug', 'Enable debug logging for troubleshooting')
  .helpOption('-h, --help', 'Display help for command')
  .addHelpText('after', `
Examples:
  $ listening-stats                         # Last month, up to 20 pages
  $ listening-stats --time-range 1week      # Only the last 7 days
  $ listening-stats -e out/history.json     # Also write plays and totals as JSON
  $ listening-stats --logout                # Forget the stored credential

Environment Variables:
  SPOTIFY_CLIENT_ID       Spotify app client id (required)
  SPOTIFY_CLIENT_SECRET   Spotify app client secret (required)
  SPOTIFY_REDIRECT_URI    Redirect URI registered for the app (required)
  TOKENS_FILE_PATH        Where the credential is stored (default: ./tokens.json)
  TOKENS_ENCRYPTION_KEY   Passphrase to encrypt the stored credential (optional)
  LOG_LEVEL               Winston log level (default: info)
  LOG_DIR                 Directory for log files (default: logs)
  REQUEST_TIMEOUT_MS      Timeout for each Spotify request (default: 30000)
`);

// Parse command line arguments
program.parse(process.argv);

const parsedOptions = CliOptionsSchema.safeParse(program.opts());
if (!parsedOptions.success) {
  const issues = parsedOptions.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
  console.error(`Error: invalid options (${issues.join('; ')})`);
  process.exit(1);
}
const cliOptions = parsedOptions.data;

// Configure logging based on debug flag
if (cliOptions.debug) {
  logger.level = 'debug';
  console.log('🐛 Debug mode enabled - verbose logging active');
}

async function main(): Promise<number> {
  const store = new FileTokenStore(config.tokensFilePath, config.tokensEncryptionKey);

  if (cliOptions.logout) {
    if (store.clear()) {
      console.log(`✅ Removed ${config.tokensFilePath}`);
    } else {
      console.log('ℹ️  No stored credential found');
    }
    return 0;
  }

  const spotify = loadSpotifyConfig();

  logger.info('Listening stats starting', {
    nodeVersion: process.version,
    platform: process.platform,
    options: {
      timeRange: cliOptions.timeRange,
      maxPages: cliOptions.maxPages,
      export: cliOptions.export
    }
  });

  const oauth = new OAuthClient(spotify, store);
  const fetcher = new HistoryFetcher(new SpotifyApi(oauth));
  const analyzer = new ListeningAnalyzer(oauth, fetcher, new ConsoleAuthorizationInput({ openBrowser: cliOptions.browser }));

  const result = await analyzer.run({
    timeWindow: cliOptions.timeRange,
    maxPages: cliOptions.maxPages
  });

  const outcome = reportOutcome(result, cliOptions.timeRange);
  printReport(outcome.lines);

  if (outcome.hasReport && cliOptions.export) {
    const written = exportHistory(cliOptions.export, result.events, result.report);
    console.log(`Exported play history to ${written}`);
  }

  if (outcome.errorMessage) {
    console.error(outcome.errorMessage);
  }

  return outcome.exitCode;
}

main()
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch(error => {
    if (error instanceof AppError) {
      logger.error('Run failed', { category: error.category, ...describeError(error) });
    } else {
      logger.error('Unhandled error in main', describeError(error));
    }
    console.error(failureMessage(error));
    process.exit(1);
  });
