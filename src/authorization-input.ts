import * as readline from 'readline/promises';
import chalk from 'chalk';
import open from 'open';
import { AuthorizationInput } from './oauth-client';
import logger from './logger';

export interface ConsoleAuthorizationOptions {
  openBrowser?: boolean;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  launch?: (url: string) => Promise<unknown>;
}

export class ConsoleAuthorizationInput implements AuthorizationInput {
  private openBrowser: boolean;
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;
  private launch: (url: string) => Promise<unknown>;

  constructor(options: ConsoleAuthorizationOptions = {}) {
    this.openBrowser = options.openBrowser ?? true;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.launch = options.launch ?? open;
  }

  async awaitRedirectUrl(authorizationUrl: string): Promise<string> {
    this.print(chalk.bold('\n=== Spotify authorization required ==='));
    this.print('1. Log in to Spotify in your browser and approve the requested permissions.');
    this.print('2. Spotify redirects to your redirect URI. Copy the FULL URL from the address bar.');
    this.print('3. Paste that URL below.\n');

    if (this.openBrowser) {
      try {
        await this.launch(authorizationUrl);
      } catch (error) {
        logger.debug('Could not open browser', {
          error: error instanceof Error ? error.message : error
        });
      }
    }
    this.print(`If the browser did not open, visit this URL:\n${authorizationUrl}\n`);

    const rl = readline.createInterface({ input: this.input, output: this.output });
    try {
      return (await rl.question('Paste the full redirect URL here: ')).trim();
    } finally {
      rl.close();
    }
  }

  private print(line: string): void {
    this.output.write(`${line}\n`);
  }
}
