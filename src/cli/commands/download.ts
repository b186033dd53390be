// src/cli/commands/download.ts
import { Command } from 'commander';
import { MAX_LIKED_POSTS } from '../../core/config/constants.js';
import { createPipeline } from '../../core/runtime.js';
import { formatRunSummary } from '../../core/summary.js';
import { parsePositiveInt, prepareCommand, reportFatal, type CommonOptions } from '../shared.js';

interface DownloadOptions extends CommonOptions {
  organize: boolean;
  disableBlacklist?: boolean;
  count: number;
  json: boolean;
}

export function registerDownloadCommand(program: Command): void {
  program
    .command('download', { isDefault: true })
    .description('Download media from recently liked posts')
    .option('--debug', 'Enable debug logging', false)
    .option('--organize', 'Move prolific authors into their own directory', false)
    .option('--disable-blacklist', 'Download posts even if they are blacklisted')
    .option('--count <n>', 'Number of liked posts to fetch (max 200)', parsePositiveInt, MAX_LIKED_POSTS)
    .option('--json', 'Print the run summary as JSON', false)
    .option('--config <path>', 'Configuration file')
    .action(async (options: DownloadOptions) => {
      try {
        const config = await prepareCommand(options);
        const pipeline = await createPipeline(config, { organize: options.organize });
        const summary = await pipeline.run({
          useBlacklist: !options.disableBlacklist,
          count: Math.min(options.count, MAX_LIKED_POSTS),
        });

        console.log(options.json ? JSON.stringify(summary, null, 2) : formatRunSummary(summary));
      } catch (error) {
        reportFatal(error);
      }
    });
}
