// src/cli/commands/post.ts
import { Command, InvalidArgumentError } from 'commander';
import { createPipeline } from '../../core/runtime.js';
import { formatPostResult } from '../../core/summary.js';
import { prepareCommand, reportFatal, type CommonOptions } from '../shared.js';

interface PostOptions extends CommonOptions {
  organize: boolean;
}

function parsePostId(value: string): string {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Post IDs are numeric.');
  }
  return value;
}

export function registerPostCommand(program: Command): void {
  program
    .command('post')
    .description('Download the media of a single post, ignoring the blacklist')
    .argument('<id>', 'Post ID', parsePostId)
    .option('--debug', 'Enable debug logging', false)
    .option('--organize', 'Move prolific authors into their own directory', false)
    .option('--config <path>', 'Configuration file')
    .action(async (id: string, options: PostOptions) => {
      try {
        const config = await prepareCommand(options);
        const pipeline = await createPipeline(config, { organize: options.organize });
        const result = await pipeline.downloadPost(id);
        console.log(formatPostResult(result));
      } catch (error) {
        reportFatal(error);
      }
    });
}
