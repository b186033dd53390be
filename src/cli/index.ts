#!/usr/bin/env node

import { Command } from 'commander';
import { registerDownloadCommand } from './commands/download.js';
import { registerPostCommand } from './commands/post.js';
import { registerTagCommand } from './commands/tag.js';
import { reportFatal } from './shared.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('likedrop')
    .description('Download the media of your liked posts')
    .version('0.1.0');

  registerDownloadCommand(program);
  registerPostCommand(program);
  registerTagCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch(reportFatal);
}
