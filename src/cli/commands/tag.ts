// src/cli/commands/tag.ts
import { Command } from 'commander';
import { createAppLogger } from '../../core/logger.js';
import { MediaLabeler, loadTagMap } from '../../core/library/index.js';
import { createMediaLibrary } from '../../core/runtime.js';
import { prepareCommand, reportFatal, type CommonOptions } from '../shared.js';

interface TagOptions extends CommonOptions {
  labels: boolean;
  updateRecent: boolean;
}

const logger = createAppLogger('tag');

export function registerTagCommand(program: Command): void {
  program
    .command('tag')
    .description('Label downloaded media in the media library')
    .option('--labels', 'Apply the tag map to the media of known authors', false)
    .option('--update-recent', 'Refresh the recent media album', false)
    .option('--debug', 'Enable debug logging', false)
    .option('--config <path>', 'Configuration file')
    .action(async (options: TagOptions) => {
      try {
        const config = await prepareCommand(options);
        if (!options.labels && !options.updateRecent) {
          logger.warn('No operation selected, exiting without taking any action');
          return;
        }

        const library = createMediaLibrary(config);
        const labeler = new MediaLabeler(library, { taggerLabel: config.tagging.taggerLabel });
        try {
          if (options.labels) {
            const tagMap = await loadTagMap(config.files.tagsFile);
            const results = await labeler.labelKnownAuthors(tagMap);
            const updated = results.reduce((total, result) => total + result.updated, 0);
            const skipped = results.filter(result => result.missingLabels.length > 0).length;
            console.log(`Labeled ${updated} photos across ${results.length} authors (${skipped} skipped)`);
          }
          if (options.updateRecent) {
            const { added } = await labeler.updateRecentAlbum(
              config.tagging.recentMediaHours,
              config.tagging.recentAlbumSlug
            );
            console.log(`Album ${config.tagging.recentAlbumSlug} now holds ${added} media items`);
          }
        } finally {
          await library.close();
        }
      } catch (error) {
        reportFatal(error);
      }
    });
}
