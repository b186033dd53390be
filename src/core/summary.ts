// src/core/summary.ts
import { statusUrl } from './config/constants.js';
import type { PostDownload, RunSummary } from './orchestrator.js';

const RULE = '━'.repeat(50);

export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    RULE,
    `Summary: ${summary.fetched} fetched, ${summary.filtered} filtered, ` +
      `${summary.downloaded} downloaded, ${summary.skipped} skipped, ${summary.failed} failed`,
    `Posts: ${summary.lookedUp} looked up, ${summary.missing} unavailable, ${summary.noMedia} without media`,
    `Blacklist: ${summary.blacklisted} added, ${summary.expired} expired`,
  ];

  if (summary.failedBatches > 0) {
    lines.push(`Lookup batches skipped after errors: ${summary.failedBatches}`);
  }
  return lines.join('\n');
}

export function formatPostResult(result: PostDownload): string {
  if (!result.found) {
    return `Unable to find post ${statusUrl(result.postId)}`;
  }
  if (result.mediaCount === 0) {
    return `No media found in post ${result.post.id}`;
  }
  return (
    `Post ${result.post.id} by ${result.post.author}: ` +
    `${result.downloaded} downloaded, ${result.skipped} skipped, ${result.failed} failed`
  );
}
