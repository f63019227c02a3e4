import type { RunSummary } from './types.js';

/** Human-readable run report, one line per entry, ending with the `Done.` line. */
export function formatRunSummary(summary: RunSummary): string[] {
  const lines: string[] = [
    `Found ${summary.filesFound} file(s) from ${summary.dataPath}`,
    `Processed ${summary.filesProcessed} file(s), ${summary.malformedFiles.length} malformed`,
    `Records: seen=${summary.recordsSeen}, attempted=${summary.productsAttempted}, malformed=${summary.malformedRecordCount}`,
    `Batches committed: ${summary.batchesCommitted}`,
  ];

  for (const issue of summary.malformedFiles) {
    lines.push(`[ERROR] ${issue.message}`);
  }

  for (const issue of summary.malformedRecords) {
    lines.push(`[WARN] ${issue.message}`);
  }
  const unlisted = summary.malformedRecordCount - summary.malformedRecords.length;
  if (unlisted > 0) {
    lines.push(`[WARN] ... and ${unlisted} more malformed record(s)`);
  }

  if (summary.aborted) {
    lines.push(`[ERROR] Run aborted: ${summary.aborted.message}`);
  }

  lines.push(`Errors: total=${summary.totalErrors}`);
  lines.push(`Done. products=${summary.productsUpserted}, images=${summary.imagesUpserted ?? 0}`);
  return lines;
}
