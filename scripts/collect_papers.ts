import 'dotenv/config';
import { ListingSchema, type ListingEntry } from '../src/agents/schemas';
import { ReportFormatError } from '../src/agents/errors';
import { getFetchConfig } from '../src/config/fetchConfig';
import { parseCollectArgs } from '../src/config/runConfig';
import { collectPapers } from '../src/ingest/collect';
import { CvfPageFetcher, cvfListingUrl } from '../src/ingest/cvf/client';
import { filterPapersByTitle } from '../src/ingest/selection';
import { buildCollectPaths, formatRunTimestamp } from '../src/pipeline/runPaths';
import { readJsonFile, writeJsonAtomic } from '../src/utils/jsonFiles';
import { createConsoleLogger } from '../src/utils/logger';
import { formatValidationErrors } from '../src/utils/validation';

const logger = createConsoleLogger('Collect');

async function loadListing(filePath: string): Promise<ListingEntry[]> {
  const parsed = ListingSchema.safeParse(await readJsonFile(filePath));
  if (!parsed.success) {
    throw new ReportFormatError(filePath, formatValidationErrors(parsed.error));
  }
  return parsed.data;
}

async function main() {
  const config = parseCollectArgs(process.argv.slice(2));
  const fetchConfig = getFetchConfig();
  const paths = buildCollectPaths({
    conference: config.conference,
    year: config.year,
    runTimestamp: formatRunTimestamp(new Date()),
    output: config.output,
  });
  const fetcher = new CvfPageFetcher({ userAgent: fetchConfig.userAgent });

  let allPapers: ListingEntry[];
  if (config.input) {
    allPapers = await loadListing(config.input);
  } else {
    allPapers = await fetcher.fetchListing(cvfListingUrl(config.conference, config.year));
    await writeJsonAtomic(paths.listingPath, allPapers);
    logger.info(`Listing saved to ${paths.listingPath}`);
  }

  if (allPapers.length === 0) {
    logger.warn('0 papers found, abort');
    return;
  }

  const targetPapers = filterPapersByTitle(allPapers, config.search);
  logger.info(
    `Filtered ${targetPapers.length} papers whose title matches '${config.search}'`
  );

  await collectPapers({
    entries: targetPapers,
    fetcher,
    outputPath: paths.outputPath,
    logPath: paths.logPath,
    delayMs: { min: fetchConfig.minDelayMs, max: fetchConfig.maxDelayMs },
    logger,
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
