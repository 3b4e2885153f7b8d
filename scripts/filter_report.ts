import 'dotenv/config';
import { parseFilterArgs } from '../src/config/runConfig';
import { exportByVerdict, parseVerdictSelection } from '../src/pipeline/filterByVerdict';
import { loadClassificationResults } from '../src/pipeline/reportFiles';
import { buildFilterExportPath, formatRunTimestamp } from '../src/pipeline/runPaths';
import { createConsoleLogger } from '../src/utils/logger';

const logger = createConsoleLogger('Filter');

async function main() {
  const config = parseFilterArgs(process.argv.slice(2));
  const results = await loadClassificationResults(config.report, logger);
  logger.info(`Loaded ${results.length} results from ${config.report}`);

  const outPath = config.output || buildFilterExportPath(formatRunTimestamp(new Date()));
  const outcome = await exportByVerdict(results, parseVerdictSelection(config.accept), outPath, logger);
  if (outcome.kind === 'invalid') {
    process.exitCode = 2;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
