import 'dotenv/config';
import { createJudge } from '../src/agents/createJudge';
import { parseClassifyArgs } from '../src/config/runConfig';
import { exportByVerdict, parseVerdictSelection } from '../src/pipeline/filterByVerdict';
import { loadPaperList } from '../src/pipeline/reportFiles';
import { runClassification } from '../src/pipeline/runClassification';
import { buildRunPaths, formatRunTimestamp } from '../src/pipeline/runPaths';
import { createConsoleLogger } from '../src/utils/logger';

const logger = createConsoleLogger('Classify');

async function main() {
  const config = parseClassifyArgs(process.argv.slice(2));
  const judge = createJudge({ modelType: config.modelType, apiKey: config.apiKey, logger });

  const papers = await loadPaperList(config.input);
  logger.info(`Successfully read ${papers.length} entries from ${config.input}`);

  const paths = buildRunPaths({
    venue: config.conference,
    year: config.year,
    runTimestamp: formatRunTimestamp(new Date()),
    output: config.output,
  });

  const report = await runClassification({
    topic: { description: config.topic, venue: config.conference, year: config.year },
    papers,
    judge,
    paths,
    logger,
  });

  const selection =
    config.accept === undefined ? { kind: 'skip' as const } : parseVerdictSelection(config.accept);
  await exportByVerdict(report.results, selection, paths.exportPath);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
