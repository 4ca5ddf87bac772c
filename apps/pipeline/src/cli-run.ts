import 'dotenv/config';

import { runPipelineOnce } from './pipeline.js';

async function main(): Promise<void> {
  try {
    const run = await runPipelineOnce();
    console.log(`Extracted ${run.extract.savedFiles.length} files, staged ${run.transform.records.length} rows`);
    console.log(`Loaded ${run.load.insertedRows}/${run.load.totalRows} rows`);
    if (run.analysis) {
      console.log(`Highest average PM2.5: ${run.analysis.summary.city_highest_avg_pm2_5 ?? 'n/a'}`);
    }
  } catch (error) {
    console.error(`Pipeline failed: ${(error as Error).message}`);
    process.exitCode = 1;
  }
}

void main();
