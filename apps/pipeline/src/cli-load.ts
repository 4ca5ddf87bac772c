import 'dotenv/config';

import { createStoreContext } from './context.js';
import { loadStaged } from './load.js';

async function main(): Promise<void> {
  try {
    const context = await createStoreContext();
    const report = await loadStaged(context);
    console.log(`Inserted ${report.insertedRows}/${report.totalRows} rows in ${report.batchCount} batches`);
    if (report.failedBatches.length > 0) {
      console.warn(`Failed batches: ${report.failedBatches.join(', ')}`);
    }
  } catch (error) {
    console.error(`Load failed: ${(error as Error).message}`);
    process.exitCode = 1;
  }
}

void main();
