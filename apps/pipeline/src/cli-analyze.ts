import 'dotenv/config';

import { analyzeStore } from './analyze.js';
import { createStoreContext } from './context.js';

async function main(): Promise<void> {
  try {
    const context = await createStoreContext();
    const result = await analyzeStore(context);
    if (!result) {
      console.log('No data to analyze. Exiting.');
      return;
    }
    console.log(`Wrote ${result.files.length} files -> ${context.paths.processedDir}`);
  } catch (error) {
    console.error(`Analysis failed: ${(error as Error).message}`);
    process.exitCode = 1;
  }
}

void main();
