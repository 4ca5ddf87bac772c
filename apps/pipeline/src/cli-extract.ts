import 'dotenv/config';

import { createPipelineContext } from './context.js';
import { extractAll } from './extract.js';

async function main(): Promise<void> {
  try {
    const context = await createPipelineContext();
    const result = await extractAll(context);
    console.log(`Saved ${result.savedFiles.length} raw files -> ${context.paths.rawDir}`);
    if (result.failedCities.length > 0) {
      console.warn(`Failed cities: ${result.failedCities.join(' | ')}`);
    }
  } catch (error) {
    console.error(`Extract failed: ${(error as Error).message}`);
    process.exitCode = 1;
  }
}

void main();
