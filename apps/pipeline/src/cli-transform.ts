import 'dotenv/config';

import { createPipelineContext } from './context.js';
import { transformAll } from './transform.js';

async function main(): Promise<void> {
  try {
    const context = await createPipelineContext();
    const result = await transformAll(context);
    console.log(`Staged ${result.records.length} rows -> ${result.outputPath}`);
  } catch (error) {
    console.error(`Transform failed: ${(error as Error).message}`);
    process.exitCode = 1;
  }
}

void main();
