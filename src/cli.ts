#!/usr/bin/env node
import 'dotenv/config';
import { loadReviewConfig } from './agents/config';
import { parseArgs, USAGE } from './cliArgs';
import { runReviewPipeline, type PipelineInput } from './pipeline/runReviewPipeline';
import { formatRunReport } from './pipeline/report';
import { createTextServices } from './services/geminiService';
import { extractPdfText } from './utils/paperParser';

async function main(): Promise<void> {
  let input: PipelineInput;
  try {
    input = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exit(1);
  }

  const config = loadReviewConfig();
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error('Cancelling review run...');
    controller.abort();
  });

  const result = await runReviewPipeline(input, config, {
    services: createTextServices(config.apiKey, config.models),
    extractText: extractPdfText,
    signal: controller.signal,
  });

  console.log(formatRunReport(result.report));
  if (!result.success) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
