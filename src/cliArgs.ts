import type { PipelineInput } from './pipeline/runReviewPipeline';

export const USAGE = [
  'Usage: litreview <pdf-folder> [--output <file>] [--out-dir <dir>]',
  'Example: litreview papers/ --out-dir reviews/',
].join('\n');

export function parseArgs(argv: string[]): PipelineInput {
  const positional: string[] = [];
  let outputPath: string | undefined;
  let outputDir: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--output' || arg === '-o') {
      outputPath = argv[++i];
      if (!outputPath) throw new Error(`${arg} needs a file path`);
    } else if (arg === '--out-dir') {
      outputDir = argv[++i];
      if (!outputDir) throw new Error(`${arg} needs a directory`);
    } else if (arg !== undefined && arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  const inputDir = positional[0];
  if (!inputDir || positional.length > 1) {
    throw new Error('Expected exactly one PDF folder');
  }
  return {
    inputDir,
    ...(outputPath ? { outputPath } : {}),
    ...(outputDir ? { outputDir } : {}),
  };
}
