#!/usr/bin/env node
import { config } from './config';
import { loadExtractionConfig } from './config/extraction-config';
import { SummaryLogger, createPipeline } from './pipeline';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

const USAGE = 'Usage: guardian-extract <folder|file.pdf> [--config path] [--hint cause] [--json]';

export interface CliOptions {
  target: string;
  configPath?: string;
  causeNumberHint?: string;
  json: boolean;
}

/**
 * Parse `guardian-extract` arguments. Returns null when the usage is wrong.
 */
export function parseCliArgs(args: string[]): CliOptions | null {
  let target: string | undefined;
  let configPath: string | undefined;
  let causeNumberHint: string | undefined;
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--json') {
      json = true;
    } else if (arg === '--config' || arg === '--hint') {
      const value = args[i + 1];
      if (!value || value.startsWith('--')) return null;
      if (arg === '--config') configPath = value;
      else causeNumberHint = value;
      i++;
    } else if (arg.startsWith('--') || target) {
      return null;
    } else {
      target = arg;
    }
  }

  if (!target) return null;
  return { target, configPath, causeNumberHint, json };
}

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (!options) {
    console.error(USAGE);
    return 2;
  }

  if (options.json) SummaryLogger.mute();

  const extractionConfig = loadExtractionConfig(options.configPath ?? config.extraction.configPath);
  const pipeline = createPipeline(config, extractionConfig);

  try {
    const report = await pipeline.runner.run(options.target, { causeNumberHint: options.causeNumberHint });
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    }
    return report.results.some(result => result.outcome === 'store_unavailable') ? 1 : 0;
  } finally {
    await pipeline.close();
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exit(code);
    })
    .catch(error => {
      logger.error({ error: errorMessage(error) }, '❌ Extraction run failed');
      process.exit(1);
    });
}
