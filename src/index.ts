#!/usr/bin/env node
import { ConfigOverrides, PipelineConfig, loadPipelineConfig, parseTimeout } from './config/pipeline';
import { UserExtractor } from './core/extractor';
import { PipelineLogger } from './core/logger';
import { UserEtlPipeline } from './pipeline/user-etl-pipeline';

function parseArgs(args: string[]): ConfigOverrides {
  const valueOf = (flag: string) => {
    const arg = args.find(a => a.startsWith(`--${flag}=`));
    return arg ? arg.slice(flag.length + 3) : undefined;
  };

  const timeout = valueOf('timeout');
  return {
    sourceUrl: valueOf('url'),
    outputPath: valueOf('output'),
    timeoutMs: timeout === undefined ? undefined : parseTimeout(timeout)
  };
}

async function main(): Promise<number> {
  let config: PipelineConfig;
  try {
    config = loadPipelineConfig(process.env, parseArgs(process.argv.slice(2)));
  } catch (error) {
    console.error('Invalid configuration:', error instanceof Error ? error.message : error);
    return 1;
  }

  const logger = new PipelineLogger({ level: config.logLevel, logDir: config.logDir });
  const pipeline = new UserEtlPipeline(
    { sourceUrl: config.sourceUrl, outputPath: config.outputPath },
    {
      logger,
      extractor: new UserExtractor(logger, { timeoutMs: config.timeoutMs })
    }
  );

  try {
    const summary = await pipeline.execute();
    logger.info(`Processed ${summary.rows_written} users`);
    logger.info(`Output saved to: ${summary.output_path}`);
    return 0;
  } catch {
    // Already logged by the pipeline with its stage and kind
    return 1;
  } finally {
    await logger.close();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Error in main execution:', error);
    process.exitCode = 1;
  });
