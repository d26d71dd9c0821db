import { UserExtractor } from '../core/extractor';
import { UserTransformer } from '../core/transformer';
import { CsvLoader } from '../core/loader';
import { EtlLogger } from '../core/logger';
import { EtlPhase, PipelineSummary } from '../core/types';
import { isEtlError } from '../core/errors';

export interface PipelineDependencies {
  logger: EtlLogger;
  extractor: UserExtractor;
}

export interface PipelineTarget {
  sourceUrl: string;
  outputPath: string;
}

const BANNER = '='.repeat(50);

/**
 * Extract -> Transform -> Load -> Validate over a single endpoint.
 * Stops at the first fatal error; nothing is retried.
 */
export class UserEtlPipeline {
  private logger: EtlLogger;
  private extractor: UserExtractor;
  private transformer: UserTransformer;
  private loader: CsvLoader;
  private currentPhase: EtlPhase = 'extract';

  constructor(private target: PipelineTarget, deps: PipelineDependencies) {
    this.logger = deps.logger;
    this.extractor = deps.extractor;
    this.transformer = new UserTransformer(deps.logger);
    this.loader = new CsvLoader(deps.logger);
  }

  public async execute(): Promise<PipelineSummary> {
    const startTime = Date.now();
    this.logger.info(BANNER);
    this.logger.info('Starting ETL Process');
    this.logger.info(BANNER);

    try {
      this.enterPhase('extract');
      const rawUsers = await this.extractor.extract(this.target.sourceUrl);
      this.logger.logPhaseEnd('extract', rawUsers.length);

      this.enterPhase('transform');
      const { records, stats } = this.transformer.transformBatch(rawUsers);
      this.logger.logPhaseEnd('transform', records.length);
      if (records.length === 0) {
        this.logger.warn('No users remaining after transformation');
      }

      this.enterPhase('load');
      const rowsWritten = await this.loader.load(records, this.target.outputPath);
      this.logger.logPhaseEnd('load', rowsWritten);

      this.enterPhase('validate');
      await this.loader.validate(this.target.outputPath, rowsWritten);
      this.logger.logPhaseEnd('validate', rowsWritten);

      const summary: PipelineSummary = {
        extracted: rawUsers.length,
        malformed: stats.malformed,
        invalid_email: stats.invalid_email,
        duplicates_removed: stats.duplicates,
        rows_written: rowsWritten,
        output_path: this.target.outputPath,
        duration_ms: Date.now() - startTime
      };
      this.logger.logSummary(summary);
      return summary;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      const stage = isEtlError(failure) ? failure.stage : this.currentPhase;
      this.logger.logError(failure, { stage });
      throw failure;
    } finally {
      this.logger.info(BANNER);
      this.logger.info('ETL Process Ended');
      this.logger.info(BANNER);
    }
  }

  private enterPhase(phase: EtlPhase): void {
    this.currentPhase = phase;
    this.logger.logPhaseStart(phase);
  }
}
