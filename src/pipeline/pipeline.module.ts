import { Module } from '@nestjs/common';
import { LEDGER_PATH } from './config/pipeline.constants';
import { PipelineController } from './pipeline.controller';
import { AggregatorService } from './services/aggregator.service';
import { AnalysisWriterService } from './services/analysis-writer.service';
import { DedupLedgerService } from './services/dedup-ledger.service';
import { FileLedgerBackend, LEDGER_BACKEND } from './services/ledger-backend';
import { LlmClientService } from './services/llm-client.service';
import { NotifierService } from './services/notifier.service';
import { PipelineRunnerService } from './services/pipeline-runner.service';
import { PipelineStorageService } from './services/pipeline-storage.service';
import { PostClassifierService } from './services/post-classifier.service';
import { PostFetcherService } from './services/post-fetcher.service';
import { ReportWriterService } from './services/report-writer.service';
import { SocialApiService } from './services/social-api.service';
import { SummarizerService } from './services/summarizer.service';

@Module({
  controllers: [PipelineController],
  providers: [
    PipelineRunnerService,
    PipelineStorageService,
    {
      provide: LEDGER_BACKEND,
      useFactory: (storage: PipelineStorageService) =>
        new FileLedgerBackend(storage, LEDGER_PATH),
      inject: [PipelineStorageService],
    },
    DedupLedgerService,
    SocialApiService,
    PostFetcherService,
    LlmClientService,
    PostClassifierService,
    SummarizerService,
    AnalysisWriterService,
    AggregatorService,
    ReportWriterService,
    NotifierService,
  ],
  exports: [PipelineRunnerService, PipelineStorageService],
})
export class PipelineModule {}
