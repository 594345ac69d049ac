// Main entry point
export { IsolationSourceLookup, outputBaseName, resolveOutputBase } from './IsolationSourceLookup.js';
export type { IsolationSourceLookupConfig } from './IsolationSourceLookup.js';

// Domain model
export { Database, AccessionKind, ACCESSION_RULES, DATABASE_BY_KIND, isDatabase } from './domain/model/Accession.js';
export type { AccessionRule, ClassifiedIdentifier } from './domain/model/Accession.js';
export type { Batch } from './domain/model/Batch.js';
export { createBatch, buildBatchQuery } from './domain/model/Batch.js';
export type { PacingPolicy, PacingOptions } from './domain/model/PacingPolicy.js';
export { computePacingPolicy, isPauseDue } from './domain/model/PacingPolicy.js';
export type { SequenceRecord, SequenceFeature, Reference, RemoteRecord } from './domain/model/SequenceRecord.js';
export type { IsolationSourceRow, ExtractedSource } from './domain/model/IsolationSourceRow.js';
export {
  NO_ISOLATION_SOURCE,
  NO_COUNTRY,
  formatReferences,
  reportHeader,
  rowCells,
} from './domain/model/IsolationSourceRow.js';
export { RunStatus } from './domain/model/RunStatus.js';
export { ExitCode } from './domain/model/RunOutcome.js';
export type { RunOutcome, RunSummary, RunArtifacts } from './domain/model/RunOutcome.js';

// Domain services
export { IdentifierClassifier } from './domain/services/IdentifierClassifier.js';
export type { ClassificationResult, SkippedSequence } from './domain/services/IdentifierClassifier.js';
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export { SourceExtractor } from './domain/services/SourceExtractor.js';
export type { Extraction, MissingQualifier } from './domain/services/SourceExtractor.js';
export { SourceHistogram } from './domain/services/SourceHistogram.js';

// Application internals (for custom pipelines)
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorListener } from './application/EventBus.js';
export { RetryExecutor } from './application/RetryExecutor.js';
export type { RetryResult } from './application/RetryExecutor.js';
export { RemoteFetcher } from './application/RemoteFetcher.js';
export type { FetchOutcome } from './application/RemoteFetcher.js';
export { BatchScheduler } from './application/BatchScheduler.js';
export type { SleepFn, RecordConsumer, ScheduleOutcome } from './application/BatchScheduler.js';
export { ResultAggregator } from './application/ResultAggregator.js';

// Ports (for custom implementations)
export type {
  SequenceDatabaseClient,
  SearchResult,
  ContinuationContext,
  RecordStream,
} from './domain/ports/SequenceDatabaseClient.js';
export type { SequenceParser } from './domain/ports/SequenceParser.js';
export type { ReportWriter, ReportWriterFactory } from './domain/ports/ReportWriter.js';
export type { LogSink, LogLevel } from './domain/ports/LogSink.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  RequestOperation,
  FileLoadedEvent,
  FileSkippedEvent,
  IdentifierSkippedEvent,
  RunStartedEvent,
  RunCompletedEvent,
  RunAbortedEvent,
  RunFailedEvent,
  BatchStartedEvent,
  BatchPausedEvent,
  BatchCompletedEvent,
  BatchEmptyEvent,
  BatchUnparseableEvent,
  BatchFailedEvent,
  RequestRetriedEvent,
  RequestFailedEvent,
  RecordSkippedEvent,
  RecordAnomalyEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { EntrezClient, ENTREZ_BASE_URL } from './infrastructure/ncbi/EntrezClient.js';
export type { EntrezClientOptions } from './infrastructure/ncbi/EntrezClient.js';
export { FastaParser } from './infrastructure/parsers/FastaParser.js';
export { GenBankParser } from './infrastructure/parsers/GenBankParser.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { detectSequenceFormat } from './infrastructure/detectSequenceFormat.js';
export type { SequenceFormat } from './infrastructure/detectSequenceFormat.js';
export { CsvReportWriter, openCsvReport } from './infrastructure/report/CsvReportWriter.js';
export { describeEvent, formatDuration } from './infrastructure/logging/describeEvent.js';
export { attachLogSink } from './infrastructure/logging/attachLogSink.js';
export { ConsoleLogSink } from './infrastructure/logging/ConsoleLogSink.js';
export { FileLogSink } from './infrastructure/logging/FileLogSink.js';
export { TeeLogSink } from './infrastructure/logging/TeeLogSink.js';
