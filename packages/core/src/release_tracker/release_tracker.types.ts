import type { AppNameResolver } from '../app_name_resolver';
import type { Logger } from '../logger';
import type { MessageSource } from '../message_source';
import type { PageSink, PublishResult } from '../page_sink';
import type { ReleaseRecordBuilder } from '../record_builder';
import type { ReleaseRecord } from '../release_types';
import type { RenderFormat } from '../renderer';
import type { ReplyMerger } from '../reply_merger';

export type ReleaseTrackerDependencies = {
  source: MessageSource;
  sink: PageSink;
  builder: ReleaseRecordBuilder;
  merger: ReplyMerger;
  resolver: AppNameResolver;
  /** Defaults to the system clock */
  clock?: () => Date;
  logger?: Logger;
};

export type RunOptions = {
  /** Lookback window in days */
  windowDays: number;
  /** Destination page; required unless dryRun */
  pageId?: string;
  /** Build and render without publishing */
  dryRun?: boolean;
  /** Format of the returned markup. Publishing always uses storage format */
  format?: RenderFormat;
  maxKeyChanges?: number;
  title?: string;
};

export type RunCounts = {
  /** Messages returned by the source for the window */
  messages: number;
  /** Thread roots whose replies were merged */
  threads: number;
  /** Records built from roots and standalone posts */
  records: number;
  /** Records that passed the acceptance filter, before deduplication */
  accepted: number;
};

export type CollectResult = {
  /** One record per app and version, newest first */
  releases: ReleaseRecord[];
  counts: RunCounts;
};

export type RunResult = {
  releases: ReleaseRecord[];
  markup: string;
  format: RenderFormat;
  generatedAt: Date;
  /** Window start, in seconds */
  oldest: number;
  counts: RunCounts;
  /** Null on dry runs */
  publish: PublishResult | null;
};
