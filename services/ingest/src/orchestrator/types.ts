import type { Logger } from '../logger';
import type { CursorStore } from '../cursors/cursorStore';
import type { FetchWindow, WindowPolicy } from '../planning/windowPlanner';

export type SourceName = 'octopus' | 'tado';

export type StreamKind = 'consumption' | 'unit_rate' | 'heating';

export type StreamDescriptor = {
  /** Cursor key, `"{id1}:{id2}"`. */
  key: string;
  kind: StreamKind;
  source: SourceName;
  labels: Record<string, string>;
};

export type StreamBatchResult = {
  fetched: number;
  skipped: number;
  /** Records that count as new and move the watermark. */
  counted: number;
  partitions: string[];
  /** Latest defining timestamp among counted records. */
  latest: Date | null;
};

export interface IngestionStream {
  readonly descriptor: StreamDescriptor;
  readonly cursor: CursorStore;
  readonly policy: WindowPolicy;
  execute(window: FetchWindow, prior: Date | null, logger: Logger): Promise<StreamBatchResult>;
}

export interface IngestionSource {
  readonly name: SourceName;
  enumerate(): Promise<IngestionStream[]>;
  close(): Promise<void>;
}

export type SourceRegistration = {
  name: SourceName;
  /** Set from the source's skip flag. */
  skip: boolean;
  /** Loads settings and builds the source; a failure counts one error for the source. */
  create(): Promise<IngestionSource>;
};

export type StreamOutcome = {
  key: string;
  kind: StreamKind;
  status: 'succeeded' | 'failed';
  fetched: number;
  counted: number;
  partitions: number;
  watermark: string | null;
  error?: string;
};

export type SourceSummary = {
  source: SourceName;
  skipped: boolean;
  successCount: number;
  errorCount: number;
  /** Set when an authentication failure stopped the remaining streams. */
  aborted: boolean;
  streams: StreamOutcome[];
  error?: string;
};

export type RunStatus = 'success' | 'partial_failure' | 'total_failure';

export type RunSummary = {
  status: RunStatus;
  successCount: number;
  errorCount: number;
  startedAt: string;
  finishedAt: string;
  sources: SourceSummary[];
};
