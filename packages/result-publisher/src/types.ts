export type SinkKind = 's3' | 'http';

export interface DeliverOptions {
  signal?: AbortSignal;
  runId?: string;
}

export interface Delivery {
  /** Public locator of the delivered archive. */
  url: string;
  key?: string;
}

/** Destination for finished archives. Implementations hold no per-job state. */
export interface ResultSink {
  readonly kind: SinkKind;
  deliver(archivePath: string, options?: DeliverOptions): Promise<Delivery>;
}
