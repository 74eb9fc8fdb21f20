export type DataSourceKind = 'normal' | 'poisson' | 'file';

/** How many times each source has fired, as seen by the UI right now. */
export interface TriggerCounts {
  generatorA: number; // "Generate normal" presses
  generatorB: number; // "Generate Poisson" presses
  fileLoad: number;   // accepted file selections
}

/** The counts the arbiter last acted on. Owned by the session, never global. */
export type TriggerState = Readonly<TriggerCounts>;

export type Dataset = number[];

export interface FileSpec {
  name: string;
  text: string;
  hasHeader: boolean;
}

export interface UploadedFile {
  name: string;
  text: string;
}

export interface ParsedColumn {
  columnName: string;
  values: Dataset;
}

export interface DataProducers {
  normal: () => Dataset;
  poisson: () => Dataset;
  file: () => Dataset;
}

export interface ArbiterOutcome {
  source: DataSourceKind | null;
  dataset: Dataset | null;
  state: TriggerState;
}

export interface DatasetSummary {
  count: number;
  mean: number;
  sd: number;
  min: number;
  max: number;
}
