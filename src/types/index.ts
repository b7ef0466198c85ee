import { Readable } from 'stream';

export type ImageVariant = 'small' | 'normal' | 'large';

export type Visibility = 'public-read';

export interface PageRange {
  first: number;
  last: number;
}

/**
 * Local path templates for one job. Each contains the `%d` page placeholder.
 */
export interface PageTemplates {
  jpegTemplate: string;
  smallTemplate: string;
  largeTemplate: string;
}

export interface ConversionJob extends PageTemplates {
  sourcePath: string;
  pageCount: number;
}

/**
 * Caller-supplied remote path templates, one per variant.
 */
export type RemoteTemplates = Record<ImageVariant, string>;

export interface UploadTarget {
  pageNumber: number;
  variant: ImageVariant;
  localPath: string;
  remotePath: string;
}

export interface PageFailure {
  page: number;
  variant?: ImageVariant;
  code: string;
  message: string;
}

export interface WorkerResult {
  range: PageRange;
  completedPages: number[];
  failure?: PageFailure;
}

export interface ConversionReport {
  job: ConversionJob;
  ranges: PageRange[];
  results: WorkerResult[];
  failures: PageFailure[];
}

export interface UploadReport {
  ranges: PageRange[];
  results: WorkerResult[];
  uploaded: UploadTarget[];
  skipped: PageFailure[];
  failures: PageFailure[];
}

export interface PipelineFailure extends PageFailure {
  phase: 'conversion' | 'upload';
}

export interface PipelineReport {
  status: 'completed' | 'partial';
  pageCount: number;
  objects: string[];
  failures: PipelineFailure[];
}

/**
 * Form fields as they arrive from multer or express.json: a repeated
 * field becomes an array.
 */
export type RequestFields = Record<string, unknown>;

/**
 * External rasterizer/resizer. The coordinators only depend on this shape.
 */
export interface Rasterizer {
  countPages(sourcePath: string): Promise<number>;
  rasterizePage(sourcePath: string, range: PageRange, outputPath: string): Promise<void>;
  resize(sourcePath: string, maxWidth: number, maxHeight: number, outputPath: string): Promise<void>;
  checkHealth(): Promise<boolean>;
}

export interface ObjectStore {
  fetch(remotePath: string): Promise<Readable>;
  store(remotePath: string, body: Readable, size: number, contentType: string, visibility: Visibility): Promise<void>;
  checkHealth(): Promise<boolean>;
}

export interface HealthStatus {
  status: 'ok' | 'error';
  timestamp: string;
  services?: {
    storage: 'up' | 'down';
    rasterizer: 'up' | 'down';
  };
}
