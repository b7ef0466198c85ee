import fs from 'fs';
import { config, PipelineConfig } from '../config';
import { errorCode, IOFailure, toError, ValidationFailure } from '../errors';
import {
  ConversionJob,
  ImageVariant,
  ObjectStore,
  PageFailure,
  PageRange,
  RemoteTemplates,
  RequestFields,
  UploadReport,
  UploadTarget,
  WorkerResult
} from '../types';
import { hasSinglePlaceholder, PLACEHOLDER, resolvePage, templateFor, UPLOAD_ORDER } from '../utils/template';
import { runPartitioned } from '../utils/workers';
import storageService from './storageService';

type UploadOptions = Pick<PipelineConfig, 'uploadWorkers'>;

const CONTENT_TYPE = 'image/jpeg';

/**
 * Read a field that must be supplied exactly once.
 */
export function requireSingleField(fields: RequestFields, name: string): string {
  const raw = fields[name];
  if (raw === undefined || raw === null) {
    throw new ValidationFailure(`Must specify the '${name}' field`, { field: name });
  }

  const values = Array.isArray(raw) ? raw : [raw];
  if (values.length !== 1) {
    throw new ValidationFailure(`Must specify exactly one value in the '${name}' field`, {
      field: name,
      count: values.length
    });
  }

  const value = values[0];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationFailure(`The '${name}' field must be a non-empty string`, { field: name });
  }
  return value;
}

function requireTemplate(fields: RequestFields, variant: ImageVariant): string {
  const template = requireSingleField(fields, variant);
  if (!hasSinglePlaceholder(template)) {
    throw new ValidationFailure(`The '${variant}' template must contain the ${PLACEHOLDER} page placeholder exactly once`, {
      field: variant
    });
  }
  return template;
}

/**
 * Validate the normal, small and large remote templates before any upload.
 */
export function validateRemoteTemplates(fields: RequestFields): RemoteTemplates {
  return {
    normal: requireTemplate(fields, 'normal'),
    small: requireTemplate(fields, 'small'),
    large: requireTemplate(fields, 'large')
  };
}

export function buildTarget(
  job: ConversionJob,
  remoteTemplates: RemoteTemplates,
  pageNumber: number,
  variant: ImageVariant
): UploadTarget {
  return {
    pageNumber,
    variant,
    localPath: resolvePage(templateFor(job, variant), pageNumber),
    remotePath: resolvePage(remoteTemplates[variant], pageNumber)
  };
}

export class UploadService {
  constructor(
    private readonly store: ObjectStore,
    private readonly options: UploadOptions
  ) {}

  /**
   * Upload one local variant image. The file must exist and be non-empty.
   */
  async upload(target: UploadTarget): Promise<void> {
    let size: number;
    try {
      size = (await fs.promises.stat(target.localPath)).size;
    } catch (error) {
      throw new IOFailure(`Cannot read ${target.localPath}`, { localPath: target.localPath }, toError(error));
    }
    if (size === 0) {
      throw new IOFailure(`${target.localPath} is empty`, { localPath: target.localPath });
    }

    const fileStream = fs.createReadStream(target.localPath);
    try {
      await this.store.store(target.remotePath, fileStream, size, CONTENT_TYPE, 'public-read');
    } finally {
      fileStream.destroy();
    }
  }

  private async uploadRange(
    job: ConversionJob,
    remoteTemplates: RemoteTemplates,
    range: PageRange,
    convertedPages: ReadonlySet<number> | undefined,
    uploaded: UploadTarget[],
    skipped: PageFailure[]
  ): Promise<WorkerResult> {
    const completedPages: number[] = [];

    for (let page = range.first; page <= range.last; page++) {
      if (convertedPages && !convertedPages.has(page)) {
        skipped.push({ page, code: 'NOT_CONVERTED', message: `Page ${page} was not converted` });
        continue;
      }

      for (const variant of UPLOAD_ORDER) {
        const target = buildTarget(job, remoteTemplates, page, variant);
        try {
          await this.upload(target);
          uploaded.push(target);
        } catch (error) {
          const err = toError(error);
          console.error(`[Upload] Page ${page} (${variant}) failed, abandoning pages ${page}-${range.last}:`, err.message);
          return {
            range,
            completedPages,
            failure: { page, variant, code: errorCode(error), message: err.message }
          };
        }
      }
      completedPages.push(page);
    }

    return { range, completedPages };
  }

  /**
   * Validate the remote templates, then upload every variant of every page
   * across the upload workers and wait for all of them.
   * @param convertedPages - When given, pages outside it are skipped and reported
   */
  async uploadAll(job: ConversionJob, fields: RequestFields, convertedPages?: ReadonlySet<number>): Promise<UploadReport> {
    const remoteTemplates = validateRemoteTemplates(fields);
    const uploaded: UploadTarget[] = [];
    const skipped: PageFailure[] = [];

    const { ranges, results, failures } = await runPartitioned(job.pageCount, this.options.uploadWorkers, (range) =>
      this.uploadRange(job, remoteTemplates, range, convertedPages, uploaded, skipped)
    );

    skipped.sort((a, b) => a.page - b.page);
    console.log(`[Upload] Uploaded ${uploaded.length}/${job.pageCount * UPLOAD_ORDER.length} objects`);
    return { ranges, results, uploaded, skipped, failures };
  }
}

export default new UploadService(storageService, config.pipeline);
