import fs from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { IOFailure, PipelineError, RemoteFailure, toError } from '../errors';
import { ObjectStore, PipelineFailure, PipelineReport, RequestFields } from '../types';
import { deriveTemplates } from '../utils/template';
import conversionService, { ConversionService } from './conversionService';
import storageService from './storageService';
import uploadService, { requireSingleField, UploadService, validateRemoteTemplates } from './uploadService';

export interface PipelineDeps {
  store: ObjectStore;
  conversion: ConversionService;
  upload: UploadService;
  scratchDir: string;
}

/**
 * Handles one conversion request from form fields to published objects.
 */
export class PipelineService {
  constructor(private readonly deps: PipelineDeps) {}

  /**
   * Download the source document into a fresh scratch directory
   */
  private async fetchSource(remotePath: string, workDir: string): Promise<string> {
    const sourcePath = path.join(workDir, 'source.pdf');
    const reader = await this.deps.store.fetch(remotePath);
    const writer = fs.createWriteStream(sourcePath);

    // pipeline destroys both streams on failure; the first to error is the origin
    const origin: { side?: 'read' | 'write' } = {};
    reader.once('error', () => {
      origin.side ??= 'read';
    });
    writer.once('error', () => {
      origin.side ??= 'write';
    });

    try {
      await pipeline(reader, writer);
    } catch (error) {
      if (origin.side !== 'write') {
        throw new RemoteFailure(`Could not fetch ${remotePath}`, { remotePath }, toError(error));
      }
      throw new IOFailure(`Could not write ${remotePath} to ${sourcePath}`, { remotePath }, toError(error));
    }

    console.log(`[Pipeline] Fetched ${remotePath} to ${sourcePath}`);
    return sourcePath;
  }

  async run(fields: RequestFields): Promise<PipelineReport> {
    // reject bad input before touching the store
    const sourceRemotePath = requireSingleField(fields, 'pdf');
    validateRemoteTemplates(fields);

    const workDir = path.join(this.deps.scratchDir, uuidv4());
    try {
      await fs.promises.mkdir(workDir, { recursive: true });
    } catch (error) {
      throw new IOFailure(`Could not create scratch directory ${workDir}`, { workDir }, toError(error));
    }

    try {
      const sourcePath = await this.fetchSource(sourceRemotePath, workDir);
      const templates = deriveTemplates(path.join(workDir, 'page%d.jpg'));

      const conversion = await this.deps.conversion.convert(sourcePath, templates);
      const convertedPages = new Set(conversion.results.flatMap((result) => result.completedPages));
      const upload = await this.deps.upload.uploadAll(conversion.job, fields, convertedPages);

      const failures: PipelineFailure[] = [
        ...conversion.failures.map((failure): PipelineFailure => ({ phase: 'conversion', ...failure })),
        ...upload.skipped.map((failure): PipelineFailure => ({ phase: 'upload', ...failure })),
        ...upload.failures.map((failure): PipelineFailure => ({ phase: 'upload', ...failure }))
      ];

      const report: PipelineReport = {
        status: failures.length === 0 ? 'completed' : 'partial',
        pageCount: conversion.job.pageCount,
        objects: upload.uploaded.map((target) => target.remotePath).sort(),
        failures
      };

      console.log(
        `[Pipeline] ${sourceRemotePath}: ${report.status}, ${report.objects.length} objects, ${failures.length} failures`
      );
      return report;
    } catch (error) {
      if (!(error instanceof PipelineError)) {
        console.error(`[Pipeline] Unexpected error for ${sourceRemotePath}:`, error);
      }
      throw error;
    } finally {
      await this.cleanup(workDir);
    }
  }

  /**
   * Remove the scratch directory and everything rendered into it
   */
  private async cleanup(workDir: string): Promise<void> {
    try {
      await fs.promises.rm(workDir, { recursive: true, force: true });
      console.log(`[Pipeline] Deleted scratch directory: ${workDir}`);
    } catch (error) {
      console.error(`[Pipeline] Error deleting ${workDir}:`, toError(error).message);
    }
  }
}

export default new PipelineService({
  store: storageService,
  conversion: conversionService,
  upload: uploadService,
  scratchDir: config.scratchDir
});
