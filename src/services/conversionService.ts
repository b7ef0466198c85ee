import { config, PipelineConfig } from '../config';
import { errorCode, IOFailure, toError } from '../errors';
import { ConversionJob, ConversionReport, PageRange, PageTemplates, Rasterizer, WorkerResult } from '../types';
import { resolvePage, VARIANTS } from '../utils/template';
import { runPartitioned } from '../utils/workers';
import rasterizerService from './rasterizerService';

type ConversionOptions = Pick<PipelineConfig, 'conversionWorkers' | 'smallVariantSource'>;

const NORMAL_MAX = VARIANTS.normal.maxDimension ?? 800;
const SMALL_MAX = VARIANTS.small.maxDimension ?? 300;

export class ConversionService {
  constructor(
    private readonly rasterizer: Rasterizer,
    private readonly options: ConversionOptions
  ) {}

  /**
   * Number of pages in the document. Any failure is terminal for the request.
   */
  async countPages(sourcePath: string): Promise<number> {
    try {
      return await this.rasterizer.countPages(sourcePath);
    } catch (error) {
      console.error(`[Conversion] Could not count pages of ${sourcePath}:`, toError(error).message);
      if (error instanceof IOFailure) {
        throw error;
      }
      throw new IOFailure(`Page count failed for ${sourcePath}`, { sourcePath }, toError(error));
    }
  }

  /**
   * Convert one range of pages: rasterize the large variant, then derive the
   * normal and small variants from it. Stops at the first failing page.
   */
  async convertRange(sourcePath: string, templates: PageTemplates, range: PageRange): Promise<WorkerResult> {
    const completedPages: number[] = [];

    for (let page = range.first; page <= range.last; page++) {
      const largePath = resolvePage(templates.largeTemplate, page);
      const normalPath = resolvePage(templates.jpegTemplate, page);
      const smallPath = resolvePage(templates.smallTemplate, page);

      try {
        await this.rasterizer.rasterizePage(sourcePath, { first: page, last: page }, largePath);
        await this.rasterizer.resize(largePath, NORMAL_MAX, NORMAL_MAX, normalPath);
        const smallSource = this.options.smallVariantSource === 'large' ? largePath : normalPath;
        await this.rasterizer.resize(smallSource, SMALL_MAX, SMALL_MAX, smallPath);
        completedPages.push(page);
      } catch (error) {
        const err = toError(error);
        console.error(`[Conversion] Page ${page} failed, abandoning pages ${page}-${range.last}:`, err.message);
        return {
          range,
          completedPages,
          failure: { page, code: errorCode(error), message: err.message }
        };
      }
    }

    return { range, completedPages };
  }

  /**
   * Count pages, fan the document out across the conversion workers and wait
   * for all of them.
   * @returns The job and every worker's result, failures included
   */
  async convert(sourcePath: string, templates: PageTemplates): Promise<ConversionReport> {
    const pageCount = await this.countPages(sourcePath);
    const job: ConversionJob = Object.freeze({ sourcePath, pageCount, ...templates });

    console.log(`[Conversion] ${sourcePath}: ${pageCount} pages across ${this.options.conversionWorkers} workers`);

    const { ranges, results, failures } = await runPartitioned(pageCount, this.options.conversionWorkers, (range) =>
      this.convertRange(job.sourcePath, job, range)
    );

    if (failures.length > 0) {
      console.warn(`[Conversion] ${failures.length} worker(s) stopped early for ${sourcePath}`);
    } else {
      console.log(`[Conversion] Converted ${pageCount} pages of ${sourcePath}`);
    }

    return { job, ranges, results, failures };
  }
}

export default new ConversionService(rasterizerService, config.pipeline);
