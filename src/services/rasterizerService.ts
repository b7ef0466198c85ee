import { execFile } from 'child_process';
import { promisify } from 'util';
import { config } from '../config';
import { IOFailure, toError } from '../errors';
import { PageRange, Rasterizer } from '../types';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<CommandOutput>;

export interface RasterizerOptions {
  ghostscriptBin: string;
  imagemagickBin: string;
  dpi: number;
  jpegQuality?: number;
}

const defaultRunner: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, { encoding: 'utf8', maxBuffer: 10 * 1024 * 1024 });
  return { stdout, stderr };
};

/**
 * Escape a path for use inside a PostScript string literal.
 */
function postscriptString(value: string): string {
  return value.replace(/[\\()]/g, (char) => `\\${char}`);
}

/**
 * Rasterizer backed by Ghostscript for PDF -> JPEG and ImageMagick for resizing.
 */
export class RasterizerService implements Rasterizer {
  constructor(
    private readonly options: RasterizerOptions,
    private readonly run: CommandRunner = defaultRunner
  ) {}

  /**
   * Check that Ghostscript can be invoked
   */
  async checkHealth(): Promise<boolean> {
    try {
      await this.run(this.options.ghostscriptBin, ['--version']);
      return true;
    } catch (error) {
      console.error('Ghostscript health check failed:', toError(error).message);
      return false;
    }
  }

  /**
   * Ask Ghostscript for the page count without rendering anything.
   * @param sourcePath - Path to the PDF file
   */
  async countPages(sourcePath: string): Promise<number> {
    const args = [
      '-q',
      '-dNODISPLAY',
      '-dSAFER',
      `--permit-file-read=${sourcePath}`,
      '-c',
      `(${postscriptString(sourcePath)}) (r) file runpdfbegin pdfpagecount = quit`
    ];

    let stdout: string;
    try {
      ({ stdout } = await this.run(this.options.ghostscriptBin, args));
    } catch (error) {
      throw new IOFailure(`Could not read page count of ${sourcePath}`, { sourcePath }, toError(error));
    }

    const trimmed = stdout.trim();
    if (!/^\d+$/.test(trimmed)) {
      throw new IOFailure(`Unexpected page count output for ${sourcePath}: "${trimmed}"`, { sourcePath });
    }
    return parseInt(trimmed, 10);
  }

  /**
   * Render a page range of the PDF to a JPEG
   * @param sourcePath - Path to the PDF file
   * @param range - Pages to render; a single page when writing one file
   * @param outputPath - Destination, may contain Ghostscript's %d for multi-page ranges
   */
  async rasterizePage(sourcePath: string, range: PageRange, outputPath: string): Promise<void> {
    const args = [
      '-dNOPAUSE',
      '-dBATCH',
      '-sDEVICE=jpeg',
      `-dFirstPage=${range.first}`,
      `-dLastPage=${range.last}`,
      `-sOutputFile=${outputPath}`,
      `-dJPEGQ=${this.options.jpegQuality ?? 90}`,
      `-r${this.options.dpi}`,
      '-q',
      sourcePath
    ];

    try {
      const { stderr } = await this.run(this.options.ghostscriptBin, args);
      if (stderr) {
        console.warn('[Rasterizer] gs stderr:', stderr);
      }
    } catch (error) {
      throw new IOFailure(
        `Rasterizing pages ${range.first}-${range.last} of ${sourcePath} failed`,
        { sourcePath, outputPath },
        toError(error)
      );
    }
  }

  /**
   * Scale an image to fit the bounding box, keeping aspect ratio and never upscaling
   */
  async resize(sourcePath: string, maxWidth: number, maxHeight: number, outputPath: string): Promise<void> {
    // '>' only shrinks images larger than the box
    const args = [sourcePath, '-resize', `${maxWidth}x${maxHeight}>`, outputPath];

    try {
      await this.run(this.options.imagemagickBin, args);
    } catch (error) {
      throw new IOFailure(
        `Resizing ${sourcePath} to ${maxWidth}x${maxHeight} failed`,
        { sourcePath, outputPath },
        toError(error)
      );
    }
  }
}

export default new RasterizerService({
  ghostscriptBin: config.ghostscriptBin,
  imagemagickBin: config.imagemagickBin,
  dpi: config.pipeline.dpi
});
