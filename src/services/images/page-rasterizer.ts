/**
 * Page Rasterizer Service
 *
 * Renders one PDF page to an opaque PNG with pdfjs-dist (legacy Node build)
 * drawing onto an @napi-rs/canvas surface, and wraps the PNG in a data URL
 * for the inference request.
 *
 * @module services/images/page-rasterizer
 */

import * as fs from 'fs';
import * as path from 'path';
import { createRequire } from 'module';
import { createCanvas } from '@napi-rs/canvas';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import { DEFAULT_ZOOM } from '../../config.js';
import { PipelineError, missingFileError } from '../../utils/errors.js';

const moduleRequire = createRequire(import.meta.url);

/** pdfjs needs a filesystem path with a trailing separator under Node */
const STANDARD_FONT_DATA_URL =
  path.join(path.dirname(moduleRequire.resolve('pdfjs-dist/package.json')), 'standard_fonts') + path.sep;

/**
 * Options for rendering a page
 */
export interface RenderOptions {
  /** Zero-based page index (default: 0) */
  pageIndex?: number;
  /** Magnification over 72 dpi user space (default: 3.5) */
  zoom?: number;
}

/**
 * A rendered page
 */
export interface RenderedPage {
  png: Buffer;
  width: number;
  height: number;
  pageCount: number;
}

/**
 * Wrap PNG bytes in a `data:image/png;base64,` URL
 */
export function toDataUrl(png: Buffer): string {
  return `data:image/png;base64,${png.toString('base64')}`;
}

/**
 * Service for rasterizing single PDF pages
 */
export class PageRasterizer {
  constructor(private readonly defaults: Required<RenderOptions> = { pageIndex: 0, zoom: DEFAULT_ZOOM }) {}

  /**
   * Render a page and return it as a PNG data URL.
   */
  async renderPageToDataUrl(pdfPath: string, options: RenderOptions = {}): Promise<string> {
    const page = await this.renderPage(pdfPath, options);
    return toDataUrl(page.png);
  }

  /**
   * Render a page to PNG bytes.
   *
   * @throws PipelineError MISSING_FILE, PAGE_OUT_OF_RANGE or RASTERIZE_FAILED
   */
  async renderPage(pdfPath: string, options: RenderOptions = {}): Promise<RenderedPage> {
    const pageIndex = options.pageIndex ?? this.defaults.pageIndex;
    const zoom = options.zoom ?? this.defaults.zoom;

    if (!fs.existsSync(pdfPath)) {
      throw missingFileError('PDF', pdfPath);
    }
    if (!Number.isInteger(pageIndex) || pageIndex < 0) {
      throw new PipelineError('PAGE_OUT_OF_RANGE', `Invalid page index ${pageIndex} for ${pdfPath}`, {
        path: pdfPath,
        pageIndex,
      });
    }
    if (!(zoom > 0)) {
      throw new PipelineError('RASTERIZE_FAILED', `Zoom must be positive, got ${zoom}`);
    }

    const data = new Uint8Array(await fs.promises.readFile(pdfPath));
    const loadingTask = pdfjsLib.getDocument({
      data,
      standardFontDataUrl: STANDARD_FONT_DATA_URL,
      verbosity: 0,
    });

    let pdfDocument: pdfjsLib.PDFDocumentProxy;
    try {
      pdfDocument = await loadingTask.promise;
    } catch (error) {
      await loadingTask.destroy();
      throw new PipelineError(
        'RASTERIZE_FAILED',
        `Cannot open PDF ${pdfPath}: ${error instanceof Error ? error.message : String(error)}`,
        { path: pdfPath }
      );
    }

    try {
      const pageCount = pdfDocument.numPages;
      if (pageIndex >= pageCount) {
        throw new PipelineError(
          'PAGE_OUT_OF_RANGE',
          `PDF ${pdfPath} does not have page index ${pageIndex}`,
          { path: pdfPath, pageIndex, pageCount }
        );
      }

      // pdfjs pages are 1-based
      const page = await pdfDocument.getPage(pageIndex + 1);
      const png = await this.renderToPng(page, zoom);
      return { ...png, pageCount };
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw new PipelineError(
        'RASTERIZE_FAILED',
        `Failed to render page ${pageIndex} of ${pdfPath}: ${error instanceof Error ? error.message : String(error)}`,
        { path: pdfPath, pageIndex }
      );
    } finally {
      await loadingTask.destroy();
    }
  }

  private async renderToPng(
    page: pdfjsLib.PDFPageProxy,
    zoom: number
  ): Promise<{ png: Buffer; width: number; height: number }> {
    const viewport = page.getViewport({ scale: zoom });
    const width = Math.ceil(viewport.width);
    const height = Math.ceil(viewport.height);

    const canvas = createCanvas(width, height);
    const context = canvas.getContext('2d');

    // No alpha: paint an opaque white page before drawing
    context.fillStyle = '#ffffff';
    context.fillRect(0, 0, width, height);

    // pdfjs types its context as the DOM CanvasRenderingContext2D
    const renderContext = {
      canvasContext: context,
      viewport,
      background: '#ffffff',
    } as unknown as Parameters<typeof page.render>[0];

    await page.render(renderContext).promise;
    page.cleanup();

    return { png: canvas.toBuffer('image/png'), width, height };
  }
}
