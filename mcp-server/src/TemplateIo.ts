import * as fs from 'fs';
import * as path from 'path';
import { FillError, FillErrorCode } from './errors';
import { TemplateFiller } from './TemplateFiller';
import { FillReport, FillRequest } from './types';

/** Delivers template bytes to the engine */
export interface TemplateSource {
  describe(): string;
  read(): Promise<Buffer>;
}

/** Accepts the filled document; returns where it went */
export interface DocumentSink {
  describe(): string;
  write(data: Buffer): Promise<string>;
}

export class FileTemplateSource implements TemplateSource {
  readonly path: string;

  constructor(filePath: string, baseDir: string = process.cwd()) {
    this.path = path.resolve(baseDir, filePath);
  }

  describe(): string {
    return this.path;
  }

  async read(): Promise<Buffer> {
    try {
      return await fs.promises.readFile(this.path);
    } catch (err) {
      throw new FillError(`Template not found: ${this.path}`, FillErrorCode.TEMPLATE_NOT_FOUND, {
        path: this.path,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

/**
 * Writes to a temp file next to the target and renames it into place, so a
 * reader never sees a half-written document.
 */
export class FileDocumentSink implements DocumentSink {
  readonly path: string;

  constructor(filePath: string, baseDir: string = process.cwd()) {
    this.path = path.resolve(baseDir, filePath);
  }

  describe(): string {
    return this.path;
  }

  async write(data: Buffer): Promise<string> {
    const tempPath = `${this.path}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.path), { recursive: true });
    } catch (err) {
      throw this.writeFailed(err);
    }
    try {
      await fs.promises.writeFile(tempPath, data);
      await fs.promises.rename(tempPath, this.path);
      return this.path;
    } catch (err) {
      await fs.promises.rm(tempPath, { force: true });
      throw this.writeFailed(err);
    }
  }

  private writeFailed(err: unknown): FillError {
    return new FillError(`Failed to write ${this.path}`, FillErrorCode.OUTPUT_WRITE_FAILED, {
      path: this.path,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}

export interface SinkResult {
  location: string;
  bytes: number;
  report: FillReport;
}

/**
 * Read a template, fill it and hand the result to a sink. Nothing reaches
 * the sink unless the whole fill succeeded.
 */
export async function fillToSink(
  filler: TemplateFiller,
  source: TemplateSource,
  sink: DocumentSink,
  request: FillRequest
): Promise<SinkResult> {
  const template = await source.read();
  const { document, report } = await filler.fill(template, request);
  const location = await sink.write(document);
  return { location, bytes: document.length, report };
}
