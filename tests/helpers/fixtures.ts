import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { ImageUploader, UploaderKind, UploaderProvider } from '../../src/uploaders/types.js';
import { createLogger, type Logger } from '../../src/utils/logger.js';

export async function makeTempDir(prefix = 'markdown-abs-'): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const filePath = path.join(root, rel);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export type LogLine = { level: string; event: string } & Record<string, unknown>;

/** Debug-level logger that keeps every line it writes. */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const sink = (line: string) => {
    lines.push(JSON.parse(line));
  };
  return { logger: createLogger({ level: 'debug', stdout: sink, stderr: sink }), lines };
}

export type UploadCall = { imagePath: string; override: boolean };

/** Returns `<baseUrl>/<basename>` for every image and records the calls. */
export class RecordingUploader implements ImageUploader {
  kind: UploaderKind = 's3';
  readonly calls: UploadCall[] = [];
  private readonly baseUrl: string;
  private readonly delayMs: number;
  private readonly failOn: string | null;
  inFlight = 0;
  maxInFlight = 0;

  constructor(options: { baseUrl?: string; delayMs?: number; failOn?: string } = {}) {
    this.baseUrl = options.baseUrl ?? 'https://cdn.test';
    this.delayMs = options.delayMs ?? 0;
    this.failOn = options.failOn ?? null;
  }

  async uploadImage(imagePath: string, override: boolean): Promise<string> {
    this.calls.push({ imagePath, override });
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      const name = path.basename(imagePath);
      if (this.failOn === name) throw new Error(`upload refused for ${name}`);
      return `${this.baseUrl}/${name}`;
    } finally {
      this.inFlight -= 1;
    }
  }
}

/** Hands the same RecordingUploader to every document. */
export class RecordingProvider implements UploaderProvider {
  kind: UploaderKind = 's3';
  readonly uploader: RecordingUploader;
  readonly documents: string[] = [];

  constructor(uploader: RecordingUploader = new RecordingUploader()) {
    this.uploader = uploader;
  }

  uploaderFor(markdownPath: string): RecordingUploader {
    this.documents.push(markdownPath);
    return this.uploader;
  }
}
