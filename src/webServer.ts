import express from 'express';
import type { Request, Response } from 'express';
import cors from 'cors';
import path from 'path';
import { AppConfig } from './config.js';
import { parseLabelCsv } from './csvInput.js';
import { InputResolutionError, LabelSheetError, describeError } from './errors.js';
import { LabelSheetGenerator } from './labelSheetGenerator.js';
import { LabelRecord, RenderOptions } from './types.js';

export const MAX_UPLOAD_SIZE = '16mb';
export const FALLBACK_UPLOAD_NAME = 'upload.csv';

export interface UploadedCsv {
  name: string;
  content: string;
}

export interface GenerateRequest {
  files: UploadedCsv[];
  render: RenderOptions;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionFlag(body: Record<string, unknown>, key: string): boolean {
  const value = body[key];
  return value === undefined ? true : value === true || value === 'on' || value === 'true';
}

/**
 * Reduces an uploaded file name to a safe base name. A name with nothing
 * left but separators, such as one written only in Cyrillic, becomes
 * `upload.csv`.
 */
export function secureFileName(name: string): string {
  const base = path.basename(name.replace(/\\/g, '/'));
  const safe = base.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '');
  const stem = path.basename(safe, path.extname(safe));
  return /[A-Za-z0-9]/.test(stem) ? safe : FALLBACK_UPLOAD_NAME;
}

export function parseGenerateRequest(body: unknown): GenerateRequest {
  if (!isRecord(body) || !Array.isArray(body.files)) {
    throw new InputResolutionError('No files selected');
  }

  const files: UploadedCsv[] = [];
  for (const entry of body.files) {
    if (!isRecord(entry) || typeof entry.name !== 'string' || entry.name.trim() === '') {
      continue;
    }
    if (!entry.name.toLowerCase().endsWith('.csv')) {
      throw new InputResolutionError(`Invalid file type: ${entry.name}. Only CSV files are allowed.`);
    }
    const content = typeof entry.content === 'string' ? entry.content : '';
    files.push({ name: secureFileName(entry.name), content });
  }

  if (files.length === 0) {
    throw new InputResolutionError('No files selected');
  }

  return {
    files,
    render: {
      includeHeader: optionFlag(body, 'includeHeader'),
      includeIdText: optionFlag(body, 'includeId'),
      includeInstruction: optionFlag(body, 'includeInstruction')
    }
  };
}

function timestamp(now: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

export function buildDownloadName(fileNames: string[], now: Date = new Date()): string {
  if (fileNames.length === 1) {
    const base = path.basename(fileNames[0], path.extname(fileNames[0]));
    return `${base}_${timestamp(now)}.pdf`;
  }
  return `barcode_sheets_${timestamp(now)}.pdf`;
}

export function createApp(
  config: AppConfig,
  generator: LabelSheetGenerator = new LabelSheetGenerator({
    texts: config.texts,
    rasterDensity: config.rasterDensity,
    log: () => undefined
  })
): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: MAX_UPLOAD_SIZE }));
  app.use(express.static(config.uiDir));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy' });
  });

  const api = express.Router();
  app.use('/api', api);

  api.post('/generate', async (req: Request, res: Response) => {
    let request: GenerateRequest;
    try {
      request = parseGenerateRequest(req.body);
    } catch (error) {
      res.status(400).json({ error: describeError(error) });
      return;
    }

    try {
      const records: LabelRecord[] = [];
      let skipped = 0;
      for (const file of request.files) {
        const parsed = parseLabelCsv(file.content, file.name);
        records.push(...parsed.records);
        skipped += parsed.skipped.length;
      }

      const downloadName = buildDownloadName(request.files.map(file => file.name));
      const { bytes } = await generator.render(records, request.render, path.basename(downloadName, '.pdf'));
      if (!bytes) {
        res.status(422).json({ error: 'No barcodes found in uploaded files' });
        return;
      }

      res.setHeader('Content-Type', 'application/pdf');
      res.setHeader('Content-Disposition', `attachment; filename="${downloadName}"`);
      res.setHeader('X-Skipped-Rows', String(skipped));
      res.send(Buffer.from(bytes));
    } catch (error) {
      if (error instanceof LabelSheetError) {
        res.status(422).json({ error: `Error generating PDF: ${error.message}` });
        return;
      }
      console.error('PDF generation failed:', error);
      res.status(500).json({ error: 'Error generating PDF' });
    }
  });

  app.get('/', (_req: Request, res: Response) => {
    res.sendFile(path.join(config.uiDir, 'index.html'));
  });

  return app;
}
