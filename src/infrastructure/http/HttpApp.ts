import { Readable } from 'node:stream';
import cors from 'cors';
import express from 'express';
import type { ErrorRequestHandler, Request } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { toTxRecordDTO } from '../../application/dto/TxRecordDTO.js';
import { TRANSACTION_FORMATS } from '../../application/ports/TransactionCodecPort.js';
import type { TransactionFormat } from '../../application/ports/TransactionCodecPort.js';
import { AppError, InvalidArgumentsError, ParsingError, WriteError } from '../../domain/errors/AppError.js';
import type { AppContainer } from '../bootstrap/AppContainer.js';

const FormatSchema = z.enum(['binary', 'text', 'csv']);

const ConvertFieldsSchema = z.object({
  inputFormat: FormatSchema,
  outputFormat: FormatSchema,
});

const CompareFieldsSchema = z.object({
  format1: FormatSchema,
  format2: FormatSchema,
});

const CONTENT_TYPES: Record<TransactionFormat, string> = {
  binary: 'application/octet-stream',
  text: 'text/plain; charset=utf-8',
  csv: 'text/csv; charset=utf-8',
};

export interface HttpErrorResponse {
  status: number;
  body: {
    error: string;
    code: string;
    context?: ParsingError['context'];
  };
}

export const toHttpError = (error: unknown): HttpErrorResponse => {
  if (error instanceof ParsingError) {
    return { status: 422, body: { error: error.message, code: error.code, context: error.context } };
  }

  if (error instanceof WriteError) {
    return { status: 500, body: { error: error.message, code: error.code } };
  }

  if (error instanceof AppError) {
    return { status: 400, body: { error: error.message, code: error.code } };
  }

  return { status: 500, body: { error: 'Unable to process request', code: 'INTERNAL_ERROR' } };
};

const validateFields = <T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> => {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidArgumentsError(
      'invalid form fields',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
};

const uploadedFile = (req: Request, field: string): Express.Multer.File => {
  const files = req.files;
  const file = files && !Array.isArray(files) ? files[field]?.[0] : undefined;

  if (!file) {
    throw new InvalidArgumentsError(`No file provided in field '${field}'`);
  }
  return file;
};

export const createHttpApp = (container: AppContainer): express.Express => {
  const app = express();
  const log = container.logger.child({ module: 'http' });

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: container.config.server.maxUploadBytes,
    },
  });

  app.use(cors({ origin: '*', credentials: false }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Transaction Format Converter API',
      version: '0.1.0',
      formats: TRANSACTION_FORMATS,
    });
  });

  app.post('/api/convert', upload.fields([{ name: 'file', maxCount: 1 }]), async (req, res) => {
    try {
      const { inputFormat, outputFormat } = validateFields(ConvertFieldsSchema, req.body);
      const file = uploadedFile(req, 'file');

      await container.conversionService.convert({
        input: Readable.from([file.buffer]),
        inputFormat,
        output: res,
        outputFormat,
        onIngested: (count) => {
          res.status(200);
          res.setHeader('Content-Type', CONTENT_TYPES[outputFormat]);
          res.setHeader('X-Records-Ingested', String(count));
        },
      });
      res.end();
    } catch (error) {
      const { status, body } = toHttpError(error);
      log.error({ err: error, status }, 'Conversion failed');
      if (res.headersSent) {
        res.destroy();
        return;
      }
      res.status(status).json(body);
    }
  });

  app.post(
    '/api/compare',
    upload.fields([
      { name: 'file1', maxCount: 1 },
      { name: 'file2', maxCount: 1 },
    ]),
    async (req, res) => {
      try {
        const { format1, format2 } = validateFields(CompareFieldsSchema, req.body);
        const file1 = uploadedFile(req, 'file1');
        const file2 = uploadedFile(req, 'file2');

        const report = await container.comparisonService.compare(
          { source: Readable.from([file1.buffer]), format: format1 },
          { source: Readable.from([file2.buffer]), format: format2 },
        );

        res.json({
          identical: report.identical,
          firstCount: report.firstCount,
          secondCount: report.secondCount,
          unmatched: report.unmatched.map((item) => ({
            record: toTxRecordDTO(item.record),
            presentIn: item.presentIn,
            surplus: item.surplus,
          })),
        });
      } catch (error) {
        const { status, body } = toHttpError(error);
        log.error({ err: error, status }, 'Comparison failed');
        res.status(status).json(body);
      }
    },
  );

  app.use('/api', (req, res) => {
    res.status(404).json({
      error: 'API endpoint not found',
      availableEndpoints: {
        health: 'GET /api/health',
        convert: 'POST /api/convert',
        compare: 'POST /api/compare',
      },
    });
  });

  const handleUploadError: ErrorRequestHandler = (error, req, res, next) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      log.warn({ err: error, status }, 'Upload rejected');
      res.status(status).json({ error: error.message, code: error.code });
      return;
    }
    next(error);
  };
  app.use(handleUploadError);

  return app;
};
