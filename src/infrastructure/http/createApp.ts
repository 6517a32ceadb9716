import cors from 'cors';
import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import {
  ExceptionalRequestSchema,
  ImportRequestSchema,
  ReportQuerySchema,
  TagTransactionRequestSchema,
  TagVendorsRequestSchema,
  VendorQuerySchema,
} from '../../application/dto/TaggingRequestDTO.js';
import { NotFoundError, PipelineError, SchemaError, StorageIOError } from '../../domain/errors/PipelineErrors.js';
import { AppContainer } from '../bootstrap/AppContainer.js';

class UnsupportedUploadError extends Error {}

const csvMimeTypes = new Set(['text/csv', 'application/csv', 'application/vnd.ms-excel', 'text/plain']);

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 10 * 1024 * 1024, // 10MB max
  },
  fileFilter: (req, file, cb) => {
    if (csvMimeTypes.has(file.mimetype) || file.originalname.toLowerCase().endsWith('.csv')) {
      cb(null, true);
    } else {
      cb(new UnsupportedUploadError('Only CSV exports are allowed'));
    }
  },
});

const statusFor = (error: unknown): number => {
  if (error instanceof ZodError || error instanceof multer.MulterError) {
    return 400;
  }

  if (error instanceof NotFoundError || (error instanceof StorageIOError && error.missing)) {
    return 404;
  }

  if (error instanceof UnsupportedUploadError) {
    return 415;
  }

  if (error instanceof SchemaError) {
    return 422;
  }

  return 500;
};

const sendError = (res: Response, error: unknown): void => {
  const status = statusFor(error);
  const message = error instanceof ZodError ? 'Invalid request' : error instanceof Error ? error.message : 'Unknown error';

  if (status === 500) {
    console.error('❌ Request failed:', error);
  }

  res.status(status).json({
    error: message,
    code: error instanceof PipelineError ? error.code : undefined,
    issues: error instanceof ZodError ? error.issues : undefined,
  });
};

const route =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res) => {
    handler(req, res).catch((error: unknown) => sendError(res, error));
  };

export const createApp = (container: AppContainer): express.Express => {
  const app = express();
  const { importService, taggingService, reportService } = container;

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Spending Tagger API',
      version: '0.1.0',
      dataset: container.config.storage.processedFile,
      rawDir: container.config.storage.rawDir,
    });
  });

  app.get(
    '/api/raw-files',
    route(async (req, res) => {
      res.json({ files: await importService.listRawFiles() });
    }),
  );

  app.post(
    '/api/imports',
    upload.single('export'),
    route(async (req, res) => {
      const result = req.file
        ? await importService.importExport({ fileName: req.file.originalname, content: req.file.buffer.toString('utf8') })
        : await importService.importExport(ImportRequestSchema.parse(req.body));

      res.json(result);
    }),
  );

  app.get(
    '/api/transactions',
    route(async (req, res) => {
      res.json({ transactions: await taggingService.listTransactions() });
    }),
  );

  app.get(
    '/api/transactions/:key/day',
    route(async (req, res) => {
      res.json(await taggingService.dailyContext(req.params.key));
    }),
  );

  app.patch(
    '/api/transactions/:key/exceptional',
    route(async (req, res) => {
      const { exceptional } = ExceptionalRequestSchema.parse(req.body);
      res.json({ transaction: await taggingService.setExceptional(req.params.key, exceptional) });
    }),
  );

  app.get(
    '/api/tagging/pending',
    route(async (req, res) => {
      res.json({ vendors: await taggingService.pendingVendors() });
    }),
  );

  app.get(
    '/api/tagging/progress',
    route(async (req, res) => {
      res.json(await taggingService.progress());
    }),
  );

  app.get(
    '/api/tagging/suggestions',
    route(async (req, res) => {
      const { vendor } = VendorQuerySchema.parse(req.query);
      res.json({ suggestions: await taggingService.suggestTags(vendor) });
    }),
  );

  app.get(
    '/api/tagging/vendor-transactions',
    route(async (req, res) => {
      const { vendor } = VendorQuerySchema.parse(req.query);
      res.json({ transactions: await taggingService.vendorTransactions(vendor) });
    }),
  );

  app.post(
    '/api/tagging/vendors',
    route(async (req, res) => {
      const { vendors, labels, exceptional } = TagVendorsRequestSchema.parse(req.body);
      res.json(await taggingService.tagVendors(vendors, { labels, exceptional }));
    }),
  );

  app.post(
    '/api/tagging/transactions/:key',
    route(async (req, res) => {
      const edit = TagTransactionRequestSchema.parse(req.body);
      res.json({ transaction: await taggingService.tagTransaction(req.params.key, edit) });
    }),
  );

  app.get(
    '/api/reports/categories',
    route(async (req, res) => {
      res.json(await reportService.categoryReport(ReportQuerySchema.parse(req.query)));
    }),
  );

  app.get(
    '/api/reports/monthly',
    route(async (req, res) => {
      res.json(await reportService.monthlyReport(ReportQuerySchema.parse(req.query)));
    }),
  );

  app.get(
    '/api/reports/categories/:category/subtags',
    route(async (req, res) => {
      const filter = ReportQuerySchema.parse(req.query);
      res.json({ category: req.params.category, subtags: await reportService.subtags(req.params.category, filter) });
    }),
  );

  app.get(
    '/api/reports/categories/:category/trend',
    route(async (req, res) => {
      const filter = ReportQuerySchema.parse(req.query);
      res.json({ category: req.params.category, trend: await reportService.categoryTrend(req.params.category, filter) });
    }),
  );

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  // Upload filter and size errors arrive here from multer.
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    sendError(res, error);
  });

  return app;
};
