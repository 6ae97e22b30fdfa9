import express from 'express';
import winston from 'winston';
import _ from 'lodash';
import { v4 as uuidv4 } from 'uuid';
import { body, validationResult } from 'express-validator';
import { DocumentFormat, DocumentType, ProductGroup } from '../types/domain';
import { Configuration } from '../services/Configuration';

export const DOCUMENT_CREATE_PATH = '/api/v3/lk/documents/create';

export interface MockSubmission {
  requestId: string;
  authorization?: string;
  body: unknown;
}

export interface MockDocumentServiceOptions {
  authToken: string;
  logger?: winston.Logger;
}

export interface MockDocumentService {
  app: express.Express;
  submissions: MockSubmission[];
}

const defaultLogger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({ format: winston.format.simple() })
  ]
});

// Stand-in for the document creation endpoint, for local runs and tests
export function createMockDocumentService(options: MockDocumentServiceOptions): MockDocumentService {
  const logger = options.logger ?? defaultLogger;
  const submissions: MockSubmission[] = [];
  const expectedAuthorization = `Bearer ${options.authToken}`;

  const app = express();
  app.use(express.json());

  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      service: 'MockDocumentService',
      timestamp: new Date().toISOString()
    });
  });

  app.post(
    DOCUMENT_CREATE_PATH,
    body('productDocument').isString().withMessage('productDocument must be a string'),
    body('productGroup').isIn(Object.values(ProductGroup)).withMessage('productGroup is not supported'),
    body('documentFormat').isIn(Object.values(DocumentFormat)).withMessage('documentFormat is not supported'),
    body('type').isIn(Object.values(DocumentType)).withMessage('type is not supported'),
    body('signature').isString().notEmpty().withMessage('signature is required'),
    (req: express.Request, res: express.Response) => {
      const requestId = req.get('X-Request-ID') || 'unknown';
      const authorization = req.get('Authorization');

      submissions.push({ requestId, authorization, body: req.body });
      logger.info(`MockDocumentService received request ${requestId}`);

      if (authorization !== expectedAuthorization) {
        res.status(401).json({
          errorCode: 'UNAUTHORIZED',
          errorMessage: 'Invalid or missing bearer token'
        });
        return;
      }

      const errors = validationResult(req);
      if (!errors.isEmpty()) {
        res.status(400).json({
          errorCode: 'VALIDATION_FAILED',
          errorMessage: 'Invalid document request',
          errorDescription: _.uniq(errors.array().map((error) => String(error.msg))).join('; ')
        });
        return;
      }

      // Empty documents are accepted at HTTP level but rejected by the business check
      if (_.isEmpty(_.trim(req.body.productDocument))) {
        res.json({
          errorCode: 'EMPTY_DOCUMENT',
          errorMessage: 'Product document is empty',
          errorDescription: 'The productDocument field must contain the document body'
        });
        return;
      }

      res.json({ value: uuidv4() });
    }
  );

  return { app, submissions };
}

if (require.main === module) {
  const config = new Configuration();
  const { app } = createMockDocumentService({ authToken: config.getAuthToken() });
  const port = config.getMockPort();

  app.listen(port, () => {
    defaultLogger.info(`MockDocumentService running on port ${port}`);
  });
}
