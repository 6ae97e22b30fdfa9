import request from 'supertest';
import winston from 'winston';
import { createMockDocumentService, DOCUMENT_CREATE_PATH, MockDocumentService } from '../src/mocks/documentService';

describe('MockDocumentService', () => {
  const validBody = {
    productDocument: 'x',
    productGroup: 'SHOES',
    documentFormat: 'MANUAL',
    type: 'LP_INTRODUCE_GOODS',
    signature: 'sig'
  };

  let service: MockDocumentService;

  beforeEach(() => {
    service = createMockDocumentService({
      authToken: 'test-token',
      logger: winston.createLogger({ silent: true })
    });
  });

  test('should report health', async () => {
    const response = await request(service.app).get('/health').expect(200);

    expect(response.body.status).toBe('healthy');
  });

  test('should accept a valid document', async () => {
    const response = await request(service.app)
      .post(DOCUMENT_CREATE_PATH)
      .set('Authorization', 'Bearer test-token')
      .set('X-Request-ID', 'req-1')
      .send(validBody)
      .expect(200);

    expect(response.body.value).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(service.submissions).toEqual([
      { requestId: 'req-1', authorization: 'Bearer test-token', body: validBody }
    ]);
  });

  test('should reject a wrong bearer token', async () => {
    const response = await request(service.app)
      .post(DOCUMENT_CREATE_PATH)
      .set('Authorization', 'Bearer other-token')
      .send(validBody)
      .expect(401);

    expect(response.body).toEqual({
      errorCode: 'UNAUTHORIZED',
      errorMessage: 'Invalid or missing bearer token'
    });
  });

  test('should reject an unsupported product group', async () => {
    const response = await request(service.app)
      .post(DOCUMENT_CREATE_PATH)
      .set('Authorization', 'Bearer test-token')
      .send({ ...validBody, productGroup: 'BOOKS' })
      .expect(400);

    expect(response.body).toEqual({
      errorCode: 'VALIDATION_FAILED',
      errorMessage: 'Invalid document request',
      errorDescription: 'productGroup is not supported'
    });
  });

  test('should report an empty document as a business error', async () => {
    const response = await request(service.app)
      .post(DOCUMENT_CREATE_PATH)
      .set('Authorization', 'Bearer test-token')
      .send({ ...validBody, productDocument: '  ' })
      .expect(200);

    expect(response.body.errorCode).toBe('EMPTY_DOCUMENT');
    expect(response.body.errorMessage).toBe('Product document is empty');
  });
});
