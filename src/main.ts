import { ApplicationContainer } from './container/DIContainer';
import { DocumentFormat, DocumentType, HonestMarkDocument, ProductGroup } from './types/domain';

// Demo entry point - submits one sample document and prints the response
async function startApplication(): Promise<void> {
  const container = new ApplicationContainer();
  container.initialize();
  const logger = container.getLogger();

  const document: HonestMarkDocument = {
    productDocument: 'Goods introduction document',
    productGroup: ProductGroup.SHOES,
    documentFormat: DocumentFormat.MANUAL,
    type: DocumentType.LP_INTRODUCE_GOODS
  };

  try {
    const client = container.getDocumentClient();
    const response = await client.submit(document, 'example-signature');

    logger.info('Document submitted', {
      value: response.value,
      errorCode: response.errorCode,
      errorMessage: response.errorMessage,
      errorDescription: response.errorDescription
    });
  } catch (error) {
    logger.error('Document submission failed:', error);
    process.exitCode = 1;
  } finally {
    await container.shutdown();
  }
}

startApplication().catch((error: unknown) => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
