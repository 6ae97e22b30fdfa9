import { IDocumentSerializer } from '../interfaces/services';
import { DocumentRequest } from '../types/domain';
import { DocumentResponse } from '../models/DocumentResponse';

// JSON codec for the document endpoint. Both directions throw on bad input.
export class JsonDocumentSerializer implements IDocumentSerializer {
  encode(request: DocumentRequest): string {
    return JSON.stringify({
      productDocument: request.productDocument,
      productGroup: request.productGroup,
      documentFormat: request.documentFormat,
      type: request.type,
      signature: request.signature
    });
  }

  decode(body: string): DocumentResponse {
    const parsed: unknown = JSON.parse(body);
    return DocumentResponse.fromJSON(parsed);
  }
}
