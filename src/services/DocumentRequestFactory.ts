import _ from 'lodash';
import {
  DocumentFormat,
  DocumentRequest,
  DocumentType,
  HonestMarkDocument,
  ProductGroup
} from '../types/domain';
import { ValidationError } from '../errors/DocumentClientErrors';

function isMember<T extends string>(enumObject: Record<string, T>, value: unknown): value is T {
  return _.isString(value) && Object.values<string>(enumObject).includes(value);
}

// Validates a document and projects it onto the wire shape
export class DocumentRequestFactory {
  createRequest(document: HonestMarkDocument | null | undefined, signature: string | null | undefined): DocumentRequest {
    if (document === null || document === undefined) {
      throw new ValidationError('Document cannot be null');
    }

    const documentFormat = this.validateFormat(document.documentFormat);
    const type = this.validateType(document.type);
    const productGroup = this.validateProductGroup(document.productGroup);

    if (!_.isString(document.productDocument)) {
      throw new ValidationError('Product document must be a string');
    }
    if (!_.isString(signature)) {
      throw new ValidationError('Signature is required');
    }

    return Object.freeze({
      productDocument: document.productDocument,
      productGroup: String(productGroup),
      documentFormat,
      type,
      signature
    });
  }

  private validateFormat(format: DocumentFormat | null | undefined): DocumentFormat {
    if (format === null || format === undefined) {
      throw new ValidationError('Document format is required');
    }
    if (!isMember(DocumentFormat, format)) {
      throw new ValidationError(`Unknown document format: ${format}`);
    }
    return format;
  }

  private validateType(type: DocumentType | null | undefined): DocumentType {
    if (type === null || type === undefined) {
      throw new ValidationError('Document type is required');
    }
    if (!isMember(DocumentType, type)) {
      throw new ValidationError(`Unknown document type: ${type}`);
    }
    return type;
  }

  private validateProductGroup(group: ProductGroup | null | undefined): ProductGroup {
    if (group === null || group === undefined) {
      throw new ValidationError('Product group is required');
    }
    if (!isMember(ProductGroup, group)) {
      throw new ValidationError(`Unknown product group: ${group}`);
    }
    return group;
  }
}
