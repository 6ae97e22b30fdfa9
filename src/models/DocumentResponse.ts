import _ from 'lodash';
import { DocumentResponseFields } from '../types/domain';

const RESPONSE_FIELDS = ['value', 'errorCode', 'errorMessage', 'errorDescription'] as const;

function isNonEmpty(value: string | undefined): boolean {
  return value !== undefined && value.length > 0;
}

// Parsed body of a document creation response
export class DocumentResponse {
  readonly value?: string;
  readonly errorCode?: string;
  readonly errorMessage?: string;
  readonly errorDescription?: string;

  constructor(fields: DocumentResponseFields = {}) {
    this.value = fields.value;
    this.errorCode = fields.errorCode;
    this.errorMessage = fields.errorMessage;
    this.errorDescription = fields.errorDescription;
    Object.freeze(this);
  }

  /**
   * The only success/failure discriminator. When the service sends both a value
   * and an error, the error wins.
   */
  hasError(): boolean {
    return isNonEmpty(this.errorCode) || isNonEmpty(this.errorMessage);
  }

  toJSON(): DocumentResponseFields {
    return _.omitBy(
      {
        value: this.value,
        errorCode: this.errorCode,
        errorMessage: this.errorMessage,
        errorDescription: this.errorDescription
      },
      _.isUndefined
    );
  }

  // Builds a response from already-parsed JSON; throws TypeError on a bad shape
  static fromJSON(payload: unknown): DocumentResponse {
    if (!_.isPlainObject(payload) || typeof payload !== 'object' || payload === null) {
      throw new TypeError('Response body must be a JSON object');
    }

    const fields: DocumentResponseFields = {};
    for (const field of RESPONSE_FIELDS) {
      const raw: unknown = Reflect.get(payload, field);
      if (raw === undefined || raw === null) continue;
      if (!_.isString(raw)) {
        throw new TypeError(`Response field "${field}" must be a string`);
      }
      fields[field] = raw;
    }

    return new DocumentResponse(fields);
  }
}
