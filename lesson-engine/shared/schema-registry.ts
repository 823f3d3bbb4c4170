import Ajv, { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { readFileSync } from 'fs';
import { schemaPath } from '../../config/paths.js';

/**
 * Ajv instance for the JSON schemas under schemas-shared/
 */
export class SchemaRegistry {
  private ajv: Ajv;

  constructor() {
    this.ajv = new Ajv({ strict: true, allErrors: true });
    addFormats(this.ajv);
  }

  compile<T>(fileName: string): ValidateFunction<T> {
    const schema: SchemaObject = JSON.parse(readFileSync(schemaPath(fileName), 'utf-8'));
    return this.ajv.compile<T>(schema);
  }

  errorsText(validate: ValidateFunction): string {
    return this.ajv.errorsText(validate.errors, { separator: '; ' });
  }
}
