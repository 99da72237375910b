import fs from 'fs';
import path from 'path';
import Ajv, { ErrorObject, SchemaObject } from 'ajv';
import { StacCollection, StacLink } from './types';

/**
 * The listing document before its collections are checked one by one
 */
export interface RawCollectionListing {
  collections: object[];
  links?: StacLink[];
  'federation:missing'?: string[];
}

const schemaDir = path.join(__dirname, '../resources/schemas');

/**
 * Reads one of the JSON schemas shipped in resources/schemas
 * @param name - the schema file name without extension
 * @returns the parsed schema
 */
function loadSchema(name: string): SchemaObject {
  return JSON.parse(fs.readFileSync(path.join(schemaDir, `${name}.json`), 'utf8'));
}

// Stops at the first error, so parsing fails fast
const ajv = new Ajv({ allowUnionTypes: true, strictNumbers: true });

export const collectionShape = ajv.compile<StacCollection>(loadSchema('collection'));

export const collectionListingShape = ajv.compile<RawCollectionListing>(loadSchema('collection-listing'));

export interface ShapeError {
  message: string;
  path: string;
}

/**
 * Describes the first error reported by a schema validator
 *
 * @param errors - the errors of the last validation
 * @param subject - what was being checked, used when the error is at the document root
 * @param pathPrefix - JSON pointer of the checked value within its enclosing document
 * @returns the error message and the JSON pointer of the offending value
 */
export function describeShapeError(
  errors: ErrorObject[] | null | undefined, subject: string, pathPrefix = '',
): ShapeError {
  const error = errors?.[0];
  if (!error) return { message: `${subject} is not valid`, path: pathPrefix };
  const instancePath = `${pathPrefix}${error.instancePath}`;
  const location = error.instancePath ? instancePath : subject;
  if (error.keyword === 'required') {
    return {
      message: `${location} ${error.message}`,
      path: `${instancePath}/${String(error.params.missingProperty)}`,
    };
  }
  return { message: `${location} ${error.message}`, path: instancePath };
}
