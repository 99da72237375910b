import { strict as assert } from 'assert';
import _ from 'lodash';
import { ParseError, SerializationError } from '../util/errors';
import { collectionShape, describeShapeError } from './schema';
import { StacCollection } from './types';

export const STAC_VERSION = '1.0.0';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * The properties a new collection must be given; everything else has a default
 */
export type CollectionProperties = Partial<StacCollection> & Pick<StacCollection, 'id' | 'description'>;

/**
 * Builds a collection with the given properties. Unless overridden the collection
 * covers the whole world, has an open-ended temporal extent and a proprietary license.
 * Properties given as undefined are left out, as they would be from its JSON.
 *
 * @param properties - the properties to set on the collection (id and description are required)
 * @returns the new collection
 */
export function createCollection(properties: CollectionProperties): StacCollection {
  assert(!!properties.id, 'Collection id is required');
  assert(!!properties.description, 'Collection description is required');
  return {
    type: 'Collection',
    stac_version: STAC_VERSION,
    stac_extensions: [],
    keywords: [],
    license: 'proprietary',
    extent: {
      spatial: { bbox: [[-180, -90, 180, 90]] },
      temporal: { interval: [[null, null]] },
    },
    links: [],
    summaries: {},
    assets: {},
    ..._.omitBy(properties, _.isUndefined),
    id: properties.id,
    description: properties.description,
  };
}

/**
 * Parses JSON text, reporting malformed input as a ParseError
 *
 * @param input - the JSON text, or its UTF-8 bytes
 * @param subject - what the text should hold, used in the error message
 * @returns the parsed value
 */
export function parseJson(input: string | Buffer, subject: string): unknown {
  try {
    // fatal: malformed UTF-8 is an error rather than U+FFFD
    const text = Buffer.isBuffer(input) ? utf8Decoder.decode(input) : input;
    return JSON.parse(text.replace(/^\uFEFF/, ''));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ParseError(`${subject} is not valid JSON: ${reason}`);
  }
}

/**
 * Checks that an already decoded JSON value has the structure of a collection
 *
 * @param data - the decoded JSON value
 * @param pathPrefix - JSON pointer of the value within its enclosing document
 * @returns the value, typed as a collection
 * @throws ParseError for the first required field that is missing or any field of the wrong type
 */
export function readCollection(data: unknown, pathPrefix = ''): StacCollection {
  if (collectionShape(data)) return data;
  const { message, path } = describeShapeError(collectionShape.errors, pathPrefix || 'collection', pathPrefix);
  throw new ParseError(message, path);
}

/**
 * Parses a STAC collection from its JSON representation. Unknown fields are kept. When a
 * key appears more than once in a JSON object the last occurrence wins.
 *
 * @param input - the JSON text, or its UTF-8 bytes
 * @returns the collection
 * @throws ParseError if the input is not JSON or does not have the structure of a collection
 */
export function parseCollection(input: string | Buffer): StacCollection {
  return readCollection(parseJson(input, 'collection'));
}

/**
 * Writes a collection as JSON text that `parseCollection` reads back to an equal value.
 * JSON has no undefined and no negative zero: properties set to undefined are dropped
 * and -0 is read back as 0.
 *
 * @param collection - the collection to write
 * @param pretty - whether to pretty-format the JSON
 * @returns the JSON text
 * @throws SerializationError if the value does not have the structure of a collection
 */
export function serializeCollection(collection: StacCollection, pretty = false): string {
  if (!collectionShape(collection)) {
    const { message, path } = describeShapeError(collectionShape.errors, 'collection');
    throw new SerializationError(message, path);
  }
  return pretty ? JSON.stringify(collection, null, 2) : JSON.stringify(collection);
}
