import logger from '../util/log';
import { ParseError } from '../util/errors';
import { listToText } from '../util/string';
import { parseJson, readCollection } from './collection';
import { collectionListingShape, describeShapeError } from './schema';
import { StacCollectionListing } from './types';

export interface CollectionListingOptions {
  // log a warning when a federated back end reports components missing from the listing
  warnOnFederationMissing?: boolean;
}

/**
 * Parses the response to a `GET /collections` request
 *
 * @param input - the JSON text, or its UTF-8 bytes
 * @param options - see CollectionListingOptions
 * @returns the collections, the links of the listing and the missing federation components
 * @throws ParseError if the listing or any of its collections is malformed
 */
export function parseCollectionListing(
  input: string | Buffer, options: CollectionListingOptions = {},
): StacCollectionListing {
  const { warnOnFederationMissing = true } = options;
  const data = parseJson(input, 'collection listing');
  if (!collectionListingShape(data)) {
    const { message, path } = describeShapeError(collectionListingShape.errors, 'collection listing');
    throw new ParseError(message, path);
  }
  const collections = data.collections.map((c, i) => readCollection(c, `/collections/${i}`));
  const federationMissing = data['federation:missing'] ?? [];
  if (warnOnFederationMissing && federationMissing.length > 0) {
    logger.warn(`Partial collection listing: missing federation components: ${listToText(federationMissing)}.`);
  }
  return { collections, links: data.links ?? [], federationMissing };
}
