import { StacCollection } from './types';

export const ITEM_ASSETS_EXTENSION = 'https://stac-extensions.github.io/item-assets/v1.0.0/schema.json';

export const EO_EXTENSION = 'https://stac-extensions.github.io/eo/v1.1.0/schema.json';

const extensionUriRegex = /^https:\/\/stac-extensions\.github\.io\/([\w-]+)\/v\d+\.\d+\.\d+[^/]*\/schema\.json$/;

/**
 * Returns the name of an extension from its schema URI, e.g. `eo` for
 * `https://stac-extensions.github.io/eo/v1.1.0/schema.json`
 *
 * @param uri - the schema URI listed in `stac_extensions`
 * @returns the extension name, or undefined for URIs outside of stac-extensions.github.io
 */
export function extensionName(uri: string): string | undefined {
  return extensionUriRegex.exec(uri)?.[1];
}

/**
 * Whether the collection declares any version of the named extension
 *
 * @param collection - the collection to check
 * @param name - the extension name, e.g. `eo` or `item-assets`
 */
export function declaresExtension(collection: StacCollection, name: string): boolean {
  return (collection.stac_extensions ?? []).some((uri) => extensionName(uri) === name);
}
