import { StacCollection, StacLink } from './types';

/**
 * Returns the links with the given relation type, in document order
 *
 * @param links - the links to search
 * @param rel - the relation type, e.g. `self` or `item`
 */
export function findLinks(links: StacLink[] | undefined, rel: string): StacLink[] {
  return (links ?? []).filter((link) => link.rel === rel);
}

/**
 * Returns the first link with the given relation type
 *
 * @param links - the links to search
 * @param rel - the relation type
 * @returns the link, or undefined if there is none
 */
export function findLink(links: StacLink[] | undefined, rel: string): StacLink | undefined {
  return findLinks(links, rel)[0];
}

/**
 * Where the collection is published, taken from its `self` link
 *
 * @param collection - the collection
 * @returns the href of the self link, or undefined if the collection has none
 */
export function selfHref(collection: StacCollection): string | undefined {
  return findLink(collection.links, 'self')?.href;
}
