import { BoundingBox } from '../util/bounding-box';

/**
 * A link within a STAC catalog, collection or item
 * https://github.com/radiantearth/stac-spec/blob/v1.0.0/collection-spec/collection-spec.md#link-object
 */
export interface StacLink {
  rel: string;
  href: string;
  type?: string;
  title?: string;
}

/**
 * A band of an electro-optical asset
 * https://github.com/stac-extensions/eo/tree/v1.1.0#band-object
 */
export interface EoBand {
  name: string;
  description?: string;
  common_name?: string;
  center_wavelength?: number;
  full_width_half_max?: number;
}

/**
 * The expected shape of an asset carried by every item of a collection
 * https://github.com/stac-extensions/item-assets/tree/v1.0.0#asset-object
 */
export interface ItemAssetDefinition {
  type?: string;
  title?: string;
  description?: string;
  roles?: string[];
  'eo:bands'?: EoBand[];
}

/**
 * An asset of the collection itself
 */
export interface StacAsset extends ItemAssetDefinition {
  href: string;
}

export interface StacProvider {
  name: string;
  description?: string;
  roles?: string[];
  url?: string;
}

// start and end bounds, null for an open end
export type TemporalInterval = [string | null, string | null];

export interface StacExtent {
  spatial: {
    bbox: BoundingBox[];
  };
  temporal: {
    interval: TemporalInterval[];
  };
}

/**
 * A STAC collection
 * https://github.com/radiantearth/stac-spec/blob/v1.0.0/collection-spec/collection-spec.md
 */
export interface StacCollection {
  type: 'Collection';
  stac_version: string;
  stac_extensions?: string[];
  id: string;
  title?: string;
  description: string;
  keywords?: string[];
  license: string;
  providers?: StacProvider[];
  extent: StacExtent;
  summaries?: { [property: string]: unknown };
  links?: StacLink[];
  assets?: { [key: string]: StacAsset };
  item_assets?: { [key: string]: ItemAssetDefinition };
}

/**
 * The response to a `GET /collections` request
 */
export interface StacCollectionListing {
  collections: StacCollection[];
  links: StacLink[];
  // components of a federated back end that did not contribute to the listing
  federationMissing: string[];
}

export type ViolationCode =
  | 'stac-version-format'
  | 'extent-empty'
  | 'bbox-range'
  | 'bbox-order'
  | 'timestamp-format'
  | 'interval-order'
  | 'extension-not-declared'
  | 'eo-bands-missing'
  | 'band-name-duplicate';

/**
 * A broken invariant in a structurally valid record. `path` is a JSON pointer.
 */
export interface ValidationViolation {
  code: ViolationCode;
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  violations: ValidationViolation[];
}

export interface ValidationOptions {
  // when the eo extension is declared, every item asset must list its eo:bands
  requireEoBands?: boolean;
  // a bbox with west > east crosses the antimeridian instead of being out of order
  allowAntimeridian?: boolean;
}
