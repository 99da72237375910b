export * from './stac/collection';
export * from './stac/collection-listing';
export * from './stac/extensions';
export * from './stac/links';
export * from './stac/validate';
export type {
  EoBand, ItemAssetDefinition, StacAsset, StacCollection, StacCollectionListing, StacExtent,
  StacLink, StacProvider, TemporalInterval, ValidationOptions, ValidationResult,
  ValidationViolation, ViolationCode,
} from './stac/types';
export type { BoundingBox } from './util/bounding-box';
export { ParseError, SerializationError, StacError } from './util/errors';
