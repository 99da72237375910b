import _ from 'lodash';
import env from '../util/env';
import logger from '../util/log';
import { BoundingBox, crossesAntimeridian, hasInvertedLatitudes, outOfRangeOrdinates } from '../util/bounding-box';
import { compareTimestamps, parseTimestamp } from '../util/date';
import { listToText } from '../util/string';
import { declaresExtension } from './extensions';
import {
  ItemAssetDefinition, StacCollection, TemporalInterval, ValidationOptions, ValidationResult,
  ValidationViolation, ViolationCode,
} from './types';

const semverRegex = /^\d+\.\d+\.\d+(-[0-9A-Za-z.-]+)?(\+[0-9A-Za-z.-]+)?$/;

/**
 * Escapes a key for use as one segment of a JSON pointer (RFC 6901)
 *
 * @param key - the object key
 * @returns the escaped segment
 */
function pointerSegment(key: string): string {
  return key.replace(/~/g, '~0').replace(/\//g, '~1');
}

function violation(code: ViolationCode, path: string, message: string): ValidationViolation {
  return { code, path, message };
}

function versionViolations(collection: StacCollection): ValidationViolation[] {
  if (semverRegex.test(collection.stac_version)) return [];
  return [violation('stac-version-format', '/stac_version',
    `stac_version '${collection.stac_version}' is not a semantic version`)];
}

/**
 * Checks the range and ordering of every bounding box of the spatial extent
 *
 * @param bboxes - the boxes of `extent.spatial.bbox`
 * @param allowAntimeridian - whether west \> east denotes a box crossing the antimeridian
 * @returns the violations found
 */
function spatialViolations(bboxes: BoundingBox[], allowAntimeridian: boolean): ValidationViolation[] {
  if (bboxes.length === 0) {
    return [violation('extent-empty', '/extent/spatial/bbox', 'spatial extent has no bounding box')];
  }
  const violations: ValidationViolation[] = [];
  bboxes.forEach((box, i) => {
    const path = `/extent/spatial/bbox/${i}`;
    const outOfRange = outOfRangeOrdinates(box);
    if (outOfRange.length > 0) {
      const verb = outOfRange.length === 1 ? 'is' : 'are';
      violations.push(violation('bbox-range', path, `${listToText(outOfRange)} ${verb} out of range`));
    }
    if (!allowAntimeridian && crossesAntimeridian(box)) {
      violations.push(violation('bbox-order', path, `west (${box[0]}) is greater than east (${box[2]})`));
    }
    if (hasInvertedLatitudes(box)) {
      violations.push(violation('bbox-order', path, `south (${box[1]}) is greater than north (${box[3]})`));
    }
  });
  return violations;
}

/**
 * Checks that interval bounds are timestamps and that each start is not after its end.
 * A null bound is open-ended.
 *
 * @param intervals - the intervals of `extent.temporal.interval`
 * @returns the violations found
 */
function temporalViolations(intervals: TemporalInterval[]): ValidationViolation[] {
  if (intervals.length === 0) {
    return [violation('extent-empty', '/extent/temporal/interval', 'temporal extent has no interval')];
  }
  const violations: ValidationViolation[] = [];
  intervals.forEach((interval, i) => {
    const path = `/extent/temporal/interval/${i}`;
    const [start, end] = interval.map((value, j) => {
      if (value === null || parseTimestamp(value)) return value ?? undefined;
      violations.push(violation('timestamp-format', `${path}/${j}`, `'${value}' is not an RFC 3339 timestamp`));
      return undefined;
    });
    if (start && end && compareTimestamps(start, end) > 0) {
      violations.push(violation('interval-order', path, `start ${start} is after end ${end}`));
    }
  });
  return violations;
}

/**
 * Checks the eo:bands of one asset definition
 *
 * @param asset - the asset or item asset definition
 * @param path - JSON pointer of the asset
 * @param eoDeclared - whether the collection declares the eo extension
 * @param bandsRequired - whether a missing eo:bands is a violation
 * @returns the violations found
 */
function bandViolations(
  asset: ItemAssetDefinition, path: string, eoDeclared: boolean, bandsRequired: boolean,
): ValidationViolation[] {
  const bands = asset['eo:bands'];
  if (!bands) {
    return bandsRequired
      ? [violation('eo-bands-missing', path, `${path} has no eo:bands`)]
      : [];
  }
  const violations: ValidationViolation[] = [];
  if (!eoDeclared) {
    violations.push(violation('extension-not-declared', `${path}/eo:bands`,
      'eo:bands is used but the eo extension is not declared in stac_extensions'));
  }
  const seen = new Set<string>();
  bands.forEach((band, i) => {
    if (seen.has(band.name)) {
      violations.push(violation('band-name-duplicate', `${path}/eo:bands/${i}`,
        `band name '${band.name}' is used more than once`));
    }
    seen.add(band.name);
  });
  return violations;
}

/**
 * Checks the fields governed by the item-assets and eo extensions
 *
 * @param collection - the collection
 * @param requireEoBands - whether every item asset must list its bands when eo is declared
 * @returns the violations found
 */
function extensionViolations(collection: StacCollection, requireEoBands: boolean): ValidationViolation[] {
  const violations: ValidationViolation[] = [];
  const eoDeclared = declaresExtension(collection, 'eo');
  // item_assets is part of the core specification from 1.1.0 on
  const itemAssetsInCore = !/^(0\.|1\.0\.)/.test(collection.stac_version);
  if (collection.item_assets && !itemAssetsInCore && !declaresExtension(collection, 'item-assets')) {
    violations.push(violation('extension-not-declared', '/item_assets',
      'item_assets is used but the item-assets extension is not declared in stac_extensions'));
  }
  for (const [key, asset] of Object.entries(collection.item_assets ?? {})) {
    violations.push(...bandViolations(
      asset, `/item_assets/${pointerSegment(key)}`, eoDeclared, requireEoBands && eoDeclared,
    ));
  }
  for (const [key, asset] of Object.entries(collection.assets ?? {})) {
    violations.push(...bandViolations(asset, `/assets/${pointerSegment(key)}`, eoDeclared, false));
  }
  return violations;
}

/**
 * Checks the invariants of a structurally valid collection and returns every broken one.
 * Asset keys need no check: a parsed collection holds each key once.
 *
 * @param collection - the collection to check
 * @param options - strictness settings, defaulting to the configured environment
 * @returns the violations, empty when the collection is valid
 */
export function validateCollection(
  collection: StacCollection, options: ValidationOptions = {},
): ValidationResult {
  const requireEoBands = options.requireEoBands ?? env.requireEoBands;
  const allowAntimeridian = options.allowAntimeridian ?? env.allowAntimeridianBbox;
  const violations = [
    ...versionViolations(collection),
    ...spatialViolations(collection.extent.spatial.bbox, allowAntimeridian),
    ...temporalViolations(collection.extent.temporal.interval),
    ...extensionViolations(collection, requireEoBands),
  ];
  if (violations.length > 0) {
    logger.debug(`Collection ${collection.id} has ${violations.length} violation(s)`, {
      collectionId: collection.id,
      codes: _.uniq(violations.map((v) => v.code)),
    });
  }
  return { valid: violations.length === 0, violations };
}
