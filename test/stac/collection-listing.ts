import { afterEach, beforeEach, describe, it } from 'mocha';
import { expect } from 'chai';
import * as sinon from 'sinon';
import _ from 'lodash';
import { parseCollectionListing } from '../../app/stac/collection-listing';
import { ParseError } from '../../app/util/errors';
import logger from '../../app/util/log';
import { buildCollection } from '../helpers/collections';

describe('parseCollectionListing', function () {
  let warnStub: sinon.SinonStub;
  beforeEach(function () {
    warnStub = sinon.stub(logger, 'warn');
  });
  afterEach(function () {
    warnStub.restore();
  });

  const first = buildCollection({ id: 'first' });
  const second = buildCollection({ id: 'second', license: 'CC-BY-4.0' });
  const links = [{ rel: 'self', href: 'https://stac.example.com/collections' }];

  describe('when given a complete listing', function () {
    it('returns the collections in order along with the links', function () {
      const listing = parseCollectionListing(JSON.stringify({ collections: [first, second], links }));
      expect(listing).to.eql({ collections: [first, second], links, federationMissing: [] });
    });

    it('does not warn', function () {
      parseCollectionListing(JSON.stringify({ collections: [first], links }));
      expect(warnStub.called).to.be.false;
    });

    it('defaults to no links', function () {
      expect(parseCollectionListing(JSON.stringify({ collections: [] })).links).to.eql([]);
    });
  });

  describe('when federation components are missing', function () {
    const text = JSON.stringify({
      collections: [first],
      links,
      'federation:missing': ['eu-west', 'us-east'],
    });

    it('returns the missing components', function () {
      expect(parseCollectionListing(text).federationMissing).to.eql(['eu-west', 'us-east']);
    });

    it('warns about the missing components', function () {
      parseCollectionListing(text);
      expect(warnStub.calledOnceWithExactly(
        'Partial collection listing: missing federation components: eu-west and us-east.',
      )).to.be.true;
    });

    it('does not warn when warnings are turned off', function () {
      parseCollectionListing(text, { warnOnFederationMissing: false });
      expect(warnStub.called).to.be.false;
    });
  });

  describe('when a collection is malformed', function () {
    it('throws a ParseError pointing into the listing', function () {
      const text = JSON.stringify({ collections: [first, _.omit(second, 'license')] });
      expect(() => parseCollectionListing(text))
        .to.throw(ParseError, '/collections/1 must have required property \'license\'')
        .with.property('path', '/collections/1/license');
    });
  });

  describe('when the collections are missing', function () {
    it('throws a ParseError', function () {
      expect(() => parseCollectionListing(JSON.stringify({ links })))
        .to.throw(ParseError, 'collection listing must have required property \'collections\'')
        .with.property('path', '/collections');
    });
  });

  describe('when the input is not JSON', function () {
    it('throws a ParseError', function () {
      expect(() => parseCollectionListing('<html></html>'))
        .to.throw(ParseError, /^collection listing is not valid JSON: /);
    });
  });
});
