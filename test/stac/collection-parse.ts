import { describe, it } from 'mocha';
import { expect } from 'chai';
import _ from 'lodash';
import { parseCollection, readCollection } from '../../app/stac/collection';
import { ParseError } from '../../app/util/errors';
import { buildCollection } from '../helpers/collections';

/**
 * Calls the function and returns the ParseError it throws
 *
 * @param fn - the function expected to throw
 * @returns the error
 */
function parseErrorFrom(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error('Expected a ParseError to be thrown');
}

describe('parseCollection', function () {
  describe('when given a well-formed collection', function () {
    const collection = buildCollection({ title: 'Test', keywords: ['a', 'b'] });
    const text = JSON.stringify(collection);

    it('returns the collection', function () {
      expect(parseCollection(text)).to.eql(collection);
    });

    it('accepts UTF-8 bytes', function () {
      expect(parseCollection(Buffer.from(text, 'utf8'))).to.eql(collection);
    });

    it('ignores a leading byte order mark', function () {
      expect(parseCollection(`\uFEFF${text}`)).to.eql(collection);
    });
  });

  describe('when the input is not JSON', function () {
    const error = parseErrorFrom(() => parseCollection('{"type": '));

    it('throws a ParseError for the document', function () {
      expect(error.path).to.equal('');
      expect(error.code).to.equal('stac.ParseError');
    });

    it('says the input is not JSON', function () {
      expect(error.message).to.match(/^collection is not valid JSON: /);
    });
  });

  describe('when the bytes are not valid UTF-8', function () {
    const text = JSON.stringify(buildCollection({ description: 'placeholder' }));
    const [head, tail] = text.split('placeholder');
    const bytes = Buffer.concat([Buffer.from(head, 'utf8'), Buffer.from([0xff, 0xfe]), Buffer.from(tail, 'utf8')]);
    const error = parseErrorFrom(() => parseCollection(bytes));

    it('throws a ParseError for the document', function () {
      expect(error.path).to.equal('');
      expect(error.message).to.match(/^collection is not valid JSON: /);
    });
  });

  describe('when a required field is missing', function () {
    for (const field of ['type', 'id', 'stac_version', 'description', 'license', 'extent']) {
      it(`rejects a collection without ${field}`, function () {
        const text = JSON.stringify(_.omit(buildCollection(), field));
        const error = parseErrorFrom(() => parseCollection(text));
        expect(error.path).to.equal(`/${field}`);
        expect(error.message).to.equal(`collection must have required property '${field}'`);
      });
    }

    it('rejects an extent without a temporal part', function () {
      const text = JSON.stringify({
        ...buildCollection(),
        extent: { spatial: { bbox: [[-180, -90, 180, 90]] } },
      });
      const error = parseErrorFrom(() => parseCollection(text));
      expect(error.path).to.equal('/extent/temporal');
      expect(error.message).to.equal('/extent must have required property \'temporal\'');
    });
  });

  describe('when a field has the wrong type', function () {
    it('rejects a numeric id', function () {
      const error = parseErrorFrom(() => parseCollection(JSON.stringify({ ...buildCollection(), id: 42 })));
      expect(error.path).to.equal('/id');
      expect(error.message).to.equal('/id must be string');
    });

    it('rejects a type other than Collection', function () {
      const error = parseErrorFrom(() => parseCollection(JSON.stringify({ ...buildCollection(), type: 'Feature' })));
      expect(error.path).to.equal('/type');
      expect(error.message).to.equal('/type must be equal to constant');
    });

    it('rejects a bounding box with three values', function () {
      const text = JSON.stringify({
        ...buildCollection(),
        extent: { spatial: { bbox: [[-180, -90, 180]] }, temporal: { interval: [[null, null]] } },
      });
      const error = parseErrorFrom(() => parseCollection(text));
      expect(error.path).to.equal('/extent/spatial/bbox/0');
      expect(error.message).to.equal('/extent/spatial/bbox/0 must NOT have fewer than 4 items');
    });

    it('rejects a band without a name', function () {
      const text = JSON.stringify({
        ...buildCollection(),
        item_assets: { red: { title: 'Red', 'eo:bands': [{ description: 'red light' }] } },
      });
      const error = parseErrorFrom(() => parseCollection(text));
      expect(error.path).to.equal('/item_assets/red/eo:bands/0/name');
    });
  });

  describe('when the document has fields the library does not model', function () {
    it('keeps them', function () {
      const text = JSON.stringify({ ...buildCollection(), 'sci:doi': '10.0000/example' });
      expect(parseCollection(text)).to.have.property('sci:doi', '10.0000/example');
    });
  });

  describe('when an item_assets key appears twice in the text', function () {
    const text = `{
      "type": "Collection", "id": "dup", "stac_version": "1.0.0", "description": "d",
      "license": "proprietary",
      "extent": { "spatial": { "bbox": [[0, 0, 1, 1]] }, "temporal": { "interval": [[null, null]] } },
      "item_assets": {
        "data": { "title": "first" },
        "data": { "title": "second" }
      }
    }`;

    it('keeps the last occurrence', function () {
      expect(parseCollection(text).item_assets).to.eql({ data: { title: 'second' } });
    });
  });

  describe('readCollection', function () {
    it('prefixes error paths with the location of the value', function () {
      const error = parseErrorFrom(() => readCollection(_.omit(buildCollection(), 'id'), '/collections/1'));
      expect(error.path).to.equal('/collections/1/id');
      expect(error.message).to.equal('/collections/1 must have required property \'id\'');
    });
  });
});
