import assert from 'node:assert/strict';
import { test } from 'node:test';
import { encodeJson, omitEmpty } from '../src/api/encoding.js';
import type { SearchRequest } from '../src/api/types.js';
import { EncodingError } from '../src/utils/errors.js';

test('omitEmpty drops empty values at every depth', () => {
  assert.deepEqual(
    omitEmpty({
      pageToken: '',
      pageSize: 0,
      filters: {
        featureFilter: { includedFeatures: [] },
        excludeNonAppCreatedData: false,
        dateFilter: { ranges: [{ startDate: { year: 2021, month: 0 }, endDate: {} }] },
      },
    }),
    { filters: { dateFilter: { ranges: [{ startDate: { year: 2021 } }] } } },
  );
});

test('omitEmpty returns undefined when nothing is left', () => {
  assert.equal(omitEmpty({ albumId: '', filters: { contentFilter: {} } }), undefined);
});

test('encodeJson keeps field order and set flags', () => {
  const request: SearchRequest = {
    pageToken: 'next-1',
    filters: {
      mediaTypeFilter: { mediaTypes: ['VIDEO'] },
      includeArchivedMedia: true,
    },
  };

  assert.equal(
    encodeJson(request),
    '{"pageToken":"next-1","filters":{"mediaTypeFilter":{"mediaTypes":["VIDEO"]},"includeArchivedMedia":true}}',
  );
});

test('encodeJson writes an empty object for an empty request', () => {
  assert.equal(encodeJson({ filters: undefined }), '{}');
});

test('encodeJson reports values JSON cannot represent', () => {
  assert.throws(() => encodeJson({ pageSize: 10n }), EncodingError);
});
