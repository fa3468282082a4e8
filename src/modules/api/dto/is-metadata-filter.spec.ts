import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { isMetadataFilter } from './is-metadata-filter';
import { QueryDto } from './query.dto';

describe('isMetadataFilter', () => {
  it('accepts flat scalar maps', () => {
    expect(isMetadataFilter({ fileName: 'q3.txt', page: 2, draft: false })).toBe(true);
    expect(isMetadataFilter({})).toBe(true);
  });

  it('rejects nested values and non-objects', () => {
    expect(isMetadataFilter({ fileName: { $ne: 'x' } })).toBe(false);
    expect(isMetadataFilter({ page: Number.NaN })).toBe(false);
    expect(isMetadataFilter(['q3.txt'])).toBe(false);
    expect(isMetadataFilter(null)).toBe(false);
  });
});

describe('QueryDto', () => {
  it('accepts a full request', async () => {
    const dto = plainToInstance(QueryDto, { query: 'How did revenue change?', topK: 3, filters: { fileName: 'q3.txt' }, rerank: false });

    await expect(validate(dto)).resolves.toEqual([]);
  });

  it('reports invalid fields', async () => {
    const dto = plainToInstance(QueryDto, { query: '', topK: 0, filters: { fileName: ['q3.txt'] } });

    const errors = await validate(dto);

    expect(errors.map((error) => error.property).sort()).toEqual(['filters', 'query', 'topK']);
    expect(errors.find((error) => error.property === 'filters')?.constraints).toEqual({
      isMetadataFilter: 'filters must map keys to strings, numbers or booleans',
    });
  });
});
