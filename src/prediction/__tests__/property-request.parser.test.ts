import { StructuralError } from '../prediction.errors';
import { parsePropertyRequest } from '../property-request.parser';

const base = { usage: 'Residential', type: 'Unit', subtype: 'Flat' };

function rejection(input: unknown): StructuralError {
  try {
    parsePropertyRequest(input);
  } catch (err) {
    if (err instanceof StructuralError) return err;
    throw err;
  }
  throw new Error('expected a StructuralError');
}

describe('parsePropertyRequest', () => {
  test('keeps only the supplied fields', () => {
    expect(parsePropertyRequest({ ...base, area_size: 100, bedrooms: 2 })).toEqual({
      ...base,
      area_size: 100,
      bedrooms: 2,
    });
  });

  test('coerces form-style values', () => {
    expect(
      parsePropertyRequest({
        ...base,
        area_size: '85.5',
        bedrooms: 'Studio',
        has_parking: 1,
        has_project: 'false',
        area_name: '  Dubai Marina ',
        registration_type: 'Off-Plan Properties',
      }),
    ).toEqual({
      ...base,
      area_size: 85.5,
      bedrooms: 0,
      has_parking: true,
      has_project: false,
      area_name: 'Dubai Marina',
      registration_type: 'OffPlan',
    });
  });

  test('treats null and empty strings as absent', () => {
    expect(
      parsePropertyRequest({ ...base, area_size: null, bedrooms: '', area_name: '' }),
    ).toEqual(base);
  });

  test.each([
    [{ ...base, area_size: 0 }, 'area_size: must be greater than 0'],
    [{ ...base, area_size: -10 }, 'area_size: must be greater than 0'],
    [{ ...base, bedrooms: 1.5 }, 'bedrooms: must be a whole number'],
    [{ ...base, bedrooms: -1 }, 'bedrooms: must not be negative'],
    [{ ...base, subtype: '  ' }, 'subtype: is required'],
    [
      { ...base, registration_type: 'constructor' },
      'registration_type: must be one of OffPlan, Ready, Existing',
    ],
    [
      { ...base, usage: 'Farm' },
      'usage: must be one of Residential, Commercial, Industrial, Hospitality, MultiUse',
    ],
  ])('rejects %j', (input, message) => {
    const err = rejection(input);
    expect(err.code).toBe('invalid_request');
    expect(err.message).toBe(message);
  });

  test('rejects a non-object body', () => {
    expect(rejection([base]).message).toBe('Request must be an object');
    expect(rejection(null).message).toBe('Request must be an object');
  });
});
