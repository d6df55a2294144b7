import { z } from 'zod';
import { describeIssues } from '../common/describe-issues';
import { ownEntry } from '../common/own-entry';
import {
  PROPERTY_TYPES,
  PROPERTY_USAGES,
  REGISTRATION_TYPES,
  type RegistrationType,
} from '../reference-data/reference-data.types';
import { StructuralError } from './prediction.errors';
import type { PropertyRequest } from './prediction.types';

// Labels used by the land department export, accepted alongside the enum.
const REGISTRATION_ALIASES: Record<string, RegistrationType> = {
  'off-plan properties': 'OffPlan',
  'off-plan': 'OffPlan',
  offplan: 'OffPlan',
  'existing properties': 'Existing',
  existing: 'Existing',
  ready: 'Ready',
};

const absentAsUndefined = (value: unknown) =>
  value === null || value === '' ? undefined : value;

const numeric = (value: unknown) => {
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isNaN(n) ? value : n;
  }
  return absentAsUndefined(value);
};

const flag = z.preprocess(
  (value) => {
    const v = numeric(value);
    if (v === 1 || v === 'true') return true;
    if (v === 0 || v === 'false') return false;
    return v;
  },
  z.boolean({ invalid_type_error: 'must be a boolean or 0/1' }).optional(),
);

export const PropertyRequestZ = z.object({
  usage: z.enum(PROPERTY_USAGES, {
    errorMap: () => ({
      message: `must be one of ${PROPERTY_USAGES.join(', ')}`,
    }),
  }),
  type: z.enum(PROPERTY_TYPES, {
    errorMap: () => ({ message: `must be one of ${PROPERTY_TYPES.join(', ')}` }),
  }),
  subtype: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  area_size: z.preprocess(
    numeric,
    z
      .number({ invalid_type_error: 'must be a number' })
      .finite('must be a finite number')
      .positive('must be greater than 0')
      .optional(),
  ),
  bedrooms: z.preprocess(
    (value) =>
      typeof value === 'string' && value.trim().toLowerCase() === 'studio'
        ? 0
        : numeric(value),
    z
      .number({ invalid_type_error: 'must be a whole number or "Studio"' })
      .int('must be a whole number')
      .min(0, 'must not be negative')
      .optional(),
  ),
  has_parking: flag,
  has_project: flag,
  area_name: z.preprocess(
    absentAsUndefined,
    z.string({ invalid_type_error: 'must be a string' }).trim().optional(),
  ),
  registration_type: z.preprocess(
    (value) =>
      typeof value === 'string'
        ? (ownEntry(REGISTRATION_ALIASES, value.trim().toLowerCase()) ?? value)
        : absentAsUndefined(value),
    z
      .enum(REGISTRATION_TYPES, {
        errorMap: () => ({
          message: `must be one of ${REGISTRATION_TYPES.join(', ')}`,
        }),
      })
      .optional(),
  ),
});

/**
 * Shape check for an untrusted request body. Anything that fails here is a
 * structural error: no prediction can be made from it.
 */
export function parsePropertyRequest(input: unknown): PropertyRequest {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new StructuralError('invalid_request', 'Request must be an object');
  }
  const parsed = PropertyRequestZ.safeParse(input);
  if (!parsed.success) {
    throw new StructuralError('invalid_request', describeIssues(parsed.error));
  }

  // Drop keys that were absent so the policy checks see only supplied fields.
  const request: PropertyRequest = {
    usage: parsed.data.usage,
    type: parsed.data.type,
    subtype: parsed.data.subtype,
  };
  const { area_size, bedrooms, has_parking, has_project, area_name, registration_type } =
    parsed.data;
  if (area_size !== undefined) request.area_size = area_size;
  if (bedrooms !== undefined) request.bedrooms = bedrooms;
  if (has_parking !== undefined) request.has_parking = has_parking;
  if (has_project !== undefined) request.has_project = has_project;
  if (area_name) request.area_name = area_name;
  if (registration_type !== undefined) request.registration_type = registration_type;
  return request;
}
