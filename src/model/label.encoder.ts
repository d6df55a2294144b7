import { Logger } from '@nestjs/common';
import type { ResolvedRequest } from '../prediction/prediction.types';
import { normalizeAreaName } from '../reference-data/area-tier.table';
import type { EncoderClasses, FeatureEncoder, FeatureVector } from './model.types';

/**
 * Label-encodes the categorical inputs by their position in the class lists
 * the model was trained with. An unseen value encodes as the first class.
 */
export class LabelEncoder implements FeatureEncoder {
  private readonly logger = new Logger(LabelEncoder.name);
  private readonly areas: ReadonlyMap<string, number>;
  private readonly subtypes: ReadonlyMap<string, number>;
  private readonly registrationTypes: ReadonlyMap<string, number>;

  constructor(readonly classes: EncoderClasses) {
    for (const [kind, list] of Object.entries(classes)) {
      if (list.length === 0) {
        throw new Error(`Encoder class list "${kind}" is empty`);
      }
    }
    this.areas = indexOf(classes.areas.map(normalizeAreaName));
    this.subtypes = indexOf(classes.subtypes);
    this.registrationTypes = indexOf(classes.registration_types);
  }

  encode(request: ResolvedRequest): FeatureVector {
    return [
      request.area_size,
      request.bedrooms,
      request.has_parking ? 1 : 0,
      request.has_project ? 1 : 0,
      this.lookup('area', this.areas, normalizeAreaName(request.area_name)),
      this.lookup('subtype', this.subtypes, request.subtype),
      this.lookup(
        'registration type',
        this.registrationTypes,
        request.registration_type,
      ),
    ];
  }

  private lookup(
    kind: string,
    index: ReadonlyMap<string, number>,
    value: string,
  ): number {
    const position = index.get(value);
    if (position === undefined) {
      this.logger.warn(`'${value}' not found in ${kind} classes, using default`);
      return 0;
    }
    return position;
  }
}

function indexOf(values: string[]): Map<string, number> {
  const index = new Map<string, number>();
  values.forEach((value, i) => {
    if (!index.has(value)) index.set(value, i);
  });
  return index;
}
