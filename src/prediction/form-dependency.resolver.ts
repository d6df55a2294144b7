import { ownEntry } from '../common/own-entry';
import {
  PROPERTY_FIELDS,
  type FormRule,
  type PropertyField,
  type PropertyType,
  type PropertyUsage,
} from '../reference-data/reference-data.types';
import type { FieldPolicy, FieldRequirement } from './prediction.types';

const ruleKey = (usage: PropertyUsage, type: PropertyType) => `${usage}:${type}`;

function allFields(
  requirement: FieldRequirement,
): Record<PropertyField, FieldRequirement> {
  return {
    area_size: requirement,
    bedrooms: requirement,
    has_parking: requirement,
    has_project: requirement,
    area_name: requirement,
    registration_type: requirement,
  };
}

/**
 * Decides, per field, whether it is Required, Optional, Hidden or AutoFilled
 * for a (usage, type) variant. Pairs without a rule get the permissive
 * policy: every field Optional.
 */
export class FormDependencyResolver {
  private readonly rules: ReadonlyMap<string, FormRule>;

  constructor(rules: readonly FormRule[]) {
    this.rules = new Map(rules.map((rule) => [ruleKey(rule.usage, rule.type), rule]));
  }

  resolve(usage: PropertyUsage, type: PropertyType, subtype: string): FieldPolicy {
    const rule = this.rules.get(ruleKey(usage, type));
    if (!rule) {
      return {
        usage,
        type,
        subtype,
        known: false,
        fields: allFields('Optional'),
        autoFill: [],
        subtypes: null,
        registrationTypes: null,
      };
    }

    const override = ownEntry(rule.subtype_overrides, subtype);
    const hidden = new Set([...rule.hidden, ...(override?.hidden ?? [])]);
    const required = new Set([...rule.required, ...(override?.required ?? [])]);
    const autoFill = rule.auto_fill.filter((entry) => !hidden.has(entry.field));
    const autoFilled = new Set<PropertyField>(
      autoFill.map((entry) => entry.field),
    );

    // Hidden wins over everything, so a subtype can narrow but never re-show.
    const fields = allFields('Optional');
    for (const field of PROPERTY_FIELDS) {
      if (hidden.has(field)) fields[field] = 'Hidden';
      else if (autoFilled.has(field)) fields[field] = 'AutoFilled';
      else if (required.has(field)) fields[field] = 'Required';
    }

    return {
      usage,
      type,
      subtype,
      known: true,
      fields,
      autoFill: autoFill.map((entry) => ({ ...entry })),
      // An empty list in the rule means "not restricted".
      subtypes: rule.subtypes.length > 0 ? [...rule.subtypes] : null,
      registrationTypes:
        rule.registration_types.length > 0 ? [...rule.registration_types] : null,
    };
  }
}
