/**
 * Projection of calculation specs onto templates
 *
 * A template names the fields (and the keyword keys inside `keywords` and
 * `extras`) that matter for an identity. Values always come from the spec;
 * the template only decides which keys survive.
 */

import { digest, isMapping } from './canonical';
import {
  CalculationDict,
  CalculationSpec,
  KeywordMap,
  MappingField,
  MAPPING_FIELDS,
  copyField,
  dumpCalculation,
  setFields,
} from './calculation';

export type CalculationTemplate = CalculationSpec | CalculationDict;

function isMappingField(field: string): field is MappingField {
  return (MAPPING_FIELDS as readonly string[]).includes(field);
}

/**
 * Keep the keys of `source` that also appear in `template`, recursing where
 * both sides hold a mapping.
 */
export function projectMapping(source: KeywordMap, template: KeywordMap): KeywordMap {
  const projected: KeywordMap = {};
  for (const key of Object.keys(template).sort()) {
    if (!Object.prototype.hasOwnProperty.call(source, key)) continue;
    const value = source[key];
    const shape = template[key];
    projected[key] = isMapping(value) && isMapping(shape) ? projectMapping(value, shape) : value;
  }
  return projected;
}

/**
 * Restrict a spec to the fields set on the template.
 * Fields the spec leaves null or absent (after defaults) are omitted.
 */
export function project(spec: CalculationSpec, template: CalculationTemplate): CalculationDict {
  const source = dumpCalculation(spec);
  const projected: CalculationDict = {};

  for (const field of setFields(template)) {
    if (isMappingField(field)) {
      const map = source[field];
      if (map !== undefined) {
        projected[field] = projectMapping(map, template[field] ?? {});
      }
      continue;
    }
    if (source[field] !== undefined) {
      copyField(projected, source, field);
    }
  }

  return projected;
}

/**
 * digest(project(spec, template))
 */
export function projectedHash(spec: CalculationSpec, template: CalculationTemplate): string {
  return digest(project(spec, template));
}
