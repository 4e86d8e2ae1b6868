// ============================================================
// Clickgraph — Extra attribution fields
//
// POST /clicked_on accepts attribution keys beyond the named
// ones (gclid, utm_id, campaign_name, ...). The global
// ValidationPipe strips undeclared properties from the DTO, so
// they are read from the raw body here instead. Nothing is
// dropped silently: a key or value that cannot be stored is a
// 400 naming the field.
// ============================================================

import { BadRequestException } from '@nestjs/common';
import {
  ATTRIBUTION_KEYS,
  CLICK_SYSTEM_KEYS,
  ExtraAttribution,
} from '../graph/attribution-graph';

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]{0,63}$/;
export const MAX_EXTRA_FIELDS = 32;
export const MAX_EXTRA_LENGTH = 2048;

/** Bound to RecordClickDto properties and validated there. */
const DECLARED_KEYS = new Set<string>([
  'id',
  'person_id',
  'campaign_id',
  ...ATTRIBUTION_KEYS,
]);

const RESERVED_KEYS = new Set<string>(
  CLICK_SYSTEM_KEYS.filter((key) => !DECLARED_KEYS.has(key)),
);

/**
 * Collect the undeclared keys of a click body. Strings are trimmed
 * and, like the named fields, blank ones and nulls count as absent.
 */
export function extraAttributionOf(body: object): ExtraAttribution {
  const extra: ExtraAttribution = {};

  for (const [key, raw] of Object.entries(body)) {
    if (DECLARED_KEYS.has(key)) continue;
    if (RESERVED_KEYS.has(key)) {
      throw new BadRequestException(`${key} is set by the server`);
    }
    if (!FIELD_NAME.test(key)) {
      throw new BadRequestException(
        `${key.slice(0, 80)} is not a valid attribution field name`,
      );
    }

    const value: unknown = raw;
    if (value === null || value === undefined) continue;

    if (typeof value === 'string') {
      const trimmed = value.trim();
      if (trimmed.length > MAX_EXTRA_LENGTH) {
        throw new BadRequestException(
          `${key} must be shorter than or equal to ${MAX_EXTRA_LENGTH} characters`,
        );
      }
      if (trimmed.length > 0) extra[key] = trimmed;
    } else if (
      (typeof value === 'number' && Number.isFinite(value)) ||
      typeof value === 'boolean'
    ) {
      extra[key] = value;
    } else {
      throw new BadRequestException(
        `${key} must be a string, number or boolean`,
      );
    }
  }

  if (Object.keys(extra).length > MAX_EXTRA_FIELDS) {
    throw new BadRequestException(
      `At most ${MAX_EXTRA_FIELDS} extra attribution fields are accepted`,
    );
  }
  return extra;
}
