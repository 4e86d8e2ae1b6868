// ============================================================
// Clickgraph — Identity Resolver
//
// Turns loosely-structured payloads into canonical upserts.
//
// Fallback policy:
//   - blank/missing display field → "Unknown" (applied by the
//     graph write, only where the node has no stored value)
//   - blank/missing id → "<prefix>_" + sha256 over the
//     normalized supplied fields, so repeat submissions of the
//     same under-specified entity converge on one node
//   - nothing supplied at all → "<prefix>_" + random UUID
//
// Normalization for hashing: NFKC, trim, collapse internal
// whitespace, lower-case. Fields are joined with U+001F in a
// fixed order and prefixed with the entity kind.
// ============================================================

import { Injectable } from '@nestjs/common';
import { createHash, randomUUID } from 'crypto';

export const UNKNOWN = 'Unknown';

export type EntityKind = 'person' | 'campaign';

const ID_PREFIX: Record<EntityKind, string> = {
  person: 'per',
  campaign: 'cmp',
};

const SEPARATOR = '\u001f';
const HASH_LENGTH = 32;

export interface PersonInput {
  id?: string | null;
  name?: string | null;
  email?: string | null;
  contact_number?: string | null;
}

export interface CampaignInput {
  id?: string | null;
  campaign?: string | null;
}

/** A null field means "not supplied": keep what the node already has. */
export interface PersonUpsert {
  id: string;
  fields: {
    name: string | null;
    email: string | null;
    contact_number: string | null;
  };
}

export interface CampaignUpsert {
  id: string;
  fields: {
    campaign: string | null;
  };
}

@Injectable()
export class IdentityResolver {
  resolvePerson(input: PersonInput): PersonUpsert {
    const fields = {
      name: normalize(input.name),
      email: normalize(input.email),
      contact_number: normalize(input.contact_number),
    };
    const id =
      normalize(input.id) ??
      this.deriveId('person', [fields.name, fields.email, fields.contact_number]);

    return { id, fields };
  }

  resolveCampaign(input: CampaignInput): CampaignUpsert {
    const fields = { campaign: normalize(input.campaign) };
    const id =
      normalize(input.id) ?? this.deriveId('campaign', [fields.campaign]);

    return { id, fields };
  }

  /** Resolve a bare reference (e.g. click endpoint) with no other fields. */
  resolveReference(kind: EntityKind, id: string | null | undefined): string {
    return normalize(id) ?? this.deriveId(kind, []);
  }

  deriveId(kind: EntityKind, values: Array<string | null>): string {
    const prefix = ID_PREFIX[kind];

    if (values.every((v) => v === null)) {
      return `${prefix}_${randomUUID().replace(/-/g, '')}`;
    }

    const key = [kind, ...values.map((v) => canonical(v ?? ''))].join(
      SEPARATOR,
    );
    const digest = createHash('sha256').update(key, 'utf8').digest('hex');
    return `${prefix}_${digest.slice(0, HASH_LENGTH)}`;
  }
}

/** Blank or missing → null; otherwise the trimmed value. */
export function normalize(value: string | null | undefined): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function canonical(value: string): string {
  return value.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}
