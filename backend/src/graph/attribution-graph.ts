// ============================================================
// Clickgraph — Attribution Graph (repository contract)
//
// Everything the feature services need from the graph store.
// Implementations must use the store's atomic merge primitive
// for node upserts; a read-then-write sequence would let two
// concurrent upserts of a brand-new id create two nodes.
// ============================================================

import type { CampaignUpsert, PersonUpsert } from '../identity/identity-resolver';

export const ATTRIBUTION_GRAPH = Symbol('ATTRIBUTION_GRAPH');

export interface PersonRecord {
  id: string;
  name: string;
  email: string;
  contact_number: string;
}

export interface CampaignRecord {
  id: string;
  campaign: string;
}

export interface AttributionFields {
  source: string | null;
  medium: string | null;
  term: string | null;
  content: string | null;
  device: string | null;
  date: string | null;
}

export const ATTRIBUTION_KEYS: ReadonlyArray<keyof AttributionFields> = [
  'source',
  'medium',
  'term',
  'content',
  'device',
  'date',
];

/**
 * Caller-defined attribution keys beyond ATTRIBUTION_KEYS (gclid,
 * utm_id, ...). Stored flat on the edge next to the named fields.
 */
export type ExtraAttribution = Record<string, string | number | boolean>;

/** Edge properties written by the server itself. */
export const CLICK_SYSTEM_KEYS: ReadonlyArray<string> = [
  'id',
  'person_id',
  'campaign_id',
  'clicked_at',
  'tag',
];

export interface NewClick {
  id: string;
  personId: string;
  campaignId: string;
  clickedAt: string;
  tag: string | null;
  attribution: AttributionFields;
  extra: ExtraAttribution;
}

export interface ClickEvent extends AttributionFields {
  id: string;
  person_id: string;
  campaign_id: string;
  clicked_at: string;
  tag: string | null;
  extra: ExtraAttribution;
}

export interface ClickSample extends AttributionFields {
  id: string;
  clicked_at: string;
  tag: string | null;
  extra: ExtraAttribution;
  person: { id: string; name: string };
  campaign: { id: string; campaign: string };
}

export interface WriteStats {
  nodesCreated: number;
  relationshipsCreated: number;
}

export interface Page<T> {
  items: T[];
  next_skip: number;
}

export interface PersonIdMapping {
  external_id: string | null;
  neo4j_id: string;
}

export interface PageRequest {
  skip: number;
  limit: number;
}

export interface AttributionGraph {
  /** Create-or-update a :Person; returns the node's state after the write. */
  mergePerson(upsert: PersonUpsert, at: string): Promise<PersonRecord>;

  mergeCampaign(upsert: CampaignUpsert, at: string): Promise<CampaignRecord>;

  /**
   * Ensure both endpoints exist (placeholders on create) and append
   * one Clicked_on edge, in a single transaction.
   */
  createClick(
    click: NewClick,
  ): Promise<{ event: ClickEvent; stats: WriteStats }>;

  /** Most recent clicks first. Read-only. */
  sampleClicks(limit: number): Promise<ClickSample[]>;

  listPersonElementIds(
    page: PageRequest,
    onlyConnected: boolean,
  ): Promise<string[]>;

  listPersonIdMap(page: PageRequest): Promise<PersonIdMapping[]>;

  /** Resolves when the store answers a trivial query. */
  ping(): Promise<void>;
}
