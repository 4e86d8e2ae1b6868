/**
 * Cypher statements for the attribution graph.
 *
 * Node upserts go through MERGE on a uniquely-constrained key, so
 * concurrent writers of the same id always land on one node.
 */

export const SCHEMA_QUERIES: readonly string[] = [
  `CREATE CONSTRAINT person_id_unique IF NOT EXISTS
   FOR (p:Person) REQUIRE p.id IS UNIQUE`,
  `CREATE CONSTRAINT ad_campaign_id_unique IF NOT EXISTS
   FOR (c:AdCampaign) REQUIRE c.id IS UNIQUE`,
  `CREATE INDEX clicked_on_clicked_at IF NOT EXISTS
   FOR ()-[r:Clicked_on]-() ON (r.clicked_at)`,
];

export const CYPHER = {
  // A supplied value overwrites, an unsupplied one keeps the stored
  // value, and a field never set falls back to $unknown.
  MERGE_PERSON: `
    MERGE (p:Person {id: $id})
      ON CREATE SET p.created_at = $at
    SET p.name = coalesce($name, p.name, $unknown),
        p.email = coalesce($email, p.email, $unknown),
        p.contact_number = coalesce($contact_number, p.contact_number, $unknown),
        p.updated_at = $at
    RETURN p.id AS id, p.name AS name, p.email AS email,
           p.contact_number AS contact_number
  `,

  MERGE_CAMPAIGN: `
    MERGE (c:AdCampaign {id: $id})
      ON CREATE SET c.created_at = $at
    SET c.campaign = coalesce($campaign, c.campaign, $unknown),
        c.updated_at = $at
    RETURN c.id AS id, c.campaign AS campaign
  `,

  // Endpoints are only touched on create; the edge is always new.
  // $attribution holds the named fields and any extra keys.
  CREATE_CLICK: `
    MERGE (p:Person {id: $person_id})
      ON CREATE SET p.name = $unknown, p.email = $unknown,
                    p.contact_number = $unknown,
                    p.created_at = $clicked_at, p.updated_at = $clicked_at
    MERGE (c:AdCampaign {id: $campaign_id})
      ON CREATE SET c.campaign = $unknown,
                    c.created_at = $clicked_at, c.updated_at = $clicked_at
    CREATE (p)-[r:Clicked_on]->(c)
    SET r += $attribution,
        r.id = $id,
        r.person_id = $person_id,
        r.campaign_id = $campaign_id,
        r.clicked_at = $clicked_at,
        r.tag = $tag
    RETURN r.id AS id, r.person_id AS person_id, r.campaign_id AS campaign_id,
           r.clicked_at AS clicked_at, r.source AS source, r.medium AS medium,
           r.term AS term, r.content AS content, r.device AS device,
           r.date AS date, r.tag AS tag, properties(r) AS props
  `,

  SAMPLE_CLICKS: `
    MATCH (p:Person)-[r:Clicked_on]->(c:AdCampaign)
    RETURN r.id AS id, r.clicked_at AS clicked_at,
           p.id AS person_id, p.name AS person_name,
           c.id AS campaign_id, c.campaign AS campaign,
           r.source AS source, r.medium AS medium, r.term AS term,
           r.content AS content, r.device AS device, r.date AS date,
           r.tag AS tag, properties(r) AS props
    ORDER BY r.clicked_at DESC
    LIMIT $limit
  `,

  PERSON_ELEMENT_IDS: `
    MATCH (p:Person)
    WHERE $only_connected = false OR (p)-[:Clicked_on]->(:AdCampaign)
    RETURN elementId(p) AS neo4j_id
    ORDER BY neo4j_id
    SKIP $skip LIMIT $limit
  `,

  PERSON_ID_MAP: `
    MATCH (p:Person)
    RETURN p.id AS external_id, elementId(p) AS neo4j_id
    ORDER BY external_id
    SKIP $skip LIMIT $limit
  `,

  PING: `RETURN 1 AS ok`,
} as const;
