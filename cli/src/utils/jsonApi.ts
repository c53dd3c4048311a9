import type { JsonApiRelationship } from "../models/jsonApi";

export const extractRelationshipIds = (relationship?: JsonApiRelationship): string[] => {
  if (!relationship || relationship.data == null) return [];

  if (Array.isArray(relationship.data)) {
    return relationship.data.map((entry) => entry.id).filter((id) => id.length > 0);
  }

  return relationship.data.id ? [relationship.data.id] : [];
};

export const extractFirstRelationshipId = (relationship?: JsonApiRelationship): string | null =>
  extractRelationshipIds(relationship)[0] ?? null;
