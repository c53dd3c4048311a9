import { z } from "zod";

export const resourceIdentifierSchema = z.object({
  id: z.string(),
  type: z.string(),
});

export const relationshipSchema = z.object({
  data: z.union([resourceIdentifierSchema, z.array(resourceIdentifierSchema)]).nullish(),
});

export const relationshipsSchema = z.record(relationshipSchema);

export const resourceSchema = <TType extends string, TAttributes extends z.ZodTypeAny>(
  type: TType,
  attributes: TAttributes,
) =>
  z.object({
    id: z.string(),
    type: z.literal(type),
    attributes,
    relationships: relationshipsSchema.optional(),
  });

/** Sideloaded resources are only read through their relationships. */
export const includedResourceSchema = z.object({
  id: z.string(),
  type: z.string(),
  relationships: relationshipsSchema.optional(),
});

export const listResponseSchema = <TResource extends z.ZodTypeAny>(resource: TResource) =>
  z.object({
    data: z.array(resource),
    included: z.array(includedResourceSchema).optional(),
  });

export type JsonApiRelationship = z.infer<typeof relationshipSchema>;
export type JsonApiIncludedResource = z.infer<typeof includedResourceSchema>;
