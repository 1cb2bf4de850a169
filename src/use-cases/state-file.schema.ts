import { z } from "zod";
import { isResourceKind, type ResourceKind } from "../entities/resource-kind.js";

const ResourceKindSchema = z
    .string()
    .refine((value): value is ResourceKind => isResourceKind(value), {
        message: "unknown resource kind",
    });

const DeposedObjectSchema = z.object({
    kind: ResourceKindSchema,
    provider_assigned_id: z.string().min(1),
    resolved_attributes: z.record(z.unknown()),
});

const StateRecordSchema = z.object({
    kind: ResourceKindSchema,
    status: z.enum(["absent", "creating", "ready", "tainted", "destroying"]),
    provider_assigned_id: z.string().min(1).nullable(),
    last_applied_attributes: z.record(z.unknown()),
    resolved_attributes: z.record(z.unknown()),
    outputs: z.record(z.unknown()),
    dependencies: z.array(z.string()).default([]),
    deposed: DeposedObjectSchema.optional(),
    updated_at: z.string(),
});

export const StateFileSchema = z.object({
    version: z.literal(1),
    serial: z.number().int().nonnegative(),
    lineage: z.string().min(1),
    records: z.record(StateRecordSchema),
});

export type StateFile = z.infer<typeof StateFileSchema>;
export type PersistedStateRecord = z.infer<typeof StateRecordSchema>;
