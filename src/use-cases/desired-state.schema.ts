import { z } from "zod";

const ADDRESS_REGEX = /^[A-Za-z][A-Za-z0-9_-]*\.[A-Za-z0-9_-]+$/;

export const ResourceAddressSchema = z
    .string()
    .regex(
        ADDRESS_REGEX,
        "address must look like <type>.<name> using letters, numbers, '_' and '-'",
    );

// Desired-state documents use snake_case keys, the same as the persisted state
const DesiredResourceSchema = z.object({
    address: ResourceAddressSchema,
    kind: z.string().min(1, "kind is required"),
    attributes: z.record(z.unknown()).default({}),
    depends_on: z.array(ResourceAddressSchema).default([]),
    lifecycle: z
        .object({
            create_before_destroy: z.boolean().default(false),
        })
        .strict()
        .default({}),
});

export const DesiredStateDocumentSchema = z.object({
    version: z.literal(1),
    resources: z.array(DesiredResourceSchema),
});

export type DesiredStateDocument = z.infer<typeof DesiredStateDocumentSchema>;
export type DesiredResource = z.infer<typeof DesiredResourceSchema>;
