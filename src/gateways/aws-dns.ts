import {
    ChangeResourceRecordSetsCommand,
    type ChangeAction,
    ListResourceRecordSetsCommand,
    type ResourceRecordSet,
    type Route53Client,
} from "@aws-sdk/client-route-53";
import { z } from "zod";
import { ProviderError } from "../entities/errors.js";
import type { ResolvedAttributes } from "../entities/state-record.js";
import { type KindHandler, parseAttributes } from "./aws-kind-handler.js";

const RecordTypeSchema = z.enum([
    "A",
    "AAAA",
    "CAA",
    "CNAME",
    "MX",
    "NS",
    "TXT",
]);

const DnsRecordAttributesSchema = z.object({
    zone_id: z.string().min(1),
    name: z.string().min(1),
    type: RecordTypeSchema,
    ttl: z.number().int().min(0).default(300),
    values: z.array(z.string()).default([]),
    alias_target: z
        .object({
            zone_id: z.string().min(1),
            name: z.string().min(1),
            evaluate_target_health: z.boolean().default(false),
        })
        .optional(),
});

type DnsRecordAttributes = z.infer<typeof DnsRecordAttributesSchema>;

interface RecordKey {
    readonly zoneId: string;
    readonly name: string;
    readonly type: z.infer<typeof RecordTypeSchema>;
}

const ID_SEPARATOR = "|";

function normalizeName(name: string): string {
    return name.endsWith(".") ? name.slice(0, -1) : name;
}

export function recordIdOf(attributes: DnsRecordAttributes): string {
    return [
        attributes.zone_id,
        normalizeName(attributes.name),
        attributes.type,
    ].join(ID_SEPARATOR);
}

function parseRecordId(id: string): RecordKey {
    const [zoneId, name, type] = id.split(ID_SEPARATOR);
    const parsedType = RecordTypeSchema.safeParse(type);
    if (!zoneId || !name || !parsedType.success) {
        throw new ProviderError(`Malformed DNS record id "${id}"`, {
            transient: false,
        });
    }
    return { zoneId, name, type: parsedType.data };
}

function toRecordSet(attributes: DnsRecordAttributes): ResourceRecordSet {
    const base = {
        Name: attributes.name,
        Type: attributes.type,
    };
    if (attributes.alias_target) {
        return {
            ...base,
            AliasTarget: {
                HostedZoneId: attributes.alias_target.zone_id,
                DNSName: attributes.alias_target.name,
                EvaluateTargetHealth:
                    attributes.alias_target.evaluate_target_health,
            },
        };
    }
    return {
        ...base,
        TTL: attributes.ttl,
        ResourceRecords: attributes.values.map((value) => ({ Value: value })),
    };
}

export function createDnsRecordHandler(client: Route53Client): KindHandler {
    const parse = (attributes: ResolvedAttributes) => {
        const parsed = parseAttributes(
            DnsRecordAttributesSchema,
            "dns_record",
            attributes,
        );
        if (!parsed.alias_target && parsed.values.length === 0) {
            throw new ProviderError(
                `DNS record ${parsed.name} needs values or an alias_target`,
                { transient: false },
            );
        }
        return parsed;
    };

    const change = async (
        action: ChangeAction,
        zoneId: string,
        recordSet: ResourceRecordSet,
        signal: AbortSignal | undefined,
    ): Promise<void> => {
        await client.send(
            new ChangeResourceRecordSetsCommand({
                HostedZoneId: zoneId,
                ChangeBatch: {
                    Changes: [{ Action: action, ResourceRecordSet: recordSet }],
                },
            }),
            { abortSignal: signal },
        );
    };

    const find = async (id: string): Promise<ResourceRecordSet | undefined> => {
        const key = parseRecordId(id);
        const response = await client.send(
            new ListResourceRecordSetsCommand({
                HostedZoneId: key.zoneId,
                StartRecordName: key.name,
                StartRecordType: key.type,
                MaxItems: 1,
            }),
        );
        return (response.ResourceRecordSets ?? []).find(
            (recordSet) =>
                recordSet.Type === key.type &&
                normalizeName(recordSet.Name ?? "").toLowerCase() ===
                    key.name.toLowerCase(),
        );
    };

    return {
        async create(attributes, { signal }) {
            const parsed = parse(attributes);
            // UPSERT so a create resumed after an interruption converges
            await change("UPSERT", parsed.zone_id, toRecordSet(parsed), signal);
            return recordIdOf(parsed);
        },

        async read(id) {
            const recordSet = await find(id);
            if (!recordSet) {
                return undefined;
            }
            return {
                fqdn: normalizeName(recordSet.Name ?? parseRecordId(id).name),
            };
        },

        async update(_id, attributes, signal) {
            const parsed = parse(attributes);
            await change("UPSERT", parsed.zone_id, toRecordSet(parsed), signal);
        },

        async delete(id, signal) {
            const recordSet = await find(id);
            if (!recordSet) {
                return;
            }
            await change("DELETE", parseRecordId(id).zoneId, recordSet, signal);
        },
    };
}
