import { ZodError } from "zod";
import type { AttributeMap, AttributeValue } from "../entities/resource-descriptor.js";
import { toAttributeValue } from "../entities/resource-descriptor.js";
import { sanitizeJson } from "../entities/sanitize-json.js";
import type { StateRecord } from "../entities/state-record.js";
import {
    type PersistedStateRecord,
    type StateFile,
    StateFileSchema,
} from "./state-file.schema.js";

export interface PersistedState {
    readonly serial: number;
    readonly lineage: string;
    readonly records: ReadonlyMap<string, StateRecord>;
}

export interface StateFileCodec {
    // Throws a plain Error describing what is wrong with the text
    decode(text: string): PersistedState;
    encode(state: PersistedState): string;
}

function toAttributeMap(
    address: string,
    raw: Readonly<Record<string, unknown>>,
): AttributeMap {
    const attributes: Record<string, AttributeValue> = {};
    for (const [name, value] of Object.entries(raw)) {
        const converted = toAttributeValue(value);
        if (converted === undefined) {
            throw new Error(
                `records.${address}.last_applied_attributes.${name} is not plain JSON`,
            );
        }
        attributes[name] = converted;
    }
    return attributes;
}

function fromPersisted(
    address: string,
    record: PersistedStateRecord,
): StateRecord {
    return {
        address,
        kind: record.kind,
        status: record.status,
        providerAssignedId: record.provider_assigned_id,
        lastAppliedAttributes: toAttributeMap(
            address,
            record.last_applied_attributes,
        ),
        resolvedAttributes: record.resolved_attributes,
        outputs: record.outputs,
        dependencies: record.dependencies,
        deposed: record.deposed && {
            kind: record.deposed.kind,
            providerAssignedId: record.deposed.provider_assigned_id,
            resolvedAttributes: record.deposed.resolved_attributes,
        },
        updatedAt: record.updated_at,
    };
}

function toPersisted(record: StateRecord): PersistedStateRecord {
    return {
        kind: record.kind,
        status: record.status,
        provider_assigned_id: record.providerAssignedId,
        last_applied_attributes: record.lastAppliedAttributes,
        resolved_attributes: record.resolvedAttributes,
        outputs: record.outputs,
        dependencies: [...record.dependencies],
        ...(record.deposed && {
            deposed: {
                kind: record.deposed.kind,
                provider_assigned_id: record.deposed.providerAssignedId,
                resolved_attributes: record.deposed.resolvedAttributes,
            },
        }),
        updated_at: record.updatedAt,
    };
}

export function createStateFileCodec(): StateFileCodec {
    return {
        decode(text: string): PersistedState {
            let raw: unknown;
            try {
                raw = JSON.parse(text);
            } catch (error) {
                const message =
                    error instanceof Error ? error.message : String(error);
                throw new Error(`not valid JSON (${message})`);
            }

            let file: StateFile;
            try {
                file = StateFileSchema.parse(sanitizeJson(raw).value);
            } catch (error) {
                if (error instanceof ZodError) {
                    throw new Error(
                        error.issues
                            .map(
                                (issue) =>
                                    `${issue.path.join(".")}: ${issue.message}`,
                            )
                            .join("; "),
                    );
                }
                throw error;
            }

            const records = new Map<string, StateRecord>();
            for (const address of Object.keys(file.records).sort()) {
                const record = file.records[address];
                if (record) {
                    records.set(address, fromPersisted(address, record));
                }
            }
            return { serial: file.serial, lineage: file.lineage, records };
        },

        encode(state: PersistedState): string {
            const records: Record<string, PersistedStateRecord> = {};
            for (const address of [...state.records.keys()].sort()) {
                const record = state.records.get(address);
                if (record) {
                    records[address] = toPersisted(record);
                }
            }
            const file: StateFile = {
                version: 1,
                serial: state.serial,
                lineage: state.lineage,
                records,
            };
            return `${JSON.stringify(file, null, 2)}\n`;
        },
    };
}
