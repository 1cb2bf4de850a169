import type { ResourceKind } from "../entities/resource-kind.js";
import type { ResolvedAttributes } from "../entities/state-record.js";
import type { Clock } from "../use-cases/clock.port.js";
import type { ResourceKindCatalog } from "../use-cases/resource-kind-catalog.port.js";
import type {
    CreateRequest,
    ResourceProvider,
} from "../use-cases/resource-provider.port.js";

export type ProviderMethod =
    | "create"
    | "read"
    | "update"
    | "delete"
    | "checkCondition";

export interface ProviderCall {
    readonly method: ProviderMethod;
    readonly kind: ResourceKind;
    readonly id?: string | undefined;
    readonly attributes?: ResolvedAttributes | undefined;
    readonly idempotencyKey?: string | undefined;
}

export interface ScriptedFailure {
    readonly method: ProviderMethod;
    readonly kind?: ResourceKind | undefined;
    readonly error: Error;
    // Unlimited when omitted
    readonly times?: number | undefined;
}

export interface FakeObject {
    readonly id: string;
    readonly kind: ResourceKind;
    attributes: ResolvedAttributes;
    pollsUntilReady: number;
}

export interface FakeProviderOptions {
    readonly catalog: ResourceKindCatalog;
    // Number of "not yet" answers before a kind reports ready, or "never"
    readonly readiness?: Partial<Record<ResourceKind, number | "never">>;
    readonly failures?: readonly ScriptedFailure[];
    readonly clock?: Clock | undefined;
    readonly latencyMs?: number | undefined;
    // Kinds whose id is built from their attributes, as S3 names a bucket;
    // creating an existing id overwrites that object
    readonly identityOf?: Partial<
        Record<ResourceKind, (attributes: ResolvedAttributes) => string>
    >;
}

export interface FakeResourceProvider extends ResourceProvider {
    readonly calls: readonly ProviderCall[];
    readonly objects: ReadonlyMap<string, FakeObject>;
    peakInFlight(): number;
    callsOf(method: ProviderMethod): readonly ProviderCall[];
}

export function createFakeResourceProvider(
    options: FakeProviderOptions,
): FakeResourceProvider {
    const calls: ProviderCall[] = [];
    const objects = new Map<string, FakeObject>();
    const remainingFailures = (options.failures ?? []).map((failure) => ({
        failure,
        left: failure.times ?? Number.POSITIVE_INFINITY,
    }));
    let counter = 0;
    let inFlight = 0;
    let peak = 0;

    const record = (call: ProviderCall) => {
        calls.push(call);
        const scripted = remainingFailures.find(
            (entry) =>
                entry.left > 0 &&
                entry.failure.method === call.method &&
                (entry.failure.kind === undefined ||
                    entry.failure.kind === call.kind),
        );
        if (scripted) {
            scripted.left -= 1;
            throw scripted.failure.error;
        }
    };

    const mutate = async <T>(work: () => T): Promise<T> => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        try {
            if (options.clock && options.latencyMs) {
                await options.clock.sleep(options.latencyMs);
            }
            return work();
        } finally {
            inFlight -= 1;
        }
    };

    const outputsOf = (object: FakeObject): ResolvedAttributes => {
        const schema = options.catalog.require(object.kind);
        const outputs: Record<string, unknown> = {};
        for (const name of Object.keys(schema.outputs)) {
            const passthrough =
                name === "fqdn"
                    ? object.attributes["name"]
                    : object.attributes[name];
            if (typeof passthrough === "string") {
                outputs[name] = passthrough;
            } else if (name === "id") {
                outputs[name] = object.id;
            } else if (name === "arn") {
                outputs[name] = `arn:fake:${object.kind}:${object.id}`;
            } else {
                outputs[name] = `${name}.${object.id}`;
            }
        }
        return outputs;
    };

    return {
        calls,
        objects,
        peakInFlight: () => peak,
        callsOf: (method: ProviderMethod) =>
            calls.filter((call) => call.method === method),

        create(
            kind: ResourceKind,
            attributes: ResolvedAttributes,
            request: CreateRequest,
        ) {
            return mutate(() => {
                record({
                    method: "create",
                    kind,
                    attributes,
                    idempotencyKey: request.idempotencyKey,
                });
                counter += 1;
                const identity = options.identityOf?.[kind];
                const id = identity ? identity(attributes) : `${kind}-${counter}`;
                const readiness = options.readiness?.[kind] ?? 0;
                objects.set(id, {
                    id,
                    kind,
                    attributes,
                    pollsUntilReady:
                        readiness === "never"
                            ? Number.POSITIVE_INFINITY
                            : readiness,
                });
                return id;
            });
        },

        async read(kind: ResourceKind, id: string) {
            record({ method: "read", kind, id });
            const object = objects.get(id);
            return object ? outputsOf(object) : undefined;
        },

        update(kind: ResourceKind, id: string, attributes: ResolvedAttributes) {
            return mutate(() => {
                record({ method: "update", kind, id, attributes });
                const object = objects.get(id);
                if (!object) {
                    throw new Error(`${id} does not exist`);
                }
                object.attributes = attributes;
            });
        },

        delete(kind: ResourceKind, id: string) {
            return mutate(() => {
                record({ method: "delete", kind, id });
                objects.delete(id);
            });
        },

        async checkCondition(kind: ResourceKind, id: string) {
            record({ method: "checkCondition", kind, id });
            const object = objects.get(id);
            if (!object) {
                return false;
            }
            if (object.pollsUntilReady > 0) {
                object.pollsUntilReady -= 1;
                return false;
            }
            return true;
        },
    };
}
