import type { EngineFactory } from "../engine.js";
import type { EngineConfig } from "../entities/engine-config.js";
import type { StateRecord } from "../entities/state-record.js";
import {
    createInMemoryStateStore,
    type InMemoryStateStore,
} from "../gateways/in-memory-state-store.js";
import { createResourceKindCatalog } from "../gateways/resource-kind-catalog.js";
import { createConditionWaiter } from "../use-cases/await-condition.js";
import { createDependencyGraphBuilder } from "../use-cases/build-dependency-graph.js";
import type { ContentSync } from "../use-cases/content-sync.port.js";
import { createConvergence } from "../use-cases/converge.js";
import { createChangeSetExecutor } from "../use-cases/execute-change-set.js";
import { createDesiredStateParser } from "../use-cases/parse-desired-state.js";
import { createChangePlanner } from "../use-cases/plan-changes.js";
import { createRetryRunner } from "../use-cases/retry-with-backoff.js";
import { createFakeClock } from "./fake-clock.js";
import {
    createFakeResourceProvider,
    type FakeResourceProvider,
    type ScriptedFailure,
} from "./fake-resource-provider.js";

export interface FakeEngine extends EngineFactory {
    readonly store: InMemoryStateStore;
    readonly provider: FakeResourceProvider;
    readonly configs: readonly EngineConfig[];
}

export interface FakeEngineOptions {
    readonly records?: Iterable<StateRecord>;
    readonly failures?: readonly ScriptedFailure[];
    readonly contentSync?: ContentSync;
}

const silentLogger = {
    info: () => undefined,
    warn: () => undefined,
    debug: () => undefined,
};

// Wires the real use cases to in-process stand-ins for AWS and the state file
export function createFakeEngine(options: FakeEngineOptions = {}): FakeEngine {
    const catalog = createResourceKindCatalog();
    const clock = createFakeClock();
    const store = createInMemoryStateStore(options.records);
    const provider = createFakeResourceProvider({
        catalog,
        failures: options.failures,
    });
    const contentSync: ContentSync = options.contentSync ?? {
        sync: async () => ({
            uploaded: [],
            deleted: [],
            unchanged: 0,
        }),
    };
    const configs: EngineConfig[] = [];

    return {
        store,
        provider,
        configs,
        stateStore(config: EngineConfig) {
            configs.push(config);
            return store;
        },
        convergence(config: EngineConfig) {
            configs.push(config);
            const waiter = createConditionWaiter({
                clock,
                logger: silentLogger,
            });
            return createConvergence({
                parser: createDesiredStateParser(catalog),
                graphBuilder: createDependencyGraphBuilder(),
                planner: createChangePlanner(catalog),
                executor: createChangeSetExecutor({
                    provider,
                    catalog,
                    waiter,
                    retry: createRetryRunner(clock, config.retry),
                    clock,
                    logger: silentLogger,
                    concurrency: config.concurrency,
                }),
                stateStore: store,
                contentSync,
                logger: silentLogger,
            });
        },
    };
}
