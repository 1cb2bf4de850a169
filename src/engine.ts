import { consola } from "consola";
import type { EngineConfig } from "./entities/engine-config.js";
import { createAwsResourceProvider } from "./gateways/aws-resource-provider.js";
import { createFileStateStore } from "./gateways/file-state-store.js";
import { createResourceKindCatalog } from "./gateways/resource-kind-catalog.js";
import { createS3ContentSync } from "./gateways/s3-content-sync.js";
import { createSystemClock } from "./gateways/system-clock.js";
import { createConditionWaiter } from "./use-cases/await-condition.js";
import { createDependencyGraphBuilder } from "./use-cases/build-dependency-graph.js";
import { type Convergence, createConvergence } from "./use-cases/converge.js";
import { createChangeSetExecutor } from "./use-cases/execute-change-set.js";
import { createDesiredStateParser } from "./use-cases/parse-desired-state.js";
import { createChangePlanner } from "./use-cases/plan-changes.js";
import { createRetryRunner } from "./use-cases/retry-with-backoff.js";
import type { StateStore } from "./use-cases/state-store.port.js";

export interface EngineFactory {
    stateStore(config: EngineConfig): StateStore;
    convergence(config: EngineConfig): Convergence;
}

export function createEngineFactory(): EngineFactory {
    const catalog = createResourceKindCatalog();
    const clock = createSystemClock();
    const stateStore = (config: EngineConfig) =>
        createFileStateStore({ statePath: config.statePath });

    return {
        stateStore,
        convergence(config: EngineConfig): Convergence {
            const waiter = createConditionWaiter({
                clock,
                logger: consola.withTag("waiter"),
            });
            return createConvergence({
                parser: createDesiredStateParser(catalog),
                graphBuilder: createDependencyGraphBuilder(),
                planner: createChangePlanner(catalog),
                executor: createChangeSetExecutor({
                    provider: createAwsResourceProvider({
                        region: config.region,
                        waiter,
                    }),
                    catalog,
                    waiter,
                    retry: createRetryRunner(clock, config.retry),
                    clock,
                    logger: consola.withTag("apply"),
                    concurrency: config.concurrency,
                }),
                stateStore: stateStore(config),
                contentSync: createS3ContentSync({
                    region: config.region,
                    logger: consola.withTag("content"),
                }),
                logger: consola.withTag("sitewright"),
            });
        },
    };
}
