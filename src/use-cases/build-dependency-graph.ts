import type { DependencyGraph } from "../entities/dependency-graph.js";
import { CycleError } from "../entities/errors.js";
import type {
    Reference,
    ResourceDescriptor,
} from "../entities/resource-descriptor.js";
import { collectReferences } from "./resolve-references.js";

export interface DependencyGraphBuilder {
    build(descriptors: readonly ResourceDescriptor[]): DependencyGraph;
}

function findCycle(
    addresses: readonly string[],
    dependencies: ReadonlyMap<string, ReadonlySet<string>>,
): string[] | undefined {
    const visited = new Set<string>();
    const onStack = new Set<string>();
    const path: string[] = [];

    const visit = (address: string): string[] | undefined => {
        visited.add(address);
        onStack.add(address);
        path.push(address);

        const next = [...(dependencies.get(address) ?? [])].sort();
        for (const dependency of next) {
            if (onStack.has(dependency)) {
                return path.slice(path.indexOf(dependency));
            }
            if (!visited.has(dependency)) {
                const cycle = visit(dependency);
                if (cycle) {
                    return cycle;
                }
            }
        }

        onStack.delete(address);
        path.pop();
        return undefined;
    };

    for (const address of addresses) {
        if (!visited.has(address)) {
            const cycle = visit(address);
            if (cycle) {
                return cycle;
            }
        }
    }
    return undefined;
}

function kahnOrder(
    addresses: readonly string[],
    dependencies: ReadonlyMap<string, ReadonlySet<string>>,
    dependents: ReadonlyMap<string, ReadonlySet<string>>,
): string[] {
    const remaining = new Map(
        addresses.map((address) => [
            address,
            dependencies.get(address)?.size ?? 0,
        ]),
    );
    const ready = addresses.filter((address) => remaining.get(address) === 0);
    ready.sort();

    const order: string[] = [];
    while (ready.length > 0) {
        const current = ready.shift();
        if (current === undefined) {
            break;
        }
        order.push(current);
        for (const dependent of dependents.get(current) ?? []) {
            const count = (remaining.get(dependent) ?? 1) - 1;
            remaining.set(dependent, count);
            if (count === 0) {
                ready.push(dependent);
                ready.sort();
            }
        }
    }
    return order;
}

export function createDependencyGraphBuilder(): DependencyGraphBuilder {
    return {
        build(descriptors: readonly ResourceDescriptor[]): DependencyGraph {
            const nodes = new Map(
                descriptors.map((descriptor) => [
                    descriptor.address,
                    descriptor,
                ]),
            );
            const addresses = [...nodes.keys()];
            const dependencies = new Map<string, Set<string>>();
            const dependents = new Map<string, Set<string>>();
            const referencesByNode = new Map<string, Reference[]>();
            const references: Reference[] = [];

            for (const address of addresses) {
                dependencies.set(address, new Set());
                dependents.set(address, new Set());
            }

            const addEdge = (from: string, to: string): void => {
                if (!nodes.has(to)) {
                    throw new Error(
                        `${from} depends on ${to}, which is not part of the graph`,
                    );
                }
                dependencies.get(from)?.add(to);
                dependents.get(to)?.add(from);
            };

            for (const descriptor of descriptors) {
                for (const dependency of descriptor.dependsOn) {
                    addEdge(descriptor.address, dependency);
                }
                const found = collectReferences(descriptor);
                for (const reference of found) {
                    addEdge(reference.from, reference.to);
                }
                referencesByNode.set(descriptor.address, found);
                references.push(...found);
            }

            const cycle = findCycle(addresses, dependencies);
            if (cycle) {
                throw new CycleError(cycle);
            }

            const order = Object.freeze(
                kahnOrder(addresses, dependencies, dependents),
            );
            const depths = new Map<string, number>();
            for (const address of order) {
                const deepest = Math.max(
                    -1,
                    ...[...(dependencies.get(address) ?? [])].map(
                        (dependency) => depths.get(dependency) ?? 0,
                    ),
                );
                depths.set(address, deepest + 1);
            }

            const sortedList = (set: ReadonlySet<string> | undefined) =>
                Object.freeze([...(set ?? [])].sort());

            return Object.freeze({
                nodes,
                references: Object.freeze(references),
                dependenciesOf: (address: string) =>
                    sortedList(dependencies.get(address)),
                dependentsOf: (address: string) =>
                    sortedList(dependents.get(address)),
                topologicalOrder: () => order,
                depthOf: (address: string) => depths.get(address) ?? 0,
                referencesFrom: (address: string) =>
                    referencesByNode.get(address) ?? [],
            });
        },
    };
}
