import type { Reference, ResourceDescriptor } from "./resource-descriptor.js";

export interface DependencyGraph {
    readonly nodes: ReadonlyMap<string, ResourceDescriptor>;
    readonly references: readonly Reference[];
    dependenciesOf(address: string): readonly string[];
    dependentsOf(address: string): readonly string[];
    // Dependencies first, ties broken by address
    topologicalOrder(): readonly string[];
    depthOf(address: string): number;
    referencesFrom(address: string): readonly Reference[];
}
