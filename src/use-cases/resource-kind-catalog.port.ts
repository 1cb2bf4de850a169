import type {
    ResourceKind,
    ResourceKindSchema,
} from "../entities/resource-kind.js";

export interface ResourceKindCatalog {
    lookup(kind: string): ResourceKindSchema | undefined;
    require(kind: ResourceKind): ResourceKindSchema;
}
