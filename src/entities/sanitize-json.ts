export const DANGEROUS_KEYS: ReadonlySet<string> = new Set([
    "__proto__",
    "constructor",
    "prototype",
]);

export const DEFAULT_MAX_DEPTH = 64;

export interface SanitizedJson {
    readonly value: unknown;
    readonly strippedPaths: readonly string[];
}

export class JsonDepthError extends Error {
    constructor(readonly maxDepth: number) {
        super(`JSON nesting exceeds ${maxDepth} levels`);
        this.name = "JsonDepthError";
    }
}

function walk(
    value: unknown,
    depth: number,
    path: string,
    maxDepth: number,
    stripped: string[],
): unknown {
    if (value === null || typeof value !== "object") {
        return value;
    }
    if (depth > maxDepth) {
        throw new JsonDepthError(maxDepth);
    }
    if (Array.isArray(value)) {
        return value.map((item, index) =>
            walk(item, depth + 1, `${path}[${index}]`, maxDepth, stripped),
        );
    }
    const result: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
        const nestedPath = path ? `${path}.${key}` : key;
        if (DANGEROUS_KEYS.has(key)) {
            stripped.push(nestedPath);
            continue;
        }
        result[key] = walk(nested, depth + 1, nestedPath, maxDepth, stripped);
    }
    return result;
}

export function sanitizeJson(
    value: unknown,
    maxDepth = DEFAULT_MAX_DEPTH,
): SanitizedJson {
    const strippedPaths: string[] = [];
    const sanitized = walk(value, 0, "", maxDepth, strippedPaths);
    return { value: sanitized, strippedPaths };
}
