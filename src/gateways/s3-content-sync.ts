import { createHash } from "node:crypto";
import { readdir, readFile, stat } from "node:fs/promises";
import { extname, join, sep } from "node:path";
import {
    CloudFrontClient,
    CreateInvalidationCommand,
} from "@aws-sdk/client-cloudfront";
import {
    DeleteObjectsCommand,
    ListObjectsV2Command,
    PutObjectCommand,
    S3Client,
} from "@aws-sdk/client-s3";
import type { ContentSyncReport } from "../entities/content-sync-outcome.js";
import { ApplyCancelledError } from "../entities/errors.js";
import type {
    ContentSync,
    ContentSyncRequest,
} from "../use-cases/content-sync.port.js";
import type { ProgressLogger } from "../use-cases/progress-logger.port.js";

const CONTENT_TYPES: Readonly<Record<string, string>> = {
    ".html": "text/html; charset=utf-8",
    ".htm": "text/html; charset=utf-8",
    ".css": "text/css; charset=utf-8",
    ".js": "text/javascript; charset=utf-8",
    ".mjs": "text/javascript; charset=utf-8",
    ".json": "application/json",
    ".map": "application/json",
    ".txt": "text/plain; charset=utf-8",
    ".xml": "application/xml",
    ".svg": "image/svg+xml",
    ".png": "image/png",
    ".jpg": "image/jpeg",
    ".jpeg": "image/jpeg",
    ".gif": "image/gif",
    ".webp": "image/webp",
    ".avif": "image/avif",
    ".ico": "image/x-icon",
    ".woff": "font/woff",
    ".woff2": "font/woff2",
    ".pdf": "application/pdf",
    ".webmanifest": "application/manifest+json",
};

const DELETE_BATCH_SIZE = 1000;
// Past this many changed paths the whole distribution is invalidated
const MAX_INVALIDATION_PATHS = 15;

export function contentTypeOf(key: string): string {
    return (
        CONTENT_TYPES[extname(key).toLowerCase()] ?? "application/octet-stream"
    );
}

function encodePathSegment(segment: string): string {
    // An unescaped "*" is a wildcard to CloudFront
    return encodeURIComponent(segment).replace(/\*/g, "%2A");
}

export function invalidationPathsOf(keys: readonly string[]): string[] {
    const paths = new Set<string>();
    for (const key of keys) {
        const path = `/${key.split("/").map(encodePathSegment).join("/")}`;
        paths.add(path);
        if (key === "index.html" || key.endsWith("/index.html")) {
            paths.add(path.slice(0, -"index.html".length));
        }
    }
    if (paths.size > MAX_INVALIDATION_PATHS) {
        return ["/*"];
    }
    return [...paths].sort();
}

function md5(body: Buffer): string {
    return createHash("md5").update(body).digest("hex");
}

export interface S3ContentSyncOptions {
    readonly region: string;
    readonly logger: ProgressLogger;
}

export function createS3ContentSync(
    options: S3ContentSyncOptions,
): ContentSync {
    const s3 = new S3Client({ region: options.region });
    const cloudFront = new CloudFrontClient({ region: "us-east-1" });

    const listLocal = async (root: string): Promise<string[]> => {
        const entries = await readdir(root, { recursive: true });
        const files: string[] = [];
        for (const entry of entries) {
            if ((await stat(join(root, entry))).isFile()) {
                files.push(entry.split(sep).join("/"));
            }
        }
        return files.sort();
    };

    const listRemote = async (
        bucket: string,
        signal: AbortSignal | undefined,
    ): Promise<Map<string, string>> => {
        const remote = new Map<string, string>();
        let continuationToken: string | undefined;
        do {
            const listing = await s3.send(
                new ListObjectsV2Command({
                    Bucket: bucket,
                    ContinuationToken: continuationToken,
                }),
                { abortSignal: signal },
            );
            for (const object of listing.Contents ?? []) {
                if (object.Key) {
                    // Single-part uploads carry the body's MD5 as their ETag
                    const eTag = (object.ETag ?? "").replaceAll('"', "");
                    remote.set(object.Key, eTag);
                }
            }
            continuationToken = listing.IsTruncated
                ? listing.NextContinuationToken
                : undefined;
        } while (continuationToken);
        return remote;
    };

    return {
        async sync(request: ContentSyncRequest): Promise<ContentSyncReport> {
            const checkCancelled = () => {
                if (request.signal?.aborted) {
                    throw new ApplyCancelledError("Content sync was cancelled");
                }
            };

            const root = request.root.replace(/[\\/]+$/, "");
            const [localKeys, remote] = await Promise.all([
                listLocal(root),
                listRemote(request.bucket, request.signal),
            ]);

            const uploaded: string[] = [];
            let unchanged = 0;
            for (const key of localKeys) {
                checkCancelled();
                const body = await readFile(join(root, ...key.split("/")));
                if (remote.get(key) === md5(body)) {
                    unchanged += 1;
                    continue;
                }
                await s3.send(
                    new PutObjectCommand({
                        Bucket: request.bucket,
                        Key: key,
                        Body: body,
                        ContentType: contentTypeOf(key),
                    }),
                    { abortSignal: request.signal },
                );
                options.logger.debug(`Uploaded ${key}`);
                uploaded.push(key);
            }

            const localSet = new Set(localKeys);
            const deleted = request.deleteExtraneous
                ? [...remote.keys()].filter((key) => !localSet.has(key)).sort()
                : [];
            for (
                let start = 0;
                start < deleted.length;
                start += DELETE_BATCH_SIZE
            ) {
                checkCancelled();
                const batch = deleted.slice(start, start + DELETE_BATCH_SIZE);
                await s3.send(
                    new DeleteObjectsCommand({
                        Bucket: request.bucket,
                        Delete: {
                            Objects: batch.map((key) => ({ Key: key })),
                            Quiet: true,
                        },
                    }),
                    { abortSignal: request.signal },
                );
            }

            let invalidationId: string | undefined;
            const changed = [...uploaded, ...deleted];
            if (request.distributionId && changed.length > 0) {
                const digest = md5(Buffer.from(changed.join("\n")));
                const paths = invalidationPathsOf(changed);
                const response = await cloudFront.send(
                    new CreateInvalidationCommand({
                        DistributionId: request.distributionId,
                        InvalidationBatch: {
                            CallerReference: `sync-${digest}-${Date.now()}`,
                            Paths: { Quantity: paths.length, Items: paths },
                        },
                    }),
                    { abortSignal: request.signal },
                );
                invalidationId = response.Invalidation?.Id;
            }

            return { uploaded, deleted, unchanged, invalidationId };
        },
    };
}
