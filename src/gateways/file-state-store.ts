import { randomUUID } from "node:crypto";
import {
    mkdir,
    open,
    readFile,
    rename,
    rm,
    writeFile,
} from "node:fs/promises";
import { hostname } from "node:os";
import { dirname } from "node:path";
import {
    type LockHolder,
    StateCorruptedError,
    StateLockedError,
} from "../entities/errors.js";
import type { StateRecord, StateSnapshot } from "../entities/state-record.js";
import {
    createStateFileCodec,
    type PersistedState,
} from "../use-cases/serialize-state.js";
import type {
    StateStore,
    StateTransaction,
} from "../use-cases/state-store.port.js";

export interface FileStateStoreOptions {
    readonly statePath: string;
}

function isMissingFile(error: unknown): boolean {
    return (
        error instanceof Error &&
        "code" in error &&
        error.code === "ENOENT"
    );
}

function isAlreadyExists(error: unknown): boolean {
    return (
        error instanceof Error &&
        "code" in error &&
        error.code === "EEXIST"
    );
}

function parseLockHolder(text: string): LockHolder | undefined {
    try {
        const raw: unknown = JSON.parse(text);
        if (
            raw !== null &&
            typeof raw === "object" &&
            "id" in raw &&
            "pid" in raw &&
            "hostname" in raw &&
            "created_at" in raw &&
            typeof raw.id === "string" &&
            typeof raw.pid === "number" &&
            typeof raw.hostname === "string" &&
            typeof raw.created_at === "string"
        ) {
            return {
                id: raw.id,
                pid: raw.pid,
                hostname: raw.hostname,
                createdAt: raw.created_at,
            };
        }
        return undefined;
    } catch {
        // A half-written lock file still means the state is locked
        return undefined;
    }
}

export function createFileStateStore(
    options: FileStateStoreOptions,
): StateStore {
    const { statePath } = options;
    const lockPath = `${statePath}.lock`;
    const codec = createStateFileCodec();

    const readState = async (): Promise<PersistedState> => {
        let text: string;
        try {
            text = await readFile(statePath, "utf-8");
        } catch (error) {
            if (isMissingFile(error)) {
                return { serial: 0, lineage: randomUUID(), records: new Map() };
            }
            throw error;
        }
        try {
            return codec.decode(text);
        } catch (error) {
            const message =
                error instanceof Error ? error.message : String(error);
            throw new StateCorruptedError(statePath, message);
        }
    };

    const writeState = async (state: PersistedState): Promise<void> => {
        const temporaryPath = `${statePath}.${process.pid}.tmp`;
        await writeFile(temporaryPath, codec.encode(state), "utf-8");
        await rename(temporaryPath, statePath);
    };

    const acquireLock = async (): Promise<LockHolder> => {
        const holder: LockHolder = {
            id: randomUUID(),
            pid: process.pid,
            hostname: hostname(),
            createdAt: new Date().toISOString(),
        };
        await mkdir(dirname(statePath), { recursive: true });
        try {
            const handle = await open(lockPath, "wx");
            try {
                await handle.writeFile(
                    JSON.stringify({
                        id: holder.id,
                        pid: holder.pid,
                        hostname: holder.hostname,
                        created_at: holder.createdAt,
                    }),
                    "utf-8",
                );
            } finally {
                await handle.close();
            }
        } catch (error) {
            if (isAlreadyExists(error)) {
                const existing = await readFile(lockPath, "utf-8").catch(
                    () => "",
                );
                throw new StateLockedError(lockPath, parseLockHolder(existing));
            }
            throw error;
        }
        return holder;
    };

    return {
        async load(): Promise<StateSnapshot> {
            const state = await readState();
            return state.records;
        },

        async beginTransaction(): Promise<StateTransaction> {
            await acquireLock();

            let state: PersistedState;
            try {
                state = await readState();
            } catch (error) {
                await rm(lockPath, { force: true });
                throw error;
            }

            const records = new Map<string, StateRecord>(state.records);
            let serial = state.serial;
            let released = false;
            let queue: Promise<void> = Promise.resolve();

            // Commits write whole snapshots one at a time, in call order
            const enqueue = (mutate: () => void): Promise<void> => {
                if (released) {
                    return Promise.reject(
                        new Error("State transaction was already released"),
                    );
                }
                const run = queue.then(async () => {
                    mutate();
                    serial += 1;
                    await writeState({
                        serial,
                        lineage: state.lineage,
                        records,
                    });
                });
                queue = run.catch(() => undefined);
                return run;
            };

            return {
                records,
                get(address: string): StateRecord | undefined {
                    return records.get(address);
                },
                commit(record: StateRecord): Promise<void> {
                    return enqueue(() => {
                        records.set(record.address, record);
                    });
                },
                remove(address: string): Promise<void> {
                    return enqueue(() => {
                        records.delete(address);
                    });
                },
                async release(): Promise<void> {
                    if (released) {
                        return;
                    }
                    released = true;
                    try {
                        await queue;
                    } finally {
                        await rm(lockPath, { force: true });
                    }
                },
            };
        },

        async forceUnlock(): Promise<boolean> {
            try {
                await rm(lockPath);
                return true;
            } catch (error) {
                if (isMissingFile(error)) {
                    return false;
                }
                throw error;
            }
        },
    };
}
