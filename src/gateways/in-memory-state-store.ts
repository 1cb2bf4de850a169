import { StateLockedError } from "../entities/errors.js";
import type { StateRecord, StateSnapshot } from "../entities/state-record.js";
import type {
    StateStore,
    StateTransaction,
} from "../use-cases/state-store.port.js";

export interface InMemoryStateStore extends StateStore {
    snapshot(): StateSnapshot;
    // Every committed write, in order; a removal is recorded as the address
    readonly writes: readonly (StateRecord | string)[];
    isLocked(): boolean;
}

export function createInMemoryStateStore(
    initial: Iterable<StateRecord> = [],
): InMemoryStateStore {
    const records = new Map<string, StateRecord>(
        [...initial].map((record) => [record.address, record]),
    );
    const writes: (StateRecord | string)[] = [];
    let locked = false;

    return {
        writes,
        snapshot(): StateSnapshot {
            return new Map(records);
        },
        isLocked(): boolean {
            return locked;
        },
        async load(): Promise<StateSnapshot> {
            return new Map(records);
        },
        async beginTransaction(): Promise<StateTransaction> {
            if (locked) {
                throw new StateLockedError("memory", undefined);
            }
            locked = true;
            let released = false;

            const guard = () => {
                if (released) {
                    throw new Error("State transaction was already released");
                }
            };

            return {
                records,
                get(address: string): StateRecord | undefined {
                    return records.get(address);
                },
                async commit(record: StateRecord): Promise<void> {
                    guard();
                    records.set(record.address, record);
                    writes.push(record);
                },
                async remove(address: string): Promise<void> {
                    guard();
                    records.delete(address);
                    writes.push(address);
                },
                async release(): Promise<void> {
                    if (!released) {
                        released = true;
                        locked = false;
                    }
                },
            };
        },
        async forceUnlock(): Promise<boolean> {
            const wasLocked = locked;
            locked = false;
            return wasLocked;
        },
    };
}
